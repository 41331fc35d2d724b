import type { PreviewRecord } from '../types.js'
import { loadHtml, visibleText } from './html.js'

export const PREVIEW_LENGTH = 2000

/**
 * Used for page types with no dedicated extractor.
 */
export function extractPreview(html: string): PreviewRecord {
  return {
    kind: 'preview',
    textPreview: visibleText(loadHtml(html)).slice(0, PREVIEW_LENGTH),
    note: 'No dedicated extractor for this page type; first part of the visible text only.',
  }
}
