/**
 * Aid and about extractors. Both keep the first few substantial paragraphs.
 */

import type { AboutRecord, AidRecord } from '../types.js'
import { lengthBetween, loadHtml, selectTexts } from './html.js'

const MAX_PARAGRAPHS = 4

export function extractSummaryParagraphs(html: string, maxParagraphs = MAX_PARAGRAPHS): string[] {
  return selectTexts(loadHtml(html), 'p')
    .filter((text) => lengthBetween(text, 60, 350))
    .slice(0, maxParagraphs)
}

export function extractAid(html: string): AidRecord {
  return {
    kind: 'aid',
    summary: extractSummaryParagraphs(html),
    note: 'Financial aid summary extracted from the leading paragraphs. Use the official page for details.',
  }
}

export function extractAbout(html: string): AboutRecord {
  return {
    kind: 'about',
    overview: extractSummaryParagraphs(html),
    note: 'Overview extracted from the leading paragraphs. Use the official page for details.',
  }
}
