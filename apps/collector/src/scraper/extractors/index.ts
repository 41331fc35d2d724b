/**
 * Extractor registry
 *
 * One extractor per page type. The Record type makes a missing page type a
 * compile error; unknown strings from outside go to the preview fallback.
 */

import { isPageType } from '@campuswatch/db'
import type { ExtractionRecord, Extractor, PageType } from '../types.js'
import { extractAdmissions } from './admissions.js'
import { extractDeadlines } from './deadlines.js'
import { extractPreview } from './fallback.js'
import { extractFees } from './fees.js'
import { extractAbout, extractAid } from './paragraphs.js'
import { extractPrograms } from './programs.js'

export const EXTRACTORS: Record<PageType, Extractor> = {
  fees: extractFees,
  admissions: extractAdmissions,
  deadlines: extractDeadlines,
  programs: extractPrograms,
  aid: extractAid,
  about: extractAbout,
}

export function extractByType(pageType: string, html: string): ExtractionRecord {
  if (isPageType(pageType)) {
    return EXTRACTORS[pageType](html)
  }
  return extractPreview(html)
}

export { extractAdmissions, extractDeadlines, extractPreview, extractFees, extractAbout, extractAid, extractPrograms }
export { cleanText, visibleText, visibleLines } from './html.js'
