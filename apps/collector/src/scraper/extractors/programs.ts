/**
 * Programs extractor: link and list texts filtered down to discipline names.
 */

import type { ProgramsRecord } from '../types.js'
import { containsAny, dedupe, lengthBetween, loadHtml, selectTexts } from './html.js'
import { DISCIPLINE_KEYWORDS, NAVIGATION_KEYWORDS } from './keywords.js'

const MAX_PROGRAMS = 120

const PROGRAMS_NOTE =
  'Programs extracted from link and list texts and filtered heuristically. Official catalogs are the source of truth.'

export function extractPrograms(html: string): ProgramsRecord {
  const $ = loadHtml(html)

  const anchors = selectTexts($, 'a').filter(
    (text) => lengthBetween(text, 3, 60) && !containsAny(text, NAVIGATION_KEYWORDS)
  )
  const listItems = selectTexts($, 'li').filter((text) => lengthBetween(text, 3, 80))

  const programs = dedupe(
    [...anchors, ...listItems].filter((text) => containsAny(text, DISCIPLINE_KEYWORDS)),
    MAX_PROGRAMS
  )

  return {
    kind: 'programs',
    programs,
    countEstimate: programs.length,
    note: PROGRAMS_NOTE,
  }
}
