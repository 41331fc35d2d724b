/**
 * Deadlines extractor
 *
 * Works line by line over the visible text. Nothing here parses a date; lines are
 * kept verbatim for a reader to check.
 */

import type { DeadlinesRecord } from '../types.js'
import { containsAny, dedupe, lengthBetween, loadHtml, visibleLines } from './html.js'
import { DEADLINE_KEYWORDS, MONTH_ABBREVIATIONS } from './keywords.js'

const MAX_LINES = 25

const MONTH =
  '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)'

/** "Nov 1", "January 15", "Sept. 3" */
export const MONTH_DAY_PATTERN = new RegExp(`\\b${MONTH}\\.?\\s+\\d{1,2}\\b`, 'i')

export const EARLY_HINT = 'Likely around Nov (check official page)'
export const REGULAR_HINT = 'Likely around Jan (check official page)'

const DEADLINES_NOTE =
  'Deadlines extracted from lines containing date or deadline keywords. Inferred buckets are low-confidence hints. Confirm on the official page.'

function isHighlight(line: string): boolean {
  if (!lengthBetween(line, 10, 240)) return false
  if (!containsAny(line, DEADLINE_KEYWORDS)) return false
  return MONTH_DAY_PATTERN.test(line) || containsAny(line, MONTH_ABBREVIATIONS)
}

function isDateLine(line: string): boolean {
  return lengthBetween(line, 10, 200) && MONTH_DAY_PATTERN.test(line)
}

export function inferBuckets(lines: string[]): DeadlinesRecord['inferred'] {
  const joined = lines.join(' | ').toLowerCase()
  return {
    early: joined.includes('nov') && joined.includes('early') ? EARLY_HINT : null,
    regular: joined.includes('jan') && joined.includes('regular') ? REGULAR_HINT : null,
  }
}

export function extractDeadlines(html: string): DeadlinesRecord {
  const lines = visibleLines(loadHtml(html))

  return {
    kind: 'deadlines',
    highlights: dedupe(lines.filter(isHighlight), MAX_LINES),
    dateLines: dedupe(lines.filter(isDateLine), MAX_LINES),
    inferred: inferBuckets(lines),
    note: DEADLINES_NOTE,
  }
}
