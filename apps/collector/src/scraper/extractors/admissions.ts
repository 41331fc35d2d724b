/**
 * Admissions extractor: page headings plus list items that read like requirements.
 */

import type { AdmissionsRecord } from '../types.js'
import { containsAny, dedupe, lengthBetween, loadHtml, selectTexts } from './html.js'
import { REQUIREMENT_KEYWORDS } from './keywords.js'

const MAX_HEADINGS = 30
const MAX_REQUIREMENTS = 40

const ADMISSIONS_NOTE =
  'Admissions requirements are extracted from headings and bullet points. Always verify on the official admissions page.'

export function extractAdmissions(html: string): AdmissionsRecord {
  const $ = loadHtml(html)

  const headings = selectTexts($, 'h1, h2, h3')
    .filter((text) => text.length > 0)
    .slice(0, MAX_HEADINGS)

  const candidates = selectTexts($, 'li').filter(
    (text) => lengthBetween(text, 20, 220) && containsAny(text, REQUIREMENT_KEYWORDS)
  )

  return {
    kind: 'admissions',
    headings,
    requirements: dedupe(candidates, MAX_REQUIREMENTS),
    note: ADMISSIONS_NOTE,
  }
}
