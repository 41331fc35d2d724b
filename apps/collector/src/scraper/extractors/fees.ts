/**
 * Fees extractor
 *
 * Label → amount pairs are read from the visible text; cost tables are kept as
 * raw rows alongside for display.
 */

import type { CheerioAPI } from 'cheerio'
import type { FeeCategory, FeeSummary, FeesRecord, TextTable } from '../types.js'
import { elementText, loadHtml, visibleText } from './html.js'

const MAX_TABLES = 3
const MAX_ROWS = 25

/** Max characters between a label and its `$` amount */
const MAX_LABEL_GAP = 120

const MIN_CATEGORIES_FOR_TOTAL = 3

const FEE_LABELS: Record<FeeCategory, string> = {
  tuition: 'Tuition',
  fees: 'Fees',
  housing: 'Housing|Room',
  food: 'Food|Board|Meal',
  books: 'Books',
  travel: 'Travel|Transportation',
  personal: 'Personal',
}

const FEE_CATEGORIES: FeeCategory[] = ['tuition', 'fees', 'housing', 'food', 'books', 'travel', 'personal']

const FEES_NOTE =
  'Fees extracted from official page text and tables; values can vary by year and program. Verify on the official page.'

const TOTAL_DISCLAIMER =
  'Naive sum of the amounts found above; categories may overlap or be missing. Not an official cost of attendance.'

export function extractTables($: CheerioAPI): TextTable[] {
  const tables: TextTable[] = []

  for (const table of $('table').toArray().slice(0, MAX_TABLES)) {
    const rows: TextTable = []
    for (const tr of $(table).find('tr').toArray().slice(0, MAX_ROWS)) {
      const cells = $(tr)
        .find('th, td')
        .toArray()
        .map((cell) => elementText(cell))
        .filter((cell) => cell.length > 0)
      if (cells.length > 0) rows.push(cells)
    }
    if (rows.length > 0) tables.push(rows)
  }

  return tables
}

/**
 * First `label ... $amount` in the text with no other `$` in between.
 * Returns the amount as `$60,000`, or null.
 */
export function findAmount(text: string, label: string): string | null {
  const pattern = new RegExp(`(?:${label})[^$]{0,${MAX_LABEL_GAP}}\\$\\s*(\\d[\\d,]*)`, 'i')
  const match = pattern.exec(text)
  if (!match) return null
  const digits = match[1].replace(/,+$/, '')
  return `$${digits}`
}

function parseAmount(amount: string): number {
  return Number.parseInt(amount.replace(/[$,]/g, ''), 10)
}

export function estimateTotal(summary: FeeSummary): FeesRecord['estimatedTotal'] {
  const amounts = FEE_CATEGORIES.map((category) => summary[category])
    .filter((value): value is string => value !== null)
    .map(parseAmount)
    .filter((value) => Number.isFinite(value))

  if (amounts.length < MIN_CATEGORIES_FOR_TOTAL) return null

  const sum = amounts.reduce((total, value) => total + value, 0)
  return { amount: `$${sum.toLocaleString('en-US')}`, disclaimer: TOTAL_DISCLAIMER }
}

export function extractFees(html: string): FeesRecord {
  const $ = loadHtml(html)
  const text = visibleText($)

  const summary: FeeSummary = {
    tuition: findAmount(text, FEE_LABELS.tuition),
    fees: findAmount(text, FEE_LABELS.fees),
    housing: findAmount(text, FEE_LABELS.housing),
    food: findAmount(text, FEE_LABELS.food),
    books: findAmount(text, FEE_LABELS.books),
    travel: findAmount(text, FEE_LABELS.travel),
    personal: findAmount(text, FEE_LABELS.personal),
  }

  return {
    kind: 'fees',
    summary,
    estimatedTotal: estimateTotal(summary),
    tables: extractTables($),
    note: FEES_NOTE,
  }
}
