import { describe, it, expect } from 'vitest'
import { PAGE_TYPES } from '@campuswatch/db'
import { EXTRACTORS, extractByType } from '../index.js'
import { PREVIEW_LENGTH } from '../fallback.js'

const AWKWARD_INPUTS = ['', 'plain text with no markup', '<div><p>unclosed <table><tr><td>$', '<<<>>>', '</p></div>']

describe('extractByType', () => {
  it('has an extractor for every page type', () => {
    expect(Object.keys(EXTRACTORS).sort()).toEqual([...PAGE_TYPES].sort())
  })

  it('dispatches on the page type', () => {
    for (const pageType of PAGE_TYPES) {
      expect(extractByType(pageType, '<p>hello</p>').kind).toBe(pageType)
    }
  })

  it('never throws on empty, pattern-free or malformed input', () => {
    for (const pageType of [...PAGE_TYPES, 'unknown']) {
      for (const input of AWKWARD_INPUTS) {
        expect(() => extractByType(pageType, input)).not.toThrow()
      }
    }
  })

  it('handles deeply nested markup', () => {
    const depth = 10000
    const html =
      '<div>'.repeat(depth) +
      '<p>Tuition and fees: $41,200 per year</p><p>Early action deadline: November 1</p>' +
      '</div>'.repeat(depth)

    const fees = extractByType('fees', html)
    expect(fees.kind === 'fees' && fees.summary.tuition).toBe('$41,200')

    const deadlines = extractByType('deadlines', html)
    expect(deadlines).toMatchObject({
      dateLines: ['Early action deadline: November 1'],
      inferred: { early: 'Likely around Nov (check official page)', regular: null },
    })

    expect(extractByType('unknown', html)).toMatchObject({
      kind: 'preview',
      textPreview: 'Tuition and fees: $41,200 per year Early action deadline: November 1',
    })
  })

  it('reads list items with deeply nested content', () => {
    const depth = 10000
    const html = `<ul><li>${'<span>'.repeat(depth)}Official transcripts are required${'</span>'.repeat(depth)}</li></ul>`

    expect(extractByType('admissions', html)).toMatchObject({
      requirements: ['Official transcripts are required'],
    })
  })

  it('returns empty fields for empty input', () => {
    expect(extractByType('fees', '')).toMatchObject({
      estimatedTotal: null,
      tables: [],
      summary: { tuition: null, fees: null },
    })
    expect(extractByType('programs', '')).toMatchObject({ programs: [], countEstimate: 0 })
  })

  it('falls back to a text preview for unknown page types', () => {
    const record = extractByType('housing', `<p>${'a'.repeat(2500)}</p>`)

    expect(record.kind).toBe('preview')
    if (record.kind !== 'preview') return
    expect(record.textPreview).toHaveLength(PREVIEW_LENGTH)
  })

  it('leaves hidden subtrees out of the preview', () => {
    const record = extractByType(
      'housing',
      '<p>Shown</p><noscript>Enable JavaScript</noscript><template><p>Hidden</p></template><style>p{}</style>'
    )

    expect(record).toMatchObject({ kind: 'preview', textPreview: 'Shown' })
  })
})
