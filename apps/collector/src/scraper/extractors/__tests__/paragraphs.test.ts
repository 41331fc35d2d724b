import { describe, it, expect } from 'vitest'
import { extractAbout, extractAid } from '../paragraphs.js'

const paragraph = (n: number) =>
  `Paragraph ${n} describes grants, scholarships and work-study options available to students.`

const PAGE = [
  '<p>Too short.</p>',
  `<p>${'x'.repeat(400)}</p>`,
  ...[1, 2, 3, 4, 5].map((n) => `<p>${paragraph(n)}</p>`),
].join('\n')

describe('paragraph extractors', () => {
  it('aid keeps the first four substantial paragraphs', () => {
    const record = extractAid(PAGE)

    expect(record.kind).toBe('aid')
    expect(record.summary).toEqual([paragraph(1), paragraph(2), paragraph(3), paragraph(4)])
  })

  it('about uses the same selection under overview', () => {
    const record = extractAbout(PAGE)

    expect(record.kind).toBe('about')
    expect(record.overview).toEqual(extractAid(PAGE).summary)
  })

  it('collapses whitespace inside a paragraph', () => {
    const record = extractAbout(`<p>Founded   in 1850,\n the college <b>enrolls</b> about four thousand undergraduate students.</p>`)

    expect(record.overview).toEqual([
      'Founded in 1850, the college enrolls about four thousand undergraduate students.',
    ])
  })
})
