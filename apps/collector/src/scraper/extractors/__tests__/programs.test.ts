import { describe, it, expect } from 'vitest'
import { extractPrograms } from '../programs.js'

describe('extractPrograms', () => {
  it('keeps discipline-like anchors and list items, anchors first', () => {
    const record = extractPrograms(`
      <nav><a href="/apply">Apply Now</a><a href="/menu">Menu</a></nav>
      <a href="/cs">Computer Science</a>
      <a href="/history">History</a>
      <a href="/fin">Financial Engineering</a>
      <ul>
        <li>Mechanical Engineering</li>
        <li><a href="/cs">Computer Science</a></li>
        <li>Campus Dining</li>
        <li>Art</li>
      </ul>`)

    expect(record.kind).toBe('programs')
    expect(record.programs).toEqual(['Computer Science', 'History', 'Mechanical Engineering', 'Art'])
    expect(record.countEstimate).toBe(4)
  })

  it('caps the list at 120 programs', () => {
    const items = Array.from({ length: 130 }, (_, i) => `<li>Area Studies ${i}</li>`).join('')
    const record = extractPrograms(`<ul>${items}</ul>`)

    expect(record.programs).toHaveLength(120)
    expect(record.countEstimate).toBe(120)
  })
})
