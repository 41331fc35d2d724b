import { describe, it, expect } from 'vitest'
import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_SOURCES_PATH } from '../config/settings.js'
import { ConfigurationError } from '../errors.js'
import { listUniversities, loadSources, parseSources, sourcesForUniversity } from '../sources.js'

describe('parseSources', () => {
  it('maps entries to sources', () => {
    expect(
      parseSources([{ university: 'Example University', page_type: 'fees', url: 'https://example.edu/cost' }])
    ).toEqual([{ university: 'Example University', pageType: 'fees', url: 'https://example.edu/cost' }])
  })

  it('rejects an unknown page type and a bad url', () => {
    try {
      parseSources([
        { university: 'Example University', page_type: 'housing', url: 'https://example.edu/housing' },
        { university: 'Example University', page_type: 'aid', url: 'not a url' },
      ])
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (!(error instanceof ConfigurationError)) return
      expect(error.issues.map((issue) => issue.path)).toEqual(['0.page_type', '1.url'])
    }
  })

  it('rejects a non-array document', () => {
    expect(() => parseSources({ sources: [] })).toThrow(ConfigurationError)
  })
})

describe('loadSources', () => {
  it('loads the bundled source list', async () => {
    const sources = await loadSources(DEFAULT_SOURCES_PATH)

    expect(sources.length).toBeGreaterThan(0)
    expect(listUniversities(sources)).toContain('Stanford University')
  })

  it('reports a missing file as a configuration error', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'campuswatch-'))

    await expect(loadSources(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('reports malformed JSON as a configuration error', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'campuswatch-'))
    const path = join(dir, 'sources.json')
    await writeFile(path, '[{"university": ')

    await expect(loadSources(path)).rejects.toThrow('is not valid JSON')
  })
})

describe('sourcesForUniversity', () => {
  it('matches names case-insensitively', () => {
    const sources = parseSources([
      { university: 'Example University', page_type: 'fees', url: 'https://example.edu/cost' },
      { university: 'Sample College', page_type: 'aid', url: 'https://sample.edu/aid' },
    ])

    expect(sourcesForUniversity(sources, ' example university ')).toHaveLength(1)
    expect(listUniversities(sources)).toEqual(['Example University', 'Sample College'])
  })
})
