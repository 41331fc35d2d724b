import { describe, it, expect } from 'vitest'
import { MemorySnapshotStore } from '../memory-store.js'
import type { NewSnapshot } from '../types.js'

const createSnapshot = (overrides: Partial<NewSnapshot> = {}): NewSnapshot => ({
  university: 'Example University',
  pageType: 'fees',
  url: 'https://example.edu/cost',
  extractedAt: new Date('2026-03-01T00:00:00Z'),
  contentHash: 'hash-1',
  payload: '{}',
  ...overrides,
})

describe('MemorySnapshotStore', () => {
  it('rejects a second row with the same url and content hash', async () => {
    const store = new MemorySnapshotStore()

    const first = await store.insert(createSnapshot())
    const second = await store.insert(createSnapshot({ extractedAt: new Date('2026-03-02T00:00:00Z') }))

    expect(first).toEqual({ status: 'inserted', id: '1' })
    expect(second).toEqual({ status: 'duplicate' })
    expect(await store.count()).toBe(1)
  })

  it('accepts the same hash under a different url', async () => {
    const store = new MemorySnapshotStore()

    await store.insert(createSnapshot())
    const result = await store.insert(createSnapshot({ url: 'https://example.edu/other' }))

    expect(result.status).toBe('inserted')
  })

  it('lists a university newest first and breaks ties by id', async () => {
    const store = new MemorySnapshotStore()
    const sameTime = new Date('2026-03-05T00:00:00Z')

    await store.insert(createSnapshot({ contentHash: 'old', extractedAt: new Date('2026-03-01T00:00:00Z') }))
    await store.insert(createSnapshot({ contentHash: 'tie-a', extractedAt: sameTime }))
    await store.insert(createSnapshot({ contentHash: 'tie-b', extractedAt: sameTime }))
    await store.insert(createSnapshot({ university: 'Other College', contentHash: 'x' }))

    const rows = await store.listByUniversity('Example University')

    expect(rows.map((r) => r.contentHash)).toEqual(['tie-b', 'tie-a', 'old'])
  })

  it('frees the unique key when a row is deleted', async () => {
    const store = new MemorySnapshotStore()
    const inserted = await store.insert(createSnapshot())
    if (inserted.status !== 'inserted') throw new Error('expected insert')

    expect(await store.delete(inserted.id)).toBe(true)
    expect(await store.delete(inserted.id)).toBe(false)
    expect((await store.insert(createSnapshot())).status).toBe('inserted')
  })

  it('counts by university and page type', async () => {
    const store = new MemorySnapshotStore()
    await store.insert(createSnapshot({ contentHash: '1' }))
    await store.insert(createSnapshot({ contentHash: '2', pageType: 'aid', url: 'https://example.edu/aid' }))
    await store.insert(createSnapshot({ contentHash: '3', university: 'Other College' }))

    expect(await store.count({ university: 'Example University' })).toBe(2)
    expect(await store.count({ university: 'Example University', pageType: 'aid' })).toBe(1)
    expect(await store.count({ pageType: 'fees' })).toBe(2)
  })

  it('returns copies from listLatest', async () => {
    const store = new MemorySnapshotStore()
    await store.insert(createSnapshot())

    const [row] = await store.listLatest(10)
    row.payload = 'mutated'

    expect((await store.listLatest(10))[0].payload).toBe('{}')
    expect(await store.listLatest(0)).toEqual([])
  })
})
