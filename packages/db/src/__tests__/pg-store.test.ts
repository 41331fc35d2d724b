import { describe, it, expect, vi, beforeEach } from 'vitest'
import { PgSnapshotStore, ensureSchema, isUniqueViolation, type Queryable } from '../pg-store.js'
import type { NewSnapshot } from '../types.js'

const query = vi.fn()
const db: Queryable = { query }

const createSnapshot = (overrides: Partial<NewSnapshot> = {}): NewSnapshot => ({
  university: 'Example University',
  pageType: 'fees',
  url: 'https://example.edu/cost',
  extractedAt: new Date('2026-03-01T12:00:00Z'),
  contentHash: 'a'.repeat(64),
  payload: '{"kind":"fees"}',
  ...overrides,
})

describe('PgSnapshotStore', () => {
  beforeEach(() => {
    query.mockReset()
  })

  describe('insert', () => {
    it('returns the new id', async () => {
      query.mockResolvedValue({ rows: [{ id: '42' }], rowCount: 1 })
      const store = new PgSnapshotStore(db)

      const result = await store.insert(createSnapshot())

      expect(result).toEqual({ status: 'inserted', id: '42' })
      const [sql, values] = query.mock.calls[0]
      expect(sql).toContain('INSERT INTO extracted_snapshots')
      expect(values).toEqual([
        'Example University',
        'fees',
        'https://example.edu/cost',
        new Date('2026-03-01T12:00:00Z'),
        'a'.repeat(64),
        '{"kind":"fees"}',
      ])
    })

    it('reports a unique violation as duplicate', async () => {
      query.mockRejectedValue(Object.assign(new Error('duplicate key value'), { code: '23505' }))
      const store = new PgSnapshotStore(db)

      await expect(store.insert(createSnapshot())).resolves.toEqual({ status: 'duplicate' })
    })

    it('rethrows other database errors', async () => {
      query.mockRejectedValue(Object.assign(new Error('connection terminated'), { code: '57P01' }))
      const store = new PgSnapshotStore(db)

      await expect(store.insert(createSnapshot())).rejects.toThrow('connection terminated')
    })
  })

  it('maps rows from listByUniversity newest first', async () => {
    query.mockResolvedValue({
      rows: [
        {
          id: '7',
          university: 'Example University',
          page_type: 'about',
          url: 'https://example.edu/about',
          extracted_at: new Date('2026-03-02T00:00:00Z'),
          content_hash: 'b'.repeat(64),
          payload: '{}',
        },
      ],
    })
    const store = new PgSnapshotStore(db)

    const rows = await store.listByUniversity('Example University')

    expect(rows).toEqual([
      {
        id: '7',
        university: 'Example University',
        pageType: 'about',
        url: 'https://example.edu/about',
        extractedAt: new Date('2026-03-02T00:00:00Z'),
        contentHash: 'b'.repeat(64),
        payload: '{}',
      },
    ])
    expect(query.mock.calls[0][0]).toContain('ORDER BY extracted_at DESC, id DESC')
    expect(query.mock.calls[0][1]).toEqual(['Example University'])
  })

  it('reports whether delete removed a row', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 })
    const store = new PgSnapshotStore(db)

    expect(await store.delete('1')).toBe(true)
    expect(await store.delete('1')).toBe(false)
  })

  it('builds count filters from the given fields only', async () => {
    query.mockResolvedValue({ rows: [{ count: '3' }] })
    const store = new PgSnapshotStore(db)

    expect(await store.count({ university: 'Example University', pageType: 'aid' })).toBe(3)
    expect(query.mock.calls[0][0]).toBe(
      'SELECT COUNT(*) AS count FROM extracted_snapshots WHERE university = $1 AND page_type = $2'
    )
    expect(query.mock.calls[0][1]).toEqual(['Example University', 'aid'])

    await store.count()
    expect(query.mock.calls[1][0]).toBe('SELECT COUNT(*) AS count FROM extracted_snapshots')
    expect(query.mock.calls[1][1]).toEqual([])
  })

  it('passes the limit to listLatest', async () => {
    query.mockResolvedValue({ rows: [] })
    const store = new PgSnapshotStore(db)

    await store.listLatest(5)

    expect(query.mock.calls[0][1]).toEqual([5])
  })
})

describe('ensureSchema', () => {
  it('runs the bundled schema file', async () => {
    query.mockReset()
    query.mockResolvedValue({ rows: [] })

    await ensureSchema(db)

    expect(query).toHaveBeenCalledTimes(1)
    expect(query.mock.calls[0][0]).toContain('CREATE TABLE IF NOT EXISTS extracted_snapshots')
    expect(query.mock.calls[0][0]).toContain('UNIQUE (url, content_hash)')
  })
})

describe('isUniqueViolation', () => {
  it('matches only SQLSTATE 23505', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true)
    expect(isUniqueViolation({ code: '23503' })).toBe(false)
    expect(isUniqueViolation(new Error('x'))).toBe(false)
    expect(isUniqueViolation(null)).toBe(false)
  })
})
