/**
 * PostgreSQL snapshot store.
 *
 * Duplicate detection relies on the (url, content_hash) unique constraint:
 * a plain INSERT is attempted and a unique violation is reported as `duplicate`.
 * That keeps concurrent runs correct without any read-before-write.
 */

import { readFile } from 'node:fs/promises'
import type { Pool } from 'pg'
import type { InsertResult, NewSnapshot, Snapshot, SnapshotFilter, SnapshotStore } from './types.js'
import { isPageType } from './types.js'

/** Anything that runs a parameterized query: a Pool or a checked-out client. */
export type Queryable = Pick<Pool, 'query'>

/** Postgres SQLSTATE for unique_violation */
export const UNIQUE_VIOLATION = '23505'

interface SnapshotRow {
  id: string
  university: string
  page_type: string
  url: string
  extracted_at: Date
  content_hash: string
  payload: string
}

const COLUMNS = 'id, university, page_type, url, extracted_at, content_hash, payload'

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  )
}

function toSnapshot(row: SnapshotRow): Snapshot {
  if (!isPageType(row.page_type)) {
    throw new Error(`Unknown page_type '${row.page_type}' on snapshot ${row.id}`)
  }
  return {
    id: String(row.id),
    university: row.university,
    pageType: row.page_type,
    url: row.url,
    extractedAt: row.extracted_at,
    contentHash: row.content_hash,
    payload: row.payload,
  }
}

export class PgSnapshotStore implements SnapshotStore {
  constructor(private readonly db: Queryable) {}

  async insert(snapshot: NewSnapshot): Promise<InsertResult> {
    try {
      const result = await this.db.query<{ id: string }>(
        `INSERT INTO extracted_snapshots (university, page_type, url, extracted_at, content_hash, payload)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id`,
        [
          snapshot.university,
          snapshot.pageType,
          snapshot.url,
          snapshot.extractedAt,
          snapshot.contentHash,
          snapshot.payload,
        ]
      )
      return { status: 'inserted', id: String(result.rows[0].id) }
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'duplicate' }
      }
      throw error
    }
  }

  async listByUniversity(university: string): Promise<Snapshot[]> {
    const result = await this.db.query<SnapshotRow>(
      `SELECT ${COLUMNS} FROM extracted_snapshots
       WHERE university = $1
       ORDER BY extracted_at DESC, id DESC`,
      [university]
    )
    return result.rows.map(toSnapshot)
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM extracted_snapshots WHERE id = $1', [id])
    return (result.rowCount ?? 0) > 0
  }

  async count(filter: SnapshotFilter = {}): Promise<number> {
    const clauses: string[] = []
    const values: string[] = []

    if (filter.university !== undefined) {
      values.push(filter.university)
      clauses.push(`university = $${values.length}`)
    }
    if (filter.pageType !== undefined) {
      values.push(filter.pageType)
      clauses.push(`page_type = $${values.length}`)
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : ''
    const result = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM extracted_snapshots${where}`,
      values
    )
    return parseInt(result.rows[0]?.count ?? '0', 10)
  }

  async listLatest(limit: number): Promise<Snapshot[]> {
    const result = await this.db.query<SnapshotRow>(
      `SELECT ${COLUMNS} FROM extracted_snapshots
       ORDER BY extracted_at DESC, id DESC
       LIMIT $1`,
      [limit]
    )
    return result.rows.map(toSnapshot)
  }
}

const SCHEMA_FILES = ['001_snapshots.sql']

/**
 * Apply the bundled schema (create-if-not-exists, safe to repeat).
 */
export async function ensureSchema(db: Queryable): Promise<void> {
  for (const file of SCHEMA_FILES) {
    const sql = await readFile(new URL(`../sql/${file}`, import.meta.url), 'utf8')
    await db.query(sql)
  }
}
