/**
 * Snapshot storage model.
 *
 * A snapshot is one extraction of one page. Rows are append-only and unique on
 * (url, contentHash); retention is the only thing that deletes them.
 */

export const PAGE_TYPES = ['fees', 'admissions', 'deadlines', 'programs', 'aid', 'about'] as const

export type PageType = (typeof PAGE_TYPES)[number]

export function isPageType(value: string): value is PageType {
  return (PAGE_TYPES as readonly string[]).includes(value)
}

export interface NewSnapshot {
  university: string
  pageType: PageType
  url: string
  extractedAt: Date
  /** sha256 hex of the normalized document */
  contentHash: string
  /** Encoded extraction record (JSON text) */
  payload: string
}

export interface Snapshot extends NewSnapshot {
  id: string
}

export type InsertResult =
  | { status: 'inserted'; id: string }
  | { status: 'duplicate' }

export interface SnapshotFilter {
  university?: string
  pageType?: PageType
}

/**
 * Storage operations the collector depends on. Engine choice is up to the caller.
 */
export interface SnapshotStore {
  /**
   * Atomic insert. A row with the same (url, contentHash) already present is
   * reported as `duplicate`, not thrown.
   */
  insert(snapshot: NewSnapshot): Promise<InsertResult>

  /** Newest first: extractedAt desc, then id desc. */
  listByUniversity(university: string): Promise<Snapshot[]>

  /** Returns false when the row was already gone. */
  delete(id: string): Promise<boolean>

  count(filter?: SnapshotFilter): Promise<number>

  /** Newest first across all universities. */
  listLatest(limit: number): Promise<Snapshot[]>
}
