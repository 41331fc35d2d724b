import type { InsertResult, NewSnapshot, Snapshot, SnapshotFilter, SnapshotStore } from './types.js'

/**
 * In-process snapshot store for development runs without DATABASE_URL and for tests.
 * Contents are lost on restart. Every method completes its check-and-write before
 * yielding, so concurrent callers see the same uniqueness guarantee as the SQL table.
 */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly rows = new Map<string, Snapshot>()
  private readonly keys = new Set<string>()
  private nextId = 1

  async insert(snapshot: NewSnapshot): Promise<InsertResult> {
    const key = uniqueKey(snapshot.url, snapshot.contentHash)
    if (this.keys.has(key)) {
      return { status: 'duplicate' }
    }

    const id = String(this.nextId++)
    this.keys.add(key)
    this.rows.set(id, { ...snapshot, id })
    return { status: 'inserted', id }
  }

  async listByUniversity(university: string): Promise<Snapshot[]> {
    return this.sorted().filter((row) => row.university === university)
  }

  async delete(id: string): Promise<boolean> {
    const row = this.rows.get(id)
    if (!row) return false

    this.rows.delete(id)
    this.keys.delete(uniqueKey(row.url, row.contentHash))
    return true
  }

  async count(filter: SnapshotFilter = {}): Promise<number> {
    let total = 0
    for (const row of this.rows.values()) {
      if (filter.university !== undefined && row.university !== filter.university) continue
      if (filter.pageType !== undefined && row.pageType !== filter.pageType) continue
      total++
    }
    return total
  }

  async listLatest(limit: number): Promise<Snapshot[]> {
    return this.sorted().slice(0, Math.max(0, limit))
  }

  private sorted(): Snapshot[] {
    return Array.from(this.rows.values(), (row) => ({ ...row })).sort(
      (a, b) => b.extractedAt.getTime() - a.extractedAt.getTime() || Number(b.id) - Number(a.id)
    )
  }
}

function uniqueKey(url: string, contentHash: string): string {
  return `${url}\u0000${contentHash}`
}
