/**
 * Retention
 *
 * Keeps the newest N snapshots per university across all page types; deletes
 * the rest. Ordering comes from the store (extractedAt desc, id desc).
 */

import type { SnapshotStore } from '@campuswatch/db'
import type { ILogger } from '@campuswatch/logger'
import type { RetentionResult } from '../types.js'

export async function trimUniversity(
  store: SnapshotStore,
  university: string,
  maxRecords: number,
  logger: ILogger
): Promise<RetentionResult> {
  const snapshots = await store.listByUniversity(university)
  const excess = snapshots.slice(maxRecords)

  let deleted = 0
  for (const snapshot of excess) {
    if (await store.delete(snapshot.id)) {
      deleted++
    }
  }

  if (deleted > 0) {
    logger.info('Trimmed old snapshots', { university, kept: snapshots.length - excess.length, deleted })
  }

  return { university, kept: snapshots.length - excess.length, deleted }
}
