/**
 * Snapshot Writer
 *
 * Maps one extraction to a snapshot row and inserts it. Unchanged content comes
 * back as a `duplicate` insert result; any other storage failure is thrown.
 */

import type { InsertResult, NewSnapshot, SnapshotStore } from '@campuswatch/db'
import type { ILogger } from '@campuswatch/logger'
import { sanitizeUrl } from '../../config/structured-log.js'
import type { ExtractionRecord, Source } from '../types.js'
import { encodePayload } from './payload.js'

export interface SnapshotDraft {
  source: Source
  contentHash: string
  record: ExtractionRecord
  extractedAt: Date
}

export function toNewSnapshot(draft: SnapshotDraft): NewSnapshot {
  return {
    university: draft.source.university,
    pageType: draft.source.pageType,
    url: draft.source.url,
    extractedAt: draft.extractedAt,
    contentHash: draft.contentHash,
    payload: encodePayload(draft.record),
  }
}

export async function writeSnapshot(
  store: SnapshotStore,
  draft: SnapshotDraft,
  logger: ILogger
): Promise<InsertResult> {
  const result = await store.insert(toNewSnapshot(draft))

  const meta = {
    university: draft.source.university,
    pageType: draft.source.pageType,
    contentHash: draft.contentHash.slice(0, 12),
    ...sanitizeUrl(draft.source.url),
  }
  if (result.status === 'inserted') {
    logger.info('Snapshot saved', { ...meta, snapshotId: result.id })
  } else {
    logger.debug('Content unchanged, snapshot skipped', meta)
  }

  return result
}
