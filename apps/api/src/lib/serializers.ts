/**
 * Snapshot rows → public JSON shape (snake_case, decoded payload).
 */

import { decodePayload } from '@campuswatch/collector'
import type { Snapshot } from '@campuswatch/db'

export interface SnapshotView {
  id: string
  university: string
  page_type: string
  url: string
  extracted_at: string
  content_hash: string
  data: Record<string, unknown>
}

export function toSnapshotView(snapshot: Snapshot): SnapshotView {
  return {
    id: snapshot.id,
    university: snapshot.university,
    page_type: snapshot.pageType,
    url: snapshot.url,
    extracted_at: snapshot.extractedAt.toISOString(),
    content_hash: snapshot.contentHash,
    data: decodePayload(snapshot.payload),
  }
}
