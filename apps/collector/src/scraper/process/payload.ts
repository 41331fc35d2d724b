/**
 * Snapshot payload codec. Records are stored as JSON text.
 */

import { z } from 'zod'
import type { ExtractionRecord } from '../types.js'

export type DecodedPayload = Record<string, unknown>

const payloadObjectSchema = z.record(z.unknown())

export function encodePayload(record: ExtractionRecord): string {
  return JSON.stringify(record)
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Parsed payload object, or `{ raw: text }` when the text is not a JSON object.
 */
export function decodePayload(text: string): DecodedPayload {
  const parsed = payloadObjectSchema.safeParse(parseJson(text))
  return parsed.success ? parsed.data : { raw: text }
}
