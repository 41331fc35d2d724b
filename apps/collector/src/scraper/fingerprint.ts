/**
 * Change fingerprint for fetched documents.
 *
 * Scripts, styles and whitespace churn on every deploy without the page content
 * changing, so they are stripped before hashing.
 */

import { createHash } from 'node:crypto'

const SCRIPT_BLOCK = /<script.*?>.*?<\/script>/gis
const STYLE_BLOCK = /<style.*?>.*?<\/style>/gis
const WHITESPACE_RUN = /\s+/g

export function normalizeDocument(document: string): string {
  return document.replace(SCRIPT_BLOCK, '').replace(STYLE_BLOCK, '').replace(WHITESPACE_RUN, ' ').trim()
}

/**
 * sha256 of the normalized document, lowercase hex.
 */
export function fingerprint(document: string): string {
  return createHash('sha256').update(normalizeDocument(document), 'utf8').digest('hex')
}
