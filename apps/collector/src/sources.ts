/**
 * Source registry
 *
 * The monitored pages live in a JSON file of `{ university, page_type, url }`
 * entries. The file is validated once at startup; an invalid file is fatal.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { PAGE_TYPES } from '@campuswatch/db'
import { ConfigurationError } from './errors.js'
import type { Source } from './scraper/types.js'

const sourceEntrySchema = z.object({
  university: z.string().trim().min(1),
  page_type: z.enum(PAGE_TYPES),
  url: z.string().url(),
})

export const sourceFileSchema = z.array(sourceEntrySchema)

/**
 * @throws ConfigurationError when the entries do not match the schema
 */
export function parseSources(data: unknown): Source[] {
  const parsed = sourceFileSchema.safeParse(data)
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid source list',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }

  return parsed.data.map((entry) => ({
    university: entry.university,
    pageType: entry.page_type,
    url: entry.url,
  }))
}

/**
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export async function loadSources(path: string): Promise<Source[]> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot read source list at ${path}`, [{ path: 'SOURCES_PATH', message }])
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Source list at ${path} is not valid JSON`, [{ path: 'SOURCES_PATH', message }])
  }

  return parseSources(data)
}

/** Distinct university names, in file order */
export function listUniversities(sources: Source[]): string[] {
  return [...new Set(sources.map((source) => source.university))]
}

export function sourcesForUniversity(sources: Source[], name: string): Source[] {
  const wanted = name.trim().toLowerCase()
  return sources.filter((source) => source.university.trim().toLowerCase() === wanted)
}
