/**
 * Collector settings, validated from the environment.
 *
 * Invalid settings are fatal at startup (ConfigurationError), never per run.
 */

import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

export const DEFAULT_SOURCES_PATH = fileURLToPath(new URL('../../data/sources.json', import.meta.url))

export const DEFAULT_USER_AGENT = 'CampusWatch/1.0 (+university page monitor; respectful crawler)'

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value)

const settingsSchema = z.object({
  REQUEST_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1000).default(25000)),
  REQUEST_DELAY_SECONDS: z.preprocess(emptyToUndefined, z.coerce.number().min(0).default(1)),
  MAX_RECORDS_PER_UNIVERSITY: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).default(30)),
  USER_AGENT: z.preprocess(emptyToUndefined, z.string().trim().min(1).default(DEFAULT_USER_AGENT)),
  FETCH_CONCURRENCY: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(16).default(4)),
  SCHEDULE_MINUTES: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).default(180)),
  SOURCES_PATH: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_SOURCES_PATH)),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(8000)),
})

export interface Settings {
  requestTimeoutMs: number
  requestDelaySeconds: number
  maxRecordsPerUniversity: number
  userAgent: string
  fetchConcurrency: number
  scheduleMinutes: number
  sourcesPath: string
  databaseUrl?: string
  port: number
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }

  const data = parsed.data
  return {
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
    requestDelaySeconds: data.REQUEST_DELAY_SECONDS,
    maxRecordsPerUniversity: data.MAX_RECORDS_PER_UNIVERSITY,
    userAgent: data.USER_AGENT,
    fetchConcurrency: data.FETCH_CONCURRENCY,
    scheduleMinutes: data.SCHEDULE_MINUTES,
    sourcesPath: data.SOURCES_PATH,
    databaseUrl: data.DATABASE_URL,
    port: data.PORT,
  }
}
