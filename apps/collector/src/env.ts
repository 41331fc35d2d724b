/**
 * Environment loader - import first, before any module that reads process.env.
 *
 * Loads apps/collector/.env.local, then the working directory's .env.
 * Production injects variables directly, so nothing is loaded there.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
  config()
}
