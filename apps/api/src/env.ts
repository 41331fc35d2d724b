/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/api/.env.local, then the working directory's .env, outside production.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
  config()
}
