import pg from 'pg'
import type { Pool, PoolConfig } from 'pg'

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 5)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: campuswatch)
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,

    max: parseInt(env.DB_POOL_MAX || '5', 10),
    min: parseInt(env.DB_POOL_MIN || '0', 10),

    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'campuswatch',
  }
}

/**
 * Creates a pool for the given database URL. Callers own the pool and must `end()` it.
 */
export function createPool(connectionString: string): Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set')
  }
  return new pg.Pool(getPoolConfig(connectionString))
}
