export * from './types.js'
export { createPool, getPoolConfig } from './client.js'
export { PgSnapshotStore, ensureSchema, isUniqueViolation, UNIQUE_VIOLATION } from './pg-store.js'
export type { Queryable } from './pg-store.js'
export { MemorySnapshotStore } from './memory-store.js'
