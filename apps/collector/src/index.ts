export * from './scraper/index.js'
export { loadSettings, DEFAULT_USER_AGENT, DEFAULT_SOURCES_PATH } from './config/settings.js'
export type { Settings } from './config/settings.js'
export { CampusWatchError, ConfigurationError, FetchError, classifyError } from './errors.js'
export type { ClassifiedError, ErrorCode, FetchFailureReason } from './errors.js'
export { loadSources, parseSources, listUniversities, sourcesForUniversity } from './sources.js'
export { createCollector, createPipeline, createStore, warmupDatabase } from './runtime.js'
export type { CollectorRuntime, StoreHandle } from './runtime.js'
export { startRunScheduler, stopRunScheduler, isRunSchedulerRunning, isRunInProgress } from './scheduler.js'
