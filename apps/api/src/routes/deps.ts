import type { ScrapePipeline, Source } from '@campuswatch/collector'
import type { SnapshotStore } from '@campuswatch/db'
import type { RunState } from '../lib/run-state.js'

/**
 * Collaborators the routers are built from. The API owns no globals.
 */
export interface AppDependencies {
  store: SnapshotStore
  pipeline: Pick<ScrapePipeline, 'run' | 'runUniversity'>
  sources: Source[]
  runState: RunState
}
