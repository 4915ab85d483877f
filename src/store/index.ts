export type { RunStore, CreateRunInput, ListRunsOptions, UpdateTaskOptions, TaskResult } from './run-store'
export { SqliteRunStore } from './sqlite-store'
export type { SqliteRunStoreOptions } from './sqlite-store'
export { InMemoryRunStore } from './memory-store'
export { paramsKey } from './params-key'
