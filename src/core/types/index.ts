export * from './metrics'
export * from './run-config'
export * from './run'
export * from './worker'
export * from './events'
export * from './sweep-config'
