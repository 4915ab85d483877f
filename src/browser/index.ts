export * from './page-driver'
export * from './cdp-page-driver'
export * from './chrome-session'
export * from './selectors'
export * from './result-parser'
export * from './actions'
export * from './rate-limiter'
export * from './browser-worker'
