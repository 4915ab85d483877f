export { loadConfig, findConfigFile, parseEnvValue, CONFIG_FILENAMES } from './load'
export type { LoadConfigOptions } from './load'
export { default as validateConfig, createDefaultConfig } from './validate'
export { resolveCredentials } from './credentials'
export { ConfigValidationError, ConfigLoadError } from './errors'
