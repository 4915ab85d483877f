import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import type { SweepConfig } from '../types'
import { deepMerge, isPlainObject, setNestedValue, type PlainObject } from '../utils/deep-merge'
import { errorMessage } from '../errors'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

export const CONFIG_FILENAMES = ['sweep.config.json', 'sweep.config.js', 'sweep.config.cjs']

// Environment variable suffix -> config path
const ENV_MAPPINGS: Record<string, string> = {
  WORKERS: 'workers',
  MAX_RETRIES: 'maxRetries',
  HEADLESS: 'headless',
  DB_PATH: 'database.path',
  ARTIFACTS_DIR: 'artifactsDir',
  SKIP_CACHE: 'skipCache',
  OUTPUT_DIR: 'output.dir',
}

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  env?: NodeJS.ProcessEnv
  cliArgs?: PlainObject
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Config file (sweep.config.{json,js,cjs})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SweepConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'SWEEP_', env = process.env, cliArgs = {} } = options

  let config: PlainObject = {}

  try {
    const fileConfig = await loadConfigFile(cwd, configPath)
    if (fileConfig) {
      config = deepMerge(config, fileConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(`Failed to load config file: ${errorMessage(error)}`, error)
  }

  const envConfig = loadConfigFromEnv(envPrefix, env)
  if (Object.keys(envConfig).length > 0) {
    config = deepMerge(config, envConfig)
  }

  if (Object.keys(cliArgs).length > 0) {
    config = deepMerge(config, cliArgs)
  }

  return validateConfig(config)
}

/**
 * Resolves the config file to load: the explicit path, or the first default
 * filename present in `cwd`
 */
export async function findConfigFile(cwd: string, configPath?: string): Promise<string | undefined> {
  if (configPath) {
    return resolve(cwd, configPath)
  }

  for (const filename of CONFIG_FILENAMES) {
    const filePath = join(cwd, filename)
    try {
      await access(filePath)
      return filePath
    } catch {
      // not present, try the next name
    }
  }
  return undefined
}

async function loadConfigFile(cwd: string, configPath?: string): Promise<PlainObject | undefined> {
  const targetPath = await findConfigFile(cwd, configPath)
  if (!targetPath) {
    return undefined
  }

  let loaded: unknown
  if (targetPath.endsWith('.json')) {
    const content = await readFile(targetPath, 'utf-8')
    loaded = JSON.parse(content)
  } else {
    const configModule: unknown = await import(targetPath)
    loaded = isPlainObject(configModule) && 'default' in configModule ? configModule.default : configModule
  }

  if (!isPlainObject(loaded)) {
    throw new Error(`${targetPath} must export an object`)
  }
  return loaded
}

function loadConfigFromEnv(prefix: string, env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {}

  for (const [suffix, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[`${prefix}${suffix}`]
    if (value !== undefined && value !== '') {
      setNestedValue(config, configPath, parseEnvValue(value))
    }
  }

  return config
}

/**
 * Parses environment variable values to numbers and booleans where they look like one
 */
export function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10)
  }

  const lower = value.toLowerCase()
  if (lower === 'true' || lower === '1' || lower === 'yes') return true
  if (lower === 'false' || lower === '0' || lower === 'no') return false

  return value
}
