import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { writeFile, mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig, resolveCredentials, validateConfig } from '.'
import { ConfigLoadError, ConfigValidationError } from './errors'

describe('Config loader', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'sweep-config-'))
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  describe('loadConfig', () => {
    it('should fill defaults when no config file exists', async () => {
      const config = await loadConfig({ cwd: testDir, env: {} })

      expect(config.workers).toBe(2)
      expect(config.maxRetries).toBe(3)
      expect(config.maxConsecutiveFailures).toBe(5)
      expect(config.watchdog).toEqual({ intervalMs: 30000, stallThresholdMs: 300000 })
      expect(config.database.path).toBe('data/sweeprunner.db')
      expect(config.output).toEqual({ dir: './sweep-results', formats: ['cli'] })
      expect(config.skipCache).toBe(false)
      expect(config.goal).toBe('balanced')
      expect(config.target).toBeUndefined()
    })

    it('should load and validate a JSON config file', async () => {
      const fileConfig = {
        target: { url: 'https://example.com/backtest/1', name: 'Iron condor' },
        sweep: { mode: 'sweep', parameter: 'delta', values: [5, 10] },
        workers: 3,
      }
      await writeFile(join(testDir, 'sweep.config.json'), JSON.stringify(fileConfig, null, 2))

      const config = await loadConfig({ cwd: testDir, env: {} })

      expect(config.target).toEqual({ url: 'https://example.com/backtest/1', name: 'Iron condor' })
      expect(config.sweep).toEqual({ mode: 'sweep', parameter: 'delta', values: [5, 10], skipCache: false })
      expect(config.workers).toBe(3)
    })

    it('should load a CommonJS config file', async () => {
      await writeFile(join(testDir, 'sweep.config.js'), 'module.exports = { workers: 6, headless: false }\n')

      const config = await loadConfig({ cwd: testDir, env: {} })

      expect(config.workers).toBe(6)
      expect(config.headless).toBe(false)
    })

    it('should prefer an explicit config path over discovery', async () => {
      await writeFile(join(testDir, 'sweep.config.json'), JSON.stringify({ workers: 1 }))
      await writeFile(join(testDir, 'custom.json'), JSON.stringify({ workers: 5 }))

      const config = await loadConfig({ cwd: testDir, configPath: 'custom.json', env: {} })

      expect(config.workers).toBe(5)
    })

    it('should throw ConfigLoadError for invalid JSON', async () => {
      await writeFile(join(testDir, 'sweep.config.json'), 'invalid json')

      await expect(loadConfig({ cwd: testDir, env: {} })).rejects.toThrow(ConfigLoadError)
    })

    it('should apply environment variable overrides', async () => {
      const config = await loadConfig({
        cwd: testDir,
        env: { SWEEP_WORKERS: '4', SWEEP_SKIP_CACHE: 'true', SWEEP_DB_PATH: ':memory:', SWEEP_OUTPUT_DIR: 'out' },
      })

      expect(config.workers).toBe(4)
      expect(config.skipCache).toBe(true)
      expect(config.database.path).toBe(':memory:')
      expect(config.output.dir).toBe('out')
    })

    it('should apply CLI arguments with the highest priority', async () => {
      await writeFile(join(testDir, 'sweep.config.json'), JSON.stringify({ workers: 2 }))

      const config = await loadConfig({ cwd: testDir, env: { SWEEP_WORKERS: '3' }, cliArgs: { workers: 5 } })

      expect(config.workers).toBe(5)
    })

    it('should merge nested sections across sources', async () => {
      await writeFile(join(testDir, 'sweep.config.json'), JSON.stringify({ output: { dir: './file-results' } }))

      const config = await loadConfig({ cwd: testDir, env: {}, cliArgs: { output: { formats: ['json'] } } })

      expect(config.output).toEqual({ dir: './file-results', formats: ['json'] })
    })

    it('should reject an invalid merged configuration', async () => {
      await writeFile(join(testDir, 'sweep.config.json'), JSON.stringify({ workers: 0 }))

      await expect(loadConfig({ cwd: testDir, env: {} })).rejects.toThrow(ConfigValidationError)
    })
  })

  describe('validateConfig', () => {
    it('should summarise every validation issue', () => {
      try {
        validateConfig({ workers: -1, target: { url: 'not-a-url' } })
        throw new Error('expected validation to fail')
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError)
        if (error instanceof ConfigValidationError) {
          expect(error.getErrorSummary().split('\n')).toEqual([
            'target.url: target.url must be a valid URL',
            'workers: Number must be greater than 0',
          ])
        }
      }
    })

    it('should reject a grid run without parameters', () => {
      expect(() => validateConfig({ sweep: { mode: 'grid', parameters: {} } })).toThrow(ConfigValidationError)
    })
  })

  describe('resolveCredentials', () => {
    it('should read the login from the environment', () => {
      expect(resolveCredentials({ SWEEP_EMAIL: ' user@example.com ', SWEEP_PASSWORD: 'test-secret' })).toEqual({
        email: 'user@example.com',
        password: 'test-secret',
      })
    })

    it('should throw when either value is missing', () => {
      expect(() => resolveCredentials({ SWEEP_EMAIL: 'user@example.com' })).toThrow(ConfigLoadError)
    })
  })
})
