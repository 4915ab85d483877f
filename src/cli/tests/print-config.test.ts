import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { runCli } from '../cli'
import { captureOutput, createTempDir, mockProcessExit, type TempDir } from './helpers'

jest.mock('../../logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  setLogLevel: jest.fn(),
}))

describe('print-config command', () => {
  let dir: TempDir

  beforeEach(async () => {
    dir = await createTempDir()
  })

  afterEach(async () => {
    await dir.remove()
  })

  it('prints the validated configuration with defaults filled in', async () => {
    const configPath = await dir.writeConfig('sweep.config.json', {
      target: { url: 'https://app.example.com/test/abc' },
      sweep: { mode: 'grid', parameters: { delta: { values: [5, 10] }, stop_loss: { values: [50, 100, 150] } } },
      workers: 3,
    })
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--quiet', '--config', configPath])

      const output = JSON.parse(capture.getLogs().trim())
      expect(output.workers).toBe(3)
      expect(output.maxRetries).toBe(3)
      expect(output.watchdog).toEqual({ intervalMs: 30000, stallThresholdMs: 300000 })
      expect(output.sweep.parameters.delta).toEqual({ values: [5, 10] })
      expect(output._taskCount).toBe(6)
      expect(capture.getErrors()).toBe('')
    } finally {
      capture.restore()
    }
  })

  it('confirms a valid configuration on stderr', async () => {
    const configPath = await dir.writeConfig('sweep.config.json', {})
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', configPath])

      expect(JSON.parse(capture.getLogs().trim())._taskCount).toBe(0)
      expect(capture.getErrors()).toBe('✅ Configuration is valid')
    } finally {
      capture.restore()
    }
  })

  it('exits with an error for a missing config file', async () => {
    const mockExit = mockProcessExit()
    const capture = captureOutput()

    try {
      await expect(runCli(['print-config', '--config', join(dir.path, 'missing.json')])).rejects.toThrow(
        'process.exit called',
      )

      expect(capture.getErrors()).toContain('❌ Failed to load configuration')
      expect(mockExit).toHaveBeenCalledWith(1)
    } finally {
      capture.restore()
      mockExit.mockRestore()
    }
  })

  it('exits with an error for a malformed config file', async () => {
    const configPath = join(dir.path, 'malformed.json')
    await writeFile(configPath, '{ invalid json }')
    const mockExit = mockProcessExit()
    const capture = captureOutput()

    try {
      await expect(runCli(['print-config', '--config', configPath])).rejects.toThrow('process.exit called')

      expect(capture.getErrors()).toContain('❌ Failed to load configuration')
    } finally {
      capture.restore()
      mockExit.mockRestore()
    }
  })

  it('reports schema violations', async () => {
    const configPath = await dir.writeConfig('sweep.config.json', { workers: 0 })
    const mockExit = mockProcessExit()
    const capture = captureOutput()

    try {
      await expect(runCli(['print-config', '--config', configPath])).rejects.toThrow('process.exit called')

      expect(capture.getErrors()).toContain('❌ Configuration validation failed:')
      expect(capture.getErrors()).toContain('workers: Number must be greater than 0')
    } finally {
      capture.restore()
      mockExit.mockRestore()
    }
  })
})
