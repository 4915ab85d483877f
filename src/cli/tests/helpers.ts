/* eslint-disable no-console */
import { jest } from '@jest/globals'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

// Capture console output for testing
export const captureOutput = () => {
  const originalLog = console.log
  const originalError = console.error
  const logs: string[] = []
  const errors: string[] = []

  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(' '))
  }

  console.error = (...args: unknown[]) => {
    errors.push(args.map(String).join(' '))
  }

  return {
    getLogs: () => logs.join('\n'),
    getErrors: () => errors.join('\n'),
    restore: () => {
      console.log = originalLog
      console.error = originalError
    },
  }
}

export function mockProcessExit() {
  return jest.spyOn(process, 'exit').mockImplementation(() => {
    throw new Error('process.exit called')
  })
}

export interface TempDir {
  path: string
  writeConfig(name: string, config: unknown): Promise<string>
  remove(): Promise<void>
}

export async function createTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), 'sweeprunner-cli-'))
  return {
    path,
    async writeConfig(name, config) {
      const filePath = join(path, name)
      await writeFile(filePath, JSON.stringify(config))
      return filePath
    },
    remove: () => rm(path, { recursive: true, force: true }),
  }
}
