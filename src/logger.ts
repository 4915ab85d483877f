/* eslint-disable no-console */
import pc from 'picocolors'
import { inspect } from 'node:util'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const LEVEL_TAG: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.gray('debug'),
  info: pc.cyan('info '),
  warn: pc.yellow('warn '),
  error: pc.red('error'),
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value)
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  const normalized = value.trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : undefined
}

let currentLevel: LogLevel = parseLogLevel(process.env.SWEEP_LOG_LEVEL) ?? 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return currentLevel === 'debug' && arg.stack ? arg.stack : arg.message
  }
  if (typeof arg === 'string') return arg
  return inspect(arg, { depth: 4, breakLength: Infinity })
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[currentLevel]) return

  const time = pc.dim(new Date().toISOString().slice(11, 23))
  const line = [time, LEVEL_TAG[level], message, ...args.map(formatArg)].join(' ')

  if (level === 'error' || level === 'warn') {
    console.error(line)
  } else {
    console.log(line)
  }
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export const logger: Logger = {
  debug: (message, ...args) => write('debug', message, args),
  info: (message, ...args) => write('info', message, args),
  warn: (message, ...args) => write('warn', message, args),
  error: (message, ...args) => write('error', message, args),
}
