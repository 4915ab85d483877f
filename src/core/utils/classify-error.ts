import type { FailureType } from '../types'

// Messages seen when Chrome or its DevTools connection goes away
const CRASH_SIGNATURES = [
  'target closed',
  'browser has disconnected',
  'browser disconnected',
  'websocket',
  'econnrefused',
  'econnreset',
  'crashed',
  'session closed',
  'not opened',
]

const TIMEOUT_SIGNATURES = ['timeout', 'timed out']

/**
 * Classifies an exception thrown while delegating a task to a worker handle
 */
export function classifyException(error: unknown): FailureType {
  const message = (error instanceof Error ? `${error.name} ${error.message}` : String(error)).toLowerCase()

  if (CRASH_SIGNATURES.some((signature) => message.includes(signature))) {
    return 'browser'
  }
  if (TIMEOUT_SIGNATURES.some((signature) => message.includes(signature))) {
    return 'timing'
  }
  return 'session'
}
