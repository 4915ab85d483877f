import { InvalidRunTransitionError } from './errors'
import type { RunStatus } from './types'

export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === 'completed' || status === 'failed'
}

/**
 * Run lifecycle: pending -> running <-> paused -> completed | failed.
 * A run left running or paused by an interrupted process may be started again.
 */
export function isRunTransitionAllowed(from: RunStatus, to: RunStatus): boolean {
  if (from === 'pending') return to === 'running' || to === 'completed' || to === 'failed'
  if (from === 'running') return to === 'running' || to === 'paused' || to === 'completed' || to === 'failed'
  if (from === 'paused') return to === 'running' || to === 'completed' || to === 'failed'
  return false
}

export function assertRunTransition(from: RunStatus, to: RunStatus): void {
  if (!isRunTransitionAllowed(from, to)) {
    throw new InvalidRunTransitionError(from, to)
  }
}
