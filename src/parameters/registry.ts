import { UnknownParameterError } from '../core/errors'
import { deltaParameter } from './delta'
import { entryTimeParameter } from './entry-time'
import { profitTargetParameter } from './profit-target'
import { stopLossParameter } from './stop-loss'
import type { ParameterHandler } from './types'

const PARAMETERS: ReadonlyMap<string, ParameterHandler> = new Map(
  [deltaParameter, entryTimeParameter, profitTargetParameter, stopLossParameter].map((handler) => [
    handler.name,
    handler,
  ]),
)

export function getParameter(name: string): ParameterHandler {
  const handler = PARAMETERS.get(name)
  if (!handler) {
    throw new UnknownParameterError(name, [...PARAMETERS.keys()])
  }
  return handler
}

export function hasParameter(name: string): boolean {
  return PARAMETERS.has(name)
}

export function listParameters(): ParameterHandler[] {
  return [...PARAMETERS.values()]
}
