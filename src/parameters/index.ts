export type { ParameterHandler, ParameterDefinition } from './types'
export { defineParameter } from './types'
export { getParameter, hasParameter, listParameters } from './registry'
export { generateCombinations, resolveValues, parameterConfigsOf, countCombinations } from './combinations'
export { inclusiveRange, formatClock } from './range'
