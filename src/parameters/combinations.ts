import type { ParameterSource, ParameterValue, ParameterValues, RunConfig } from '../core/types'
import { getParameter } from './registry'

/**
 * Values for one parameter: the explicit list when given, otherwise generated
 * from `range` (or the handler defaults)
 */
export function resolveValues(parameter: string, source: ParameterSource): ParameterValue[] {
  const handler = getParameter(parameter)
  if (source.values) {
    return source.values.map((value) => handler.parseValue(value))
  }
  return handler.generateValues(source.range)
}

/**
 * Parameter mappings to create tasks for.
 *
 * - sweep: one mapping per value
 * - grid: cartesian product, first declared parameter varying slowest
 * - staged: the first stage only; later stages are planned from its results
 */
export function generateCombinations(config: RunConfig): ParameterValues[] {
  switch (config.mode) {
    case 'sweep':
      return resolveValues(config.parameter, config).map((value) => ({ [config.parameter]: value }))
    case 'grid': {
      let combinations: ParameterValues[] = [{}]
      for (const [parameter, source] of Object.entries(config.parameters)) {
        const values = resolveValues(parameter, source)
        combinations = combinations.flatMap((base) => values.map((value) => ({ ...base, [parameter]: value })))
      }
      return combinations
    }
    case 'staged': {
      const [first] = config.stages
      if (!first) return []
      return resolveValues(first.parameter, first).map((value) => ({ [first.parameter]: value }))
    }
  }
}

export function countCombinations(config: RunConfig): number {
  return generateCombinations(config).length
}

/**
 * Handler configs (the `range` blocks) keyed by parameter name, used when
 * applying values on the page
 */
export function parameterConfigsOf(config: RunConfig): Record<string, unknown> {
  switch (config.mode) {
    case 'sweep':
      return config.range ? { [config.parameter]: config.range } : {}
    case 'grid':
      return Object.fromEntries(
        Object.entries(config.parameters).flatMap(([name, source]) => (source.range ? [[name, source.range]] : [])),
      )
    case 'staged':
      return Object.fromEntries(config.stages.flatMap((stage) => (stage.range ? [[stage.parameter, stage.range]] : [])))
  }
}
