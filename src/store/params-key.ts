import type { ParameterValues } from '../core/types'

/**
 * Canonical form of a parameter mapping: JSON with keys sorted, so equal
 * mappings compare equal regardless of insertion order
 */
export function paramsKey(params: ParameterValues): string {
  const sorted: ParameterValues = {}
  for (const key of Object.keys(params).sort()) {
    const value = params[key]
    if (value !== undefined) {
      sorted[key] = value
    }
  }
  return JSON.stringify(sorted)
}
