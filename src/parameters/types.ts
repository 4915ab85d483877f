import type { z } from 'zod'
import type { ParameterValue } from '../core/types'
import type { PageDriver } from '../browser/page-driver'

/**
 * A sweepable setting of the target page. Configs are validated with
 * `configSchema`; missing fields take the schema defaults.
 */
export interface ParameterHandler {
  readonly name: string
  readonly displayName: string
  readonly description: string
  readonly configSchema: z.ZodTypeAny
  defaults(): Record<string, unknown>
  // Validates explicitly listed values
  parseValue(value: ParameterValue): ParameterValue
  generateValues(config?: unknown): ParameterValue[]
  applyToTarget(page: PageDriver, value: ParameterValue, config?: unknown): Promise<boolean>
}

export interface ParameterDefinition<C extends Record<string, unknown>, V extends ParameterValue> {
  name: string
  displayName: string
  description: string
  configSchema: z.ZodType<C, z.ZodTypeDef, unknown>
  valueSchema: z.ZodType<V>
  generate(config: C): V[]
  apply(page: PageDriver, value: V, config: C): Promise<boolean>
}

export function defineParameter<C extends Record<string, unknown>, V extends ParameterValue>(
  definition: ParameterDefinition<C, V>,
): ParameterHandler {
  const { configSchema, valueSchema } = definition
  return {
    name: definition.name,
    displayName: definition.displayName,
    description: definition.description,
    configSchema,
    defaults: () => configSchema.parse({}),
    parseValue: (value) => valueSchema.parse(value),
    generateValues: (config) => definition.generate(configSchema.parse(config ?? {})),
    applyToTarget: (page, value, config) =>
      definition.apply(page, valueSchema.parse(value), configSchema.parse(config ?? {})),
  }
}
