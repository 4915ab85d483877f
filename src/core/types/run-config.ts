import { z } from 'zod'

export const ParameterValueSchema = z.union([z.number(), z.string(), z.boolean()])

export type ParameterValue = z.infer<typeof ParameterValueSchema>

export type ParameterValues = Record<string, ParameterValue>

// Either explicit values or a handler config the values are generated from.
// When both are missing the handler's defaults are used.
const ParameterSourceSchema = z.object({
  values: z.array(ParameterValueSchema).min(1, 'values must not be empty').optional(),
  range: z.record(z.string(), z.unknown()).optional(),
})

export type ParameterSource = z.infer<typeof ParameterSourceSchema>

const RunFlagsSchema = z.object({
  skipCache: z.boolean().default(false),
})

export const SweepRunConfigSchema = z
  .object({
    mode: z.literal('sweep'),
    parameter: z.string().min(1, 'parameter is required'),
  })
  .merge(ParameterSourceSchema)
  .merge(RunFlagsSchema)

export const GridRunConfigSchema = z
  .object({
    mode: z.literal('grid'),
    parameters: z
      .record(z.string().min(1), ParameterSourceSchema)
      .refine((parameters) => Object.keys(parameters).length > 0, 'grid mode needs at least one parameter'),
  })
  .merge(RunFlagsSchema)

export const StageSchema = z
  .object({
    parameter: z.string().min(1, 'parameter is required'),
  })
  .merge(ParameterSourceSchema)

export const StagedRunConfigSchema = z
  .object({
    mode: z.literal('staged'),
    stages: z.array(StageSchema).min(1, 'staged mode needs at least one stage'),
  })
  .merge(RunFlagsSchema)

export const RunConfigSchema = z.discriminatedUnion('mode', [
  SweepRunConfigSchema,
  GridRunConfigSchema,
  StagedRunConfigSchema,
])

export type RunConfig = z.infer<typeof RunConfigSchema>
export type RunConfigInput = z.input<typeof RunConfigSchema>
export type RunMode = RunConfig['mode']

export const RUN_MODES: readonly RunMode[] = ['sweep', 'grid', 'staged']
