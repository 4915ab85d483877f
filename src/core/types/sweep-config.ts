import { z } from 'zod'
import { RunConfigSchema } from './run-config'

export const GOALS = ['balanced', 'maximize_returns', 'protect_capital'] as const
export type Goal = (typeof GOALS)[number]

export const TargetConfigSchema = z.object({
  url: z.string().url('target.url must be a valid URL'),
  name: z.string().optional(),
})

export type TargetConfig = z.infer<typeof TargetConfigSchema>

export const WatchdogConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(30000),
  stallThresholdMs: z.number().int().positive().default(300000), // 5 minutes
})

export type WatchdogConfig = z.infer<typeof WatchdogConfigSchema>

// Output configuration for reports
export const OutputConfigSchema = z.object({
  dir: z.string().default('./sweep-results'),
  formats: z.array(z.enum(['cli', 'json'])).default(['cli']),
})

export type OutputConfig = z.infer<typeof OutputConfigSchema>

export const DatabaseConfigSchema = z.object({
  path: z.string().min(1).default('data/sweeprunner.db'),
})

// Main configuration object
export const SweepConfigSchema = z.object({
  target: TargetConfigSchema.optional(),
  sweep: RunConfigSchema.optional(),
  workers: z.number().int().positive().default(2),
  maxRetries: z.number().int().nonnegative().default(3),
  maxConsecutiveFailures: z.number().int().positive().default(5),
  watchdog: WatchdogConfigSchema.default({}),
  progressIntervalMs: z.number().int().positive().default(2000),
  queueWaitMs: z.number().int().positive().default(1000),
  idlePollMs: z.number().int().positive().default(500),
  skipCache: z.boolean().default(false),
  headless: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30000), // per interaction wait
  runTimeoutMs: z.number().int().positive().default(120000), // backtest completion
  baseDelayMs: z.number().int().nonnegative().default(500),
  minRequestDelayMs: z.number().int().nonnegative().default(6000),
  database: DatabaseConfigSchema.default({}),
  artifactsDir: z.string().default('./artifacts'),
  output: OutputConfigSchema.default({}),
  goal: z.enum(GOALS).default('balanced'),
})

export type SweepConfig = z.infer<typeof SweepConfigSchema>
export type SweepConfigInput = z.input<typeof SweepConfigSchema>
