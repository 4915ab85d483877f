import { z } from 'zod'
import type { Locator } from '../browser/page-driver'
import { defineParameter } from './types'
import { END_BEFORE_START, endNotBeforeStart, inclusiveRange, numericRangeShape } from './range'

// Leg inputs carry a "±" unit button
const DELTA_INPUT: Locator = { css: 'div.inline-flex input', label: '±', exactLabel: true }

export const DeltaConfigSchema = z
  .object({
    ...numericRangeShape({ start: 5, end: 50, step: 1 }, 100),
    applyTo: z.enum(['both', 'put_only', 'call_only']).default('both'),
  })
  .refine(endNotBeforeStart, END_BEFORE_START)

export type DeltaConfig = z.infer<typeof DeltaConfigSchema>

export const deltaParameter = defineParameter({
  name: 'delta',
  displayName: 'Delta',
  description: 'Options delta for put/call leg selection',
  configSchema: DeltaConfigSchema,
  valueSchema: z.number().int().min(1).max(100),
  generate: (config) => inclusiveRange(config.start, config.end, config.step),
  async apply(page, value, config) {
    const legs = await page.count(DELTA_INPUT)
    if (legs === 0) return false

    const targets: number[] = []
    if (config.applyTo !== 'call_only') targets.push(0)
    if (config.applyTo !== 'put_only' && legs >= 2) targets.push(1)

    for (const nth of targets) {
      const locator = { ...DELTA_INPUT, nth }
      if (!(await page.fill(locator, String(value)))) return false
      if ((await page.readValue(locator)) !== String(value)) return false
    }
    return targets.length > 0
  },
})
