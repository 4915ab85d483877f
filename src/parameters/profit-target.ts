import { z } from 'zod'
import type { Locator } from '../browser/page-driver'
import { defineParameter } from './types'
import { END_BEFORE_START, endNotBeforeStart, inclusiveRange, numericRangeShape } from './range'

const PROFIT_TARGET_INPUT: Locator = { css: 'input', label: 'Profit Target' }

export const ProfitTargetConfigSchema = z
  .object({
    ...numericRangeShape({ start: 10, end: 100, step: 10 }, 500),
    unit: z.enum(['%', '$']).default('%'),
  })
  .refine(endNotBeforeStart, END_BEFORE_START)

export const profitTargetParameter = defineParameter({
  name: 'profit_target',
  displayName: 'Profit Target',
  description: 'Profit target for closing positions',
  configSchema: ProfitTargetConfigSchema,
  valueSchema: z.number().positive(),
  generate: (config) => inclusiveRange(config.start, config.end, config.step),
  async apply(page, value) {
    if (!(await page.fill(PROFIT_TARGET_INPUT, String(value)))) return false
    return (await page.readValue(PROFIT_TARGET_INPUT)) === String(value)
  },
})
