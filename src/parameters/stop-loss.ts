import { z } from 'zod'
import type { Locator } from '../browser/page-driver'
import { defineParameter } from './types'
import { END_BEFORE_START, endNotBeforeStart, inclusiveRange, numericRangeShape } from './range'

const STOP_LOSS_INPUT: Locator = { css: 'input', label: 'Stop Loss' }

export const StopLossConfigSchema = z
  .object({
    ...numericRangeShape({ start: 50, end: 200, step: 25 }, 1000),
    unit: z.enum(['%', '$']).default('%'),
  })
  .refine(endNotBeforeStart, END_BEFORE_START)

export const stopLossParameter = defineParameter({
  name: 'stop_loss',
  displayName: 'Stop Loss',
  description: 'Stop loss for limiting losses',
  configSchema: StopLossConfigSchema,
  valueSchema: z.number().positive(),
  generate: (config) => inclusiveRange(config.start, config.end, config.step),
  async apply(page, value) {
    if (!(await page.fill(STOP_LOSS_INPUT, String(value)))) return false
    return (await page.readValue(STOP_LOSS_INPUT)) === String(value)
  },
})
