import { z } from 'zod'
import type { Locator } from '../browser/page-driver'
import { defineParameter } from './types'
import { ClockSchema, formatClock } from './range'

const ENTRY_TIME_INPUT: Locator = { css: "input[type='time']", label: 'Entry Time' }

export const EntryTimeConfigSchema = z
  .object({
    startHour: z.number().int().min(0).max(23).default(9),
    startMinute: z.number().int().min(0).max(59).default(30),
    endHour: z.number().int().min(0).max(23).default(15),
    endMinute: z.number().int().min(0).max(59).default(0),
    intervalMinutes: z.number().int().min(5).max(120).default(30),
  })
  .refine((c) => c.endHour * 60 + c.endMinute >= c.startHour * 60 + c.startMinute, {
    message: 'end time must not be before start time',
    path: ['endHour'],
  })

export type EntryTimeConfig = z.infer<typeof EntryTimeConfigSchema>

export const entryTimeParameter = defineParameter({
  name: 'entry_time',
  displayName: 'Entry Time',
  description: 'Time of day to enter trades (HH:MM)',
  configSchema: EntryTimeConfigSchema,
  valueSchema: ClockSchema,
  generate(config) {
    const values: string[] = []
    const end = config.endHour * 60 + config.endMinute
    for (let minutes = config.startHour * 60 + config.startMinute; minutes <= end; minutes += config.intervalMinutes) {
      values.push(formatClock(minutes))
    }
    return values
  },
  async apply(page, value) {
    if (!(await page.fill(ENTRY_TIME_INPUT, value))) return false
    return (await page.readValue(ENTRY_TIME_INPUT)) === value
  },
})
