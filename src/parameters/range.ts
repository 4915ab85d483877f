import { z } from 'zod'

/**
 * `start`/`end`/`step` fields with the given defaults
 */
export function numericRangeShape(defaults: { start: number; end: number; step: number }, max: number) {
  return {
    start: z.number().min(1).max(max).default(defaults.start),
    end: z.number().min(1).max(max).default(defaults.end),
    step: z.number().positive('step must be positive').default(defaults.step),
  }
}

export function endNotBeforeStart(range: { start: number; end: number }): boolean {
  return range.end >= range.start
}

export const END_BEFORE_START = { message: 'end must not be before start', path: ['end'] }

/**
 * Inclusive arithmetic progression from `start` to `end`
 */
export function inclusiveRange(start: number, end: number, step: number): number[] {
  const count = Math.floor((end - start) / step + 1e-9) + 1
  return Array.from({ length: Math.max(count, 0) }, (_, i) => Number((start + i * step).toFixed(10)))
}

export function formatClock(totalMinutes: number): string {
  const hour = Math.floor(totalMinutes / 60)
  const minute = totalMinutes % 60
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`
}

export const ClockSchema = z.string().regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'expected a HH:MM time')
