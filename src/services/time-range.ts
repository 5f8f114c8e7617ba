import type { SunEvent, SunTimes, TimeRange } from '@/types'

// The range of a window whose start or end never happens
export const EMPTY_TIME_RANGE: TimeRange = Object.freeze({})

/**
 * Build a range from two events; empty unless both were found
 */
export function extractTimeRange(
  events: ReadonlyMap<string, SunEvent>,
  startName: string,
  endName: string
): TimeRange {
  const start = events.get(startName)?.instant
  const end = events.get(endName)?.instant

  if (start && end) {
    return Object.freeze({ start, end })
  }
  return EMPTY_TIME_RANGE
}

export function isValidTimeRange(range: TimeRange): range is Required<TimeRange> {
  return range.start !== undefined && range.end !== undefined && range.end.getTime() > range.start.getTime()
}

/**
 * True when either endpoint is missing, as opposed to a range that is merely empty or reversed
 */
export function isMissingTimeRange(range: TimeRange): boolean {
  return range.start === undefined || range.end === undefined
}

/**
 * Length in milliseconds, 0 for a range with a missing endpoint
 */
export function getDurationMs(range: TimeRange): number {
  if (!range.start || !range.end) return 0
  return range.end.getTime() - range.start.getTime()
}

export function hasValidGoldenHour(sunTimes: SunTimes): boolean {
  return isValidTimeRange(sunTimes.goldenMorning) || isValidTimeRange(sunTimes.goldenEvening)
}

export function hasValidBlueHour(sunTimes: SunTimes): boolean {
  return isValidTimeRange(sunTimes.blueMorning) || isValidTimeRange(sunTimes.blueEvening)
}

/**
 * Whether an instant falls inside a valid range (start inclusive, end exclusive)
 */
export function isWithinTimeRange(range: TimeRange, instant: Date): boolean {
  if (!isValidTimeRange(range)) return false
  const time = instant.getTime()
  return time >= range.start.getTime() && time < range.end.getTime()
}
