import { DateTime } from 'luxon'
import type { TimeRange } from '@/types'
import { getDurationMs, isValidTimeRange } from '@/services/time-range'
import { FALLBACK_TIMEZONE, isValidTimezone } from '@/services/timezone'

export const MISSING_TIME = '--:--'
export const MISSING_RANGE = 'N/A'

/**
 * Format an instant as wall-clock time in the given zone
 */
export function formatTime(instant: Date | undefined, use24Hour: boolean, zone: string = FALLBACK_TIMEZONE): string {
  if (!instant || Number.isNaN(instant.getTime())) return MISSING_TIME

  const local = DateTime.fromJSDate(instant, { zone: isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE })
  return local.toFormat(use24Hour ? 'HH:mm' : 'h:mm a', { locale: 'en-US' })
}

/**
 * Calendar date (YYYY-MM-DD) of an instant in the given zone
 */
export function formatDate(instant: Date, zone: string = FALLBACK_TIMEZONE): string {
  const local = DateTime.fromJSDate(instant, { zone: isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE })
  return local.toISODate() ?? MISSING_RANGE
}

/**
 * "06:12 - 07:03", or N/A when the range does not happen that day
 */
export function formatTimeRange(range: TimeRange, use24Hour: boolean, zone?: string): string {
  if (!isValidTimeRange(range)) return MISSING_RANGE
  return `${formatTime(range.start, use24Hour, zone)} - ${formatTime(range.end, use24Hour, zone)}`
}

/**
 * Human readable length: "45 min", "2h" or "1h 15m"
 */
export function formatDuration(range: TimeRange): string {
  if (!isValidTimeRange(range)) return MISSING_RANGE

  const minutes = Math.floor(getDurationMs(range) / (1000 * 60))
  if (minutes < 60) {
    return `${minutes} min`
  }

  const hours = Math.floor(minutes / 60)
  const mins = minutes % 60
  return mins === 0 ? `${hours}h` : `${hours}h ${mins}m`
}
