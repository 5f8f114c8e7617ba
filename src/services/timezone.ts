import { find } from 'geo-tz'
import { DateTime, IANAZone } from 'luxon'
import { createLogger } from './logger'

export const FALLBACK_TIMEZONE = 'UTC'

const log = createLogger('timezone')

/**
 * Maps coordinates to an IANA zone; never throws
 */
export interface TimezoneResolver {
  resolve(latitude: number, longitude: number): string
}

/**
 * Resolver backed by the geo-tz boundary data.
 * Loading the data is expensive, so build one instance at startup and pass it around.
 */
export class GeoTzResolver implements TimezoneResolver {
  constructor(private readonly fallback: string = FALLBACK_TIMEZONE) {}

  resolve(latitude: number, longitude: number): string {
    try {
      const [zone] = find(latitude, longitude)
      if (zone && isValidTimezone(zone)) {
        return zone
      }
      log.debug(`No timezone found for ${latitude}, ${longitude}, using ${this.fallback}`)
    } catch (error) {
      log.debug(`Timezone lookup failed for ${latitude}, ${longitude}, using ${this.fallback}`, error)
    }
    return this.fallback
  }
}

/**
 * Resolver that always answers with the same zone
 */
export class FixedTimezoneResolver implements TimezoneResolver {
  private readonly zone: string

  constructor(zone: string = FALLBACK_TIMEZONE) {
    this.zone = isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE
  }

  resolve(): string {
    return this.zone
  }
}

export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone)
}

/**
 * Midnight at the start of the calendar day that `date` falls on in `zone`.
 * An unknown zone falls back to UTC.
 */
export function startOfLocalDay(date: Date, zone: string): Date {
  const effectiveZone = isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE
  return DateTime.fromJSDate(date, { zone: effectiveZone }).startOf('day').toJSDate()
}

/**
 * Midnight of the following local day; 23 or 25 hours away across a DST change
 */
export function nextLocalDay(dayStart: Date, zone: string): Date {
  const effectiveZone = isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE
  return DateTime.fromJSDate(dayStart, { zone: effectiveZone }).plus({ days: 1 }).startOf('day').toJSDate()
}

/**
 * Midnight of a calendar day given as year, month (1-12) and day in `zone`
 */
export function localMidnight(year: number, month: number, day: number, zone: string): Date {
  const effectiveZone = isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE
  return DateTime.fromObject({ year, month, day }, { zone: effectiveZone }).toJSDate()
}
