import type {
  ElevationThresholds,
  Location,
  Settings,
  SunCalculationResult,
  SunEventSet,
  SunEventSpec,
  SunPosition,
  SunTimes
} from '@/types'
import { loadConfig } from './config'
import { SunCalculationError, errorMessage } from './errors'
import { createLogger, type Logger } from './logger'
import { DEFAULT_SETTINGS, thresholdsFromSettings } from './settings'
import { getSunPosition } from './solar-position'
import { findSunEvents } from './sun-event-engine'
import { extractTimeRange } from './time-range'
import {
  FALLBACK_TIMEZONE,
  GeoTzResolver,
  isValidTimezone,
  nextLocalDay,
  startOfLocalDay,
  type TimezoneResolver
} from './timezone'

export const GOLDEN_MORNING_START = 'GoldenMorningStart'
export const GOLDEN_MORNING_END = 'GoldenMorningEnd'
export const GOLDEN_EVENING_START = 'GoldenEveningStart'
export const GOLDEN_EVENING_END = 'GoldenEveningEnd'
export const BLUE_MORNING_START = 'BlueMorningStart'
export const BLUE_MORNING_END = 'BlueMorningEnd'
export const BLUE_EVENING_START = 'BlueEveningStart'
export const BLUE_EVENING_END = 'BlueEveningEnd'

// Golden hour runs from the apparent horizon, a little after sunrise and before sunset
export const GOLDEN_HORIZON_ELEVATION = 0

/**
 * The eight crossings that bound the golden and blue hours.
 *
 * Morning ranges run from the lower elevation up to the higher one, evening
 * ranges from the higher one down to the lower, so every range starts before
 * it ends. Elevations are copied from `thresholds` when the specs are built.
 */
export function createGoldenBlueEvents(thresholds: ElevationThresholds): readonly SunEventSpec[] {
  const { goldenElevation, blueStart, blueEnd } = thresholds

  return Object.freeze([
    // Golden hour: horizon up to the golden elevation in the morning, back down in the evening
    { name: GOLDEN_MORNING_START, elevation: GOLDEN_HORIZON_ELEVATION, beforeTransit: true },
    { name: GOLDEN_MORNING_END, elevation: goldenElevation, beforeTransit: true },
    { name: GOLDEN_EVENING_START, elevation: goldenElevation, beforeTransit: false },
    { name: GOLDEN_EVENING_END, elevation: GOLDEN_HORIZON_ELEVATION, beforeTransit: false },

    // Blue hour: deeper twilight comes first in the morning and last in the evening
    { name: BLUE_MORNING_START, elevation: blueEnd, beforeTransit: true },
    { name: BLUE_MORNING_END, elevation: blueStart, beforeTransit: true },
    { name: BLUE_EVENING_START, elevation: blueStart, beforeTransit: false },
    { name: BLUE_EVENING_END, elevation: blueEnd, beforeTransit: false }
  ].map((spec) => Object.freeze(spec)))
}

/**
 * Calculate sunrise, sunset, solar noon and the golden/blue hours for the
 * local calendar day that `date` falls on in `zone`.
 *
 * Throws SunCalculationError when the sun position cannot be computed;
 * events the sun does not reach that day are reported as missing instead.
 */
export function calculateSunTimes(
  location: Location,
  date: Date,
  thresholds: ElevationThresholds,
  zone: string = FALLBACK_TIMEZONE
): SunTimes {
  const context = {
    operation: 'calculateSunTimes',
    latitude: location.latitude,
    longitude: location.longitude,
    date: Number.isNaN(date.getTime()) ? String(date) : date.toISOString()
  }
  if (Number.isNaN(date.getTime())) {
    throw new SunCalculationError('Cannot calculate sun times for an invalid date', context)
  }

  const timezone = isValidTimezone(zone) ? zone : FALLBACK_TIMEZONE
  const dayStart = startOfLocalDay(date, timezone)
  const dayEnd = nextLocalDay(dayStart, timezone)
  const specs = createGoldenBlueEvents({ ...thresholds })

  let found: SunEventSet
  try {
    found = findSunEvents({ start: dayStart, end: dayEnd }, location, specs)
  } catch (error) {
    throw new SunCalculationError(`Failed to calculate sun events: ${errorMessage(error)}`, context, {
      cause: error
    })
  }

  const { events } = found

  return Object.freeze({
    date: dayStart,
    timezone,
    location: Object.freeze({ ...location }),
    sunrise: found.sunrise.instant,
    sunset: found.sunset.instant,
    solarNoon: found.transit.instant,
    goldenMorning: extractTimeRange(events, GOLDEN_MORNING_START, GOLDEN_MORNING_END),
    goldenEvening: extractTimeRange(events, GOLDEN_EVENING_START, GOLDEN_EVENING_END),
    blueMorning: extractTimeRange(events, BLUE_MORNING_START, BLUE_MORNING_END),
    blueEvening: extractTimeRange(events, BLUE_EVENING_START, BLUE_EVENING_END)
  })
}

export interface SunTimesCalculatorOptions {
  timezoneResolver?: TimezoneResolver
  logger?: Logger
}

/**
 * Sun times calculator bound to a settings snapshot and a timezone resolver
 */
export class SunTimesCalculator {
  private settings: Settings
  private readonly timezoneResolver: TimezoneResolver
  private readonly log: Logger

  constructor(settings: Settings = DEFAULT_SETTINGS, options: SunTimesCalculatorOptions = {}) {
    this.settings = { ...settings }
    this.timezoneResolver =
      options.timezoneResolver ?? new GeoTzResolver(loadConfig().defaultTimezone ?? FALLBACK_TIMEZONE)
    this.log = options.logger ?? createLogger('sun-times')
  }

  /**
   * Replace the thresholds used by later calculations
   */
  updateSettings(settings: Settings): void {
    this.settings = { ...settings }
  }

  getSettings(): Readonly<Settings> {
    return { ...this.settings }
  }

  /**
   * Zone of the location: its own when valid, otherwise resolved from coordinates
   */
  resolveTimezone(location: Location): string {
    if (location.timezone && isValidTimezone(location.timezone)) {
      return location.timezone
    }

    const resolved = this.timezoneResolver.resolve(location.latitude, location.longitude)
    if (isValidTimezone(resolved)) {
      return resolved
    }

    this.log.debug(`Resolver returned unknown zone "${resolved}", using ${FALLBACK_TIMEZONE}`)
    return FALLBACK_TIMEZONE
  }

  calculate(location: Location, date: Date = new Date()): SunTimes {
    const thresholds = thresholdsFromSettings(this.settings)
    const zone = this.resolveTimezone(location)
    const sunTimes = calculateSunTimes(location, date, thresholds, zone)

    this.log.debug(
      `Calculated sun times for ${location.name ?? `${location.latitude}, ${location.longitude}`} ` +
        `on ${sunTimes.date.toISOString()} (${zone})`
    )
    return sunTimes
  }

  /**
   * Like calculate, but reports failure in the result instead of throwing
   */
  tryCalculate(location: Location, date: Date = new Date()): SunCalculationResult {
    try {
      return { success: true, sunTimes: this.calculate(location, date) }
    } catch (error) {
      this.log.error('Sun time calculation failed', error)
      return { success: false, error: errorMessage(error) }
    }
  }

  /**
   * Sun times for consecutive local days starting with the day of `startDate`
   */
  calculateProgression(location: Location, startDate: Date = new Date(), days: number = 7): SunTimes[] {
    const thresholds = thresholdsFromSettings(this.settings)
    const zone = this.resolveTimezone(location)
    const results: SunTimes[] = []

    let day = startOfLocalDay(startDate, zone)
    for (let i = 0; i < days; i++) {
      results.push(calculateSunTimes(location, day, thresholds, zone))
      day = nextLocalDay(day, zone)
    }

    return results
  }

  /**
   * Live elevation and azimuth of the sun
   */
  getCurrentSunPosition(location: Location, now: Date = new Date()): SunPosition {
    return getSunPosition(now, location)
  }
}
