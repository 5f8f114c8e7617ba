export type * from './types'
export { getSunPosition, applyRefraction } from './services/solar-position'
export { findSunEvents, SUNRISE_ELEVATION, SUNRISE_EVENT, SUNSET_EVENT, TRANSIT_EVENT } from './services/sun-event-engine'
export {
  SunTimesCalculator,
  calculateSunTimes,
  createGoldenBlueEvents,
  GOLDEN_HORIZON_ELEVATION,
  type SunTimesCalculatorOptions
} from './services/sun-times-calculator'
export {
  EMPTY_TIME_RANGE,
  extractTimeRange,
  getDurationMs,
  hasValidBlueHour,
  hasValidGoldenHour,
  isMissingTimeRange,
  isValidTimeRange,
  isWithinTimeRange
} from './services/time-range'
export {
  FALLBACK_TIMEZONE,
  FixedTimezoneResolver,
  GeoTzResolver,
  isValidTimezone,
  localMidnight,
  nextLocalDay,
  startOfLocalDay,
  type TimezoneResolver
} from './services/timezone'
export { DEFAULT_SETTINGS, SettingsSchema, parseSettings, thresholdsFromSettings, validateSettings } from './services/settings'
export { createManualLocation, getDefaultLocation, isValidLocation } from './services/location'
export { SolarPositionError, SunCalculationError } from './services/errors'
export { Logger, createLogger, logger } from './services/logger'
export { loadConfig, type Config } from './services/config'
export { formatDate, formatDuration, formatTime, formatTimeRange } from './utils/format'
