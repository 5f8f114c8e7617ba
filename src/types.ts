// TypeScript type definitions for the golden hour engine

export interface Location {
  latitude: number
  longitude: number
  elevation?: number // metres above sea level, 0 when omitted
  name?: string
  timezone?: string // IANA identifier, resolved from coordinates when missing
}

/**
 * Sun elevation angles (degrees) that bound the golden and blue hours
 */
export interface ElevationThresholds {
  goldenElevation: number
  blueStart: number // nearer the horizon, e.g. -4
  blueEnd: number // further below the horizon, e.g. -8
}

export interface Settings {
  goldenHourElevation: number
  blueHourStart: number
  blueHourEnd: number
  timeFormat24Hour: boolean
  autoDetectLocation: boolean
  lastLocation?: Location
}

export interface SunPosition {
  elevation: number // degrees above the horizon, negative below
  azimuth: number // degrees clockwise from north
}

/**
 * A named crossing of a fixed elevation, searched on one side of solar transit
 */
export interface SunEventSpec {
  readonly name: string
  readonly elevation: number
  readonly beforeTransit: boolean
}

export interface SunEvent {
  name: string
  elevation: number // target elevation; for transit the peak, NaN when it was not computed
  instant: Date | undefined // undefined when the sun never reaches the elevation that day
}

export interface SearchWindow {
  start: Date // local midnight
  end: Date // next local midnight
}

export interface SunEventSet {
  transit: SunEvent
  sunrise: SunEvent
  sunset: SunEvent
  events: ReadonlyMap<string, SunEvent> // only the events that were found
}

export interface TimeRange {
  start?: Date
  end?: Date
}

export interface SunTimes {
  date: Date // local midnight of the calculated day
  timezone: string
  location: Location
  sunrise: Date | undefined
  sunset: Date | undefined
  solarNoon: Date | undefined // undefined only for coordinates off the globe
  goldenMorning: TimeRange
  goldenEvening: TimeRange
  blueMorning: TimeRange
  blueEvening: TimeRange
}

export type SunCalculationResult =
  | { success: true; sunTimes: SunTimes }
  | { success: false; error: string }

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent'
