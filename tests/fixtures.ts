import type { Location } from '@/types'

export const london: Location = {
  latitude: 51.5074,
  longitude: -0.1278,
  elevation: 11,
  name: 'London, United Kingdom',
  timezone: 'Europe/London'
}

export const helsinki: Location = {
  latitude: 60.1699,
  longitude: 24.9384,
  name: 'Helsinki, Finland',
  timezone: 'Europe/Helsinki'
}

export const svalbard: Location = {
  latitude: 78,
  longitude: 15.6,
  name: 'Svalbard',
  timezone: 'Arctic/Longyearbyen'
}

export const newYork: Location = {
  latitude: 40.7128,
  longitude: -74.006,
  name: 'New York, NY',
  timezone: 'America/New_York'
}

export const sydney: Location = {
  latitude: -33.8688,
  longitude: 151.2093,
  name: 'Sydney, Australia',
  timezone: 'Australia/Sydney'
}

export const quito: Location = {
  latitude: -0.1807,
  longitude: -78.4678,
  elevation: 2850,
  name: 'Quito, Ecuador',
  timezone: 'America/Guayaquil'
}

export const MINUTE = 60 * 1000

export function minutesBetween(a: Date, b: Date): number {
  return Math.abs(a.getTime() - b.getTime()) / MINUTE
}

/**
 * Narrow away undefined, failing the test when the value is missing
 */
export function defined<T>(value: T | undefined, label = 'value'): T {
  if (value === undefined) {
    throw new Error(`Expected ${label} to be defined`)
  }
  return value
}
