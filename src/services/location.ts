import type { Location } from '@/types'

/**
 * Validate location coordinates
 */
export function isValidLocation(latitude: number, longitude: number): boolean {
  return latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180
}

/**
 * Default location (fallback when no location available)
 */
export function getDefaultLocation(): Location {
  return {
    latitude: 51.5074,
    longitude: -0.1278,
    elevation: 11,
    name: 'London, United Kingdom',
    timezone: 'Europe/London'
  }
}

/**
 * Location from user input; rejects coordinates outside the globe
 */
export function createManualLocation(
  latitude: number,
  longitude: number,
  options: { name?: string; elevation?: number; timezone?: string } = {}
): Location {
  if (!isValidLocation(latitude, longitude)) {
    throw new RangeError(`Invalid coordinates: ${latitude}, ${longitude}`)
  }

  return {
    latitude,
    longitude,
    elevation: options.elevation ?? 0,
    name: options.name || `${latitude.toFixed(4)}, ${longitude.toFixed(4)}`,
    timezone: options.timezone
  }
}

