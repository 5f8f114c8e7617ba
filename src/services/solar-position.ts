import { Body, Equator, Horizon, MakeTime, Observer, Refraction } from 'astronomy-engine'
import type { Location, SunPosition } from '@/types'
import { SolarPositionError, errorMessage } from './errors'

// Refraction is applied only while the sun is within reach of the horizon:
// its apparent radius plus the refraction at the horizon
const SUN_RADIUS = 0.26667
const HORIZON_REFRACTION = 0.5667
export const REFRACTION_LIMIT = -(SUN_RADIUS + HORIZON_REFRACTION)

/**
 * Topocentric elevation and azimuth of the sun for an observer at the given location
 */
export function getSunPosition(instant: Date, location: Location): SunPosition {
  const time = instant.getTime()
  if (!Number.isFinite(time)) {
    throw new SolarPositionError('Cannot compute the sun position for an invalid date')
  }

  const elevationMeters = location.elevation ?? 0
  if (![location.latitude, location.longitude, elevationMeters].every(Number.isFinite)) {
    throw new SolarPositionError(
      `Cannot compute the sun position for coordinates ${location.latitude}, ${location.longitude}`
    )
  }

  try {
    const astroTime = MakeTime(instant)
    const observer = new Observer(location.latitude, location.longitude, elevationMeters)
    const equatorial = Equator(Body.Sun, astroTime, observer, true, true)
    const horizontal = Horizon(astroTime, observer, equatorial.ra, equatorial.dec)

    return {
      elevation: applyRefraction(horizontal.altitude),
      azimuth: horizontal.azimuth
    }
  } catch (error) {
    throw new SolarPositionError(`Sun position calculation failed: ${errorMessage(error)}`, {
      cause: error
    })
  }
}

/**
 * Apparent elevation for a geometric one; deep twilight angles stay geometric
 */
export function applyRefraction(geometricElevation: number): number {
  if (geometricElevation < REFRACTION_LIMIT) {
    return geometricElevation
  }
  return geometricElevation + Refraction('normal', geometricElevation)
}
