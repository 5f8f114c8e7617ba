import { describe, test, expect } from 'vitest'
import { applyRefraction, getSunPosition, REFRACTION_LIMIT } from '@/services/solar-position'
import { SolarPositionError } from '@/services/errors'
import { london, sydney } from '../fixtures'

describe('Solar Position', () => {
  describe('getSunPosition', () => {
    test('should put the winter noon sun low in the south for London', () => {
      const position = getSunPosition(new Date('2026-01-02T12:04:00Z'), london)

      // 90 - latitude + declination (about -22.9)
      expect(position.elevation).toBeGreaterThan(15)
      expect(position.elevation).toBeLessThan(16.5)
      expect(position.azimuth).toBeGreaterThan(175)
      expect(position.azimuth).toBeLessThan(185)
    })

    test('should put the sun deep below the horizon at midnight', () => {
      const position = getSunPosition(new Date('2026-01-02T00:00:00Z'), london)

      expect(position.elevation).toBeLessThan(-55)
    })

    test('should put the noon sun in the north for the southern hemisphere winter', () => {
      // Sydney solar noon is close to 02:00 UTC
      const position = getSunPosition(new Date('2026-06-21T01:55:00Z'), sydney)

      expect(position.elevation).toBeGreaterThan(30)
      expect(position.elevation).toBeLessThan(35)
      expect(position.azimuth > 355 || position.azimuth < 5).toBe(true)
    })

    test('should return identical results for identical input', () => {
      const instant = new Date('2026-03-20T09:30:00Z')

      expect(getSunPosition(instant, london)).toEqual(getSunPosition(instant, london))
    })

    test('should reject an invalid date', () => {
      expect(() => getSunPosition(new Date('not a date'), london)).toThrow(SolarPositionError)
    })

    test('should reject non-finite coordinates', () => {
      expect(() => getSunPosition(new Date('2026-01-02T12:00:00Z'), { ...london, latitude: NaN }))
        .toThrow(SolarPositionError)
    })
  })

  describe('applyRefraction', () => {
    test('should leave twilight elevations geometric', () => {
      expect(applyRefraction(-5)).toBe(-5)
      expect(applyRefraction(-18)).toBe(-18)
    })

    test('should lift the sun near the horizon by about half a degree', () => {
      const lift = applyRefraction(0)

      expect(lift).toBeGreaterThan(0.4)
      expect(lift).toBeLessThan(0.6)
    })

    test('should lift high elevations only slightly', () => {
      const lift = applyRefraction(45) - 45

      expect(lift).toBeGreaterThan(0)
      expect(lift).toBeLessThan(0.05)
    })

    test('should start refracting at the sun radius plus horizon refraction', () => {
      expect(REFRACTION_LIMIT).toBeCloseTo(-0.8333, 4)
      expect(applyRefraction(REFRACTION_LIMIT)).toBeGreaterThan(REFRACTION_LIMIT)
    })
  })
})
