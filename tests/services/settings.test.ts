import { describe, test, expect } from 'vitest'
import { ZodError } from 'zod'
import {
  DEFAULT_SETTINGS,
  parseSettings,
  thresholdsFromSettings,
  validateSettings
} from '@/services/settings'

describe('Settings', () => {
  describe('parseSettings', () => {
    test('should fill in defaults for missing settings', () => {
      expect(parseSettings(undefined)).toEqual({
        goldenHourElevation: 6,
        blueHourStart: -4,
        blueHourEnd: -8,
        timeFormat24Hour: true,
        autoDetectLocation: true
      })
    })

    test('should keep values that are already in range', () => {
      const settings = parseSettings({ goldenHourElevation: 10, blueHourStart: -3, blueHourEnd: -12, timeFormat24Hour: false })

      expect(settings.goldenHourElevation).toBe(10)
      expect(settings.blueHourStart).toBe(-3)
      expect(settings.blueHourEnd).toBe(-12)
      expect(settings.timeFormat24Hour).toBe(false)
    })

    test('should clamp out of range thresholds', () => {
      const settings = parseSettings({ goldenHourElevation: 20, blueHourStart: 3, blueHourEnd: -30 })

      expect(settings.goldenHourElevation).toBe(15)
      expect(settings.blueHourStart).toBe(0)
      expect(settings.blueHourEnd).toBe(-18)
    })

    test('should keep the last location', () => {
      const settings = parseSettings({ lastLocation: { latitude: 48.8566, longitude: 2.3522, name: 'Paris' } })

      expect(settings.lastLocation).toEqual({ latitude: 48.8566, longitude: 2.3522, name: 'Paris' })
    })

    test('should reject values of the wrong type', () => {
      expect(() => parseSettings({ goldenHourElevation: 'high' })).toThrow(ZodError)
    })
  })

  describe('validateSettings', () => {
    test('should move the blue hour end below a start it is not below', () => {
      const settings = validateSettings({ ...DEFAULT_SETTINGS, blueHourStart: -6, blueHourEnd: -6 })

      expect(settings.blueHourStart).toBe(-6)
      expect(settings.blueHourEnd).toBe(-10)
    })

    test('should clamp a negative golden elevation to the horizon', () => {
      expect(validateSettings({ ...DEFAULT_SETTINGS, goldenHourElevation: -2 }).goldenHourElevation).toBe(0)
    })

    test('should not modify its input', () => {
      const input = { ...DEFAULT_SETTINGS, goldenHourElevation: 40 }

      validateSettings(input)

      expect(input.goldenHourElevation).toBe(40)
    })
  })

  describe('thresholdsFromSettings', () => {
    test('should take a frozen snapshot of the thresholds', () => {
      const thresholds = thresholdsFromSettings(DEFAULT_SETTINGS)

      expect(thresholds).toEqual({ goldenElevation: 6, blueStart: -4, blueEnd: -8 })
      expect(Object.isFrozen(thresholds)).toBe(true)
    })
  })
})
