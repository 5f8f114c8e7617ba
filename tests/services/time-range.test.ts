import { describe, test, expect } from 'vitest'
import {
  EMPTY_TIME_RANGE,
  extractTimeRange,
  getDurationMs,
  hasValidBlueHour,
  hasValidGoldenHour,
  isMissingTimeRange,
  isValidTimeRange,
  isWithinTimeRange
} from '@/services/time-range'
import type { SunEvent, SunTimes } from '@/types'
import { london } from '../fixtures'

const sixAm = new Date('2026-01-02T06:00:00Z')
const sevenAm = new Date('2026-01-02T07:00:00Z')

function event(name: string, instant: Date): SunEvent {
  return { name, elevation: 0, instant }
}

function sunTimesWith(ranges: Partial<SunTimes>): SunTimes {
  return {
    date: new Date('2026-01-02T00:00:00Z'),
    timezone: 'UTC',
    location: london,
    sunrise: undefined,
    sunset: undefined,
    solarNoon: new Date('2026-01-02T12:00:00Z'),
    goldenMorning: EMPTY_TIME_RANGE,
    goldenEvening: EMPTY_TIME_RANGE,
    blueMorning: EMPTY_TIME_RANGE,
    blueEvening: EMPTY_TIME_RANGE,
    ...ranges
  }
}

describe('Time Range', () => {
  describe('extractTimeRange', () => {
    const events = new Map([
      ['Start', event('Start', sixAm)],
      ['End', event('End', sevenAm)]
    ])

    test('should build a range when both events were found', () => {
      expect(extractTimeRange(events, 'Start', 'End')).toEqual({ start: sixAm, end: sevenAm })
    })

    test('should return the empty range when either event is missing', () => {
      expect(extractTimeRange(events, 'Start', 'Missing')).toBe(EMPTY_TIME_RANGE)
      expect(extractTimeRange(events, 'Missing', 'End')).toBe(EMPTY_TIME_RANGE)
    })
  })

  describe('validity', () => {
    test('should accept a range that ends after it starts', () => {
      expect(isValidTimeRange({ start: sixAm, end: sevenAm })).toBe(true)
    })

    test('should reject reversed and zero-length ranges', () => {
      expect(isValidTimeRange({ start: sevenAm, end: sixAm })).toBe(false)
      expect(isValidTimeRange({ start: sixAm, end: sixAm })).toBe(false)
    })

    test('should tell a missing range apart from a zero-length one', () => {
      expect(isMissingTimeRange(EMPTY_TIME_RANGE)).toBe(true)
      expect(isMissingTimeRange({ start: sixAm })).toBe(true)
      expect(isMissingTimeRange({ start: sixAm, end: sixAm })).toBe(false)
    })
  })

  describe('getDurationMs', () => {
    test('should measure the range', () => {
      expect(getDurationMs({ start: sixAm, end: sevenAm })).toBe(60 * 60 * 1000)
    })

    test('should be zero for a missing range', () => {
      expect(getDurationMs(EMPTY_TIME_RANGE)).toBe(0)
    })
  })

  describe('isWithinTimeRange', () => {
    const range = { start: sixAm, end: sevenAm }

    test('should include the start and exclude the end', () => {
      expect(isWithinTimeRange(range, sixAm)).toBe(true)
      expect(isWithinTimeRange(range, new Date('2026-01-02T06:30:00Z'))).toBe(true)
      expect(isWithinTimeRange(range, sevenAm)).toBe(false)
    })

    test('should never match a missing range', () => {
      expect(isWithinTimeRange(EMPTY_TIME_RANGE, sixAm)).toBe(false)
    })
  })

  describe('golden and blue hour checks', () => {
    test('should report a golden hour when only the evening one is valid', () => {
      const sunTimes = sunTimesWith({ goldenEvening: { start: sixAm, end: sevenAm } })

      expect(hasValidGoldenHour(sunTimes)).toBe(true)
      expect(hasValidBlueHour(sunTimes)).toBe(false)
    })

    test('should report a blue hour when only the morning one is valid', () => {
      const sunTimes = sunTimesWith({ blueMorning: { start: sixAm, end: sevenAm } })

      expect(hasValidBlueHour(sunTimes)).toBe(true)
      expect(hasValidGoldenHour(sunTimes)).toBe(false)
    })
  })
})
