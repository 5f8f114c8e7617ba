/**
 * Settings service
 * Defaults, parsing and clamping of the golden/blue hour thresholds
 */

import { z } from 'zod'
import type { ElevationThresholds, Settings } from '@/types'

export const GOLDEN_ELEVATION_RANGE = { min: 0, max: 15 } as const
export const BLUE_START_RANGE = { min: -6, max: 0 } as const
export const BLUE_END_RANGE = { min: -18, max: -6 } as const

// Gap restored when the blue hour end is not below its start
export const BLUE_HOUR_MIN_SPAN = 4

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  goldenHourElevation: 6,
  blueHourStart: -4,
  blueHourEnd: -8,
  timeFormat24Hour: true,
  autoDetectLocation: true
})

const LocationSchema = z.object({
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  elevation: z.number().finite().optional(),
  name: z.string().optional(),
  timezone: z.string().optional()
})

export const SettingsSchema = z.object({
  goldenHourElevation: z.number().finite().default(DEFAULT_SETTINGS.goldenHourElevation),
  blueHourStart: z.number().finite().default(DEFAULT_SETTINGS.blueHourStart),
  blueHourEnd: z.number().finite().default(DEFAULT_SETTINGS.blueHourEnd),
  timeFormat24Hour: z.boolean().default(DEFAULT_SETTINGS.timeFormat24Hour),
  autoDetectLocation: z.boolean().default(DEFAULT_SETTINGS.autoDetectLocation),
  lastLocation: LocationSchema.optional()
})

export type SettingsInput = z.input<typeof SettingsSchema>

function clamp(value: number, range: { min: number; max: number }): number {
  return Math.min(range.max, Math.max(range.min, value))
}

/**
 * Clamp every threshold into its allowed range and keep blue hour end below its start
 */
export function validateSettings(settings: Settings): Settings {
  const goldenHourElevation = clamp(settings.goldenHourElevation, GOLDEN_ELEVATION_RANGE)
  const blueHourStart = clamp(settings.blueHourStart, BLUE_START_RANGE)
  let blueHourEnd = clamp(settings.blueHourEnd, BLUE_END_RANGE)

  if (blueHourEnd >= blueHourStart) {
    blueHourEnd = blueHourStart - BLUE_HOUR_MIN_SPAN
  }

  return { ...settings, goldenHourElevation, blueHourStart, blueHourEnd }
}

/**
 * Parse stored or user-supplied settings, filling in defaults
 */
export function parseSettings(input: unknown): Settings {
  const parsed = SettingsSchema.parse(input ?? {})
  const { lastLocation, ...rest } = parsed
  return validateSettings(lastLocation ? { ...rest, lastLocation } : rest)
}

/**
 * Snapshot of the three thresholds the calculator consumes
 */
export function thresholdsFromSettings(settings: Settings): Readonly<ElevationThresholds> {
  return Object.freeze({
    goldenElevation: settings.goldenHourElevation,
    blueStart: settings.blueHourStart,
    blueEnd: settings.blueHourEnd
  })
}
