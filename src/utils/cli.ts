import type { SunTimes, TimeRange } from '@/types'
import { hasValidBlueHour, hasValidGoldenHour, isValidTimeRange } from '@/services/time-range'
import { MISSING_RANGE, formatDate, formatDuration, formatTime, formatTimeRange } from './format'

export const USAGE =
  'Usage: tsx src/main.ts --lat <degrees> --lon <degrees> [--date YYYY-MM-DD] [--elevation <m>] [--tz <zone>] [--12h]'

export interface CliArgs {
  latitude: number
  longitude: number
  elevation?: number
  date?: { year: number; month: number; day: number }
  timezone?: string
  use24Hour: boolean
}

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value)
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number`)
  }
  return parsed
}

function parseDate(value: string | undefined): { year: number; month: number; day: number } {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value ?? '')
  if (!match) {
    throw new Error('--date must be formatted as YYYY-MM-DD')
  }
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) }
}

/**
 * Parse command line flags (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliArgs {
  let latitude: number | undefined
  let longitude: number | undefined
  const args: Omit<CliArgs, 'latitude' | 'longitude'> = { use24Hour: true }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    const value = argv[i + 1]

    switch (token) {
      case '--lat':
        latitude = parseNumber(token, value)
        i += 1
        break
      case '--lon':
        longitude = parseNumber(token, value)
        i += 1
        break
      case '--elevation':
        args.elevation = parseNumber(token, value)
        i += 1
        break
      case '--date':
        args.date = parseDate(value)
        i += 1
        break
      case '--tz':
        if (!value) throw new Error('--tz needs a zone name')
        args.timezone = value
        i += 1
        break
      case '--12h':
        args.use24Hour = false
        break
      default:
        throw new Error(`Unknown option ${token}\n${USAGE}`)
    }
  }

  if (latitude === undefined || longitude === undefined) {
    throw new Error(USAGE)
  }

  return { latitude, longitude, ...args }
}

/**
 * Text report of one day's sun times
 */
export function renderSunTimes(sunTimes: SunTimes, use24Hour: boolean): string {
  const zone = sunTimes.timezone
  const time = (instant: Date | undefined) => formatTime(instant, use24Hour, zone)
  const range = (label: string, value: TimeRange) =>
    isValidTimeRange(value)
      ? `${label.padEnd(16)}${formatTimeRange(value, use24Hour, zone)} (${formatDuration(value)})`
      : `${label.padEnd(16)}${MISSING_RANGE}`

  return [
    `Date            ${formatDate(sunTimes.date, zone)}`,
    `Timezone        ${zone}`,
    `Sunrise         ${time(sunTimes.sunrise)}`,
    `Solar noon      ${time(sunTimes.solarNoon)}`,
    `Sunset          ${time(sunTimes.sunset)}`,
    range('Golden morning', sunTimes.goldenMorning),
    range('Golden evening', sunTimes.goldenEvening),
    range('Blue morning', sunTimes.blueMorning),
    range('Blue evening', sunTimes.blueEvening),
    ...(hasValidGoldenHour(sunTimes) ? [] : ['No golden hour on this day']),
    ...(hasValidBlueHour(sunTimes) ? [] : ['No blue hour on this day'])
  ].join('\n')
}
