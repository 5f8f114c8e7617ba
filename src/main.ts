import { SunTimesCalculator } from '@/services/sun-times-calculator'
import { createManualLocation } from '@/services/location'
import { logger } from '@/services/logger'
import { DEFAULT_SETTINGS } from '@/services/settings'
import { localMidnight } from '@/services/timezone'
import { parseCliArgs, renderSunTimes } from '@/utils/cli'

function main(): void {
  const args = parseCliArgs(process.argv.slice(2))
  const location = createManualLocation(args.latitude, args.longitude, {
    elevation: args.elevation,
    timezone: args.timezone
  })

  const calculator = new SunTimesCalculator({ ...DEFAULT_SETTINGS, timeFormat24Hour: args.use24Hour })
  const zone = calculator.resolveTimezone(location)
  const date = args.date ? localMidnight(args.date.year, args.date.month, args.date.day, zone) : new Date()

  const sunTimes = calculator.calculate(location, date)
  console.log(renderSunTimes(sunTimes, args.use24Hour))
}

try {
  main()
} catch (error) {
  logger.error('Failed to calculate sun times', error)
  process.exitCode = 1
}
