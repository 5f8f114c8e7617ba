import type { Location, SearchWindow, SunEvent, SunEventSet, SunEventSpec } from '@/types'
import { isValidLocation } from './location'
import { REFRACTION_LIMIT, getSunPosition } from './solar-position'

const SAMPLE_STEP_MS = 5 * 60 * 1000
const TRANSIT_TOLERANCE_MS = 1000
const CROSSING_TOLERANCE_MS = 500
const GOLDEN_RATIO = (Math.sqrt(5) - 1) / 2

// Upper limb on the refracted horizon: the geometric centre sits at REFRACTION_LIMIT.
// Apparent elevation is refracted only from that angle up, so it passes the
// limit at the same instant.
export const SUNRISE_ELEVATION = REFRACTION_LIMIT
export const TRANSIT_EVENT = 'Transit'
export const SUNRISE_EVENT = 'Sunrise'
export const SUNSET_EVENT = 'Sunset'

interface Sample {
  time: number
  elevation: number
}

type ElevationFn = (time: number) => number

/**
 * Find solar transit, sunrise, sunset and every custom elevation crossing
 * within one local day.
 *
 * Before-transit events are searched between the window start and transit,
 * after-transit events between transit and the window end. An event the sun
 * never reaches is left out of `events` and carries no instant.
 *
 * Finite coordinates off the globe yield no events at all; non-finite ones
 * throw SolarPositionError.
 */
export function findSunEvents(
  window: SearchWindow,
  location: Location,
  specs: readonly SunEventSpec[] = []
): SunEventSet {
  const start = window.start.getTime()
  const end = window.end.getTime()
  if (!(end > start)) {
    throw new RangeError('Search window must end after it starts')
  }

  if (isOffGlobe(location)) {
    return noEvents()
  }

  const elevationAt: ElevationFn = (time) => getSunPosition(new Date(time), location).elevation

  const samples = sampleElevations(start, end, elevationAt)
  const transit = findTransit(samples, elevationAt)
  const morning = [...samples.filter((sample) => sample.time < transit.time), transit]
  const evening = [transit, ...samples.filter((sample) => sample.time > transit.time)]

  const locate = (spec: SunEventSpec): SunEvent => {
    const time = spec.beforeTransit
      ? findAscendingCrossing(morning, spec.elevation, elevationAt)
      : findDescendingCrossing(evening, spec.elevation, elevationAt)

    return {
      name: spec.name,
      elevation: spec.elevation,
      instant: time === undefined ? undefined : new Date(time)
    }
  }

  const events = new Map<string, SunEvent>()
  for (const spec of specs) {
    const event = locate(spec)
    if (event.instant) {
      events.set(spec.name, event)
    } else {
      events.delete(spec.name)
    }
  }

  return {
    transit: { name: TRANSIT_EVENT, elevation: transit.elevation, instant: new Date(transit.time) },
    sunrise: locate({ name: SUNRISE_EVENT, elevation: SUNRISE_ELEVATION, beforeTransit: true }),
    sunset: locate({ name: SUNSET_EVENT, elevation: SUNRISE_ELEVATION, beforeTransit: false }),
    events
  }
}

function isOffGlobe({ latitude, longitude }: Location): boolean {
  return Number.isFinite(latitude) && Number.isFinite(longitude) && !isValidLocation(latitude, longitude)
}

function noEvents(): SunEventSet {
  return {
    transit: { name: TRANSIT_EVENT, elevation: Number.NaN, instant: undefined },
    sunrise: { name: SUNRISE_EVENT, elevation: SUNRISE_ELEVATION, instant: undefined },
    sunset: { name: SUNSET_EVENT, elevation: SUNRISE_ELEVATION, instant: undefined },
    events: new Map()
  }
}

/**
 * Elevation every few minutes from start to end, both included
 */
function sampleElevations(start: number, end: number, elevationAt: ElevationFn): Sample[] {
  const samples: Sample[] = []
  for (let time = start; time < end; time += SAMPLE_STEP_MS) {
    samples.push({ time, elevation: elevationAt(time) })
  }
  samples.push({ time: end, elevation: elevationAt(end) })
  return samples
}

/**
 * Highest sample, refined by golden-section search over its neighbours
 */
function findTransit(samples: Sample[], elevationAt: ElevationFn): Sample {
  let peak = 0
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].elevation > samples[peak].elevation) {
      peak = i
    }
  }

  let lo = samples[Math.max(peak - 1, 0)].time
  let hi = samples[Math.min(peak + 1, samples.length - 1)].time
  let left = hi - GOLDEN_RATIO * (hi - lo)
  let right = lo + GOLDEN_RATIO * (hi - lo)
  let leftValue = elevationAt(left)
  let rightValue = elevationAt(right)

  while (hi - lo > TRANSIT_TOLERANCE_MS) {
    if (leftValue < rightValue) {
      lo = left
      left = right
      leftValue = rightValue
      right = lo + GOLDEN_RATIO * (hi - lo)
      rightValue = elevationAt(right)
    } else {
      hi = right
      right = left
      rightValue = leftValue
      left = hi - GOLDEN_RATIO * (hi - lo)
      leftValue = elevationAt(left)
    }
  }

  const time = Math.round((lo + hi) / 2)
  const refined = { time, elevation: elevationAt(time) }
  return refined.elevation >= samples[peak].elevation ? refined : samples[peak]
}

/**
 * Last rise through the target elevation, scanning back from transit
 */
function findAscendingCrossing(
  samples: Sample[],
  target: number,
  elevationAt: ElevationFn
): number | undefined {
  for (let i = samples.length - 2; i >= 0; i--) {
    const before = samples[i]
    const after = samples[i + 1]
    if (before.elevation < target && after.elevation >= target) {
      return bisect(before.time, after.time, (time) => elevationAt(time) >= target)
    }
  }
  return undefined
}

/**
 * First fall through the target elevation, scanning on from transit
 */
function findDescendingCrossing(
  samples: Sample[],
  target: number,
  elevationAt: ElevationFn
): number | undefined {
  for (let i = 0; i < samples.length - 1; i++) {
    const before = samples[i]
    const after = samples[i + 1]
    if (before.elevation >= target && after.elevation < target) {
      return bisect(before.time, after.time, (time) => elevationAt(time) < target)
    }
  }
  return undefined
}

/**
 * Narrow [lo, hi] down to the point where `reached` turns true;
 * `reached(lo)` is false and `reached(hi)` is true
 */
function bisect(lo: number, hi: number, reached: (time: number) => boolean): number {
  while (hi - lo > CROSSING_TOLERANCE_MS) {
    const mid = (lo + hi) / 2
    if (reached(mid)) {
      hi = mid
    } else {
      lo = mid
    }
  }
  return Math.round((lo + hi) / 2)
}
