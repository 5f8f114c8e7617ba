/**
 * Error types raised by the sun calculations
 */

export interface ErrorContext {
  operation?: string
  latitude?: number
  longitude?: number
  date?: string
}

export class SolarPositionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SolarPositionError'
  }
}

export class SunCalculationError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'SunCalculationError'
  }
}

/**
 * Get a printable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
