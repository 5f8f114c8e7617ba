/**
 * Configuration service
 * Reads runtime configuration from the environment
 */

import { z } from 'zod'
import type { LogLevelName } from '@/types'

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevelName[]

const ConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .catch('warn'),
  DEFAULT_TIMEZONE: z.string().trim().min(1).optional().catch(undefined)
})

export interface Config {
  logLevel: LogLevelName
  defaultTimezone?: string // used when a location's zone cannot be resolved
}

/**
 * Build the configuration; unknown or malformed values fall back to defaults
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.parse({
    LOG_LEVEL: env.LOG_LEVEL ?? 'warn',
    DEFAULT_TIMEZONE: env.DEFAULT_TIMEZONE
  })

  return {
    logLevel: parsed.LOG_LEVEL,
    defaultTimezone: parsed.DEFAULT_TIMEZONE
  }
}
