/**
 * Logger service
 * Console logging with a minimum level and an optional scope prefix
 */

import type { LogLevelName } from '@/types'
import { loadConfig } from './config'

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
}

export class Logger {
  private minLevel: LogLevel

  constructor(level: LogLevelName = 'warn', private readonly scope?: string) {
    this.minLevel = LEVELS_BY_NAME[level]
  }

  setLevel(level: LogLevelName): void {
    this.minLevel = LEVELS_BY_NAME[level]
  }

  child(scope: string): Logger {
    const logger = new Logger('warn', this.scope ? `${this.scope}:${scope}` : scope)
    logger.minLevel = this.minLevel
    return logger
  }

  private shouldLog(level: LogLevel): boolean {
    return this.minLevel !== LogLevel.SILENT && level >= this.minLevel
  }

  private formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString()
    const scope = this.scope ? ` [${this.scope}]` : ''
    return `[${timestamp}] [${level}]${scope} ${message}`
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage('DEBUG', message), ...args)
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage('INFO', message), ...args)
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message), ...args)
    }
  }

  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorMessage = error instanceof Error ? error.message : String(error)
      console.error(this.formatMessage('ERROR', `${message}: ${errorMessage}`), ...args)

      if (error instanceof Error && error.stack && this.minLevel === LogLevel.DEBUG) {
        console.error('Stack trace:', error.stack)
      }
    }
  }
}

// Shared instance configured from the environment
export const logger = new Logger(loadConfig().logLevel)

export function createLogger(scope: string): Logger {
  return logger.child(scope)
}
