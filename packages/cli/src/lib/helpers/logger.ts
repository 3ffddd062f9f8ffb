/**
 * CLI Logger
 *
 * Leveled, optionally colored output for autoroute commands. Errors go to
 * the error sink (stderr by default), everything else to the output sink.
 *
 * @example
 * ```ts
 * import { cliLogger } from './helpers'
 *
 * cliLogger.info('Scanning %d file(s)', files.length)
 * cliLogger.success('Generated generated/routes.list.generated.ts')
 * ```
 */

import { format } from 'node:util'
import type { TextSink } from '@autoroute/shared'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success'

export interface LoggerOptions {
  /** Minimum log level to display */
  level?: LogLevel
  colors?: boolean
  /** Prefix for all messages, rendered as `[prefix]` */
  prefix?: string
  output?: TextSink
  errorOutput?: TextSink
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  success: 1,
}

const LEVEL_ICONS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
  success: '✅',
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  success: COLORS.green,
}

export class CliLogger {
  private options: Required<LoggerOptions>

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level ?? 'info',
      colors: options.colors ?? true,
      prefix: options.prefix ?? '',
      output: options.output ?? process.stdout,
      errorOutput: options.errorOutput ?? process.stderr,
    }
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[this.options.level]
  }

  private format(level: LogLevel, message: string): string {
    const parts: string[] = []
    const color = this.options.colors ? LEVEL_COLORS[level] : ''
    const reset = this.options.colors ? COLORS.reset : ''

    parts.push(`${color}${LEVEL_ICONS[level]}${reset}`)
    if (this.options.prefix) {
      parts.push(`[${this.options.prefix}]`)
    }
    parts.push(message)

    return parts.join(' ')
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return

    const formatted = this.format(level, message)
    const output = level === 'error' ? this.options.errorOutput : this.options.output
    output.write(formatted + '\n')
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', format(message, ...args))
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', format(message, ...args))
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', format(message, ...args))
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', format(message, ...args))
  }

  success(message: string, ...args: unknown[]): void {
    this.write('success', format(message, ...args))
  }

  /**
   * Create a new logger sharing these options under a nested prefix
   */
  withPrefix(prefix: string): CliLogger {
    return new CliLogger({
      ...this.options,
      prefix: this.options.prefix ? `${this.options.prefix}:${prefix}` : prefix,
    })
  }
}

export const cliLogger = new CliLogger({ prefix: 'autoroute' })
