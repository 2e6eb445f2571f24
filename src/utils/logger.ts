import chalk from 'chalk'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  quiet: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  quiet: false
}

let config: LoggerConfig = { ...DEFAULT_CONFIG }

/**
 * Configure the logger
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

/**
 * Restore the default configuration
 */
export function resetLogger(): void {
  config = { ...DEFAULT_CONFIG }
}

function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level]
}

/**
 * Format a log message
 */
export function formatMessage(level: LogLevel, message: string): string {
  return `[${level.toUpperCase()}] ${message}`
}

export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    console.debug(chalk.gray(formatMessage('debug', message)), ...args)
  }
}

export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.info(chalk.blue(formatMessage('info', message)), ...args)
  }
}

export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.warn(chalk.yellow(formatMessage('warn', message)), ...args)
  }
}

export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(chalk.red(formatMessage('error', message)), ...args)
  }
}

/**
 * Write a progress line to stdout (shown unless quiet)
 */
export function line(message: string): void {
  if (!config.quiet) {
    console.log(message)
  }
}

/**
 * Log a success message (always shown unless quiet)
 */
export function success(message: string): void {
  if (!config.quiet) {
    console.log(chalk.green(message))
  }
}

/**
 * Log the result of one processed item.
 * Failures go to stderr and are shown even when quiet.
 */
export function outcome(succeeded: boolean, message: string): void {
  if (!succeeded) {
    if (shouldLog('error')) {
      console.error(`${chalk.red('[FAILED]')} ${message}`)
    }
    return
  }

  if (!config.quiet) {
    console.log(`${chalk.green('[OK]')} ${message}`)
  }
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

/**
 * Create a named logger instance
 */
export function createLogger(name: string): Logger {
  const prefix = (msg: string) => `[${name}] ${msg}`

  return {
    debug: (message: string, ...args: unknown[]) => debug(prefix(message), ...args),
    info: (message: string, ...args: unknown[]) => info(prefix(message), ...args),
    warn: (message: string, ...args: unknown[]) => warn(prefix(message), ...args),
    error: (message: string, ...args: unknown[]) => error(prefix(message), ...args)
  }
}
