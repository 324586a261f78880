import chalk from 'chalk'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel
  quiet: boolean
  timestamps: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  quiet: false,
  timestamps: false
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

/**
 * Check if a log level should be displayed
 */
function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level]
}

/**
 * Format a log message, with a timestamp in verbose runs
 */
function formatMessage(level: LogLevel, message: string): string {
  const prefix = config.timestamps
    ? `[${new Date().toISOString()}] [${level.toUpperCase()}]`
    : `${level}:`
  return `${prefix} ${message}`
}

/**
 * Log a debug message
 */
export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    console.debug(chalk.gray(formatMessage('debug', message)), ...args)
  }
}

/**
 * Log an info message
 */
export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.info(chalk.blue(formatMessage('info', message)), ...args)
  }
}

/**
 * Log a warning message
 */
export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.warn(chalk.yellow(formatMessage('warn', message)), ...args)
  }
}

/**
 * Log an error message
 */
export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(chalk.red(formatMessage('error', message)), ...args)
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
