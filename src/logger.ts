/**
 * Console logger with chalk colors
 */

import chalk from 'chalk'

export interface Logger {
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
}

export interface LoggerOptions {
  /** Prefix for every line, e.g. '[update]' */
  prefix?: string
  /** Only errors are printed */
  quiet?: boolean
  /** Print debug lines */
  verbose?: boolean
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { prefix, quiet = false, verbose = false } = options
  const tag = prefix ? `${chalk.gray(prefix)} ` : ''

  return {
    info(message) {
      if (!quiet) console.log(`${tag}${message}`)
    },
    success(message) {
      if (!quiet) console.log(`${tag}${chalk.green('✓')} ${message}`)
    },
    warn(message) {
      if (!quiet) console.warn(`${tag}${chalk.yellow('⚠')} ${chalk.yellow(message)}`)
    },
    error(message) {
      console.error(`${tag}${chalk.red('✗')} ${chalk.red(message)}`)
    },
    debug(message) {
      if (verbose && !quiet) console.log(`${tag}${chalk.gray(message)}`)
    },
  }
}

/** Logger that drops everything; the default for library calls */
export const silentLogger: Logger = {
  info() {},
  success() {},
  warn() {},
  error() {},
  debug() {},
}
