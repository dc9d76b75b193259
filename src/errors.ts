/**
 * Error types for profile-readme
 *
 * Only ConfigError, RenderError and FileSystemError stop a run.
 * FetchError is recovered by the fetchers and reported as unavailable data.
 */

/**
 * Base error class for all profile-readme errors
 * Carries structured context and the underlying cause
 */
export class DashboardError extends Error {
  public context?: Record<string, unknown>
  public readonly timestamp: Date

  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = this.constructor.name
    this.context = options?.context
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Get a formatted error message with context
   */
  public getFullMessage(): string {
    let msg = `[${this.name}] ${this.message}`

    if (this.context && Object.keys(this.context).length > 0) {
      msg += `\nContext: ${JSON.stringify(this.context, null, 2)}`
    }

    if (this.cause) {
      msg += `\nCause: ${getErrorMessage(this.cause)}`
    }

    return msg
  }
}

/**
 * The configuration document is missing, malformed or invalid
 */
export class ConfigError extends DashboardError {
  public readonly configKey?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
      configKey?: string
      filePath?: string
    }
  ) {
    super(message, options)
    this.configKey = options?.configKey
    if (options?.configKey || options?.filePath) {
      this.context = {
        ...this.context,
        ...(options.configKey && { configKey: options.configKey }),
        ...(options.filePath && { filePath: options.filePath }),
      }
    }
  }
}

/**
 * Why a source could not provide data
 */
export type FetchFailureReason =
  | 'not_configured'   // Section enabled but no profile URL / username
  | 'http_status'      // Non-2xx response
  | 'network'          // DNS, connection reset, etc.
  | 'timeout'          // Attempt exceeded the configured timeout
  | 'markup_not_found' // Page fetched but the expected markup is absent
  | 'invalid_response' // Body could not be decoded

/**
 * A single source failed to provide data
 */
export class FetchError extends DashboardError {
  public readonly reason: FetchFailureReason
  public readonly statusCode?: number
  public readonly url?: string

  constructor(
    message: string,
    options: {
      reason: FetchFailureReason
      cause?: unknown
      context?: Record<string, unknown>
      statusCode?: number
      url?: string
    }
  ) {
    super(message, options)
    this.reason = options.reason
    this.statusCode = options.statusCode
    this.url = options.url
    this.context = {
      ...this.context,
      reason: options.reason,
      ...(options.statusCode !== undefined && { statusCode: options.statusCode }),
      ...(options.url && { url: options.url }),
    }
  }
}

/**
 * Section markers in the document are structurally broken
 */
export class RenderError extends DashboardError {
  public readonly section?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
      section?: string
      line?: number
    }
  ) {
    super(message, options)
    this.section = options?.section
    if (options?.section || options?.line) {
      this.context = {
        ...this.context,
        ...(options.section && { section: options.section }),
        ...(options.line && { line: options.line }),
      }
    }
  }
}

/**
 * Reading or writing the output document failed
 */
export class FileSystemError extends DashboardError {
  public readonly filePath?: string
  public readonly operation?: 'read' | 'write'

  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
      filePath?: string
      operation?: 'read' | 'write'
    }
  ) {
    super(message, options)
    this.filePath = options?.filePath
    this.operation = options?.operation
    if (options?.filePath || options?.operation) {
      this.context = {
        ...this.context,
        ...(options.filePath && { filePath: options.filePath }),
        ...(options.operation && { operation: options.operation }),
      }
    }
  }
}

/**
 * Safely extract an error message from an unknown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return String(error)
}

/**
 * Get the Node.js error code (ENOENT, EACCES, ...) if there is one
 */
export function getNodeErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/** Process exit codes */
export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  config: 2,
  render: 3,
  fileSystem: 4,
} as const

/**
 * Map an error that stopped the run to a process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) return EXIT_CODES.config
  if (error instanceof RenderError) return EXIT_CODES.render
  if (error instanceof FileSystemError) return EXIT_CODES.fileSystem
  return EXIT_CODES.unexpected
}

/**
 * Type guard for profile-readme errors
 */
export function isDashboardError(error: unknown): error is DashboardError {
  return error instanceof DashboardError
}
