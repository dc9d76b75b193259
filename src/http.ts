/**
 * HTTP GET with a per-attempt timeout and bounded retries
 *
 * - Every attempt is bounded by an AbortSignal timeout
 * - Non-2xx responses, network errors and timeouts are retried
 * - A fixed delay separates attempts (api_settings.rate_limit_delay)
 * - Never throws: the outcome is a tagged result
 */

import { FetchError, getErrorMessage } from './errors.js'
import type { FetchFailureReason } from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { ApiSettings } from './types.js'

/** Browser-like User-Agent; profile sites reject obvious bots */
export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

export type FetchFn = typeof fetch

export interface HttpOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn
  headers?: Record<string, string>
  logger?: Logger
  /** Label used in log lines, e.g. '[google_scholar]' */
  logPrefix?: string
}

export type HttpResult =
  | { ok: true; body: string; status: number; attempts: number }
  | { ok: false; error: FetchError; attempts: number }

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Classify a thrown fetch error
 */
export function classifyError(error: unknown): FetchFailureReason {
  if (error instanceof Error) {
    const name = error.name.toLowerCase()
    const message = error.message.toLowerCase()
    if (
      name === 'timeouterror' ||
      name === 'aborterror' ||
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('aborted')
    ) {
      return 'timeout'
    }
  }
  return 'network'
}

async function attempt(url: string, settings: ApiSettings, options: HttpOptions): Promise<{ body: string; status: number }> {
  const fetchFn = options.fetch ?? fetch
  const timeoutMs = settings.timeout * 1000

  let response: Response
  try {
    response = await fetchFn(url, {
      headers: { 'User-Agent': USER_AGENT, ...options.headers },
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    const reason = classifyError(error)
    const message = reason === 'timeout'
      ? `Request timed out after ${timeoutMs}ms`
      : `Network error: ${getErrorMessage(error)}`
    throw new FetchError(message, { reason, cause: error, url })
  }

  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`, {
      reason: 'http_status',
      statusCode: response.status,
      url,
    })
  }

  try {
    return { body: await response.text(), status: response.status }
  } catch (error) {
    throw new FetchError(`Failed to read response body: ${getErrorMessage(error)}`, {
      reason: classifyError(error) === 'timeout' ? 'timeout' : 'invalid_response',
      cause: error,
      url,
    })
  }
}

/**
 * GET a URL, retrying up to `settings.retries` extra times
 */
export async function getWithRetry(url: string, settings: ApiSettings, options: HttpOptions = {}): Promise<HttpResult> {
  const { logger = silentLogger, logPrefix = '[http]' } = options
  const maxAttempts = settings.retries + 1
  const delayMs = settings.rateLimitDelay * 1000

  let lastError: FetchError | undefined
  for (let attempts = 1; attempts <= maxAttempts; attempts++) {
    try {
      const { body, status } = await attempt(url, settings, options)
      return { ok: true, body, status, attempts }
    } catch (error) {
      lastError = error instanceof FetchError
        ? error
        : new FetchError(getErrorMessage(error), { reason: 'network', cause: error, url })

      if (attempts === maxAttempts) {
        logger.warn(`${logPrefix} Failed after ${attempts} attempt(s): ${lastError.message} [${lastError.reason}]`)
        return { ok: false, error: lastError, attempts }
      }

      logger.debug(
        `${logPrefix} Attempt ${attempts}/${maxAttempts} failed [${lastError.reason}]: ${lastError.message}. Retrying in ${delayMs}ms...`
      )
      if (delayMs > 0) {
        await sleep(delayMs)
      }
    }
  }

  // maxAttempts is at least 1, so the loop always returns
  return {
    ok: false,
    error: lastError ?? new FetchError('No attempt was made', { reason: 'network', url }),
    attempts: maxAttempts,
  }
}
