/**
 * Profile fetcher: GET a profile page, then run the site's extractor
 */

import { getErrorMessage } from './errors.js'
import { getWithRetry } from './http.js'
import type { FetchFn } from './http.js'
import { createExtractorRegistry } from './extractors.js'
import type { ProfileExtractor } from './extractors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { ApiSettings, FetchResult, ProfileData, ProfileSite } from './types.js'

export interface ProfileFetchOptions {
  fetch?: FetchFn
  logger?: Logger
  /** Site → extractor (default: built-in strategies) */
  extractors?: ReadonlyMap<string, ProfileExtractor>
}

/**
 * Fetch and extract one profile. Never throws; failures come back as
 * an `unavailable` result.
 */
export async function fetchProfile(
  site: ProfileSite,
  url: string | undefined,
  settings: ApiSettings,
  options: ProfileFetchOptions = {}
): Promise<FetchResult<ProfileData>> {
  const { logger = silentLogger } = options
  const logPrefix = `[${site}]`

  if (!url) {
    return {
      status: 'unavailable',
      source: site,
      reason: 'not_configured',
      detail: `No profile URL configured for ${site}`,
      attempts: 0,
    }
  }

  const response = await getWithRetry(url, settings, {
    fetch: options.fetch,
    logger,
    logPrefix,
    headers: { Accept: 'text/html,application/xhtml+xml' },
  })

  if (!response.ok) {
    return {
      status: 'unavailable',
      source: site,
      reason: response.error.reason,
      detail: response.error.message,
      attempts: response.attempts,
    }
  }

  const extractors = options.extractors ?? createExtractorRegistry()
  const extractor = extractors.get(site)

  let data: ProfileData | null
  try {
    data = extractor ? extractor.extract(response.body) : null
  } catch (error) {
    const detail = `Extraction failed for ${url}: ${getErrorMessage(error)}`
    logger.warn(`${logPrefix} ${detail}`)
    return {
      status: 'unavailable',
      source: site,
      reason: 'markup_not_found',
      detail,
      attempts: response.attempts,
    }
  }

  if (!data) {
    const detail = extractor
      ? `Expected markup not found on ${url}`
      : `No extraction strategy registered for ${site}`
    logger.warn(`${logPrefix} ${detail}`)
    return {
      status: 'unavailable',
      source: site,
      reason: 'markup_not_found',
      detail,
      attempts: response.attempts,
    }
  }

  logger.debug(`${logPrefix} Extracted ${Object.keys(data.stats).length} metric(s) in ${response.attempts} attempt(s)`)
  return { status: 'ok', source: site, data, attempts: response.attempts }
}
