/**
 * GitHub stats from the public REST API
 */

import { z } from 'zod'
import { getWithRetry } from './http.js'
import type { FetchFn } from './http.js'
import { FetchError, getErrorMessage } from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { ApiSettings, FetchResult, GitHubSettings, GitHubStats, LanguageCount } from './types.js'

export const GITHUB_API_URL = 'https://api.github.com'
export const README_STATS_URL = 'https://github-readme-stats.vercel.app'

export interface GitHubFetchOptions {
  fetch?: FetchFn
  logger?: Logger
  /** Personal access token; raises the rate limit */
  token?: string
}

const userSchema = z.object({
  login: z.string(),
  public_repos: z.number().default(0),
  public_gists: z.number().default(0),
  followers: z.number().default(0),
  following: z.number().default(0),
})

const reposSchema = z.array(
  z.object({
    name: z.string(),
    fork: z.boolean().default(false),
    language: z.string().nullable().default(null),
    stargazers_count: z.number().default(0),
  })
)

type Repo = z.infer<typeof reposSchema>[number]

/**
 * Count repositories per primary language, forks excluded.
 * Sorted by count desc, then name asc.
 */
export function summarizeLanguages(repos: readonly Repo[], limit: number): LanguageCount[] {
  const counts = new Map<string, number>()
  for (const repo of repos) {
    if (repo.fork || !repo.language) continue
    counts.set(repo.language, (counts.get(repo.language) ?? 0) + 1)
  }

  return [...counts.entries()]
    .map(([name, repos]) => ({ name, repos }))
    .sort((a, b) => b.repos - a.repos || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, limit)
}

/** github-readme-stats card URLs for the enabled toggles */
export function statsCardUrls(settings: GitHubSettings): { stats?: string; languages?: string } {
  const user = encodeURIComponent(settings.username)
  const theme = encodeURIComponent(settings.theme)
  return {
    stats: settings.showStats
      ? `${README_STATS_URL}/api?username=${user}&show_icons=true&theme=${theme}`
      : undefined,
    languages: settings.showLanguages
      ? `${README_STATS_URL}/api/top-langs/?username=${user}&layout=compact&theme=${theme}`
      : undefined,
  }
}

async function getJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  settings: ApiSettings,
  options: GitHubFetchOptions
): Promise<{ ok: true; value: T; attempts: number } | { ok: false; error: FetchError; attempts: number }> {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
  }
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`
  }

  const response = await getWithRetry(url, settings, {
    fetch: options.fetch,
    logger: options.logger,
    logPrefix: '[github]',
    headers,
  })
  if (!response.ok) return response

  let body: unknown
  try {
    body = JSON.parse(response.body)
  } catch (error) {
    return {
      ok: false,
      error: new FetchError(`Invalid JSON from ${url}: ${getErrorMessage(error)}`, { reason: 'invalid_response', cause: error, url }),
      attempts: response.attempts,
    }
  }

  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    return {
      ok: false,
      error: new FetchError(`Unexpected response shape from ${url}`, { reason: 'invalid_response', cause: parsed.error, url }),
      attempts: response.attempts,
    }
  }

  return { ok: true, value: parsed.data, attempts: response.attempts }
}

/**
 * Fetch user and language stats. Toggles that are off skip their call;
 * with both off no request is made.
 *
 * Stars and languages come from the first page of owned repositories
 * (up to 100); further pages are not followed.
 */
export async function fetchGitHubStats(
  settings: GitHubSettings | undefined,
  apiSettings: ApiSettings,
  options: GitHubFetchOptions = {}
): Promise<FetchResult<GitHubStats>> {
  const { logger = silentLogger } = options

  if (!settings) {
    return {
      status: 'unavailable',
      source: 'github',
      reason: 'not_configured',
      detail: 'No github.username configured',
      attempts: 0,
    }
  }

  const user = encodeURIComponent(settings.username)
  let attempts = 0
  let stats: GitHubStats = { username: settings.username }

  if (settings.showStats) {
    const result = await getJson(`${GITHUB_API_URL}/users/${user}`, userSchema, apiSettings, { ...options, logger })
    attempts += result.attempts
    if (!result.ok) {
      return { status: 'unavailable', source: 'github', reason: result.error.reason, detail: result.error.message, attempts }
    }
    stats = {
      ...stats,
      user: {
        publicRepos: result.value.public_repos,
        publicGists: result.value.public_gists,
        followers: result.value.followers,
        following: result.value.following,
      },
    }
  }

  if (settings.showLanguages) {
    const result = await getJson(
      `${GITHUB_API_URL}/users/${user}/repos?per_page=100&type=owner`,
      reposSchema,
      apiSettings,
      { ...options, logger }
    )
    attempts += result.attempts
    if (!result.ok) {
      return { status: 'unavailable', source: 'github', reason: result.error.reason, detail: result.error.message, attempts }
    }
    stats = {
      ...stats,
      repos: {
        totalStars: result.value.reduce((sum, repo) => sum + (repo.fork ? 0 : repo.stargazers_count), 0),
        languages: summarizeLanguages(result.value, settings.topLanguages),
      },
    }
  }

  logger.debug(`[github] Collected stats for ${settings.username} in ${attempts} request(s)`)
  return { status: 'ok', source: 'github', data: stats, attempts }
}
