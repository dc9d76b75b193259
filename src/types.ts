/**
 * Core types for profile-readme
 */

import type { FetchFailureReason } from './errors.js'

/** Profile sites with a built-in extraction strategy */
export const PROFILE_SITES = ['researchgate', 'google_scholar', 'linkedin'] as const
export type ProfileSite = (typeof PROFILE_SITES)[number]

/** Managed sections, in the order they appear in a bootstrapped README */
export const SECTION_NAMES = [
  'about',
  'publications',
  'citations',
  'research_interests',
  'current_projects',
  'education',
  'experience',
  'links',
  'github_stats',
] as const
export type SectionName = (typeof SECTION_NAMES)[number]

/** Where a section's fetched data comes from */
export type SourceId = ProfileSite | 'github'

export interface EducationEntry {
  readonly institution: string
  readonly degree: string
  readonly location: string
}

export interface ExperienceEntry {
  readonly title: string
  readonly organization: string
  readonly period?: string
}

export interface ManualData {
  readonly name: string
  readonly institution: string
  readonly department: string
  readonly researchInterests: readonly string[]
  readonly currentProjects: readonly string[]
  readonly education: readonly EducationEntry[]
  readonly experience: readonly ExperienceEntry[]
}

export interface GitHubSettings {
  readonly username: string
  readonly showStats: boolean
  readonly showLanguages: boolean
  readonly theme: string
  readonly topLanguages: number
}

export interface ApiSettings {
  /** Seconds to wait between attempts */
  readonly rateLimitDelay: number
  /** Seconds before a single attempt is abandoned */
  readonly timeout: number
  /** Extra attempts after the first one */
  readonly retries: number
}

/**
 * Validated configuration. Deeply frozen after loading.
 */
export interface DashboardConfig {
  /** Site → profile URL. Sites without a built-in strategy are allowed. */
  readonly profiles: Readonly<Record<string, string>>
  readonly readmePath: string
  readonly updateFrequency?: string
  readonly sections: Readonly<Record<SectionName, boolean>>
  readonly manualData: ManualData
  readonly github?: GitHubSettings
  readonly apiSettings: ApiSettings
}

/**
 * Metrics extracted from a profile page
 */
export interface ProfileData {
  readonly site: string
  readonly name?: string
  readonly publications?: number
  readonly citations?: number
  readonly hIndex?: number
  readonly i10Index?: number
  /** Current position line (LinkedIn) */
  readonly headline?: string
  /** Every numeric metric found, keyed by metric name */
  readonly stats: Readonly<Record<string, number>>
}

export interface LanguageCount {
  readonly name: string
  readonly repos: number
}

export interface GitHubStats {
  readonly username: string
  readonly user?: {
    readonly publicRepos: number
    readonly publicGists: number
    readonly followers: number
    readonly following: number
  }
  readonly repos?: {
    readonly totalStars: number
    readonly languages: readonly LanguageCount[]
  }
}

export interface SourceDataMap {
  researchgate: ProfileData
  google_scholar: ProfileData
  linkedin: ProfileData
  github: GitHubStats
}

export type FetchSuccess<T> = {
  readonly status: 'ok'
  readonly source: SourceId
  readonly data: T
  readonly attempts: number
}

export type FetchUnavailable = {
  readonly status: 'unavailable'
  readonly source: SourceId
  readonly reason: FetchFailureReason
  readonly detail: string
  readonly attempts: number
}

/** Per-source outcome of a run */
export type FetchResult<T = ProfileData | GitHubStats> = FetchSuccess<T> | FetchUnavailable

/** Fetch results keyed by source; sources that were not fetched are absent */
export type FetchResults = {
  readonly [K in SourceId]?: FetchResult<SourceDataMap[K]>
}

export type RunState = 'idle' | 'loading' | 'fetching' | 'rendering' | 'done'

export interface UpdateResult {
  /** The rendered document differs from the file on disk */
  changed: boolean
  document: string
  outputPath: string
  results: FetchResults
}
