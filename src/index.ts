/**
 * profile-readme
 *
 * Personal dashboard README generator: manual data and scraped profile
 * metrics rendered into marker-delimited README sections.
 */

// Types
export type {
  DashboardConfig,
  ManualData,
  EducationEntry,
  ExperienceEntry,
  GitHubSettings,
  ApiSettings,
  ProfileData,
  GitHubStats,
  LanguageCount,
  FetchResult,
  FetchSuccess,
  FetchUnavailable,
  FetchResults,
  ProfileSite,
  SectionName,
  SourceId,
  RunState,
  UpdateResult,
} from './types.js'
export { PROFILE_SITES, SECTION_NAMES } from './types.js'

// Errors
export {
  DashboardError,
  ConfigError,
  FetchError,
  RenderError,
  FileSystemError,
  getErrorMessage,
  exitCodeFor,
  isDashboardError,
  EXIT_CODES,
} from './errors.js'
export type { FetchFailureReason } from './errors.js'

// Configuration
export { loadConfig, parseConfig, enabledSections, DEFAULT_CONFIG_PATH, DEFAULT_CONFIG_TEMPLATE } from './config.js'

// Fetching
export { getWithRetry, USER_AGENT } from './http.js'
export type { FetchFn, HttpOptions, HttpResult } from './http.js'
export {
  researchGateExtractor,
  googleScholarExtractor,
  linkedInExtractor,
  createExtractorRegistry,
  DEFAULT_EXTRACTORS,
} from './extractors.js'
export type { ProfileExtractor } from './extractors.js'
export { fetchProfile } from './profiles.js'
export type { ProfileFetchOptions } from './profiles.js'
export { fetchGitHubStats, statsCardUrls } from './github.js'
export type { GitHubFetchOptions } from './github.js'

// Rendering
export { renderDashboard, renderSection, bootstrapDocument } from './renderer.js'
export { findRegions, startMarker, endMarker, escapeMarkers } from './markers.js'

// Orchestration
export { UpdateOrchestrator, update, planFetches } from './orchestrator.js'
export type { UpdateOptions, FetchTask } from './orchestrator.js'

// Logging
export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'
