/**
 * Update orchestrator
 * loading → fetching → rendering → done
 *
 * Only ConfigError, RenderError and FileSystemError escape run().
 * Fetch failures end up as "unavailable" sections.
 */

import { readFile, rename, unlink, writeFile } from 'node:fs/promises'
import { dirname, basename, join, resolve } from 'node:path'
import { loadConfig, DEFAULT_CONFIG_PATH } from './config.js'
import { FileSystemError, getErrorMessage, getNodeErrorCode } from './errors.js'
import { createExtractorRegistry } from './extractors.js'
import type { ProfileExtractor } from './extractors.js'
import { fetchGitHubStats } from './github.js'
import type { FetchFn } from './http.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import { fetchProfile } from './profiles.js'
import { renderDashboard } from './renderer.js'
import type {
  DashboardConfig,
  FetchResult,
  FetchResults,
  GitHubStats,
  ProfileData,
  ProfileSite,
  RunState,
  SourceId,
  UpdateResult,
} from './types.js'

export interface UpdateOptions {
  /** Path to the YAML configuration (default: dashboard_config.yaml) */
  configPath?: string
  /** Output path; overrides readme_path (resolved against cwd) */
  outputPath?: string
  /** Render and compare without writing */
  dryRun?: boolean
  /** GitHub token for API requests */
  githubToken?: string
  fetch?: FetchFn
  /** Extra or replacement extraction strategies */
  extractors?: readonly ProfileExtractor[]
  logger?: Logger
}

export type FetchTask =
  | { source: ProfileSite; url: string | undefined }
  | { source: 'github' }

/**
 * Decide which sources the enabled sections need. Each source appears once.
 */
export function planFetches(config: DashboardConfig): FetchTask[] {
  const tasks: FetchTask[] = []
  const { sections, profiles } = config

  if (sections.publications) {
    tasks.push({ source: 'researchgate', url: profiles.researchgate })
  }
  if (sections.citations) {
    tasks.push({ source: 'google_scholar', url: profiles.google_scholar })
  }
  // LinkedIn only adds a headline to manual experience entries
  if (sections.experience && profiles.linkedin) {
    tasks.push({ source: 'linkedin', url: profiles.linkedin })
  }
  if (sections.github_stats && config.github && (config.github.showStats || config.github.showLanguages)) {
    tasks.push({ source: 'github' })
  }

  return tasks
}

type TaskOutcome =
  | { source: ProfileSite; result: FetchResult<ProfileData> }
  | { source: 'github'; result: FetchResult<GitHubStats> }

type MutableFetchResults = {
  -readonly [K in keyof FetchResults]: FetchResults[K]
}

/**
 * Write-then-rename so readers never see a partial document
 */
export async function writeAtomic(path: string, content: string): Promise<void> {
  const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
  try {
    await writeFile(tmp, content, 'utf-8')
    await rename(tmp, path)
  } catch (error) {
    await unlink(tmp).catch(() => undefined)
    throw new FileSystemError(`Failed to write ${path}: ${getErrorMessage(error)}`, {
      cause: error,
      filePath: path,
      operation: 'write',
    })
  }
}

async function readExisting(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    if (getNodeErrorCode(error) === 'ENOENT') return null
    throw new FileSystemError(`Failed to read ${path}: ${getErrorMessage(error)}`, {
      cause: error,
      filePath: path,
      operation: 'read',
    })
  }
}

export class UpdateOrchestrator {
  private currentState: RunState = 'idle'
  private readonly options: UpdateOptions
  private readonly logger: Logger

  constructor(options: UpdateOptions = {}) {
    this.options = options
    this.logger = options.logger ?? silentLogger
  }

  get state(): RunState {
    return this.currentState
  }

  private transition(next: RunState): void {
    this.logger.debug(`[update] ${this.currentState} → ${next}`)
    this.currentState = next
  }

  async run(): Promise<UpdateResult> {
    if (this.currentState !== 'idle') {
      throw new Error(`UpdateOrchestrator.run() called in state "${this.currentState}"; create a new orchestrator per run`)
    }

    this.transition('loading')
    const configPath = this.options.configPath ?? DEFAULT_CONFIG_PATH
    const config = await loadConfig(configPath)
    const outputPath = this.options.outputPath
      ? resolve(this.options.outputPath)
      : resolve(dirname(configPath), config.readmePath)
    this.logger.info(`Loaded ${configPath}`)

    this.transition('fetching')
    const results = await this.fetchAll(config)

    this.transition('rendering')
    const existing = await readExisting(outputPath)
    const document = renderDashboard(config, results, existing)
    const changed = document !== existing

    if (!changed) {
      this.logger.info(`${outputPath} is up to date`)
    } else if (this.options.dryRun) {
      this.logger.info(`Dry run: ${outputPath} would change`)
    } else {
      await writeAtomic(outputPath, document)
      this.logger.success(`Updated ${outputPath}`)
    }

    this.transition('done')
    return { changed, document, outputPath, results }
  }

  private async fetchAll(config: DashboardConfig): Promise<FetchResults> {
    const tasks = planFetches(config)
    const registry = createExtractorRegistry(this.options.extractors)
    const shared = { fetch: this.options.fetch, logger: this.logger }

    // One slot per task; each slot is written by its own task only
    const slots = await Promise.all(
      tasks.map(async (task): Promise<TaskOutcome> =>
        task.source === 'github'
          ? {
            source: 'github',
            result: await fetchGitHubStats(config.github, config.apiSettings, { ...shared, token: this.options.githubToken }),
          }
          : {
            source: task.source,
            result: await fetchProfile(task.source, task.url, config.apiSettings, { ...shared, extractors: registry }),
          }
      )
    )

    const results: MutableFetchResults = {}
    for (const slot of slots) {
      if (slot.result.status === 'ok') {
        this.logger.success(`${sourceLabel(slot.source)}: fetched`)
      } else {
        this.logger.warn(`${sourceLabel(slot.source)}: unavailable (${slot.result.reason}) ${slot.result.detail}`)
      }

      if (slot.source === 'github') {
        results.github = slot.result
      } else {
        results[slot.source] = slot.result
      }
    }

    return results
  }
}

function sourceLabel(source: SourceId): string {
  return source === 'github' ? 'GitHub' : source
}

/**
 * Convenience wrapper: one run with the given options
 */
export function update(options: UpdateOptions = {}): Promise<UpdateResult> {
  return new UpdateOrchestrator(options).run()
}
