/**
 * Configuration loader
 * Parses dashboard_config.yaml into a validated, frozen DashboardConfig
 */

import { readFile } from 'node:fs/promises'
import { parse as parseYaml, YAMLParseError } from 'yaml'
import { z } from 'zod'
import { ConfigError, getErrorMessage, getNodeErrorCode } from './errors.js'
import { SECTION_NAMES } from './types.js'
import type { DashboardConfig, SectionName } from './types.js'

export const DEFAULT_CONFIG_PATH = 'dashboard_config.yaml'

const httpUrl = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), { message: 'Must be an http(s) URL' })

const configSchema = z.object({
  profiles: z.record(z.string(), httpUrl).default({}),
  readme_path: z.string().min(1).default('README.md'),
  update_frequency: z.string().optional(),
  sections: z.record(z.string(), z.boolean()).default({}),
  manual_data: z.object({
    name: z.string().trim().min(1, 'Name is required'),
    institution: z.string().default(''),
    department: z.string().default(''),
    research_interests: z.array(z.string()).default([]),
    current_projects: z.array(z.string()).default([]),
    education: z
      .array(
        z.object({
          institution: z.string().min(1),
          degree: z.string().min(1),
          location: z.string().default(''),
        })
      )
      .default([]),
    experience: z
      .array(
        z.object({
          title: z.string().min(1),
          organization: z.string().min(1),
          period: z.string().optional(),
        })
      )
      .default([]),
  }),
  github: z
    .object({
      username: z.string().trim().min(1),
      show_stats: z.boolean().default(false),
      show_languages: z.boolean().default(false),
      theme: z.string().default('default'),
      top_languages: z.number().int().min(1).max(20).default(5),
    })
    .optional(),
  api_settings: z
    .object({
      rate_limit_delay: z.number().min(0).default(2),
      timeout: z.number().positive().default(30),
      retries: z.number().int().min(0).max(10).default(3),
    })
    .default({}),
})

type RawConfig = z.infer<typeof configSchema>

function isSectionName(value: string): value is SectionName {
  return (SECTION_NAMES as readonly string[]).includes(value)
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

function toConfig(raw: RawConfig, source: string): DashboardConfig {
  const sections: Record<SectionName, boolean> = {
    about: false,
    publications: false,
    citations: false,
    research_interests: false,
    current_projects: false,
    education: false,
    experience: false,
    links: false,
    github_stats: false,
  }

  for (const [name, enabled] of Object.entries(raw.sections)) {
    if (!isSectionName(name)) {
      throw new ConfigError(
        `Unknown section "${name}". Known sections: ${SECTION_NAMES.join(', ')}`,
        { configKey: `sections.${name}`, filePath: source }
      )
    }
    sections[name] = enabled
  }

  const manual = raw.manual_data

  return deepFreeze({
    profiles: { ...raw.profiles },
    readmePath: raw.readme_path,
    updateFrequency: raw.update_frequency,
    sections,
    manualData: {
      name: manual.name,
      institution: manual.institution,
      department: manual.department,
      researchInterests: manual.research_interests,
      currentProjects: manual.current_projects,
      education: manual.education,
      experience: manual.experience,
    },
    github: raw.github && {
      username: raw.github.username,
      showStats: raw.github.show_stats,
      showLanguages: raw.github.show_languages,
      theme: raw.github.theme,
      topLanguages: raw.github.top_languages,
    },
    apiSettings: {
      rateLimitDelay: raw.api_settings.rate_limit_delay,
      timeout: raw.api_settings.timeout,
      retries: raw.api_settings.retries,
    },
  })
}

/**
 * Parse and validate configuration text.
 * `source` only labels errors.
 */
export function parseConfig(text: string, source = DEFAULT_CONFIG_PATH): DashboardConfig {
  let document: unknown
  try {
    document = parseYaml(text)
  } catch (error) {
    const detail = error instanceof YAMLParseError ? error.message : getErrorMessage(error)
    throw new ConfigError(`Malformed YAML in ${source}: ${detail}`, { cause: error, filePath: source })
  }

  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError(`${source} must contain a YAML mapping`, { filePath: source })
  }

  const result = configSchema.safeParse(document)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue.path.join('.')
    const problems = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid configuration in ${source}: ${problems.join('; ')}`, {
      cause: result.error,
      configKey: key || undefined,
      filePath: source,
    })
  }

  return toConfig(result.data, source)
}

/**
 * Load the configuration document from disk
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_PATH): Promise<DashboardConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    const message = getNodeErrorCode(error) === 'ENOENT'
      ? `Configuration file not found: ${path}`
      : `Cannot read configuration file ${path}: ${getErrorMessage(error)}`
    throw new ConfigError(message, { cause: error, filePath: path })
  }

  return parseConfig(text, path)
}

/**
 * Enabled sections in document order
 */
export function enabledSections(config: DashboardConfig): SectionName[] {
  return SECTION_NAMES.filter(name => config.sections[name])
}

/** Starter configuration written by `profile-readme init` */
export const DEFAULT_CONFIG_TEMPLATE = `# Dashboard configuration
profiles:
  researchgate: "https://www.researchgate.net/profile/Your-Name"
  google_scholar: "https://scholar.google.com/citations?user=YOUR_ID"
  linkedin: "https://www.linkedin.com/in/your-name/"

# README file, relative to this file
readme_path: "README.md"

# For reference only; the schedule lives in .github/workflows/update-dashboard.yml
update_frequency: "daily"

# Sections to include in the dashboard
sections:
  about: true
  publications: true
  citations: true
  research_interests: true
  current_projects: true
  education: true
  experience: true
  links: true
  github_stats: true

# Manual data (update these when needed)
manual_data:
  name: "Your Name"
  institution: "Your University"
  department: "Your Department"
  research_interests:
    - "First Interest"
    - "Second Interest"
  current_projects:
    - "Current Project"
  education:
    - institution: "Your University"
      degree: "Your Degree"
      location: "City, Country"
  experience: []

github:
  username: "your-username"
  show_stats: true
  show_languages: true
  theme: "default"

api_settings:
  rate_limit_delay: 2  # seconds between attempts
  timeout: 30  # seconds per attempt
  retries: 3
`
