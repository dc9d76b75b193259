import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { parseConfig } from '../../src/config.js'
import type { ApiSettings, DashboardConfig } from '../../src/types.js'

const fixturesDir = new URL('../fixtures/', import.meta.url)

export function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(name, fixturesDir)), 'utf-8')
}

export const RESEARCHGATE_URL = 'https://www.researchgate.net/profile/Test-Researcher'
export const SCHOLAR_URL = 'https://scholar.google.com/citations?user=TEST_ID'
export const LINKEDIN_URL = 'https://www.linkedin.com/in/test-researcher/'

export const FAST_API: ApiSettings = { rateLimitDelay: 0, timeout: 1, retries: 2 }

/**
 * Build a config YAML document. `sections` lists the enabled sections.
 */
export function configYaml(options: {
  sections?: string[]
  researchInterests?: string[]
  extra?: string
} = {}): string {
  const { sections = [], researchInterests = ['A', 'B'], extra = '' } = options
  const sectionLines = sections.map(name => `  ${name}: true`).join('\n')
  const interestLines = researchInterests.map(item => `    - "${item}"`).join('\n')

  return `profiles:
  researchgate: "${RESEARCHGATE_URL}"
  google_scholar: "${SCHOLAR_URL}"
  linkedin: "${LINKEDIN_URL}"
readme_path: "README.md"
sections:
${sectionLines || '  about: false'}
manual_data:
  name: "Test Researcher"
  institution: "Example University"
  department: "Department of Testing"
  research_interests:
${interestLines || '    []'}
  current_projects:
    - "Project One"
  education:
    - institution: "Example University"
      degree: "MSc Testing"
      location: "Testville"
github:
  username: "test-user"
  show_stats: true
  show_languages: true
  theme: "radical"
api_settings:
  rate_limit_delay: 0
  timeout: 1
  retries: 2
${extra}`
}

export function makeConfig(options: Parameters<typeof configYaml>[0] = {}): DashboardConfig {
  return parseConfig(configYaml(options), 'test.yaml')
}
