/**
 * Section renderers
 * Each returns the markdown placed between a section's markers.
 */

import { statsCardUrls } from './github.js'
import type { DashboardConfig, FetchResult, FetchResults, ProfileData, SectionName } from './types.js'

export interface SectionContext {
  config: DashboardConfig
  results: FetchResults
}

/** Fixed placeholder for data that could not be fetched */
export function unavailable(label: string): string {
  return `_${label} data is currently unavailable._`
}

function metric(label: string, value: number | undefined): string | null {
  return value === undefined ? null : `- **${label}**: ${value}`
}

function metricLines(...lines: Array<string | null>): string[] {
  return lines.filter((line): line is string => line !== null)
}

function profileData(result: FetchResult<ProfileData> | undefined): ProfileData | null {
  return result?.status === 'ok' ? result.data : null
}

/** Profile link labels, in display order */
const PROFILE_LABELS: Record<string, string> = {
  researchgate: 'ResearchGate',
  google_scholar: 'Google Scholar',
  linkedin: 'LinkedIn',
}

export function renderAbout({ config }: SectionContext): string {
  const { institution, department } = config.manualData
  const lines = ['## 👋 About Me', '']

  if (institution && department) {
    lines.push(`I'm a researcher at ${institution}, ${department}.`)
  } else if (institution || department) {
    lines.push(`I'm a researcher at ${institution || department}.`)
  } else {
    lines.push(`I'm ${config.manualData.name}.`)
  }

  return lines.join('\n')
}

export function renderPublications({ results }: SectionContext): string {
  const lines = ['## 📚 Publications', '']
  const data = profileData(results.researchgate)

  if (!data) {
    lines.push(unavailable('Publication'))
    return lines.join('\n')
  }

  lines.push(
    ...metricLines(
      metric('Publications', data.publications),
      metric('Citations', data.citations),
      metric('h-index', data.hIndex)
    )
  )
  lines.push('', '_Source: ResearchGate_')
  return lines.join('\n')
}

export function renderCitations({ results }: SectionContext): string {
  const lines = ['## 📊 Citation Metrics', '']
  const data = profileData(results.google_scholar)

  if (!data) {
    lines.push(unavailable('Citation'))
    return lines.join('\n')
  }

  lines.push(
    ...metricLines(
      metric('Citations', data.citations),
      metric('h-index', data.hIndex),
      metric('i10-index', data.i10Index)
    )
  )
  lines.push('', '_Source: Google Scholar_')
  return lines.join('\n')
}

function renderList(heading: string, items: readonly string[]): string {
  const lines = [heading, '']
  if (items.length === 0) {
    lines.push('_Nothing listed yet._')
  } else {
    lines.push(...items.map(item => `- ${item}`))
  }
  return lines.join('\n')
}

export function renderResearchInterests({ config }: SectionContext): string {
  return renderList('## 🔬 Research Interests', config.manualData.researchInterests)
}

export function renderCurrentProjects({ config }: SectionContext): string {
  return renderList('## 💻 Current Projects', config.manualData.currentProjects)
}

export function renderEducation({ config }: SectionContext): string {
  const lines = ['## 🎓 Education', '']
  const { education } = config.manualData

  if (education.length === 0) {
    lines.push('_Nothing listed yet._')
    return lines.join('\n')
  }

  for (const entry of education) {
    lines.push(`- **${entry.institution}**`)
    lines.push(`  - ${entry.degree}${entry.location ? ` (${entry.location})` : ''}`)
  }
  return lines.join('\n')
}

export function renderExperience({ config, results }: SectionContext): string {
  const lines = ['## 💼 Experience', '']
  const linkedin = results.linkedin
  const { experience } = config.manualData

  if (linkedin) {
    const data = profileData(linkedin)
    lines.push(data?.headline ? `**Current position:** ${data.headline}` : unavailable('LinkedIn'))
    lines.push('')
  }

  for (const entry of experience) {
    lines.push(`- **${entry.title}**, ${entry.organization}${entry.period ? ` (${entry.period})` : ''}`)
  }

  if (!linkedin && experience.length === 0) {
    lines.push('_Nothing listed yet._')
  }

  return lines.join('\n')
}

export function renderLinks({ config }: SectionContext): string {
  const lines = ['## 🔗 Links', '']
  const sites = Object.keys(config.profiles).sort((a, b) => {
    const order = Object.keys(PROFILE_LABELS)
    const ai = order.indexOf(a) === -1 ? order.length : order.indexOf(a)
    const bi = order.indexOf(b) === -1 ? order.length : order.indexOf(b)
    return ai - bi || (a < b ? -1 : a > b ? 1 : 0)
  })

  for (const site of sites) {
    lines.push(`- [${PROFILE_LABELS[site] ?? site}](${config.profiles[site]})`)
  }
  if (config.github) {
    lines.push(`- [GitHub](https://github.com/${config.github.username})`)
  }
  if (lines.length === 2) {
    lines.push('_No profiles configured._')
  }

  return lines.join('\n')
}

export function renderGitHubStats({ config, results }: SectionContext): string {
  const lines = ['## 📈 GitHub Statistics', '']
  const settings = config.github

  if (!settings) {
    lines.push(unavailable('GitHub'))
    return lines.join('\n')
  }

  const result = results.github
  if (result?.status === 'ok') {
    const { user, repos } = result.data
    if (user) {
      lines.push(`- **Public repositories**: ${user.publicRepos}`)
      lines.push(`- **Followers**: ${user.followers}`)
    }
    if (repos) {
      lines.push(`- **Stars earned**: ${repos.totalStars}`)
      if (repos.languages.length > 0) {
        lines.push(`- **Top languages**: ${repos.languages.map(lang => `${lang.name} (${lang.repos})`).join(', ')}`)
      }
    }
  } else if (result) {
    lines.push(unavailable('GitHub'))
  }

  const cards = statsCardUrls(settings)
  if (cards.stats || cards.languages) {
    if (lines.length > 2) lines.push('')
    if (cards.stats) lines.push(`![GitHub Stats](${cards.stats})`)
    if (cards.languages) lines.push(`![Top Languages](${cards.languages})`)
  }

  if (lines.length === 2) {
    lines.push(`[github.com/${settings.username}](https://github.com/${settings.username})`)
  }

  return lines.join('\n')
}

export const SECTION_RENDERERS: Record<SectionName, (context: SectionContext) => string> = {
  about: renderAbout,
  publications: renderPublications,
  citations: renderCitations,
  research_interests: renderResearchInterests,
  current_projects: renderCurrentProjects,
  education: renderEducation,
  experience: renderExperience,
  links: renderLinks,
  github_stats: renderGitHubStats,
}
