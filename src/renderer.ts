/**
 * Dashboard renderer
 * Splices freshly rendered sections into the existing README
 */

import { SECTION_RENDERERS } from './components.js'
import { replaceRegions, wrapSection } from './markers.js'
import { SECTION_NAMES } from './types.js'
import type { DashboardConfig, FetchResults, SectionName } from './types.js'

/**
 * Render one section, or '' when it is disabled
 */
export function renderSection(section: SectionName, config: DashboardConfig, results: FetchResults): string {
  if (!config.sections[section]) return ''
  return SECTION_RENDERERS[section]({ config, results })
}

/**
 * Layout for a README that does not exist yet: a title line followed by
 * every section's marker pair. The title is ordinary text afterwards.
 */
export function bootstrapDocument(config: DashboardConfig): string {
  const blocks = [`# ${config.manualData.name}`, ...SECTION_NAMES.map(section => wrapSection(section, ''))]
  return `${blocks.join('\n\n')}\n`
}

/**
 * Render the dashboard.
 *
 * - `existing === null` bootstraps a new document
 * - only text between marker pairs is replaced
 * - disabled sections collapse to an empty marker pair
 * - enabled sections missing from the document are appended in section order
 *
 * Identical inputs give byte-identical output.
 */
export function renderDashboard(config: DashboardConfig, results: FetchResults, existing: string | null): string {
  const base = existing ?? bootstrapDocument(config)
  const { document, sections } = replaceRegions(base, section => renderSection(section, config, results))

  const missing = SECTION_NAMES.filter(section => config.sections[section] && !sections.includes(section))
  if (missing.length === 0) {
    return document
  }

  const appended = missing.map(section => wrapSection(section, renderSection(section, config, results)))
  const head = document.length === 0 ? '' : document.endsWith('\n') ? `${document}\n` : `${document}\n\n`
  return `${head}${appended.join('\n\n')}\n`
}
