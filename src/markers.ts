/**
 * Section markers
 *
 * A managed section is bracketed by
 *   <!-- dashboard:start:<name> -->
 *   ...
 *   <!-- dashboard:end:<name> -->
 * and only the text between the two markers is ever replaced.
 */

import { RenderError } from './errors.js'
import { SECTION_NAMES } from './types.js'
import type { SectionName } from './types.js'

const MARKER_REGEX = /<!--\s*dashboard:(start|end):([\w-]+)\s*-->/g

export function startMarker(section: SectionName): string {
  return `<!-- dashboard:start:${section} -->`
}

export function endMarker(section: SectionName): string {
  return `<!-- dashboard:end:${section} -->`
}

/** A marker pair located in a document */
export interface MarkedRegion {
  section: SectionName
  /** Offset of the first character after the start marker */
  contentStart: number
  /** Offset of the first character of the end marker */
  contentEnd: number
}

function isSectionName(value: string): value is SectionName {
  return (SECTION_NAMES as readonly string[]).includes(value)
}

function lineAt(document: string, offset: number): number {
  return document.slice(0, offset).split('\n').length
}

/**
 * Locate every marker pair. Throws RenderError on unknown names,
 * unbalanced, nested or duplicate pairs.
 */
export function findRegions(document: string): MarkedRegion[] {
  const regions: MarkedRegion[] = []
  const seen = new Set<SectionName>()
  let open: { section: SectionName; contentStart: number } | null = null

  for (const match of document.matchAll(MARKER_REGEX)) {
    const [marker, kind, name] = match
    const offset = match.index ?? 0
    const line = lineAt(document, offset)

    if (!isSectionName(name)) {
      throw new RenderError(`Unknown section marker "${name}"`, { section: name, line })
    }

    if (kind === 'start') {
      if (open) {
        throw new RenderError(`Section "${name}" starts inside section "${open.section}"`, { section: name, line })
      }
      if (seen.has(name)) {
        throw new RenderError(`Section "${name}" appears more than once`, { section: name, line })
      }
      open = { section: name, contentStart: offset + marker.length }
      continue
    }

    if (!open || open.section !== name) {
      throw new RenderError(`End marker for "${name}" has no matching start marker`, { section: name, line })
    }
    regions.push({ section: name, contentStart: open.contentStart, contentEnd: offset })
    seen.add(name)
    open = null
  }

  if (open) {
    throw new RenderError(`Section "${open.section}" has no end marker`, {
      section: open.section,
      line: lineAt(document, open.contentStart),
    })
  }

  return regions
}

/** Rendered content must not contain a live marker */
export function escapeMarkers(content: string): string {
  return content.replace(MARKER_REGEX, marker => `&lt;${marker.slice(1, -1)}&gt;`)
}

/**
 * Wrap rendered section content in its marker pair.
 * Empty content collapses to adjacent markers.
 */
export function wrapSection(section: SectionName, content: string): string {
  const body = escapeMarkers(content.trim())
  return body
    ? `${startMarker(section)}\n${body}\n${endMarker(section)}`
    : `${startMarker(section)}\n${endMarker(section)}`
}

/**
 * Replace the content of every marker pair with `render(section)`.
 * Text outside the pairs is kept byte for byte.
 */
export function replaceRegions(document: string, render: (section: SectionName) => string): {
  document: string
  sections: SectionName[]
} {
  const regions = findRegions(document)
  let result = ''
  let cursor = 0

  for (const region of regions) {
    const body = escapeMarkers(render(region.section).trim())
    result += document.slice(cursor, region.contentStart)
    result += body ? `\n${body}\n` : '\n'
    cursor = region.contentEnd
  }
  result += document.slice(cursor)

  return { document: result, sections: regions.map(region => region.section) }
}
