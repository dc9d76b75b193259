/**
 * Per-site extraction strategies
 *
 * Profile markup is unstable, so each site is a pluggable strategy.
 * An extractor returns null when the markup it relies on is absent.
 */

import type { ProfileData } from './types.js'

export interface ProfileExtractor {
  readonly site: string
  extract(html: string): ProfileData | null
}

/** Parse "1,234" / "1 234" / "1234" */
export function parseCount(text: string): number | undefined {
  const digits = text.replace(/[,\s .]/g, '')
  if (!/^\d+$/.test(digits)) return undefined
  return parseInt(digits, 10)
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
}

const MAX_CODE_POINT = 0x10ffff

function fromCodePoint(code: number, raw: string): string {
  return Number.isFinite(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : raw
}

/** Numeric references outside the Unicode range are left as written */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|\w+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(parseInt(entity.slice(2), 16), match)
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(parseInt(entity.slice(1), 10), match)
    }
    return ENTITIES[entity.toLowerCase()] ?? match
  })
}

function cleanText(text: string): string {
  return decodeEntities(text.replace(/<[^>]+>/g, '')).replace(/\s+/g, ' ').trim()
}

function firstCount(html: string, pattern: RegExp): number | undefined {
  const match = html.match(pattern)
  return match ? parseCount(match[1]) : undefined
}

function withStats(data: Omit<ProfileData, 'stats'>): ProfileData {
  const stats: Record<string, number> = {}
  if (data.publications !== undefined) stats.publications = data.publications
  if (data.citations !== undefined) stats.citations = data.citations
  if (data.hIndex !== undefined) stats.h_index = data.hIndex
  if (data.i10Index !== undefined) stats.i10_index = data.i10Index
  return { ...data, stats }
}

/**
 * ResearchGate profile page
 * Counts appear as "42 Publications", "1,234 Citations"
 */
export const researchGateExtractor: ProfileExtractor = {
  site: 'researchgate',
  extract(html) {
    const publications = firstCount(html, /([\d,]+)\s*(?:<[^>]*>\s*)*Publications?\b/i)
    const citations = firstCount(html, /([\d,]+)\s*(?:<[^>]*>\s*)*Citations?\b/i)
    if (publications === undefined && citations === undefined) return null

    const name = html.match(/<h1[^>]*>([^<]+)<\/h1>/i)
    return withStats({
      site: 'researchgate',
      name: name ? cleanText(name[1]) : undefined,
      publications,
      citations,
      hIndex: firstCount(html, /h-index(?:\s*<[^>]*>)*\s*([\d,]+)/i),
    })
  },
}

/**
 * Google Scholar citations page
 * The stats table holds six gsc_rsb_std cells:
 * citations (all, since), h-index (all, since), i10-index (all, since)
 *
 * `publications` counts the article rows on the fetched page only; Scholar
 * pages its list (20 rows by default), so larger profiles are undercounted.
 */
export const googleScholarExtractor: ProfileExtractor = {
  site: 'google_scholar',
  extract(html) {
    const cells = [...html.matchAll(/<td[^>]*class="gsc_rsb_std"[^>]*>([\d,]+)<\/td>/g)]
      .map(match => parseCount(match[1]))
    const citations = cells[0]
    if (citations === undefined) return null

    const rows = html.match(/class="gsc_a_tr"/g)
    const name = html.match(/<div[^>]*id="gsc_prf_in"[^>]*>([^<]+)<\/div>/)

    return withStats({
      site: 'google_scholar',
      name: name ? cleanText(name[1]) : undefined,
      citations,
      hIndex: cells[2],
      i10Index: cells[4],
      publications: rows ? rows.length : undefined,
    })
  },
}

/**
 * LinkedIn public profile
 * Only the headline is reachable without the API: og:title reads
 * "Name - Position - Company | LinkedIn"
 */
export const linkedInExtractor: ProfileExtractor = {
  site: 'linkedin',
  extract(html) {
    const og = html.match(/<meta[^>]+property="og:title"[^>]+content="([^"]*)"/i)
      ?? html.match(/<meta[^>]+content="([^"]*)"[^>]+property="og:title"/i)
    const title = og ?? html.match(/<title[^>]*>([^<]*)<\/title>/i)
    if (!title) return null

    const text = cleanText(title[1]).replace(/\s*\|\s*LinkedIn\s*$/i, '')
    const parts = text.split(/\s+[-–]\s+/)
    if (parts.length < 2) return null

    return withStats({
      site: 'linkedin',
      name: parts[0],
      headline: parts.slice(1).join(' - '),
    })
  },
}

export const DEFAULT_EXTRACTORS: readonly ProfileExtractor[] = [
  researchGateExtractor,
  googleScholarExtractor,
  linkedInExtractor,
]

/**
 * Build a site → extractor map; later entries override earlier ones
 */
export function createExtractorRegistry(
  extra: readonly ProfileExtractor[] = []
): ReadonlyMap<string, ProfileExtractor> {
  const registry = new Map<string, ProfileExtractor>()
  for (const extractor of [...DEFAULT_EXTRACTORS, ...extra]) {
    registry.set(extractor.site, extractor)
  }
  return registry
}
