import { describe, it, expect } from 'vitest'
import {
  createExtractorRegistry,
  decodeEntities,
  googleScholarExtractor,
  linkedInExtractor,
  parseCount,
  researchGateExtractor,
} from '../src/extractors.js'
import type { ProfileExtractor } from '../src/extractors.js'
import { readFixture } from './helpers/fixtures.js'

describe('parseCount', () => {
  it('should accept thousands separators', () => {
    expect(parseCount('1,234')).toBe(1234)
    expect(parseCount('42')).toBe(42)
    expect(parseCount('abc')).toBeUndefined()
  })
})

describe('decodeEntities', () => {
  it('should decode named and numeric entities', () => {
    expect(decodeEntities('Marine &amp; Coastal &#8211; Lab &#x41;')).toBe('Marine & Coastal – Lab A')
  })

  it('should keep references outside the Unicode range as written', () => {
    expect(decodeEntities('a &#x110000; b &#1114112; c')).toBe('a &#x110000; b &#1114112; c')
  })
})

describe('researchGateExtractor', () => {
  it('should extract publication, citation and h-index counts', () => {
    expect(researchGateExtractor.extract(readFixture('researchgate.html'))).toEqual({
      site: 'researchgate',
      name: 'Test Researcher',
      publications: 42,
      citations: 1050,
      hIndex: 9,
      stats: { publications: 42, citations: 1050, h_index: 9 },
    })
  })

  it('should return null when the counts are absent', () => {
    expect(researchGateExtractor.extract('<html><h1>Sign in</h1></html>')).toBeNull()
  })

  it('should extract counts when the name holds an invalid reference', () => {
    expect(researchGateExtractor.extract('<h1>Bad &#x110000; Name</h1> 12 Publications')).toMatchObject({
      name: 'Bad &#x110000; Name',
      publications: 12,
    })
  })
})

describe('googleScholarExtractor', () => {
  it('should read the all-time column of the stats table', () => {
    expect(googleScholarExtractor.extract(readFixture('google_scholar.html'))).toEqual({
      site: 'google_scholar',
      name: 'Test Researcher',
      citations: 1234,
      hIndex: 15,
      i10Index: 20,
      publications: 3,
      stats: { publications: 3, citations: 1234, h_index: 15, i10_index: 20 },
    })
  })

  it('should return null for a captcha page', () => {
    expect(googleScholarExtractor.extract('<html><form id="captcha-form"></form></html>')).toBeNull()
  })
})

describe('linkedInExtractor', () => {
  it('should take the headline from og:title', () => {
    const data = linkedInExtractor.extract(readFixture('linkedin.html'))

    expect(data).toEqual({
      site: 'linkedin',
      name: 'Test Researcher',
      headline: 'Research Engineer - Example Lab',
      stats: {},
    })
  })

  it('should return null for the auth wall', () => {
    expect(linkedInExtractor.extract('<html><title>LinkedIn</title></html>')).toBeNull()
  })
})

describe('createExtractorRegistry', () => {
  it('should let custom strategies replace built-in ones', () => {
    const custom: ProfileExtractor = {
      site: 'researchgate',
      extract: () => ({ site: 'researchgate', publications: 1, stats: { publications: 1 } }),
    }

    const registry = createExtractorRegistry([custom])

    expect(registry.get('researchgate')).toBe(custom)
    expect(registry.get('google_scholar')).toBe(googleScholarExtractor)
  })
})
