import { describe, it, expect } from 'vitest'
import { endMarker, escapeMarkers, findRegions, replaceRegions, startMarker, wrapSection } from '../src/markers.js'
import { RenderError } from '../src/errors.js'

describe('markers', () => {
  it('should format start and end markers', () => {
    expect(startMarker('about')).toBe('<!-- dashboard:start:about -->')
    expect(endMarker('github_stats')).toBe('<!-- dashboard:end:github_stats -->')
  })

  it('should wrap content and collapse empty content', () => {
    expect(wrapSection('links', '  body\n')).toBe('<!-- dashboard:start:links -->\nbody\n<!-- dashboard:end:links -->')
    expect(wrapSection('links', '')).toBe('<!-- dashboard:start:links -->\n<!-- dashboard:end:links -->')
  })

  it('should find regions in document order', () => {
    const doc = [
      'intro',
      '<!-- dashboard:start:education -->',
      'x',
      '<!-- dashboard:end:education -->',
      '<!--dashboard:start:about-->',
      '<!--dashboard:end:about-->',
    ].join('\n')

    const regions = findRegions(doc)

    expect(regions.map(r => r.section)).toEqual(['education', 'about'])
    expect(doc.slice(regions[0].contentStart, regions[0].contentEnd)).toBe('\nx\n')
  })

  it('should replace only the text between markers', () => {
    const doc = 'before\n<!-- dashboard:start:about -->\nold\n<!-- dashboard:end:about -->\nafter'

    const { document, sections } = replaceRegions(doc, () => 'new')

    expect(document).toBe('before\n<!-- dashboard:start:about -->\nnew\n<!-- dashboard:end:about -->\nafter')
    expect(sections).toEqual(['about'])
  })

  it('should escape marker-shaped text inside section content', () => {
    const document = `${startMarker('experience')}\n${endMarker('experience')}\n`

    const result = replaceRegions(document, () => 'Dev <!-- dashboard:end:experience -->')

    expect(result.document).toBe(
      '<!-- dashboard:start:experience -->\nDev &lt;!-- dashboard:end:experience --&gt;\n<!-- dashboard:end:experience -->\n'
    )
    expect(findRegions(result.document)).toHaveLength(1)
  })

  it('should escape markers in wrapped content', () => {
    expect(wrapSection('links', '<!--dashboard:start:about-->')).toBe(
      '<!-- dashboard:start:links -->\n&lt;!--dashboard:start:about--&gt;\n<!-- dashboard:end:links -->'
    )
    expect(escapeMarkers('<!-- plain comment -->')).toBe('<!-- plain comment -->')
  })

  it('should reject an end marker without a start', () => {
    expect(() => findRegions('<!-- dashboard:end:about -->')).toThrow(RenderError)
  })

  it('should reject a start marker without an end', () => {
    expect(() => findRegions('<!-- dashboard:start:about -->\ntext')).toThrow('Section "about" has no end marker')
  })

  it('should reject nested sections', () => {
    const doc = [
      '<!-- dashboard:start:about -->',
      '<!-- dashboard:start:links -->',
      '<!-- dashboard:end:links -->',
      '<!-- dashboard:end:about -->',
    ].join('\n')

    expect(() => findRegions(doc)).toThrow('Section "links" starts inside section "about"')
  })

  it('should reject duplicate sections', () => {
    const pair = '<!-- dashboard:start:about -->\n<!-- dashboard:end:about -->'

    expect(() => findRegions(`${pair}\n${pair}`)).toThrow('Section "about" appears more than once')
  })

  it('should reject unknown section names', () => {
    try {
      findRegions('<!-- dashboard:start:blog -->\n<!-- dashboard:end:blog -->')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(RenderError)
      expect(error).toMatchObject({ section: 'blog', context: { section: 'blog', line: 1 } })
    }
  })
})
