import { describe, expect, it } from 'vitest'
import { ParseError } from './errors.js'
import { decodeRowIndex, firstAttr, parseContributionGrid } from './parse.js'

function page(svg: string) {
  return `<!DOCTYPE html><html><head><title>contributions</title></head><body><div class="calendar">${svg}</div></body></html>`
}

const twoWeeks = page(`
  <svg width="722" height="112" class="js-calendar-graph-svg">
    <g transform="translate(10, 20)">
      <g transform="translate(0, 0)">
        <rect width="10" height="10" x="14" y="0" data-count="0"></rect>
        <rect width="10" height="10" x="14" y="10" data-count="2"></rect>
        <rect width="10" height="10" x="14" y="20" data-count="0"></rect>
        <rect width="10" height="10" x="14" y="30" data-count="1"></rect>
        <rect width="10" height="10" x="14" y="40" data-count="0"></rect>
        <rect width="10" height="10" x="14" y="50" data-count="0"></rect>
        <rect width="10" height="10" x="14" y="60" data-count="5"></rect>
      </g>
      <g transform="translate(14, 0)">
        <rect width="10" height="10" x="13" y="0" data-level="1"></rect>
        <rect width="10" height="10" x="13" y="10" data-level="0"></rect>
        <rect width="10" height="10" x="13" y="20" data-level="3"></rect>
      </g>
      <text x="14" y="-7" class="month">Jan</text>
    </g>
  </svg>
`)

describe('parseContributionGrid', () => {
  it('turns week groups into columns of a 7-row matrix', () => {
    expect(parseContributionGrid(twoWeeks)).toEqual([
      [0, 1],
      [1, 0],
      [0, 1],
      [1, 0],
      [0, 0],
      [0, 0],
      [1, 0],
    ])
  })

  it('falls back to enumeration order when y is missing or unparsable', () => {
    const html = page(`
      <svg><g>
        <rect data-count="1"/>
        <rect data-count="0"/>
        <rect y="oops" data-count="3"/>
      </g></svg>
    `)
    expect(parseContributionGrid(html)).toEqual([[1], [0], [1], [0], [0], [0], [0]])
  })

  it('prefers data-count over data-level and defaults to dead', () => {
    const html = page(`
      <svg><g>
        <rect y="0" data-count="0" data-level="4"/>
        <rect y="10" data-level="2"/>
        <rect y="20"/>
        <rect y="30" data-count="many"/>
      </g></svg>
    `)
    expect(parseContributionGrid(html)).toEqual([[0], [1], [0], [0], [0], [0], [0]])
  })

  it('ignores squares below the last day of the week', () => {
    const html = page(`<svg><g><rect y="0" data-count="1"/><rect y="90" data-count="1"/></g></svg>`)
    expect(parseContributionGrid(html)).toEqual([[1], [0], [0], [0], [0], [0], [0]])
  })

  it('ignores squares above the first day of the week', () => {
    const html = page(`<svg><g><rect y="-5" data-count="1"/><rect y="10" data-count="1"/></g></svg>`)
    expect(parseContributionGrid(html)).toEqual([[0], [1], [0], [0], [0], [0], [0]])
  })

  it('skips groups without squares', () => {
    const html = page(`
      <svg>
        <g></g>
        <g><text>Mon</text></g>
        <g><rect y="30" data-count="7"/></g>
      </svg>
    `)
    expect(parseContributionGrid(html)).toEqual([[0], [0], [0], [1], [0], [0], [0]])
  })

  it('fails when the page has no svg', () => {
    expect(() => parseContributionGrid(page('<table></table>'))).toThrow(ParseError)
    expect(() => parseContributionGrid(page('<table></table>'))).toThrow('Could not find contributions SVG in response')
  })

  it('fails when no week columns are found', () => {
    expect(() => parseContributionGrid(page('<svg><g></g></svg>'))).toThrow('No contribution columns parsed')
  })

  it('only reads the first svg on the page', () => {
    const html = page(`
      <svg class="octicon"><path d="M0 0h16v16H0z"></path></svg>
      <svg><g><rect y="0" data-count="1"/></g></svg>
    `)
    expect(() => parseContributionGrid(html)).toThrow('No contribution columns parsed')
  })
})

describe('decodeRowIndex', () => {
  it('divides the offset by the row pitch', () => {
    expect(decodeRowIndex('0', 4)).toBe(0)
    expect(decodeRowIndex('20', 0)).toBe(2)
    expect(decodeRowIndex('15.7', 0)).toBe(1)
    expect(decodeRowIndex('60', 0)).toBe(6)
  })

  it('rounds negative offsets down', () => {
    expect(decodeRowIndex('-5', 0)).toBe(-1)
    expect(decodeRowIndex('-10', 0)).toBe(-1)
    expect(decodeRowIndex('-11', 0)).toBe(-2)
  })

  it('uses the ordinal when the offset is unusable', () => {
    expect(decodeRowIndex(undefined, 3)).toBe(3)
    expect(decodeRowIndex('abc', 5)).toBe(5)
  })
})

describe('firstAttr', () => {
  const attrs: Record<string, string> = { 'data-level': '2', 'y': '10' }
  const get = (name: string) => attrs[name]

  it('returns the first attribute present', () => {
    expect(firstAttr(get, ['data-count', 'data-level'], '0')).toBe('2')
    expect(firstAttr(get, ['y', 'data-level'], '0')).toBe('10')
  })

  it('returns the fallback when none are present', () => {
    expect(firstAttr(get, ['data-count'], '0')).toBe('0')
  })
})
