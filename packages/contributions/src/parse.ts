import type { BinaryMatrix, Cell } from '@contrib-life/life'
import * as cheerio from 'cheerio'
import { ParseError } from './errors.js'

/** Height of a week column */
export const DAYS_PER_WEEK = 7

/** Vertical distance in pixels between day squares on the contributions graph */
export const ROW_PITCH = 10

// Checked in order, the first one present wins
const COUNT_ATTRIBUTES = ['data-count', 'data-level'] as const

type AttributeGetter = (name: string) => string | undefined

/**
 * Returns the value of the first attribute in `names` that is present.
 *
 * @param get - Looks up a single attribute
 * @param names - Attribute names in order of preference
 * @param fallback - Value used when none are present
 */
export function firstAttr(get: AttributeGetter, names: readonly string[], fallback: string): string {
  for (const name of names) {
    const value = get(name)
    if (value !== undefined)
      return value
  }
  return fallback
}

/**
 * Works out which day of the week a square sits on from its `y` offset.
 *
 * This depends on the page's current layout and nothing else,
 * so a change upstream will silently shift rows.
 *
 * @param y - Raw `y` attribute of the square
 * @param ordinal - Position of the square within its week group
 * @returns Row index; may fall outside the week if the layout is unexpected
 */
export function decodeRowIndex(y: string | undefined, ordinal: number): number {
  const offset = y === undefined ? Number.NaN : Number.parseFloat(y)
  if (!Number.isFinite(offset))
    return ordinal
  return Math.floor(Math.trunc(offset) / ROW_PITCH)
}

function isAlive(count: string): boolean {
  const value = Number.parseInt(count, 10)
  return Number.isFinite(value) && value > 0
}

/**
 * Scrapes the contribution graph out of a contributions page.
 *
 * Each `<g>` with `<rect>` children is one week, top to bottom.
 * A day is alive when it has at least one contribution.
 *
 * @param html - The contributions page
 * @returns A 7-row matrix with one column per week
 */
export function parseContributionGrid(html: string): BinaryMatrix {
  const $ = cheerio.load(html)
  const svg = $('svg').first()
  if (svg.length === 0) {
    throw new ParseError('Could not find contributions SVG in response')
  }

  const columns: Cell[][] = []
  for (const group of svg.find('g').toArray()) {
    const squares = $(group).children('rect').toArray()
    // Wrapper groups only hold other groups
    if (squares.length === 0)
      continue

    const column = new Array<Cell>(DAYS_PER_WEEK).fill(0)
    squares.forEach((square, ordinal) => {
      const $square = $(square)
      const row = decodeRowIndex($square.attr('y'), ordinal)
      if (row < 0 || row >= DAYS_PER_WEEK)
        return

      const count = firstAttr(name => $square.attr(name), COUNT_ATTRIBUTES, '0')
      column[row] = isAlive(count) ? 1 : 0
    })
    columns.push(column)
  }

  if (columns.length === 0) {
    throw new ParseError('No contribution columns parsed')
  }

  return Array.from(
    { length: DAYS_PER_WEEK },
    (_, row): Cell[] => columns.map((column): Cell => column[row] ?? 0),
  )
}
