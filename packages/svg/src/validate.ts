import { readFile } from 'node:fs/promises'
import { XMLParser, XMLValidator } from 'fast-xml-parser'

export const ValidationCode = {
  Ok: 0,
  Malformed: 2,
  MissingSize: 3,
  NotSvg: 4,
  NoAnimation: 5,
} as const

export type ValidationCode = typeof ValidationCode[keyof typeof ValidationCode]

export interface ValidationResult {
  code: ValidationCode
  /** One line describing the outcome */
  message: string
}

interface XmlElement {
  name: string
  attributes: Record<string, string>
  children: XmlElement[]
}

// SMIL elements that can drive an animation on their own
const ANIMATION_ELEMENTS = new Set(['animate', 'animateTransform', 'animateMotion', 'set'])

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  preserveOrder: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Drops any namespace prefix from a tag name */
export function localName(name: string): string {
  return name.slice(name.lastIndexOf(':') + 1)
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {}
  if (!isRecord(value))
    return attributes

  for (const [name, attribute] of Object.entries(value)) {
    if (typeof attribute === 'string') {
      attributes[localName(name)] = attribute
    }
  }
  return attributes
}

/** Converts the parser's ordered output into a plain element tree */
function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes))
    return []

  const list: unknown[] = nodes
  const elements: XmlElement[] = []
  for (const node of list) {
    if (!isRecord(node))
      continue

    for (const [key, value] of Object.entries(node)) {
      // Attributes, text, comments, CDATA and processing instructions
      if (key === ':@' || key.startsWith('#') || key.startsWith('?'))
        continue

      elements.push({
        name: key,
        attributes: readAttributes(node[':@']),
        children: toElements(value),
      })
    }
  }
  return elements
}

function containsAnimation(element: XmlElement): boolean {
  return ANIMATION_ELEMENTS.has(localName(element.name))
    || element.children.some(containsAnimation)
}

// Comments and CDATA may hold a bare `&`
const UNPARSED_SECTIONS = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g

// An `&` that does not start a predefined or numeric character reference
const UNKNOWN_REFERENCE = /&(?!(?:amp|lt|gt|quot|apos|#\d+|#x[\da-fA-F]+);)[^\s<]{0,16}/

/** Finds the first entity reference XML does not define on its own */
function findUnknownReference(text: string): string | undefined {
  return text.replace(UNPARSED_SECTIONS, '').match(UNKNOWN_REFERENCE)?.[0]
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Checks that `text` is a well-formed SVG with explicit size and at least
 * one animation element. Never throws; every failure becomes a result.
 */
export function validateSvg(text: string): ValidationResult {
  let roots: XmlElement[]
  try {
    const result = XMLValidator.validate(text)
    if (result !== true) {
      const { msg, line, col } = result.err
      return {
        code: ValidationCode.Malformed,
        message: `ERROR: Failed to parse SVG: ${msg} (line ${line}, column ${col})`,
      }
    }
    const reference = findUnknownReference(text)
    if (reference !== undefined) {
      return { code: ValidationCode.Malformed, message: `ERROR: Failed to parse SVG: undefined entity ${reference}` }
    }
    roots = toElements(parser.parse(text))
  }
  catch (error) {
    return { code: ValidationCode.Malformed, message: `ERROR: Failed to parse SVG: ${reasonOf(error)}` }
  }

  const [root] = roots
  if (root === undefined) {
    return { code: ValidationCode.Malformed, message: 'ERROR: Failed to parse SVG: no root element' }
  }
  if (roots.length > 1) {
    return { code: ValidationCode.Malformed, message: 'ERROR: Failed to parse SVG: more than one root element' }
  }

  if (localName(root.name).toLowerCase() !== 'svg') {
    return { code: ValidationCode.NotSvg, message: 'ERROR: Root element is not SVG' }
  }

  if (!root.attributes.width || !root.attributes.height) {
    return { code: ValidationCode.MissingSize, message: 'ERROR: SVG missing width/height' }
  }

  if (!containsAnimation(root)) {
    return { code: ValidationCode.NoAnimation, message: 'ERROR: No <animate> elements found; animation may not work' }
  }

  return { code: ValidationCode.Ok, message: 'OK: SVG parsed and contains animation' }
}

/** Reads the file at `path` and validates it, an unreadable file counts as malformed */
export async function validateSvgFile(path: string): Promise<ValidationResult> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  }
  catch (error) {
    return { code: ValidationCode.Malformed, message: `ERROR: Failed to parse SVG: ${reasonOf(error)}` }
  }
  return validateSvg(text)
}
