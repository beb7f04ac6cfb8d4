import type { BinaryMatrix, FrameSequence } from '@contrib-life/life'
import type { StyleConfig, SvgStyle } from './style.js'
import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { isRectangular, matrixSize, ValueError } from '@contrib-life/life'
import { escapeXml, keyTimes, opacityValues } from './format.js'

/** Corner radius of every cell */
const CELL_RADIUS = 2

export interface CanvasSize {
  width: number
  height: number
}

/** Size of the drawing, without a trailing gap after the last row and column */
export function canvasSize(matrix: BinaryMatrix, style: Pick<SvgStyle, 'cellSize' | 'gap'>): CanvasSize {
  const { rows, cols } = matrixSize(matrix)
  const pitch = style.cellSize + style.gap
  return {
    width: cols * pitch - style.gap,
    height: rows * pitch - style.gap,
  }
}

/**
 * Builds an animated SVG that flips through `frames`.
 *
 * Dead cells are drawn once as a static background. Each frame is a group
 * of its live cells, and all groups share one discrete opacity animation
 * so exactly one of them is visible at any time.
 *
 * @param frames - Generations to show, in order
 * @param style - Sizes, colors and timing
 * @returns The SVG document
 */
export function renderAnimatedSvg(frames: FrameSequence, style: SvgStyle): string {
  if (frames.length === 0) {
    throw new ValueError('No frames to render')
  }

  const { cellSize, gap, aliveColor, deadColor, frameDuration } = style
  const { rows, cols } = matrixSize(frames[0])
  frames.forEach((frame, k) => {
    const size = matrixSize(frame)
    if (!isRectangular(frame) || size.rows !== rows || size.cols !== cols) {
      throw new ValueError(`Frame ${k} is not a ${rows}x${cols} grid`)
    }
  })
  const { width, height } = canvasSize(frames[0], style)
  const pitch = cellSize + gap

  const rect = (row: number, col: number, fill: string) =>
    `<rect x="${col * pitch}" y="${row * pitch}" width="${cellSize}" height="${cellSize}" rx="${CELL_RADIUS}" ry="${CELL_RADIUS}" fill="${escapeXml(fill)}"/>`

  const parts: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}">`,
  ]

  const background: string[] = []
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      background.push(rect(r, c, deadColor))
    }
  }
  parts.push(`<g id="bg">${background.join('')}</g>`)

  const frameCount = frames.length
  const duration = (frameDuration * frameCount).toFixed(3)
  const times = keyTimes(frameCount)

  frames.forEach((frame, k) => {
    const cells: string[] = []
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        if (frame[r][c] === 1) {
          cells.push(rect(r, c, aliveColor))
        }
      }
    }

    const animate = `<animate attributeName="opacity" dur="${duration}s" repeatCount="indefinite" `
      + `calcMode="discrete" keyTimes="${times}" values="${opacityValues(k, frameCount)}"/>`
    parts.push(`<g id="f${k}" opacity="${k === 0 ? 1 : 0}">${cells.join('')}${animate}</g>`)
  })

  parts.push('</svg>')
  return parts.join('\n')
}

/**
 * Renders `frames` and writes the document to `style.outputPath`,
 * creating parent directories and replacing any existing file.
 * Nothing is written unless the whole document could be built.
 */
export async function writeAnimatedSvg(frames: FrameSequence, style: StyleConfig): Promise<string> {
  const document = renderAnimatedSvg(frames, style)
  await mkdir(dirname(style.outputPath), { recursive: true })
  await writeFile(style.outputPath, document, 'utf-8')
  return document
}
