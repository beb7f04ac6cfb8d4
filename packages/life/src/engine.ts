import type { BinaryMatrix, Cell, FrameSequence } from './matrix.js'
import { ValueError } from './errors.js'
import { matrixSize } from './matrix.js'

/**
 * Counts live cells in the Moore neighborhood of (row, col).
 * The universe is bounded: anything past the edge counts as dead.
 */
export function countNeighbors(matrix: BinaryMatrix, row: number, col: number): number {
  const { rows, cols } = matrixSize(matrix)
  let count = 0

  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0)
        continue

      const r = row + dr
      const c = col + dc
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        count += matrix[r][c]
      }
    }
  }

  return count
}

/**
 * Computes the next generation under B3/S23.
 *
 * - Living cell survives with 2-3 neighbors
 * - Dead cell is born with exactly 3 neighbors
 *
 * @param matrix - Current generation, left untouched
 * @returns A new matrix of the same shape
 */
export function step(matrix: BinaryMatrix): BinaryMatrix {
  return matrix.map((row, r) => row.map((cell, c): Cell => {
    const neighbors = countNeighbors(matrix, r, c)
    if (cell === 1)
      return neighbors === 2 || neighbors === 3 ? 1 : 0
    return neighbors === 3 ? 1 : 0
  }))
}

/**
 * Runs the simulation for a fixed number of frames.
 *
 * @param matrix - Seed generation, returned as frame 0
 * @param steps - Total number of frames, must be a positive integer
 * @returns Exactly `steps` generations
 */
export function simulate(matrix: BinaryMatrix, steps: number): FrameSequence {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new ValueError(`Step count must be a positive integer, got ${steps}`)
  }

  const frames: BinaryMatrix[] = [matrix]
  let current = matrix
  for (let i = 1; i < steps; i++) {
    current = step(current)
    frames.push(current)
  }
  return frames
}
