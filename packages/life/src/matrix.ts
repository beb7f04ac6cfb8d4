export type Cell = 0 | 1

/** Row-major grid of dead (0) and alive (1) cells */
export type BinaryMatrix = readonly (readonly Cell[])[]

/** Every generation of a simulation, seed first */
export type FrameSequence = readonly BinaryMatrix[]

export interface MatrixSize {
  rows: number
  cols: number
}

export function createMatrix(rows: number, cols: number, fill: Cell = 0): BinaryMatrix {
  return Array.from({ length: rows }, () => new Array<Cell>(cols).fill(fill))
}

/**
 * Gets the dimensions of a matrix.
 * Column count is taken from the first row, so an empty matrix is 0x0.
 */
export function matrixSize(matrix: BinaryMatrix): MatrixSize {
  return {
    rows: matrix.length,
    cols: matrix[0]?.length ?? 0,
  }
}

export function isRectangular(matrix: BinaryMatrix): boolean {
  const { cols } = matrixSize(matrix)
  return matrix.every(row => row.length === cols)
}

export function countAlive(matrix: BinaryMatrix): number {
  let count = 0
  for (const row of matrix) {
    for (const cell of row) {
      count += cell
    }
  }
  return count
}
