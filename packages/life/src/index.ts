export { countNeighbors, simulate, step } from './engine.js'
export { ValueError } from './errors.js'
export { countAlive, createMatrix, isRectangular, matrixSize } from './matrix.js'
export type { BinaryMatrix, Cell, FrameSequence, MatrixSize } from './matrix.js'
