export { escapeXml, formatKeyTime, keyTimes, opacityValues } from './format.js'
export { canvasSize, renderAnimatedSvg, writeAnimatedSvg } from './render.js'
export type { CanvasSize } from './render.js'
export { DEFAULT_STYLE, StyleConfigSchema, SvgStyleSchema } from './style.js'
export type { StyleConfig, SvgStyle } from './style.js'
export { localName, validateSvg, validateSvgFile, ValidationCode } from './validate.js'
export type { ValidationResult } from './validate.js'
