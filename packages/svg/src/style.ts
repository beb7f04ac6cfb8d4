import { z } from 'zod'

export const SvgStyleSchema = z.object({
  /** Side of a cell square in pixels */
  cellSize: z.coerce.number().int().positive().default(10),
  /** Space between neighbouring cells in pixels */
  gap: z.coerce.number().int().nonnegative().default(2),
  aliveColor: z.string().min(1).default('#2ea043'),
  deadColor: z.string().min(1).default('#ebedf0'),
  /** Seconds each generation stays on screen */
  frameDuration: z.coerce.number().positive().finite().default(0.08),
})

export const StyleConfigSchema = SvgStyleSchema.extend({
  outputPath: z.string().min(1).default('assets/life.svg'),
})

export type SvgStyle = Readonly<z.infer<typeof SvgStyleSchema>>
export type StyleConfig = Readonly<z.infer<typeof StyleConfigSchema>>

export const DEFAULT_STYLE: StyleConfig = StyleConfigSchema.parse({})
