import { parseArgs } from 'node:util'
import { StyleConfigSchema } from '@contrib-life/svg'
import { z } from 'zod'

export const GenerateOptionsSchema = z.object({
  username: z.string({ required_error: 'Pass --username or set GITHUB_ACTOR' })
    .trim()
    .min(1, 'Pass --username or set GITHUB_ACTOR'),
  /** Number of generations in the animation, seed included */
  steps: z.coerce.number().int().positive().default(60),
  style: StyleConfigSchema,
})

export type GenerateOptions = z.infer<typeof GenerateOptionsSchema>

export type ParsedCommand<Options> =
  | { kind: 'run', options: Options }
  | { kind: 'help' }
  | { kind: 'invalid', problems: string[] }

export const GENERATE_USAGE = `usage: generate --username <name> [options]

Fetches a contribution graph and writes it as an animated Game of Life SVG.

  --username <name>        account to fetch (default: $GITHUB_ACTOR)
  --steps <n>              number of frames to simulate (default: 60)
  --frame-duration <s>     seconds per frame (default: 0.08)
  --cell <px>              cell size (default: 10)
  --gap <px>               gap between cells (default: 2)
  --alive-color <color>    color for alive cells (default: #2ea043)
  --dead-color <color>     color for dead cells (default: #ebedf0)
  --out <path>             output SVG path (default: assets/life.svg)
  -h, --help               show this message`

export const VALIDATE_USAGE = 'usage: validate path/to.svg'

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

function readGenerateFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      'username': { type: 'string' },
      'steps': { type: 'string' },
      'frame-duration': { type: 'string' },
      'cell': { type: 'string' },
      'gap': { type: 'string' },
      'alive-color': { type: 'string' },
      'dead-color': { type: 'string' },
      'out': { type: 'string' },
      'help': { type: 'boolean', short: 'h' },
    },
  }).values
}

type GenerateFlags = ReturnType<typeof readGenerateFlags>

/**
 * Parses `generate` flags into options.
 * Flags arrive as strings and are coerced and checked by the schema.
 *
 * @param argv - Arguments after the script name
 * @param env - Source of the `GITHUB_ACTOR` fallback
 */
export function parseGenerateArgs(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): ParsedCommand<GenerateOptions> {
  let values: GenerateFlags
  try {
    values = readGenerateFlags(argv)
  }
  catch (error) {
    return { kind: 'invalid', problems: [error instanceof Error ? error.message : String(error)] }
  }

  if (values.help) {
    return { kind: 'help' }
  }

  const result = GenerateOptionsSchema.safeParse({
    username: values.username ?? env.GITHUB_ACTOR,
    steps: values.steps,
    style: {
      cellSize: values.cell,
      gap: values.gap,
      aliveColor: values['alive-color'],
      deadColor: values['dead-color'],
      frameDuration: values['frame-duration'],
      outputPath: values.out,
    },
  })

  return result.success
    ? { kind: 'run', options: result.data }
    : { kind: 'invalid', problems: formatIssues(result.error) }
}

/** Expects exactly one positional argument, the file to check */
export function parseValidateArgs(argv: string[]): ParsedCommand<{ path: string }> {
  const [path, ...rest] = argv
  if (path === undefined || rest.length > 0 || path === '-h' || path === '--help') {
    return { kind: 'invalid', problems: [VALIDATE_USAGE] }
  }
  return { kind: 'run', options: { path } }
}
