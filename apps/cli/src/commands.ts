import type { GenerateOptions } from './options.js'
import { fetchContributionGrid } from '@contrib-life/contributions'
import { matrixSize, simulate } from '@contrib-life/life'
import { createLogger } from '@contrib-life/logger'
import { validateSvgFile, writeAnimatedSvg } from '@contrib-life/svg'
import { GENERATE_USAGE, parseGenerateArgs, parseValidateArgs } from './options.js'

const logger = createLogger('cli')

export type Print = (line: string) => void

const printToStdout: Print = line => void process.stdout.write(`${line}\n`)

/**
 * Fetches the contribution grid, simulates it and writes the animation.
 *
 * @returns Path of the written file
 */
export async function generate({ username, steps, style }: GenerateOptions): Promise<string> {
  const grid = await fetchContributionGrid(username)
  const { rows, cols } = matrixSize(grid)
  logger.info(`Fetched ${rows}x${cols} contribution grid for ${username}`)

  const frames = simulate(grid, steps)
  await writeAnimatedSvg(frames, style)
  logger.info(`Wrote ${style.outputPath}`)

  return style.outputPath
}

/** Runs the `generate` command and returns the process exit code */
export async function runGenerate(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  print: Print = printToStdout,
): Promise<number> {
  const command = parseGenerateArgs(argv, env)
  switch (command.kind) {
    case 'help':
      print(GENERATE_USAGE)
      return 0
    case 'invalid':
      for (const problem of command.problems) {
        logger.error(problem)
      }
      print(GENERATE_USAGE)
      return 1
  }

  try {
    await generate(command.options)
    return 0
  }
  catch (error) {
    logger.error('Failed to generate animation', error)
    return 1
  }
}

/** Runs the `validate` command, printing one status line, and returns its exit code */
export async function runValidate(argv: string[], print: Print = printToStdout): Promise<number> {
  const command = parseValidateArgs(argv)
  if (command.kind !== 'run') {
    const problems = command.kind === 'invalid' ? command.problems : []
    problems.forEach(print)
    return 1
  }

  const result = await validateSvgFile(command.options.path)
  print(result.message)
  return result.code
}
