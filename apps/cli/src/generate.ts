import { runGenerate } from './commands.js'

process.exitCode = await runGenerate(process.argv.slice(2))
