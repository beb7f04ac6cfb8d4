import { runValidate } from './commands.js'

process.exitCode = await runValidate(process.argv.slice(2))
