/**
 * Process entry point for `vtt-scan`.
 */

import { isMainScript } from '../terminal/index.ts'
import { runCli } from './index.ts'

if (isMainScript(import.meta.url)) {
	process.exitCode = await runCli(process.argv.slice(2))
}
