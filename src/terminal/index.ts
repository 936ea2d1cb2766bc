/**
 * Terminal helpers for the command-line entry point.
 */

import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

/**
 * Check whether a module is the script Node was started with
 *
 * @param importMetaUrl - `import.meta.url` of the calling module
 * @returns True when the module is the process entry point
 *
 * @example
 * ```ts
 * if (isMainScript(import.meta.url)) {
 *   main();
 * }
 * ```
 */
export function isMainScript(importMetaUrl: string): boolean {
	const entry = process.argv[1]
	if (!entry) return false
	try {
		return realpathSync(entry) === realpathSync(fileURLToPath(importMetaUrl))
	} catch {
		// Entry point that no longer exists on disk
		return false
	}
}

/**
 * Output format for CLI commands
 *
 * - TEXT: cues re-rendered as a WebVTT document (default)
 * - JSON: machine-readable cue array
 */
export enum OutputFormat {
	TEXT = 'text',
	JSON = 'json',
}
