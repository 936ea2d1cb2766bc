/**
 * `vtt-scan` command: parse a WebVTT file and print its cues.
 *
 * ```
 * vtt-scan <file> [--format text|json] [--log-level L] [--log-dir D]
 * ```
 *
 * Exit codes: 0 on success, 1 when the file is missing or malformed or
 * can't be read, 2 for bad options.
 */

import { existsSync } from 'node:fs'
import { z } from 'zod'
import { StructuredError } from '../errors/index.ts'
import { createScanLogger, LOG_LEVELS } from '../logging/index.ts'
import { OutputFormat } from '../terminal/index.ts'
import { type Cue, formatCue, isVttFile, parseVttFile } from '../vtt/index.ts'

export const USAGE =
	'Usage: vtt-scan <file> [--format text|json] [--log-level debug|info|warning|error] [--log-dir <dir>]'

type FlagValue = string | boolean | (string | boolean)[]

/**
 * Split command-line arguments into positionals and flags.
 *
 * Handles three flag formats:
 * - `--key value` (spaced syntax)
 * - `--key=value` (equals syntax)
 * - `--key` (boolean flag)
 *
 * Duplicate flags are stored as arrays.
 *
 * @example
 * parseArgs(["captions.vtt", "--format", "json"])
 * // → { positional: ["captions.vtt"], flags: { format: "json" } }
 *
 * @example
 * parseArgs(["--log-level=debug", "a.vtt"])
 * // → { positional: ["a.vtt"], flags: { "log-level": "debug" } }
 */
export function parseArgs(argv: readonly string[]): {
	positional: string[]
	flags: Record<string, FlagValue>
} {
	const positional: string[] = []
	const flags: Record<string, FlagValue> = {}

	const setFlag = (key: string, value: string | boolean) => {
		const existing = flags[key]
		if (existing === undefined) {
			flags[key] = value
		} else if (Array.isArray(existing)) {
			existing.push(value)
		} else {
			flags[key] = [existing, value]
		}
	}

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]
		if (!arg) continue
		if (!arg.startsWith('--')) {
			positional.push(arg)
			continue
		}

		const equals = arg.indexOf('=')
		const key = arg.slice(2, equals < 0 ? undefined : equals)
		if (!key) continue

		const next = argv[i + 1]
		if (equals >= 0) {
			setFlag(key, arg.slice(equals + 1))
		} else if (next && !next.startsWith('--')) {
			setFlag(key, next)
			i++
		} else {
			setFlag(key, true)
		}
	}

	return { positional, flags }
}

/**
 * First string value of a flag, ignoring boolean occurrences.
 *
 * @example
 * getStringFlag(parseArgs(["--format", "json"]).flags, "format") // → "json"
 * getStringFlag(parseArgs(["--format"]).flags, "format") // → undefined
 */
export function getStringFlag(
	flags: Record<string, FlagValue>,
	key: string,
): string | undefined {
	const value = flags[key]
	if (typeof value === 'string') return value
	if (Array.isArray(value)) {
		return value.find((v): v is string => typeof v === 'string')
	}
	return undefined
}

/** Validated CLI options. */
export const CliOptionsSchema = z.object({
	input: z.string({ required_error: 'Missing input file' }).min(1, 'Missing input file'),
	format: z.nativeEnum(OutputFormat).default(OutputFormat.TEXT),
	logLevel: z.enum(LOG_LEVELS).default('info'),
	logDir: z.string().min(1, 'Log directory must not be empty').optional(),
})

export type CliOptions = z.infer<typeof CliOptionsSchema>

/**
 * Turn raw arguments into validated options.
 *
 * @throws StructuredError with category CONFIGURATION
 */
export function resolveOptions(argv: readonly string[]): CliOptions {
	const { positional, flags } = parseArgs(argv)

	if (positional.length > 1) {
		throw new StructuredError(
			`Expected one input file (got: ${positional.length})`,
			'CONFIGURATION',
			'BAD_OPTIONS',
			false,
			{ positional },
		)
	}

	const result = CliOptionsSchema.safeParse({
		input: positional[0],
		format: getStringFlag(flags, 'format'),
		logLevel: getStringFlag(flags, 'log-level'),
		logDir: getStringFlag(flags, 'log-dir'),
	})
	if (!result.success) {
		const issue = result.error.issues[0]
		const field = issue?.path.join('.') ?? 'options'
		throw new StructuredError(
			`Invalid ${field}: ${issue?.message ?? 'unknown problem'}`,
			'CONFIGURATION',
			'BAD_OPTIONS',
			false,
			{ issues: result.error.issues },
		)
	}
	return result.data
}

/**
 * Render cues for output.
 *
 * Text output is a WebVTT document; JSON output is an array of cues with
 * times as `HH:MM:SS.mmm` strings.
 */
export function renderCues(cues: readonly Cue[], format: OutputFormat): string {
	if (format === OutputFormat.JSON) {
		return JSON.stringify(cues, null, 2)
	}
	return ['WEBVTT', ...cues.map(formatCue)].join('\n\n')
}

/** Where the CLI writes. */
export interface CliIo {
	stdout: (text: string) => void
	stderr: (text: string) => void
}

const consoleIo: CliIo = {
	stdout: (text) => console.log(text),
	stderr: (text) => console.error(text),
}

function describeError(error: StructuredError): string {
	const line = error.context.line
	const where = typeof line === 'number' ? ` (line ${line})` : ''
	return `Error [${error.code}]${where}: ${error.message}`
}

/**
 * Run the command and return its exit code.
 */
export async function runCli(
	argv: readonly string[],
	io: CliIo = consoleIo,
): Promise<number> {
	let options: CliOptions
	try {
		options = resolveOptions(argv)
	} catch (error: unknown) {
		if (!(error instanceof StructuredError)) throw error
		io.stderr(describeError(error))
		io.stderr(USAGE)
		return 2
	}

	const logging = createScanLogger({
		subsystems: ['cli'],
		logDir: options.logDir,
		lowestLevel: options.logLevel,
	})
	const logger = logging.getSubsystemLogger('cli')
	if (options.logDir !== undefined) {
		await logging.initLogger()
	}

	try {
		if (!existsSync(options.input)) {
			throw new StructuredError(
				`File not found: ${options.input}`,
				'NOT_FOUND',
				'INPUT_NOT_FOUND',
				false,
				{ path: options.input },
			)
		}
		if (!isVttFile(options.input)) {
			logger.warning('Input {path} does not have a .vtt extension', {
				path: options.input,
			})
		}

		logger.info('Scanning {path}', { path: options.input })
		const { cues } = parseVttFile(options.input)
		logger.info('Scanned {count} cues from {path}', {
			count: cues.length,
			path: options.input,
		})

		io.stdout(renderCues(cues, options.format))
		return 0
	} catch (error: unknown) {
		if (!(error instanceof StructuredError)) throw error
		logger.error('Scan failed: {message}', { ...error.toJSON() })
		io.stderr(describeError(error))
		return 1
	} finally {
		await logging.disposeLogger()
	}
}
