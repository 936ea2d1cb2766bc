/**
 * Scan Logger Factory.
 *
 * Creates configured LogTape loggers with:
 * - JSONL file output with rotation
 * - Hierarchical categories under "vtt-scan" for subsystem filtering
 * - A default log location of ~/.vtt-scan/logs/<name>.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
	reset,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
	ROOT_CATEGORY,
} from './config.ts'

/**
 * Options for creating a scan logger.
 */
export interface ScanLoggerOptions {
	/** Log file name (without extension). Defaults to "vtt-scan". */
	name?: string

	/**
	 * Subsystem names for hierarchical loggers.
	 *
	 * @example ["scanner", "cli"] → loggers for ["vtt-scan", "scanner"], etc.
	 */
	subsystems?: string[]

	/** Log directory. Defaults to ~/.vtt-scan/logs/ */
	logDir?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest log level to capture. Defaults to "debug". */
	lowestLevel?: LogLevel
}

/**
 * Result of creating a scan logger.
 */
export interface ScanLogger {
	/**
	 * Configure LogTape with the file sink. Must be called before logging.
	 * Safe to call multiple times - only initializes once.
	 */
	initLogger: () => Promise<void>

	/**
	 * Flush and close the sinks and clear LogTape's configuration. Does
	 * nothing when `initLogger()` found LogTape configured by someone else.
	 */
	disposeLogger: () => Promise<void>

	/** Root logger for the "vtt-scan" category. */
	rootLogger: Logger

	/**
	 * Get a subsystem logger by name.
	 *
	 * @param subsystem - Subsystem name (e.g., "scanner", "source")
	 * @returns Logger for ["vtt-scan", subsystem] category
	 */
	getSubsystemLogger: (subsystem: string) => Logger

	/** Log directory path */
	logDir: string

	/** Log file path */
	logFile: string

	/** Pre-created subsystem loggers keyed by subsystem name. */
	subsystemLoggers: Record<string, Logger>
}

/**
 * Create a configured logger for the scanner and its tooling.
 *
 * Library code logs through `getLogger(["vtt-scan", ...])` and stays silent
 * until an entry point calls `initLogger()`.
 *
 * @example
 * ```typescript
 * const { initLogger, rootLogger, subsystemLoggers } = createScanLogger({
 *   subsystems: ["cli"],
 *   lowestLevel: "info",
 * });
 *
 * await initLogger();
 * subsystemLoggers.cli?.info("Scanning {path}", { path });
 * ```
 */
export function createScanLogger(options: ScanLoggerOptions = {}): ScanLogger {
	const {
		name = ROOT_CATEGORY,
		subsystems = [],
		logDir = DEFAULT_LOG_DIR,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${name}${DEFAULT_LOG_EXTENSION}`)

	let isInitialized = false
	let ownsConfiguration = false

	async function initLogger(): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}

		const sinkName = `file_${name}`

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [ROOT_CATEGORY],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ['logtape', 'meta'],
						sinks: [sinkName],
						lowestLevel: 'error',
					},
				],
			})
		} catch (error: unknown) {
			// Tests or a host application may have configured LogTape first;
			// keep their configuration.
			if (
				error instanceof Error &&
				error.message.includes('Already configured')
			) {
				isInitialized = true
				return
			}
			throw error
		}

		getLogger([ROOT_CATEGORY]).info('Logging initialized', {
			logDir,
			logFile,
			maxSize,
			maxFiles,
			lowestLevel,
		})

		isInitialized = true
		ownsConfiguration = true
	}

	async function disposeLogger(): Promise<void> {
		if (!ownsConfiguration) return
		await reset()
		isInitialized = false
		ownsConfiguration = false
	}

	const rootLogger = getLogger([ROOT_CATEGORY])

	function getSubsystemLogger(subsystem: string): Logger {
		return getLogger([ROOT_CATEGORY, subsystem])
	}

	const subsystemLoggers: Record<string, Logger> = {}
	for (const subsystem of subsystems) {
		subsystemLoggers[subsystem] = getSubsystemLogger(subsystem)
	}

	return {
		initLogger,
		disposeLogger,
		rootLogger,
		getSubsystemLogger,
		logDir,
		logFile,
		subsystemLoggers,
	}
}
