/**
 * Logging configuration defaults.
 *
 * These values can be overridden when creating a scan logger.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

/** Root LogTape category for everything in this package */
export const ROOT_CATEGORY = 'vtt-scan'

/** Default log directory (~/.vtt-scan/logs) */
export const DEFAULT_LOG_DIR: string = join(homedir(), '.vtt-scan', 'logs')

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = '.jsonl'

/**
 * Logging levels, using LogTape's names ("warning", not "warn").
 *
 * - DEBUG: scanner steps (header validated, each cue, format errors)
 * - INFO: run start/complete, cue counts
 * - WARNING: suspicious but accepted input (e.g. non-.vtt extension)
 * - ERROR: parse or source failures
 */
export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = 'debug'
