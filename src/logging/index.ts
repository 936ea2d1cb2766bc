/**
 * vtt-scan/logging
 *
 * LogTape-based logging for the scanner and CLI.
 *
 * Provides:
 * - JSONL file output with rotation (1MB default, 5 files)
 * - Hierarchical categories under "vtt-scan" for subsystem filtering
 *
 * Library modules call `getLogger(["vtt-scan", subsystem])` directly and
 * stay silent until an entry point configures a sink.
 *
 * @example
 * ```typescript
 * import { createScanLogger } from "vtt-scan/logging";
 *
 * const { initLogger, rootLogger } = createScanLogger({ lowestLevel: "info" });
 * await initLogger();
 * rootLogger.info("Scan started");
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_LEVELS,
	type LogLevel,
	ROOT_CATEGORY,
} from './config.ts'
export {
	createScanLogger,
	type ScanLogger,
	type ScanLoggerOptions,
} from './factory.ts'
