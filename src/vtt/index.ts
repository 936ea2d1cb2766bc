/**
 * WebVTT (Web Video Text Tracks) scanner module.
 *
 * A single-pass scanner that turns a byte stream into cue records:
 * identifier, start and stop time, settings and payload lines. Malformed
 * input produces one error; there is no recovery.
 *
 * @example
 * ```ts
 * import { parseVtt, parseVttFile } from "vtt-scan/vtt";
 *
 * const { cues } = parseVttFile("meeting-transcript.vtt");
 * for (const cue of cues) {
 *   console.log(cue.startTime.toString(), cue.payload.join(" "));
 * }
 * ```
 *
 * @module vtt
 */

export { type Cue, createCue, formatCue, type Setting } from './cue.ts'
export {
	isVttFormatError,
	type VttError,
	VttFormatError,
	type VttFormatErrorCode,
	VttSourceError,
} from './errors.ts'
export {
	DEFAULT_CHUNK_SIZE,
	FileCharSource,
	type FileCharSourceOptions,
} from './file-source.ts'
export {
	ARROW,
	type GrammarResult,
	MAX_NUMBER,
	parseNumber,
	parseSettings,
	parseTime,
	parseTimingsLine,
	type Timings,
} from './grammar.ts'
export {
	isVttFile,
	parseVtt,
	parseVttFile,
	readCues,
	type VttParseResult,
} from './parser.ts'
export {
	type ScanFailure,
	type ScanResult,
	VttScanner,
	type VttScannerOptions,
} from './scanner.ts'
export {
	BufferCharSource,
	type CharRead,
	type CharSource,
	END_OF_STREAM,
	stringSource,
} from './source.ts'
export { VttTime } from './time.ts'
