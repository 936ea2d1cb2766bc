/**
 * Whole-document helpers on top of {@link VttScanner}.
 *
 * Unlike the scanner, these throw the first error they meet.
 *
 * @module vtt/parser
 */

import { type Cue, createCue } from './cue.ts'
import { FileCharSource, type FileCharSourceOptions } from './file-source.ts'
import { VttScanner, type VttScannerOptions } from './scanner.ts'
import { type CharSource, stringSource } from './source.ts'

/**
 * Result of parsing a whole document.
 */
export interface VttParseResult {
	readonly cues: readonly Cue[]
}

/**
 * Check if a file path is a VTT file.
 *
 * @param filePath - Path to check
 * @returns True if the file has a .vtt extension (case-insensitive)
 */
export function isVttFile(filePath: string): boolean {
	return filePath.toLowerCase().endsWith('.vtt')
}

/**
 * Validate the header, then yield a fresh cue per block.
 *
 * @throws VttFormatError | VttSourceError on the first failure
 *
 * @example
 * ```ts
 * for (const cue of readCues(stringSource(text))) {
 *   console.log(cue.startTime.toString(), cue.payload.join(" "));
 * }
 * ```
 */
export function* readCues(
	source: CharSource,
	options: VttScannerOptions = {},
): Generator<Cue, void, undefined> {
	const scanner = new VttScanner(source, options)

	const header = scanner.init()
	if (header.status === 'error') throw header.error

	for (;;) {
		const cue = createCue()
		const result = scanner.parse(cue)
		if (result.status === 'end-of-stream') return
		if (result.status === 'error') throw result.error
		yield cue
	}
}

/**
 * Parse WebVTT text.
 *
 * @param content - Raw VTT file content
 * @returns Every cue in document order
 */
export function parseVtt(
	content: string,
	options: VttScannerOptions = {},
): VttParseResult {
	return { cues: [...readCues(stringSource(content), options)] }
}

/**
 * Parse a WebVTT file from disk. The file is always closed.
 */
export function parseVttFile(
	path: string,
	options: VttScannerOptions & FileCharSourceOptions = {},
): VttParseResult {
	const source = new FileCharSource(path, options)
	try {
		return { cues: [...readCues(source, options)] }
	} finally {
		source.close()
	}
}
