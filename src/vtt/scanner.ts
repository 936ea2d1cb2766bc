/**
 * Streaming WebVTT scanner.
 *
 * Pulls bytes from a {@link CharSource}, validates the header once with
 * {@link VttScanner.init}, then yields one cue per {@link VttScanner.parse}
 * call. One byte of pushback is the only lookahead the grammar needs: it
 * tells a BOM from content and a lone CR from CRLF.
 *
 * Outcomes are returned, not thrown. After the first error the scanner's
 * position is unspecified and it should be discarded.
 *
 * @example
 * ```ts
 * const scanner = new VttScanner(stringSource(text));
 * const header = scanner.init();
 * if (header.status === "error") throw header.error;
 *
 * const cue = createCue();
 * for (;;) {
 *   const result = scanner.parse(cue);
 *   if (result.status === "end-of-stream") break;
 *   if (result.status === "error") throw result.error;
 *   console.log(formatCue(cue));
 * }
 * ```
 *
 * @module vtt/scanner
 */

import { getLogger, type Logger } from '@logtape/logtape'
import { StructuredError } from '../errors/index.ts'
import type { Cue } from './cue.ts'
import {
	type VttError,
	VttFormatError,
	type VttFormatErrorCode,
	VttSourceError,
} from './errors.ts'
import { ARROW, parseTimingsLine } from './grammar.ts'
import type { CharRead, CharSource } from './source.ts'

const LF = 0x0a
const CR = 0x0d
const BOM = [0xef, 0xbb, 0xbf] as const
const HEADER = 'WEBVTT'

const OK = { status: 'ok' } as const
const END = { status: 'end-of-stream' } as const

/** A failed scan, carrying the format or source error. */
export interface ScanFailure {
	readonly status: 'error'
	readonly error: VttError
}

/** Outcome of {@link VttScanner.init} and {@link VttScanner.parse}. */
export type ScanResult = typeof OK | typeof END | ScanFailure

type LineRead = { readonly status: 'ok'; readonly line: string } | typeof END | ScanFailure

export interface VttScannerOptions {
	/** Logger for scan events. Defaults to the `["vtt-scan", "scanner"]` category. */
	logger?: Logger
}

export class VttScanner {
	private pushback: number | undefined
	private linesRead = 0
	private readonly decoder = new TextDecoder('utf-8', { ignoreBOM: true })
	private readonly logger: Logger

	constructor(
		private readonly source: CharSource,
		options: VttScannerOptions = {},
	) {
		this.logger = options.logger ?? getLogger(['vtt-scan', 'scanner'])
	}

	/** Number of complete lines consumed so far. */
	get lineNumber(): number {
		return this.linesRead
	}

	/**
	 * Validate the stream header: optional BOM, `WEBVTT`, optional text after
	 * a space or tab, then a blank line.
	 *
	 * End-of-stream right after `WEBVTT` or its line counts as an empty
	 * document and succeeds.
	 */
	init(): ScanResult {
		const bom = this.parseBom()
		if (bom.status === 'end-of-stream') {
			return this.fail('EMPTY_STREAM', 'Stream is empty')
		}
		if (bom.status === 'error') return bom

		for (let i = 0; i < HEADER.length; i++) {
			const read = this.getChar()
			if (read.status === 'error') return this.sourceFailure(read.error)
			if (read.status === 'end-of-stream' || read.char !== HEADER.charCodeAt(i)) {
				return this.fail('MISSING_HEADER', `Stream does not start with ${HEADER}`, {
					line: 1,
					column: i,
				})
			}
		}

		const rest = this.parseLine()
		if (rest.status === 'error') return rest
		if (rest.status === 'end-of-stream') return this.headerDone()

		const first = rest.line[0]
		if (first !== undefined && first !== ' ' && first !== '\t') {
			return this.fail(
				'BAD_HEADER_SUFFIX',
				`Text after ${HEADER} must start with a space or tab`,
				{ line: 1, column: HEADER.length },
			)
		}

		const separator = this.parseLine()
		if (separator.status === 'error') return separator
		if (separator.status === 'end-of-stream') return this.headerDone()
		if (separator.line !== '') {
			return this.fail('MISSING_SEPARATOR', 'Header must be followed by a blank line', {
				line: this.linesRead,
			})
		}

		return this.headerDone()
	}

	/**
	 * Read the next cue into `cue`, overwriting every field.
	 *
	 * Returns `end-of-stream` when only blank lines remain. End-of-stream in
	 * the middle of a cue is a format error.
	 */
	parse(cue: Cue): ScanResult {
		let line: string
		for (;;) {
			const read = this.parseLine()
			if (read.status !== 'ok') return read
			if (read.line !== '') {
				line = read.line
				break
			}
		}

		let identifier = ''
		let arrowPos = line.indexOf(ARROW)
		if (arrowPos < 0) {
			identifier = line

			const timings = this.parseLine()
			if (timings.status === 'error') return timings
			if (timings.status === 'end-of-stream') {
				return this.fail('TRUNCATED_CUE', `Cue '${identifier}' ends before its timings line`, {
					line: this.linesRead,
				})
			}

			line = timings.line
			arrowPos = line.indexOf(ARROW)
			if (arrowPos < 0) {
				return this.fail('MISSING_ARROW', `Timings line has no '${ARROW}'`, {
					line: this.linesRead,
				})
			}
		}

		const timingsLine = this.linesRead
		const timings = parseTimingsLine(line, arrowPos)
		if (!timings.ok) {
			return this.failWith(timings.error.withContext({ line: timingsLine }))
		}

		const payload: string[] = []
		for (;;) {
			const read = this.parseLine()
			if (read.status === 'error') return read
			if (read.status === 'end-of-stream' || read.line === '') break
			payload.push(read.line)
		}
		if (payload.length === 0) {
			return this.fail('EMPTY_PAYLOAD', 'Cue has no payload lines', { line: timingsLine })
		}

		cue.identifier = identifier
		cue.startTime = timings.value.startTime
		cue.stopTime = timings.value.stopTime
		cue.settings = timings.value.settings
		cue.payload = payload

		this.logger.debug('Parsed cue {identifier} at line {line}', {
			identifier,
			line: timingsLine,
			start: cue.startTime.toString(),
			stop: cue.stopTime.toString(),
			settings: cue.settings.length,
			payloadLines: payload.length,
		})
		return OK
	}

	private getChar(): CharRead {
		const pending = this.pushback
		if (pending !== undefined) {
			this.pushback = undefined
			return { status: 'ok', char: pending }
		}
		return this.source.getChar()
	}

	private ungetChar(char: number): void {
		if (this.pushback !== undefined) {
			throw new StructuredError(
				'Pushback buffer already holds a byte',
				'INTERNAL',
				'PUSHBACK_OVERFLOW',
				false,
				{ pending: this.pushback, char },
			)
		}
		this.pushback = char
	}

	/**
	 * Consume a UTF-8 BOM if present. A mismatch on the first byte means no
	 * BOM; a mismatch later cannot be undone with one byte of pushback.
	 */
	private parseBom(): ScanResult {
		for (let i = 0; i < BOM.length; i++) {
			const read = this.getChar()
			if (read.status === 'error') return this.sourceFailure(read.error)
			if (read.status === 'end-of-stream') {
				return i === 0 ? END : this.fail('PARTIAL_BOM', 'Stream ends inside a byte-order mark')
			}
			if (read.char !== BOM[i]) {
				if (i === 0) {
					this.ungetChar(read.char)
					return OK
				}
				return this.fail('PARTIAL_BOM', 'Incomplete byte-order mark', { byte: i })
			}
		}
		return OK
	}

	/**
	 * Finish a line after a CR or LF. CR LF is one terminator; a lone CR is
	 * a terminator too, and the byte after it is pushed back.
	 */
	private parseLineTerminator(char: number): ScanResult {
		if (char === LF) return OK

		const next = this.getChar()
		if (next.status === 'error') return this.sourceFailure(next.error)
		if (next.status === 'ok' && next.char !== LF) this.ungetChar(next.char)
		return OK
	}

	/**
	 * Read one line without its terminator. `end-of-stream` only when nothing
	 * was read; an unterminated last line is still a line.
	 */
	private parseLine(): LineRead {
		const bytes: number[] = []
		for (;;) {
			const read = this.getChar()
			if (read.status === 'error') return this.sourceFailure(read.error)
			if (read.status === 'end-of-stream') {
				if (bytes.length === 0) return END
				break
			}
			if (read.char === LF || read.char === CR) {
				const terminator = this.parseLineTerminator(read.char)
				if (terminator.status === 'error') return terminator
				break
			}
			bytes.push(read.char)
		}

		this.linesRead++
		return { status: 'ok', line: this.decoder.decode(Uint8Array.from(bytes)) }
	}

	private headerDone(): ScanResult {
		this.logger.debug('Validated header ({lines} lines)', { lines: this.linesRead })
		return OK
	}

	private fail(
		code: VttFormatErrorCode,
		message: string,
		context: Record<string, unknown> = {},
	): ScanFailure {
		return this.failWith(new VttFormatError(code, message, context))
	}

	private failWith(error: VttFormatError): ScanFailure {
		this.logger.debug('Format error {code}: {message}', {
			code: error.code,
			message: error.message,
			...error.context,
		})
		return { status: 'error', error }
	}

	private sourceFailure(cause: Error): ScanFailure {
		this.logger.debug('Source failed after {lines} lines', {
			lines: this.linesRead,
			error: cause,
		})
		return {
			status: 'error',
			error: new VttSourceError(cause, { line: this.linesRead + 1 }),
		}
	}
}
