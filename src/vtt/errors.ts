/**
 * Errors reported by the WebVTT scanner.
 *
 * @module vtt/errors
 */

import { StructuredError } from '../errors/index.ts'

/**
 * Every grammar violation the scanner can report.
 */
export type VttFormatErrorCode =
	| 'EMPTY_STREAM'
	| 'PARTIAL_BOM'
	| 'MISSING_HEADER'
	| 'BAD_HEADER_SUFFIX'
	| 'MISSING_SEPARATOR'
	| 'MISSING_ARROW'
	| 'TRUNCATED_CUE'
	| 'EMPTY_PAYLOAD'
	| 'BAD_TIMINGS'
	| 'EXPECTED_DIGIT'
	| 'NUMBER_OVERFLOW'
	| 'MINUTES_OUT_OF_RANGE'
	| 'SECONDS_OUT_OF_RANGE'
	| 'BAD_FRACTION'
	| 'JUNK_AFTER_TIME'
	| 'JUNK_BEFORE_ARROW'
	| 'BAD_SETTING_NAME'
	| 'EMPTY_SETTING_NAME'
	| 'EMPTY_SETTING_VALUE'
	| 'COLON_IN_SETTING_VALUE'

/**
 * The input does not conform to the WebVTT grammar.
 *
 * `context.line` is the 1-based line number when the scanner knows it;
 * `context.column` is the cursor inside the scanned segment.
 */
export class VttFormatError extends StructuredError {
	public override readonly code: VttFormatErrorCode

	constructor(
		code: VttFormatErrorCode,
		message: string,
		context: Record<string, unknown> = {},
	) {
		super(message, 'FORMAT', code, false, context)
		this.name = 'VttFormatError'
		this.code = code
	}

	/**
	 * Copy of this error with extra context merged in.
	 */
	withContext(extra: Record<string, unknown>): VttFormatError {
		return new VttFormatError(this.code, this.message, {
			...this.context,
			...extra,
		})
	}
}

/**
 * The character source reported a failure. The original error is kept
 * as `cause` without interpretation.
 */
export class VttSourceError extends StructuredError {
	constructor(cause: Error, context: Record<string, unknown> = {}) {
		super(
			`Character source failed: ${cause.message}`,
			'SOURCE',
			'SOURCE_FAILURE',
			false,
			context,
			cause,
		)
		this.name = 'VttSourceError'
	}
}

/** Any error the scanner returns. */
export type VttError = VttFormatError | VttSourceError

/**
 * Type guard for scanner format errors.
 */
export function isVttFormatError(error: unknown): error is VttFormatError {
	return error instanceof VttFormatError
}
