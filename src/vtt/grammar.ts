/**
 * Line-level WebVTT grammar: numbers, timestamps, settings and timings
 * lines.
 *
 * Every routine scans `line` from an explicit cursor up to an explicit
 * `end` bound and hands back the cursor where it stopped. Nothing here
 * touches the character source.
 *
 * @module vtt/grammar
 */

import type { Setting } from './cue.ts'
import { VttFormatError, type VttFormatErrorCode } from './errors.ts'
import { VttTime } from './time.ts'

/** The token separating start and stop times. */
export const ARROW = '-->'

/** Largest value {@link parseNumber} accepts (2^31 - 1). */
export const MAX_NUMBER = 2_147_483_647

/**
 * Outcome of a grammar routine. On success `cursor` is the index just past
 * what was consumed.
 */
export type GrammarResult<T> =
	| { readonly ok: true; readonly value: T; readonly cursor: number }
	| { readonly ok: false; readonly error: VttFormatError }

/** Start time, stop time and settings of one timings line. */
export interface Timings {
	startTime: VttTime
	stopTime: VttTime
	settings: Setting[]
}

function success<T>(value: T, cursor: number): GrammarResult<T> {
	return { ok: true, value, cursor }
}

function failure(
	code: VttFormatErrorCode,
	message: string,
	column: number,
): { readonly ok: false; readonly error: VttFormatError } {
	return { ok: false, error: new VttFormatError(code, message, { column }) }
}

function charAt(line: string, index: number, end: number): string | undefined {
	return index < end ? line[index] : undefined
}

function isWhitespace(c: string | undefined): boolean {
	return c === ' ' || c === '\t'
}

function digitAt(line: string, index: number, end: number): number {
	if (index >= end) return -1
	const code = line.charCodeAt(index)
	return code >= 48 && code <= 57 ? code - 48 : -1
}

function skipWhitespace(line: string, cursor: number, end: number): number {
	let i = cursor
	while (isWhitespace(charAt(line, i, end))) i++
	return i
}

/**
 * Parse a run of ASCII digits starting exactly at `cursor`.
 *
 * No sign, no decimal point. Fails when there is no digit at `cursor` or the
 * value passes {@link MAX_NUMBER}.
 */
export function parseNumber(
	line: string,
	cursor: number,
	end: number = line.length,
): GrammarResult<number> {
	let i = cursor
	let digit = digitAt(line, i, end)
	if (digit < 0) {
		return failure('EXPECTED_DIGIT', `Expected a digit at column ${cursor}`, cursor)
	}

	let value = 0
	while (digit >= 0) {
		value = value * 10 + digit
		if (value > MAX_NUMBER) {
			return failure('NUMBER_OVERFLOW', `Number too large at column ${cursor}`, cursor)
		}
		i++
		digit = digitAt(line, i, end)
	}

	return success(value, i)
}

/**
 * Parse a timestamp: `SS[.sss]`, `MM:SS[.sss]` or `HH:MM:SS[.sss]`.
 *
 * Leading spaces and tabs are skipped. The bare seconds form has no upper
 * bound and is normalized; in the colon forms minutes and seconds must be
 * below 60. The timestamp must be followed by `end`, a space or a tab.
 *
 * @example
 * ```ts
 * parseTime("01:02:03.4", 0); // ok, 01:02:03.400, cursor 10
 * parseTime("75", 0);         // ok, 00:01:15.000
 * parseTime("00:60:00", 0);   // MINUTES_OUT_OF_RANGE
 * ```
 */
export function parseTime(
	line: string,
	cursor: number,
	end: number = line.length,
): GrammarResult<VttTime> {
	let i = skipWhitespace(line, cursor, end)

	const firstColumn = i
	const first = parseNumber(line, firstColumn, end)
	if (!first.ok) return first
	i = first.cursor

	let hours = 0
	let minutes = 0
	let seconds: number

	if (charAt(line, i, end) === ':') {
		const secondColumn = i + 1
		const second = parseNumber(line, secondColumn, end)
		if (!second.ok) return second
		i = second.cursor

		const hasThird = charAt(line, i, end) === ':'
		if (second.value >= 60) {
			return hasThird
				? failure('MINUTES_OUT_OF_RANGE', `Minutes must be below 60 (got: ${second.value})`, secondColumn)
				: failure('SECONDS_OUT_OF_RANGE', `Seconds must be below 60 (got: ${second.value})`, secondColumn)
		}

		if (hasThird) {
			const thirdColumn = i + 1
			const third = parseNumber(line, thirdColumn, end)
			if (!third.ok) return third
			if (third.value >= 60) {
				return failure('SECONDS_OUT_OF_RANGE', `Seconds must be below 60 (got: ${third.value})`, thirdColumn)
			}
			i = third.cursor
			hours = first.value
			minutes = second.value
			seconds = third.value
		} else {
			if (first.value >= 60) {
				return failure('MINUTES_OUT_OF_RANGE', `Minutes must be below 60 (got: ${first.value})`, firstColumn)
			}
			minutes = first.value
			seconds = second.value
		}
	} else {
		seconds = first.value
	}

	let milliseconds = 0
	if (charAt(line, i, end) === '.') {
		const fractionColumn = i + 1
		const fraction = parseNumber(line, fractionColumn, end)
		if (!fraction.ok) {
			return fraction.error.code === 'EXPECTED_DIGIT'
				? failure('BAD_FRACTION', `Expected fraction digits at column ${fractionColumn}`, fractionColumn)
				: fraction
		}
		const digits = fraction.cursor - fractionColumn
		if (digits > 3) {
			return failure('BAD_FRACTION', `At most 3 fraction digits allowed (got: ${digits})`, fractionColumn)
		}
		milliseconds = fraction.value * 10 ** (3 - digits)
		i = fraction.cursor
	}

	const next = charAt(line, i, end)
	if (next !== undefined && !isWhitespace(next)) {
		return failure('JUNK_AFTER_TIME', `Unexpected '${next}' after timestamp at column ${i}`, i)
	}

	return success(VttTime.fromParts(hours, minutes, seconds, milliseconds), i)
}

/**
 * Parse whitespace-separated `NAME:VALUE` settings up to `end`.
 *
 * Names and values must be non-empty; a name may not contain whitespace
 * and a value may not contain a colon. Order and duplicates are kept.
 *
 * @example
 * ```ts
 * parseSettings(" align:start line:0", 0);
 * // ok, [{ name: "align", value: "start" }, { name: "line", value: "0" }]
 * ```
 */
export function parseSettings(
	line: string,
	cursor: number,
	end: number = line.length,
): GrammarResult<Setting[]> {
	const settings: Setting[] = []
	let i = cursor

	for (;;) {
		i = skipWhitespace(line, i, end)
		if (i >= end) return success(settings, i)

		const nameStart = i
		for (;;) {
			const c = charAt(line, i, end)
			if (c === ':') break
			if (c === undefined || isWhitespace(c)) {
				return failure('BAD_SETTING_NAME', `Setting at column ${nameStart} has no ':' separator`, i)
			}
			i++
		}
		if (i === nameStart) {
			return failure('EMPTY_SETTING_NAME', `Empty setting name at column ${nameStart}`, nameStart)
		}
		const name = line.slice(nameStart, i)
		i++ // colon

		const valueStart = i
		for (;;) {
			const c = charAt(line, i, end)
			if (c === undefined || isWhitespace(c)) break
			if (c === ':') {
				return failure('COLON_IN_SETTING_VALUE', `Setting '${name}' has a ':' in its value`, i)
			}
			i++
		}
		if (i === valueStart) {
			return failure('EMPTY_SETTING_VALUE', `Setting '${name}' has an empty value`, valueStart)
		}

		settings.push({ name, value: line.slice(valueStart, i) })
	}
}

/**
 * Parse a whole timings line given the index of its arrow token.
 *
 * `[0, arrowPos)` holds the start time plus optional whitespace;
 * `[arrowPos + 3, end)` holds the stop time followed by settings.
 */
export function parseTimingsLine(
	line: string,
	arrowPos: number,
): GrammarResult<Timings> {
	if (!Number.isInteger(arrowPos) || arrowPos < 0 || arrowPos >= line.length) {
		return failure('BAD_TIMINGS', `Arrow position ${arrowPos} is outside the line`, 0)
	}

	const start = parseTime(line, 0, arrowPos)
	if (!start.ok) return start

	for (let i = start.cursor; i < arrowPos; i++) {
		if (!isWhitespace(line[i])) {
			return failure('JUNK_BEFORE_ARROW', `Unexpected '${line[i]}' before '${ARROW}' at column ${i}`, i)
		}
	}

	const stop = parseTime(line, arrowPos + ARROW.length)
	if (!stop.ok) return stop

	const settings = parseSettings(line, stop.cursor)
	if (!settings.ok) return settings

	return success(
		{ startTime: start.value, stopTime: stop.value, settings: settings.value },
		settings.cursor,
	)
}
