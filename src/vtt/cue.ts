/**
 * Parsed cue records.
 *
 * @module vtt/cue
 */

import { VttTime } from './time.ts'

/**
 * A `NAME:VALUE` token from a timings line. Neither part is empty or
 * contains a colon, space or tab.
 */
export interface Setting {
	name: string
	value: string
}

/**
 * One subtitle entry.
 *
 * A cue passed to `VttScanner.parse` is an output location: every successful
 * call overwrites all of its fields. Callers may reuse one instance across
 * calls.
 */
export interface Cue {
	/** Empty when the block had no identifier line. */
	identifier: string
	startTime: VttTime
	stopTime: VttTime
	/** In order of appearance; duplicates kept. */
	settings: Setting[]
	/** One entry per non-empty payload line; never empty after a parse. */
	payload: string[]
}

/**
 * Create a blank cue to pass to `VttScanner.parse`.
 */
export function createCue(): Cue {
	return {
		identifier: '',
		startTime: VttTime.ZERO,
		stopTime: VttTime.ZERO,
		settings: [],
		payload: [],
	}
}

/**
 * Render a cue back to a WebVTT cue block (without the trailing blank line).
 *
 * @example
 * ```ts
 * formatCue(cue);
 * // "intro\n00:00:01.000 --> 00:00:02.000 align:start\nHello"
 * ```
 */
export function formatCue(cue: Cue): string {
	const timings = [`${cue.startTime} --> ${cue.stopTime}`]
	for (const setting of cue.settings) {
		timings.push(`${setting.name}:${setting.value}`)
	}

	const lines: string[] = []
	if (cue.identifier !== '') lines.push(cue.identifier)
	lines.push(timings.join(' '), ...cue.payload)
	return lines.join('\n')
}
