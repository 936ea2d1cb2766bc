/**
 * Cue timestamps.
 *
 * @module vtt/time
 */

const MS_PER_SECOND = 1000
const SECONDS_PER_MINUTE = 60
const MINUTES_PER_HOUR = 60

/**
 * A normalized cue timestamp.
 *
 * Fields always satisfy `minutes < 60`, `seconds < 60` and
 * `milliseconds < 1000`. Instances are immutable; arithmetic returns a new
 * value.
 *
 * @example
 * ```ts
 * const t = VttTime.fromParts(0, 0, 90, 500);
 * t.toString(); // "00:01:30.500"
 * t.presentation(); // 90500
 * t.plus(-1000).toString(); // "00:01:29.500"
 * ```
 */
export class VttTime {
	/** The zero timestamp. */
	static readonly ZERO: VttTime = new VttTime(0, 0, 0, 0)

	/** The latest representable timestamp (`Number.MAX_SAFE_INTEGER` ms). */
	static readonly MAX: VttTime = VttTime.fromPresentation(Number.MAX_SAFE_INTEGER)

	private constructor(
		readonly hours: number,
		readonly minutes: number,
		readonly seconds: number,
		readonly milliseconds: number,
	) {}

	/**
	 * Build a timestamp from a total millisecond count.
	 *
	 * Negative counts and NaN give {@link VttTime.ZERO}; counts past
	 * `Number.MAX_SAFE_INTEGER`, Infinity included, clamp to
	 * {@link VttTime.MAX}. Fractions are truncated.
	 */
	static fromPresentation(totalMs: number): VttTime {
		if (!(totalMs > 0)) return VttTime.ZERO

		const ms = Math.trunc(Math.min(totalMs, Number.MAX_SAFE_INTEGER))
		let seconds = Math.floor(ms / MS_PER_SECOND)
		const milliseconds = ms - seconds * MS_PER_SECOND

		let minutes = Math.floor(seconds / SECONDS_PER_MINUTE)
		seconds -= minutes * SECONDS_PER_MINUTE

		const hours = Math.floor(minutes / MINUTES_PER_HOUR)
		minutes -= hours * MINUTES_PER_HOUR

		return new VttTime(hours, minutes, seconds, milliseconds)
	}

	/**
	 * Build a timestamp from components that may exceed their ranges.
	 * `fromParts(0, 0, 90, 0)` is one minute thirty.
	 */
	static fromParts(
		hours: number,
		minutes: number,
		seconds: number,
		milliseconds = 0,
	): VttTime {
		return VttTime.fromPresentation(
			((hours * MINUTES_PER_HOUR + minutes) * SECONDS_PER_MINUTE + seconds) *
				MS_PER_SECOND +
				milliseconds,
		)
	}

	/** Total duration in milliseconds. */
	presentation(): number {
		return (
			((this.hours * MINUTES_PER_HOUR + this.minutes) * SECONDS_PER_MINUTE +
				this.seconds) *
				MS_PER_SECOND +
			this.milliseconds
		)
	}

	/**
	 * Field-wise comparison, hours first.
	 *
	 * @returns -1, 0 or 1
	 */
	compare(other: VttTime): -1 | 0 | 1 {
		const pairs: Array<[number, number]> = [
			[this.hours, other.hours],
			[this.minutes, other.minutes],
			[this.seconds, other.seconds],
			[this.milliseconds, other.milliseconds],
		]
		for (const [a, b] of pairs) {
			if (a < b) return -1
			if (a > b) return 1
		}
		return 0
	}

	equals(other: VttTime): boolean {
		return this.compare(other) === 0
	}

	isBefore(other: VttTime): boolean {
		return this.compare(other) < 0
	}

	isAfter(other: VttTime): boolean {
		return this.compare(other) > 0
	}

	isAtOrBefore(other: VttTime): boolean {
		return this.compare(other) <= 0
	}

	isAtOrAfter(other: VttTime): boolean {
		return this.compare(other) >= 0
	}

	/**
	 * Shift by a signed number of milliseconds. Results below zero clamp
	 * to {@link VttTime.ZERO}.
	 */
	plus(deltaMs: number): VttTime {
		return VttTime.fromPresentation(this.presentation() + deltaMs)
	}

	minus(deltaMs: number): VttTime {
		return this.plus(-deltaMs)
	}

	/** Signed difference `this - other` in milliseconds. */
	diff(other: VttTime): number {
		return this.presentation() - other.presentation()
	}

	/** `HH:MM:SS.mmm`, hours padded to at least two digits. */
	toString(): string {
		const hh = String(this.hours).padStart(2, '0')
		const mm = String(this.minutes).padStart(2, '0')
		const ss = String(this.seconds).padStart(2, '0')
		const mmm = String(this.milliseconds).padStart(3, '0')
		return `${hh}:${mm}:${ss}.${mmm}`
	}

	toJSON(): string {
		return this.toString()
	}
}
