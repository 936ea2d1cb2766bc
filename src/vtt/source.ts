/**
 * Character sources feeding the scanner.
 *
 * A source hands out one byte per call and reports end-of-stream or a
 * failure explicitly. The scanner never buffers beyond a single pushed-back
 * byte, so sources are free to buffer internally.
 *
 * @module vtt/source
 */

/**
 * Result of reading one byte from a {@link CharSource}.
 */
export type CharRead =
	| { readonly status: 'ok'; readonly char: number }
	| { readonly status: 'end-of-stream' }
	| { readonly status: 'error'; readonly error: Error }

/**
 * Supplies bytes to the scanner one at a time.
 *
 * Implementations may block. They should report I/O failures as
 * `{ status: "error" }` rather than throwing.
 */
export interface CharSource {
	getChar(): CharRead
}

/** Shared end-of-stream result. */
export const END_OF_STREAM: CharRead = Object.freeze({
	status: 'end-of-stream',
})

/**
 * In-memory source over a byte array.
 *
 * @example
 * ```ts
 * const source = new BufferCharSource(readFileSync("captions.vtt"));
 * ```
 */
export class BufferCharSource implements CharSource {
	private position = 0

	constructor(private readonly bytes: Uint8Array) {}

	getChar(): CharRead {
		const char = this.bytes[this.position]
		if (char === undefined) return END_OF_STREAM
		this.position++
		return { status: 'ok', char }
	}

	/** Bytes not yet handed out. */
	get remaining(): number {
		return this.bytes.length - this.position
	}
}

/**
 * Source over a string, encoded as UTF-8.
 *
 * A leading U+FEFF in the string becomes the 3-byte BOM the scanner
 * expects.
 */
export function stringSource(text: string): BufferCharSource {
	return new BufferCharSource(new TextEncoder().encode(text))
}
