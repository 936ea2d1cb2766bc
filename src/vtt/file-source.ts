/**
 * Synchronous file-backed character source.
 *
 * @module vtt/file-source
 */

import { closeSync, openSync, readSync } from 'node:fs'
import { getLogger } from '@logtape/logtape'
import { toError } from '../errors/index.ts'
import { type CharRead, type CharSource, END_OF_STREAM } from './source.ts'

const logger = getLogger(['vtt-scan', 'source'])

/** Default read size for {@link FileCharSource}. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024

export interface FileCharSourceOptions {
	/** Bytes read from disk per refill. Defaults to 64 KiB. */
	chunkSize?: number
}

/**
 * Reads a file in chunks and hands it out byte by byte.
 *
 * The file is opened on the first read. Open and read failures come back as
 * `{ status: "error" }`, with the `node:fs` error (and its `code`) intact.
 * Call {@link FileCharSource.close} when done; the scanner never closes its
 * source.
 *
 * @example
 * ```ts
 * const source = new FileCharSource("captions.vtt");
 * try {
 *   const scanner = new VttScanner(source);
 *   // ...
 * } finally {
 *   source.close();
 * }
 * ```
 */
export class FileCharSource implements CharSource {
	private fd: number | undefined
	private closed = false
	private readonly buffer: Uint8Array
	private length = 0
	private position = 0
	private exhausted = false

	constructor(
		readonly path: string,
		options: FileCharSourceOptions = {},
	) {
		const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
		if (!Number.isInteger(chunkSize) || chunkSize < 1) {
			throw new RangeError(`chunkSize must be a positive integer (got: ${chunkSize})`)
		}
		this.buffer = new Uint8Array(chunkSize)
	}

	getChar(): CharRead {
		if (this.position >= this.length) {
			const refill = this.refill()
			if (refill) return refill
		}

		const char = this.buffer[this.position]
		if (char === undefined) return END_OF_STREAM
		this.position++
		return { status: 'ok', char }
	}

	/** Release the file descriptor. Safe to call more than once. */
	close(): void {
		if (this.closed) return
		this.closed = true
		this.length = 0
		this.position = 0
		if (this.fd !== undefined) {
			closeSync(this.fd)
			this.fd = undefined
		}
	}

	private refill(): CharRead | undefined {
		if (this.closed) {
			return { status: 'error', error: new Error(`Source closed: ${this.path}`) }
		}
		if (this.exhausted) return END_OF_STREAM

		try {
			if (this.fd === undefined) {
				this.fd = openSync(this.path, 'r')
				logger.debug('Opened {path}', { path: this.path })
			}
			this.length = readSync(this.fd, this.buffer, 0, this.buffer.length, null)
		} catch (error: unknown) {
			logger.debug('Read failed for {path}', { path: this.path, error })
			return { status: 'error', error: toError(error) }
		}

		this.position = 0
		if (this.length === 0) {
			this.exhausted = true
			return END_OF_STREAM
		}
		return undefined
	}
}
