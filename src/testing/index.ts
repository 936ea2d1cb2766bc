/**
 * Test helpers: temporary directories, fixture files and in-memory
 * character sources.
 *
 * @example
 * ```ts
 * import { createTempDir, writeTestFile, cleanupTestDir } from "../testing/index.ts";
 *
 * const dir = createTempDir("vtt-");
 * const path = writeTestFile(dir, "captions.vtt", "WEBVTT\n\n");
 * // ...
 * cleanupTestDir(dir);
 * ```
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { CharRead, CharSource } from '../vtt/source.ts'

/**
 * Create a temporary directory with a given prefix
 *
 * @param prefix - Prefix for the temp directory name (default: "test-")
 * @returns Absolute path to the created temp directory
 */
export function createTempDir(prefix = 'test-'): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/**
 * Write a test file to a directory, creating parent directories as needed
 *
 * @param dir - Base directory (absolute path)
 * @param relativePath - Path relative to dir (can include subdirectories)
 * @param content - File content; strings are written as UTF-8
 * @returns Absolute path of the written file
 */
export function writeTestFile(
	dir: string,
	relativePath: string,
	content: string | Uint8Array,
): string {
	const fullPath = path.join(dir, relativePath)
	fs.mkdirSync(path.dirname(fullPath), { recursive: true })
	fs.writeFileSync(fullPath, content)
	return fullPath
}

/**
 * Remove a test directory and everything in it
 */
export function cleanupTestDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true })
}

/**
 * Source that replays a fixed list of reads, then reports end-of-stream.
 * Lets tests inject a failure at an exact byte.
 *
 * @example
 * ```ts
 * const source = scriptedSource([...bytesOf("WEB"), { status: "error", error: new Error("gone") }]);
 * ```
 */
export function scriptedSource(reads: ReadonlyArray<CharRead>): CharSource & {
	readonly calls: number
} {
	let calls = 0
	return {
		getChar(): CharRead {
			const read = reads[calls]
			calls++
			return read ?? { status: 'end-of-stream' }
		},
		get calls() {
			return calls
		},
	}
}

/**
 * The UTF-8 bytes of `text` as successful reads.
 */
export function bytesOf(text: string): CharRead[] {
	return Array.from(new TextEncoder().encode(text), (char) => ({
		status: 'ok' as const,
		char,
	}))
}
