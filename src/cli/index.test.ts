import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import { OutputFormat } from '../terminal/index.ts'
import { cleanupTestDir, createTempDir, writeTestFile } from '../testing/index.ts'
import { parseVtt } from '../vtt/index.ts'
import {
	type CliIo,
	getStringFlag,
	parseArgs,
	renderCues,
	resolveOptions,
	runCli,
	USAGE,
} from './index.ts'

function captureIo(): CliIo & { out: string[]; err: string[] } {
	const out: string[] = []
	const err: string[] = []
	return {
		out,
		err,
		stdout: (text) => out.push(text),
		stderr: (text) => err.push(text),
	}
}

const SAMPLE = 'WEBVTT\n\n1\n00:01.000 --> 00:02.000 align:start\nHi\n\n00:03.000 --> 00:04.500\nBye\n'

describe('parseArgs', () => {
	test('parses --flag value (spaced) format', () => {
		const result = parseArgs(['a.vtt', '--format', 'json'])
		expect(result.positional).toEqual(['a.vtt'])
		expect(result.flags.format).toBe('json')
	})

	test('parses --flag=value (equals) format', () => {
		const result = parseArgs(['--log-level=debug', 'a.vtt'])
		expect(result.positional).toEqual(['a.vtt'])
		expect(result.flags['log-level']).toBe('debug')
	})

	test('parses boolean flags', () => {
		const result = parseArgs(['a.vtt', '--verbose', '--format', 'text'])
		expect(result.flags.verbose).toBe(true)
		expect(result.flags.format).toBe('text')
	})

	test('collects duplicate flags into an array', () => {
		const result = parseArgs(['--format', 'json', '--format=text', '--format'])
		expect(result.flags.format).toEqual(['json', 'text', true])
	})
})

describe('getStringFlag', () => {
	test('returns the first string value', () => {
		expect(getStringFlag({ format: [true, 'json', 'text'] }, 'format')).toBe('json')
		expect(getStringFlag({ format: 'text' }, 'format')).toBe('text')
	})

	test('returns undefined for boolean or missing flags', () => {
		expect(getStringFlag({ format: true }, 'format')).toBeUndefined()
		expect(getStringFlag({}, 'format')).toBeUndefined()
	})
})

describe('resolveOptions', () => {
	test('applies defaults', () => {
		expect(resolveOptions(['a.vtt'])).toEqual({
			input: 'a.vtt',
			format: OutputFormat.TEXT,
			logLevel: 'info',
		})
	})

	test('reads every flag', () => {
		expect(
			resolveOptions(['a.vtt', '--format', 'json', '--log-level', 'debug', '--log-dir', 'logs']),
		).toEqual({
			input: 'a.vtt',
			format: OutputFormat.JSON,
			logLevel: 'debug',
			logDir: 'logs',
		})
	})

	test('requires an input file', () => {
		expect(() => resolveOptions([])).toThrow('Invalid input: Missing input file')
	})

	test('rejects more than one input file', () => {
		expect(() => resolveOptions(['a.vtt', 'b.vtt'])).toThrow(
			'Expected one input file (got: 2)',
		)
	})

	test('rejects unknown formats as configuration errors', () => {
		let caught: unknown
		try {
			resolveOptions(['a.vtt', '--format', 'xml'])
		} catch (error: unknown) {
			caught = error
		}

		expect(caught).toBeInstanceOf(StructuredError)
		expect(caught).toMatchObject({ category: 'CONFIGURATION', code: 'BAD_OPTIONS' })
	})
})

describe('renderCues', () => {
	const { cues } = parseVtt(SAMPLE)

	test('renders text as a WebVTT document', () => {
		expect(renderCues(cues, OutputFormat.TEXT)).toBe(
			[
				'WEBVTT',
				'',
				'1',
				'00:00:01.000 --> 00:00:02.000 align:start',
				'Hi',
				'',
				'00:00:03.000 --> 00:00:04.500',
				'Bye',
			].join('\n'),
		)
	})

	test('renders JSON with formatted times', () => {
		expect(JSON.parse(renderCues(cues, OutputFormat.JSON))).toEqual([
			{
				identifier: '1',
				startTime: '00:00:01.000',
				stopTime: '00:00:02.000',
				settings: [{ name: 'align', value: 'start' }],
				payload: ['Hi'],
			},
			{
				identifier: '',
				startTime: '00:00:03.000',
				stopTime: '00:00:04.500',
				settings: [],
				payload: ['Bye'],
			},
		])
	})

	test('renders an empty document as the header alone', () => {
		expect(renderCues([], OutputFormat.TEXT)).toBe('WEBVTT')
		expect(renderCues([], OutputFormat.JSON)).toBe('[]')
	})
})

describe('runCli', () => {
	let dir: string

	beforeEach(() => {
		dir = createTempDir('vtt-cli-')
	})

	afterEach(() => {
		cleanupTestDir(dir)
	})

	test('prints cues and exits 0', async () => {
		const path = writeTestFile(dir, 'captions.vtt', SAMPLE)
		const io = captureIo()

		expect(await runCli([path, '--format', 'json'], io)).toBe(0)
		expect(io.err).toEqual([])
		expect(io.out.length).toBe(1)
		expect(JSON.parse(io.out[0] ?? '')).toHaveLength(2)
	})

	test('exits 2 with usage for bad options', async () => {
		const io = captureIo()

		expect(await runCli([], io)).toBe(2)
		expect(io.err).toEqual(['Error [BAD_OPTIONS]: Invalid input: Missing input file', USAGE])
		expect(io.out).toEqual([])
	})

	test('exits 1 for a missing file', async () => {
		const path = join(dir, 'missing.vtt')
		const io = captureIo()

		expect(await runCli([path], io)).toBe(1)
		expect(io.err).toEqual([`Error [INPUT_NOT_FOUND]: File not found: ${path}`])
	})

	test('exits 1 with the line number for a malformed file', async () => {
		const path = writeTestFile(dir, 'bad.vtt', 'WEBVTT\nKind: captions\n\n')
		const io = captureIo()

		expect(await runCli([path], io)).toBe(1)
		expect(io.err).toEqual([
			'Error [MISSING_SEPARATOR] (line 2): Header must be followed by a blank line',
		])
	})

	test('accepts files without a .vtt extension', async () => {
		const path = writeTestFile(dir, 'captions.txt', SAMPLE)
		const io = captureIo()

		expect(await runCli([path], io)).toBe(0)
		expect(io.out[0]?.startsWith('WEBVTT\n\n1\n')).toBe(true)
	})

	test('writes a log file when --log-dir is given', async () => {
		const path = writeTestFile(dir, 'captions.vtt', SAMPLE)
		const logDir = join(dir, 'logs')
		const io = captureIo()

		expect(await runCli([path, '--log-dir', logDir], io)).toBe(0)

		const logFile = join(logDir, 'vtt-scan.jsonl')
		expect(existsSync(logFile)).toBe(true)
		expect(readFileSync(logFile, 'utf-8')).toContain(`Scanned 2 cues from ${path}`)
	})
})
