import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { configure, reset } from '@logtape/logtape'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { cleanupTestDir, createTempDir } from '../testing/index.ts'
import { DEFAULT_LOG_DIR, ROOT_CATEGORY } from './config.ts'
import { createScanLogger } from './factory.ts'

describe('createScanLogger', () => {
	test('uses the default directory and file name', () => {
		const logger = createScanLogger()

		expect(logger.logDir).toBe(DEFAULT_LOG_DIR)
		expect(logger.logFile).toBe(join(DEFAULT_LOG_DIR, 'vtt-scan.jsonl'))
	})

	test('names the log file after the logger', () => {
		const logger = createScanLogger({ name: 'captions', logDir: '/tmp/logs' })

		expect(logger.logFile).toBe(join('/tmp/logs', 'captions.jsonl'))
	})

	test('creates subsystem loggers under the root category', () => {
		const logger = createScanLogger({ subsystems: ['scanner', 'cli'] })

		expect(Object.keys(logger.subsystemLoggers)).toEqual(['scanner', 'cli'])
		expect(logger.subsystemLoggers.cli?.category).toEqual([ROOT_CATEGORY, 'cli'])
		expect(logger.getSubsystemLogger('source').category).toEqual([
			ROOT_CATEGORY,
			'source',
		])
		expect(logger.rootLogger.category).toEqual([ROOT_CATEGORY])
	})
})

describe('initLogger', () => {
	let dir: string

	beforeEach(() => {
		dir = createTempDir('vtt-logs-')
	})

	afterEach(async () => {
		await reset()
		cleanupTestDir(dir)
	})

	test('creates the log directory and writes JSON lines', async () => {
		const logDir = join(dir, 'nested', 'logs')
		const logger = createScanLogger({ logDir, lowestLevel: 'info' })

		await logger.initLogger()
		await logger.initLogger()
		expect(existsSync(logDir)).toBe(true)

		logger.rootLogger.info('Scanned {count} cues', { count: 3 })
		await logger.disposeLogger()

		const lines = readFileSync(logger.logFile, 'utf-8').trim().split('\n')
		const messages = lines.map((line) => JSON.parse(line).message)
		expect(messages).toEqual(['Logging initialized', 'Scanned 3 cues'])
	})

	test('leaves an existing configuration alone', async () => {
		await configure({ sinks: {}, loggers: [] })
		const logger = createScanLogger({ logDir: dir })

		await expect(logger.initLogger()).resolves.toBeUndefined()
		await logger.disposeLogger()

		// Still configured by the test, so configuring again must fail
		await expect(configure({ sinks: {}, loggers: [] })).rejects.toThrow(
			/Already configured/,
		)
	})
})
