import { describe, expect, test } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import { isVttFormatError, VttFormatError, VttSourceError } from './errors.ts'

describe('VttFormatError', () => {
	test('is a non-recoverable FORMAT error', () => {
		const error = new VttFormatError('MISSING_ARROW', "Timings line has no '-->'", { line: 4 })

		expect(error).toBeInstanceOf(StructuredError)
		expect(error.name).toBe('VttFormatError')
		expect(error.category).toBe('FORMAT')
		expect(error.code).toBe('MISSING_ARROW')
		expect(error.recoverable).toBe(false)
		expect(error.context).toEqual({ line: 4 })
	})

	test('withContext returns a copy with merged context', () => {
		const error = new VttFormatError('BAD_FRACTION', 'Bad fraction', { column: 6 })
		const located = error.withContext({ line: 3 })

		expect(located).not.toBe(error)
		expect(located.code).toBe('BAD_FRACTION')
		expect(located.context).toEqual({ column: 6, line: 3 })
		expect(error.context).toEqual({ column: 6 })
	})
})

describe('VttSourceError', () => {
	test('wraps the source failure as cause', () => {
		const cause = new Error('EIO')
		const error = new VttSourceError(cause, { line: 2 })

		expect(error.message).toBe('Character source failed: EIO')
		expect(error.category).toBe('SOURCE')
		expect(error.code).toBe('SOURCE_FAILURE')
		expect(error.cause).toBe(cause)
	})
})

describe('isVttFormatError', () => {
	test('accepts format errors only', () => {
		expect(isVttFormatError(new VttFormatError('EMPTY_STREAM', 'Empty'))).toBe(true)
		expect(isVttFormatError(new VttSourceError(new Error('gone')))).toBe(false)
		expect(isVttFormatError(new Error('plain'))).toBe(false)
		expect(isVttFormatError('EMPTY_STREAM')).toBe(false)
	})
})
