/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	type StructuredErrorJson,
	toError,
} from './structured-error.ts'
