/**
 * Structured error base for the scanner and its tooling.
 *
 * Every failure the package reports carries:
 * - A category that says which layer failed
 * - A machine-readable code
 * - A recoverability flag
 * - Context metadata (line, column, path)
 * - An optional `cause` for errors raised by collaborators
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the package.
 */
export type ErrorCategory =
	| 'FORMAT' // Input violates the WebVTT grammar
	| 'SOURCE' // The character source failed
	| 'NOT_FOUND' // Input file doesn't exist
	| 'CONFIGURATION' // Invalid options
	| 'INTERNAL' // Unexpected failure

/**
 * Serialized form of a {@link StructuredError}.
 */
export interface StructuredErrorJson {
	name: string
	message: string
	category: ErrorCategory
	code: string
	recoverable: boolean
	context: Record<string, unknown>
	stack?: string
	cause?: {
		name: string
		message: string
		stack?: string
	}
}

/**
 * Structured error with categorization, recoverability, and context.
 *
 * Use this as a base class for domain-specific error types.
 *
 * @example
 * ```typescript
 * class OptionsError extends StructuredError {
 *   constructor(message: string, context?: Record<string, unknown>) {
 *     super(message, "CONFIGURATION", "BAD_OPTIONS", false, context);
 *     this.name = "OptionsError";
 *   }
 * }
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category for classification.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "MISSING_ARROW", "SOURCE_FAILURE").
	 */
	public readonly code: string

	/**
	 * Whether retrying the operation could succeed.
	 */
	public readonly recoverable: boolean

	/**
	 * Arbitrary context metadata for debugging.
	 */
	public readonly context: Record<string, unknown>

	/**
	 * Original error that caused this error.
	 */
	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize error to JSON for logging or CLI output.
	 */
	toJSON(): StructuredErrorJson {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

/**
 * Type guard to check if an error is a StructuredError.
 *
 * @param error - Value to check
 * @returns True if error is a StructuredError instance
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * Type guard to check if an error is recoverable.
 *
 * @param error - Value to check
 * @returns True if error is a StructuredError and is marked recoverable
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}

/**
 * Coerce any thrown value into an `Error` so it can be chained as `cause`.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}
