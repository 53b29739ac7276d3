import { StatusCode } from './types.js';

/**
 * Base class for Leanframe specific errors
 * Provides status code support
 */
export class LeanframeError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'LeanframeError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, LeanframeError);
		}
	}
}

/**
 * Error thrown when a schema description string cannot be parsed.
 * Carries the offset into the source text where parsing failed.
 */
export class TypeParseError extends LeanframeError {
	constructor(message: string, public readonly text: string, public readonly position: number) {
		super(`${message} (at position ${position} in '${text}')`, StatusCode.FORMAT);
		this.name = 'TypeParseError';
		Object.setPrototypeOf(this, TypeParseError.prototype);
	}
}

/**
 * Error thrown when an expression node violates one of its invariants
 * while being built (unknown column, non-boolean predicate, ...)
 */
export class ConstructionError extends LeanframeError {
	constructor(message: string, code: number = StatusCode.CONSTRAINT) {
		super(message, code);
		this.name = 'ConstructionError';
		Object.setPrototypeOf(this, ConstructionError.prototype);
	}
}

/**
 * Error thrown when column-wise fusion sees columns from more than one table
 */
export class MismatchedSourceError extends ConstructionError {
	constructor(public readonly sources: readonly string[]) {
		super(`All inputs must be from same table. Saw the following tables: ${sources.join(', ')}`, StatusCode.MISMATCH);
		this.name = 'MismatchedSourceError';
		Object.setPrototypeOf(this, MismatchedSourceError.prototype);
	}
}

/**
 * Error thrown when a schema is queried on a node that lacks the declared
 * information needed to infer it
 */
export class SchemaInferenceError extends LeanframeError {
	constructor(message: string) {
		super(message, StatusCode.SCHEMA);
		this.name = 'SchemaInferenceError';
		Object.setPrototypeOf(this, SchemaInferenceError.prototype);
	}
}

/**
 * Error thrown by the lean-projection optimizer.
 * MISUSE for caller errors (requesting an unknown field), INTERNAL for consistency failures.
 */
export class OptimizerError extends LeanframeError {
	constructor(message: string, code: number = StatusCode.MISUSE) {
		super(message, code);
		this.name = 'OptimizerError';
		Object.setPrototypeOf(this, OptimizerError.prototype);
	}
}

/**
 * Helper function to throw a LeanframeError
 * @param message Error message
 * @param code Status code (defaults to ERROR)
 * @param cause Optional underlying error
 * @returns Never (always throws)
 */
export function leanframeError(
	message: string,
	code: StatusCode = StatusCode.ERROR,
	cause?: Error
): never {
	throw new LeanframeError(message, code, cause);
}

/** Throws a ConstructionError */
export function constructionError(message: string, code: StatusCode = StatusCode.CONSTRAINT): never {
	throw new ConstructionError(message, code);
}
