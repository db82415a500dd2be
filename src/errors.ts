// SPDX-License-Identifier: MIT
// VQIR Error Types
// Error domain for validation, rendering and the construction surface

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Validation errors
	MissingRequiredField: "MissingRequiredField",
	LimitExceeded: "LimitExceeded",
	InvalidValue: "InvalidValue",
	InvalidFilter: "InvalidFilter",
	DeleteAllRequired: "DeleteAllRequired",
	UnsupportedOperation: "UnsupportedOperation",
	SchemaError: "SchemaError",

	// Rendering errors
	UnsupportedFilter: "UnsupportedFilter",
	UnsupportedOperator: "UnsupportedOperator",
	SerializationError: "SerializationError",

	// Construction surface
	InvalidIdentifier: "InvalidIdentifier",
	UnknownReference: "UnknownReference",
	BuilderError: "BuilderError",
	ConfigError: "ConfigError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	code: ErrorCode;
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

/**
 * Result type for fallible lookups that should not throw
 */
export type Result<T> =
	| { success: true; value: T }
	| { success: false; error: VQIRError };

//==============================================================================
// VQIR Error Class
//==============================================================================

export class VQIRError extends Error {
	readonly code: ErrorCode;
	readonly path?: string;

	constructor(code: ErrorCode, message: string, path?: string) {
		super(message);
		this.name = "VQIRError";
		this.code = code;
		if (path !== undefined) this.path = path;
	}

	/**
	 * Wrap the first failure of a validation result for callers that throw.
	 */
	static fromValidation(error: ValidationError): VQIRError {
		return new VQIRError(error.code, "Invalid query: " + error.message, error.path);
	}

	/**
	 * Create an UnsupportedFilter error
	 */
	static unsupportedFilter(dialect: string, kind: string): VQIRError {
		return new VQIRError(
			ErrorCodes.UnsupportedFilter,
			"Unsupported filter type for " + dialect + ": " + kind,
		);
	}

	/**
	 * Create an UnsupportedOperator error
	 */
	static unsupportedOperator(dialect: string, operator: string): VQIRError {
		return new VQIRError(
			ErrorCodes.UnsupportedOperator,
			"Filter operator " + operator + " is not supported by " + dialect,
		);
	}

	/**
	 * Create a SerializationError
	 */
	static serialization(message: string): VQIRError {
		return new VQIRError(
			ErrorCodes.SerializationError,
			"Failed to serialize query: " + message,
		);
	}

	/**
	 * Create an InvalidIdentifier error
	 */
	static invalidIdentifier(kind: string, name: string): VQIRError {
		return new VQIRError(
			ErrorCodes.InvalidIdentifier,
			"Invalid " + kind + " name: " + JSON.stringify(name),
		);
	}

	/**
	 * Create an UnknownReference error
	 */
	static unknownReference(message: string): VQIRError {
		return new VQIRError(ErrorCodes.UnknownReference, message);
	}

	/**
	 * Create a BuilderError
	 */
	static builder(message: string): VQIRError {
		return new VQIRError(ErrorCodes.BuilderError, message);
	}

	/**
	 * Create a ConfigError
	 */
	static config(message: string): VQIRError {
		return new VQIRError(ErrorCodes.ConfigError, message);
	}
}

export function isVQIRError(value: unknown): value is VQIRError {
	return value instanceof VQIRError;
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
