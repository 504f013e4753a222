// SPDX-License-Identifier: MIT
// ZKIR Error Types
// Fatal construction/reduction errors. Validator diagnostics are plain strings, not errors.

import type { TypeId } from "./types.ts";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Builder errors
	UnknownType: "UnknownType",
	UnknownFunction: "UnknownFunction",
	DuplicateFunction: "DuplicateFunction",
	DuplicatePlugin: "DuplicatePlugin",
	ArityError: "ArityError",
	InvalidFunction: "InvalidFunction",
	FreedOutputWire: "FreedOutputWire",

	// Reduction errors
	InvalidGateSet: "InvalidGateSet",
	UnsatisfiableGateSet: "UnsatisfiableGateSet",

	// Evaluation errors
	Unsupported: "Unsupported",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// ZKIR Error Class
//==============================================================================

export class ZKIRError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "ZKIRError";
		this.code = code;
	}

	static unknownType(typeId: TypeId, action: string): ZKIRError {
		return new ZKIRError(
			ErrorCodes.UnknownType,
			"Type id " + String(typeId) + " is not defined, " + action,
		);
	}

	static unknownFunction(name: string): ZKIRError {
		return new ZKIRError(ErrorCodes.UnknownFunction, "Function " + name + " does not exist");
	}

	static duplicateFunction(name: string): ZKIRError {
		return new ZKIRError(ErrorCodes.DuplicateFunction, "Function " + name + " already exists");
	}

	static duplicatePlugin(name: string): ZKIRError {
		return new ZKIRError(ErrorCodes.DuplicatePlugin, "Plugin " + name + " already exists");
	}

	/**
	 * Create an ArityError for a call site whose wire or value counts do not
	 * match the declared signature.
	 */
	static arityError(name: string, what: string): ZKIRError {
		return new ZKIRError(
			ErrorCodes.ArityError,
			"Call to function " + name + ": number of " + what + " mismatch.",
		);
	}

	static unsupported(what: string): ZKIRError {
		return new ZKIRError(ErrorCodes.Unsupported, what + " is not supported");
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
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
