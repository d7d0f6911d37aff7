// SPDX-License-Identifier: MIT
// CPS Error Types
// Error domain for internal invariant breaches, evaluation and validation

import type { Term, TermKind } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Internal invariant breaches (compiler bugs, never user errors)
	ClosureBeforeEval: "ClosureBeforeEval",
	NonCanonicalBuiltin: "NonCanonicalBuiltin",
	ComplexInAtomic: "ComplexInAtomic",
	MalformedCPS: "MalformedCPS",

	// Evaluation errors
	TypeError: "TypeError",
	ArityError: "ArityError",
	DomainError: "DomainError",
	UnboundIdentifier: "UnboundIdentifier",
	MatchFailure: "MatchFailure",
	Unsupported: "Unsupported",
	NonTermination: "NonTermination",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const internalCodes: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
	ErrorCodes.ClosureBeforeEval,
	ErrorCodes.NonCanonicalBuiltin,
	ErrorCodes.ComplexInAtomic,
	ErrorCodes.MalformedCPS,
]);

//==============================================================================
// CPS Error Class
//==============================================================================

export class CPSError extends Error {
	readonly code: ErrorCode;
	readonly node?: TermKind;

	constructor(code: ErrorCode, message: string, node?: TermKind) {
		super(message);
		this.name = "CPSError";
		this.code = code;
		if (node !== undefined) this.node = node;
	}

	/**
	 * True for breaches of the transformation's preconditions. These abort the
	 * compilation and are never meant to be handled by the caller.
	 */
	isInternal(): boolean {
		return internalCodes.has(this.code);
	}

	/**
	 * Create a ClosureBeforeEval error
	 */
	static closureBeforeEval(pass: string): CPSError {
		return new CPSError(
			ErrorCodes.ClosureBeforeEval,
			"Internal error in " + pass + ": closure should not exist before evaluation",
			"closure",
		);
	}

	/**
	 * Create a NonCanonicalBuiltin error
	 */
	static nonCanonicalBuiltin(pass: string, term: Term): CPSError {
		return new CPSError(
			ErrorCodes.NonCanonicalBuiltin,
			"Internal error in " + pass + ": " + term.kind +
				" is partially applied and should not exist before evaluation",
			term.kind,
		);
	}

	/**
	 * Create a ComplexInAtomic error
	 */
	static complexInAtomic(term: Term): CPSError {
		return new CPSError(
			ErrorCodes.ComplexInAtomic,
			"Internal error in cpsAtomic: complex term of kind " + term.kind,
			term.kind,
		);
	}

	/**
	 * Create a MalformedCPS error
	 */
	static malformedCps(details: string[]): CPSError {
		return new CPSError(
			ErrorCodes.MalformedCPS,
			"Internal error: output is not in CPS form (" + details.join("; ") + ")",
		);
	}

	static typeError(expected: string, got: string, context?: string): CPSError {
		const ctx = context ? " (" + context + ")" : "";
		return new CPSError(
			ErrorCodes.TypeError,
			"Type error" + ctx + ": expected " + expected + ", got " + got,
		);
	}

	static arityError(expected: number, got: number, name: string): CPSError {
		return new CPSError(
			ErrorCodes.ArityError,
			"Arity error: " + name + " expects " + String(expected) +
				" arguments, got " + String(got),
		);
	}

	static domainError(message: string): CPSError {
		return new CPSError(ErrorCodes.DomainError, message);
	}

	static unboundIdentifier(name: string): CPSError {
		return new CPSError(ErrorCodes.UnboundIdentifier, "Unbound identifier: " + name);
	}

	static matchFailure(): CPSError {
		return new CPSError(ErrorCodes.MatchFailure, "No match arm matched the scrutinee");
	}

	static unsupported(kind: TermKind): CPSError {
		return new CPSError(
			ErrorCodes.Unsupported,
			"Evaluation of " + kind + " requires an inference runtime",
			kind,
		);
	}

	static nonTermination(): CPSError {
		return new CPSError(
			ErrorCodes.NonTermination,
			"Term evaluation did not terminate",
		);
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
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

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (term.kind) {
 *   case "var": return ...;
 *   case "lam": return ...;
 *   default:
 *     exhaustive(term); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
