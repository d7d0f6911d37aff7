// SPDX-License-Identifier: MIT
// Term Validator
// Two-phase validation: Zod safeParse for structure, then semantic checks

import { z } from "zod/v4";
import { primitives } from "./domains/prims.js";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import { childTerms, patternBinders } from "./terms/traverse.js";
import type { ConstValue, Term } from "./types.js";
import { type CPSDocument, CPSDocumentSchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function addError(
	state: ValidationState,
	message: string,
	value?: unknown,
): void {
	state.errors.push({
		path: currentPath(state),
		message,
		value,
	});
}

//==============================================================================
// Semantic Checks
//==============================================================================

function checkConst(c: ConstValue, state: ValidationState): void {
	if (c.kind !== "prim") return;
	const arity = primitives[c.name].arity;
	if (c.args.length >= arity) {
		addError(state, "Primitive " + c.name + " takes " + String(arity) +
			" arguments but carries " + String(c.args.length));
	}
	for (const a of c.args) checkConst(a, state);
}

function checkDuplicates(names: readonly string[], what: string, state: ValidationState): void {
	const seen = new Set<string>();
	for (const name of names) {
		if (seen.has(name)) addError(state, "Duplicate " + what + ": " + name);
		seen.add(name);
	}
}

function checkNode(term: Term, state: ValidationState): void {
	switch (term.kind) {
		case "const":
			checkConst(term.value, state);
			break;
		case "rec":
			checkDuplicates(term.fields.map((f) => f.label), "record label", state);
			break;
		case "match":
			for (const arm of term.arms) {
				checkDuplicates(patternBinders(arm.pattern), "pattern variable", state);
			}
			break;
		case "concat":
		case "infer":
		case "logPdf":
		case "utest":
			if (term.operand !== null) {
				addError(state, "Builtin " + term.kind + " must be unapplied before transformation");
			}
			break;
		case "sample":
		case "weight":
		case "dweight":
			if (term.first !== null || term.second !== null) {
				addError(state, term.kind + " must be unapplied before transformation");
			}
			break;
		case "closure":
			addError(state, "Closures are runtime values and cannot appear in source terms");
			break;
		default:
			break;
	}
}

function checkTerm(term: Term, state: ValidationState): void {
	checkNode(term, state);
	for (const [segment, child] of childTerms(term)) {
		state.path.push(segment);
		checkTerm(child, state);
		state.path.pop();
	}
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Semantic validation of an in-memory term: the shape the CPS passes expect
 * of their input.
 */
export function validateTerm(term: Term): ValidationResult<Term> {
	const state: ValidationState = { errors: [], path: [] };
	checkTerm(term, state);
	return state.errors.length > 0 ? invalidResult(state.errors) : validResult(term);
}

export function validateDocument(doc: unknown): ValidationResult<CPSDocument> {
	// Phase 1: Structural validation via Zod
	const parsed = CPSDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<CPSDocument>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	const state: ValidationState = { errors: [], path: ["term"] };
	checkTerm(parsed.data.term, state);
	return state.errors.length > 0
		? invalidResult<CPSDocument>(state.errors)
		: validResult(parsed.data);
}
