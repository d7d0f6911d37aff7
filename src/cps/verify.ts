// SPDX-License-Identifier: MIT
// CPS Form Checker
// Reports every function body that returns a bare value instead of calling a continuation

import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "../errors.js";
import type { LamTerm, Term } from "../types.js";
import { freeVars } from "../terms/names.js";
import { childTerms } from "../terms/traverse.js";

//==============================================================================
// Checker State
//==============================================================================

interface CheckState {
	errors: ValidationError[];
	path: string[];
}

function currentPath(state: CheckState): string {
	return state.path.length > 0 ? "$." + state.path.join(".") : "$";
}

function withSegment(state: CheckState, segment: string, f: () => void): void {
	state.path.push(segment);
	f();
	state.path.pop();
}

//==============================================================================
// Tail Positions
//==============================================================================

/** `λx. x`, allowed only as a continuation value, never as a CPS function. */
function isIdentity(lam: LamTerm): boolean {
	return lam.body.kind === "var" && lam.body.name === lam.param;
}

/**
 * Check the tail positions of a function body. Inside a CPS function every
 * tail call must pass on `cont`, the continuation parameter of its header.
 */
function checkTail(term: Term, cont: string | null, state: CheckState): void {
	switch (term.kind) {
		case "app":
			if (cont !== null && !freeVars(term).has(cont)) {
				state.errors.push({
					path: currentPath(state),
					message: "tail call does not pass on continuation " + cont,
				});
			}
			return;
		case "if":
			withSegment(state, "then", () => { checkTail(term.then, cont, state); });
			withSegment(state, "else", () => { checkTail(term.else, cont, state); });
			return;
		case "match":
			term.arms.forEach((arm, i) => {
				withSegment(state, "arms[" + String(i) + "]", () => { checkTail(arm.body, cont, state); });
			});
			return;
		default:
			state.errors.push({
				path: currentPath(state),
				message: "bare " + term.kind + " in tail position",
			});
	}
}

/**
 * `header` is the continuation parameter when `lam` is the body of
 * `λk. lam`, and null otherwise.
 */
function checkLam(lam: LamTerm, header: string | null, state: CheckState): void {
	// λk. λx. body: the inner lambda is checked against k when visited
	if (lam.body.kind === "lam") return;
	if (header === null && isIdentity(lam)) return;
	withSegment(state, "body", () => { checkTail(lam.body, header, state); });
}

function visit(term: Term, header: string | null, state: CheckState): void {
	if (term.kind === "lam") checkLam(term, header, state);
	for (const [segment, child] of childTerms(term)) {
		const childHeader = term.kind === "lam" && child.kind === "lam" ? term.param : null;
		withSegment(state, segment, () => { visit(child, childHeader, state); });
	}
}

/**
 * Check that every function in a CPS-converted term ends in a call, and that
 * every CPS function hands its continuation to that call.
 */
export function verifyCps(term: Term): ValidationResult<Term> {
	const state: CheckState = { errors: [], path: [] };
	visit(term, null, state);
	return state.errors.length > 0 ? invalidResult(state.errors) : validResult(term);
}
