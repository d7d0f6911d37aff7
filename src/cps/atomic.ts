// SPDX-License-Identifier: MIT
// Atomicity Classifier
// A term is atomic when it needs no control-flow sequencing to produce its value

import { exhaustive } from "../errors.js";
import type { Term } from "../types.js";

/**
 * Check if a term is atomic (contains no computation).
 *
 * Builtins and probabilistic primitives count as atomic leaves whatever their
 * operand state; the passes reject non-canonical shapes separately.
 */
export function isAtomic(term: Term): boolean {
	switch (term.kind) {
		case "app":
			return false;

		case "var":
		case "lam":
		case "closure":
		case "const":
		case "fix":
		case "concat":
		case "infer":
		case "logPdf":
		case "utest":
		case "sample":
		case "weight":
		case "dweight":
			return true;

		case "if":
			return isAtomic(term.cond) && isAtomic(term.then) && isAtomic(term.else);

		case "match":
			return isAtomic(term.scrutinee) && term.arms.every((arm) => isAtomic(arm.body));

		case "rec":
			return term.fields.every((field) => isAtomic(field.value));

		case "tup":
		case "list":
			return term.elements.every(isAtomic);

		case "recProj":
		case "tupProj":
			return isAtomic(term.base);

		default:
			return exhaustive(term);
	}
}
