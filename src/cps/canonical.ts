// SPDX-License-Identifier: MIT
// Canonical Shape Checks
// Builtins and probabilistic primitives enter the CPS passes fully unapplied

import { CPSError } from "../errors.js";
import type { BuiltinTerm, ProbTerm } from "../types.js";

export function assertCanonicalBuiltin(term: BuiltinTerm, pass: string): BuiltinTerm {
	if (term.operand !== null) throw CPSError.nonCanonicalBuiltin(pass, term);
	return term;
}

export function assertCanonicalProb(term: ProbTerm, pass: string): ProbTerm {
	if (term.first !== null || term.second !== null) {
		throw CPSError.nonCanonicalBuiltin(pass, term);
	}
	return term;
}
