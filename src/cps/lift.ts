// SPDX-License-Identifier: MIT
// Application Lifting
//
// Hoists every complex subterm out of a non-tail position (if condition, match
// scrutinee, projection base, aggregate element) into a fresh variable bound
// by an immediately applied lambda. Afterwards the only terms that can be
// complex are app, if and match, which keeps the CPS case analysis small.

import { CPSError, exhaustive } from "../errors.js";
import type { Term } from "../types.js";
import {
	appTerm,
	ifTerm,
	lamTerm,
	listTerm,
	matchTerm,
	recProjTerm,
	recTerm,
	tupProjTerm,
	tupTerm,
	varTerm,
} from "../types.js";
import { isAtomic } from "./atomic.js";
import { assertCanonicalBuiltin, assertCanonicalProb } from "./canonical.js";
import type { FreshNames } from "./fresh.js";

//==============================================================================
// Pending Bindings
//==============================================================================

interface Binding {
	name: string;
	term: Term;
}

/**
 * Lift a child in non-tail position. A child that is still complex after
 * lifting is replaced by a fresh variable and recorded in `bindings`.
 */
function extractComplex(term: Term, bindings: Binding[], fresh: FreshNames): Term {
	const lifted = liftApps(term, fresh);
	if (isAtomic(lifted)) return lifted;
	const name = fresh.next("v");
	bindings.push({ name, term: lifted });
	return varTerm(name);
}

/**
 * Bind the pending terms around `body`. The first binding is the outermost,
 * so the extracted children still evaluate left to right.
 */
function wrapBindings(body: Term, bindings: readonly Binding[]): Term {
	return bindings.reduceRight<Term>(
		(rest, binding) => appTerm(lamTerm(binding.name, rest), binding.term),
		body,
	);
}

//==============================================================================
// Lifting
//==============================================================================

/**
 * Lift applications as far up as possible in a term.
 */
export function liftApps(term: Term, fresh: FreshNames): Term {
	const bindings: Binding[] = [];
	const extract = (t: Term): Term => extractComplex(t, bindings, fresh);

	switch (term.kind) {
		case "if": {
			const cond = extract(term.cond);
			return wrapBindings(
				ifTerm(cond, liftApps(term.then, fresh), liftApps(term.else, fresh)),
				bindings,
			);
		}

		case "match": {
			const scrutinee = extract(term.scrutinee);
			const arms = term.arms.map((arm) => ({
				pattern: arm.pattern,
				body: liftApps(arm.body, fresh),
			}));
			return wrapBindings(matchTerm(scrutinee, arms), bindings);
		}

		case "rec": {
			const fields = term.fields.map((field) => ({
				label: field.label,
				value: extract(field.value),
			}));
			return wrapBindings(recTerm(fields), bindings);
		}

		case "tup":
			return wrapBindings(tupTerm(term.elements.map(extract)), bindings);

		case "list":
			return wrapBindings(listTerm(term.elements.map(extract)), bindings);

		case "recProj":
			return wrapBindings(recProjTerm(extract(term.base), term.label), bindings);

		case "tupProj":
			return wrapBindings(tupProjTerm(extract(term.base), term.index), bindings);

		case "lam":
			return lamTerm(term.param, liftApps(term.body, fresh));

		case "app":
			return appTerm(liftApps(term.fn, fresh), liftApps(term.arg, fresh));

		case "var":
		case "const":
		case "fix":
			return term;

		case "concat":
		case "infer":
		case "logPdf":
		case "utest":
			return assertCanonicalBuiltin(term, "liftApps");

		case "sample":
		case "weight":
		case "dweight":
			return assertCanonicalProb(term, "liftApps");

		case "closure":
			throw CPSError.closureBeforeEval("liftApps");

		default:
			return exhaustive(term);
	}
}
