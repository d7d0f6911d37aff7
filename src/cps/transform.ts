// SPDX-License-Identifier: MIT
// CPS Transformation
//
// Every function gains one extra leading parameter, a continuation taking
// exactly one argument, and never returns: it applies its continuation to
// its result instead. Atomic terms are converted directly; complex terms are
// converted against an explicit continuation.

import { CPSError, exhaustive } from "../errors.js";
import { termSize } from "../terms/traverse.js";
import { collectNames } from "../terms/names.js";
import type { AppTerm, IfTerm, MatchTerm, Term } from "../types.js";
import {
	appTerm,
	builtinArity,
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
import { identityContinuation, wrapBuiltin, wrapConst, wrapFix } from "./builtin.js";
import { assertCanonicalBuiltin, assertCanonicalProb } from "./canonical.js";
import { FreshNames } from "./fresh.js";
import { liftApps } from "./lift.js";
import { verifyCps } from "./verify.js";

//==============================================================================
// Options
//==============================================================================

export interface CPSOptions {
	/** Log the lifted term and the output size to the console. */
	trace?: boolean;
	/** Check the output with verifyCps and throw MalformedCPS when it fails. */
	verify?: boolean;
}

//==============================================================================
// Atomic Terms
//==============================================================================

/**
 * CPS transformation of atomic terms (terms containing no computation). No
 * continuation is needed: the result is the CPS form of the value itself.
 */
export function cpsAtomic(term: Term, fresh: FreshNames): Term {
	const atomic = (t: Term): Term => cpsAtomic(t, fresh);

	switch (term.kind) {
		case "var":
			return term;

		case "lam": {
			const k = fresh.next("k");
			return lamTerm(k, lamTerm(term.param, cpsComplex(varTerm(k), term.body, fresh)));
		}

		case "app":
			throw CPSError.complexInAtomic(term);

		case "closure":
			throw CPSError.closureBeforeEval("cpsAtomic");

		case "if":
			return ifTerm(atomic(term.cond), atomic(term.then), atomic(term.else));

		case "match":
			return matchTerm(
				atomic(term.scrutinee),
				term.arms.map((arm) => ({ pattern: arm.pattern, body: atomic(arm.body) })),
			);

		case "rec":
			return recTerm(term.fields.map((field) => ({ label: field.label, value: atomic(field.value) })));

		case "tup":
			return tupTerm(term.elements.map(atomic));

		case "list":
			return listTerm(term.elements.map(atomic));

		case "recProj":
			return recProjTerm(atomic(term.base), term.label);

		case "tupProj":
			return tupProjTerm(atomic(term.base), term.index);

		case "const":
			return wrapConst(term, fresh);

		case "fix":
			return wrapFix(term, fresh);

		case "concat":
		case "infer":
		case "logPdf":
		case "utest":
			return wrapBuiltin(assertCanonicalBuiltin(term, "cpsAtomic"), builtinArity[term.kind], fresh);

		// Already in CPS form
		case "sample":
		case "weight":
		case "dweight":
			return assertCanonicalProb(term, "cpsAtomic");

		default:
			return exhaustive(term);
	}
}

//==============================================================================
// Complex Terms
//==============================================================================

/**
 * Operator before operand. An atomic side is converted in place; a complex
 * side is bound to a fresh variable whose continuation is the rest of the
 * construction.
 */
function cpsApp(cont: Term, term: AppTerm, fresh: FreshNames): Term {
	const fnName = isAtomic(term.fn) ? null : fresh.next("f");
	const argName = isAtomic(term.arg) ? null : fresh.next("e");

	const fnValue = fnName === null ? cpsAtomic(term.fn, fresh) : varTerm(fnName);
	const argValue = argName === null ? cpsAtomic(term.arg, fresh) : varTerm(argName);
	const call = appTerm(appTerm(fnValue, cont), argValue);

	const inner = argName === null ? call : cpsComplex(lamTerm(argName, call), term.arg, fresh);
	return fnName === null ? inner : cpsComplex(lamTerm(fnName, inner), term.fn, fresh);
}

/**
 * Branches share one continuation variable bound outside the branch, so
 * the continuation is never copied into each branch.
 */
function cpsBranch(cont: Term, term: IfTerm | MatchTerm, fresh: FreshNames): Term {
	const c = fresh.next("c");
	const shared = varTerm(c);
	const inner = term.kind === "if"
		? ifTerm(
			cpsAtomic(term.cond, fresh),
			cpsComplex(shared, term.then, fresh),
			cpsComplex(shared, term.else, fresh),
		)
		: matchTerm(
			cpsAtomic(term.scrutinee, fresh),
			term.arms.map((arm) => ({ pattern: arm.pattern, body: cpsComplex(shared, arm.body, fresh) })),
		);
	return appTerm(lamTerm(c, inner), cont);
}

/**
 * Complex CPS transformation. `cont` must denote a one-argument
 * continuation; the result tail-calls it with the value of `term`.
 */
export function cpsComplex(cont: Term, term: Term, fresh: FreshNames): Term {
	switch (term.kind) {
		case "app":
			return cpsApp(cont, term, fresh);

		case "if":
		case "match":
			// Atomic branches carry no computation: don't thread the continuation
			return isAtomic(term)
				? appTerm(cont, cpsAtomic(term, fresh))
				: cpsBranch(cont, term, fresh);

		// After lifting, everything else is atomic
		default:
			return appTerm(cont, cpsAtomic(term, fresh));
	}
}

//==============================================================================
// Driver
//==============================================================================

/**
 * CPS transform a whole term: lift applications, then convert. A complex
 * term gets the identity function as its top-level continuation.
 */
export function cpsTransform(term: Term, options: CPSOptions = {}): Term {
	const fresh = new FreshNames(collectNames(term));
	const lifted = liftApps(term, fresh);

	if (options.trace) {
		console.debug("[CPS] After lifting apps: " + JSON.stringify(lifted));
	}

	const result = isAtomic(lifted)
		? cpsAtomic(lifted, fresh)
		: cpsComplex(identityContinuation(fresh), lifted, fresh);

	if (options.verify) {
		const check = verifyCps(result);
		if (!check.valid) {
			throw CPSError.malformedCps(check.errors.map((e) => e.path + ": " + e.message));
		}
	}

	if (options.trace) {
		console.debug(
			"[CPS] Output size: " + String(termSize(result)) +
				" nodes (input " + String(termSize(term)) + ", " + String(fresh.count) + " fresh names)",
		);
	}

	return result;
}
