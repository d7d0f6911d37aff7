// SPDX-License-Identifier: MIT
// Builtin and Fixpoint Wrappers
// Eta-expand opaque operations into curried functions that take a continuation

import { constArity } from "../domains/prims.js";
import type { ConstTerm, FixTerm, LamTerm, Term } from "../types.js";
import { appMany, appTerm, lamTerm, varTerm } from "../types.js";
import type { FreshNames } from "./fresh.js";

/**
 * The identity continuation. Continuations always take exactly one argument,
 * so this is a plain one-parameter function.
 */
export function identityContinuation(fresh: FreshNames): LamTerm {
	const x = fresh.next("x");
	return lamTerm(x, varTerm(x));
}

/**
 * Wrap an opaque operation of fixed arity in CPS form.
 *
 * For arity 2 the result is
 * `λk1. λa1. k1 (λk2. λa2. k2 (t a1 a2))`: each layer hands the next layer to
 * its continuation, and the innermost layer applies the untransformed
 * operation to every argument, left to right. Arity 0 returns `t` unchanged.
 */
export function wrapBuiltin(term: Term, arity: number, fresh: FreshNames): Term {
	const params: string[] = [];
	for (let i = 0; i < arity; i++) params.push(fresh.next("a"));

	const inner = appMany(term, params.map(varTerm));
	return params.reduceRight<Term>((acc, param) => {
		const k = fresh.next("k");
		return lamTerm(k, lamTerm(param, appTerm(varTerm(k), acc)));
	}, inner);
}

export function wrapConst(term: ConstTerm, fresh: FreshNames): Term {
	return wrapBuiltin(term, constArity(term.value), fresh);
}

/**
 * Wrap the recursion combinator: `λk. λv. k (fix (v id))`.
 *
 * The function handed to fix is a CPS function, so it expects a continuation
 * before its self-reference. Applying it to the identity continuation first
 * yields the one-argument function fix needs.
 */
export function wrapFix(term: FixTerm, fresh: FreshNames): Term {
	const v = fresh.next("v");
	const k = fresh.next("k");
	const inner = appTerm(term, appTerm(varTerm(v), identityContinuation(fresh)));
	return lamTerm(k, lamTerm(v, appTerm(varTerm(k), inner)));
}
