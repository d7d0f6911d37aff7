// SPDX-License-Identifier: MIT
// Shorthand constructors shared by the test suites

import {
	appMany,
	boolConst,
	constTerm,
	fixTerm,
	intConst,
	lamTerm,
	listTerm,
	primConst,
	type PrimName,
	type Term,
	varTerm,
} from "../src/types.js";

export const v = varTerm;

export const int = (value: number): Term => constTerm(intConst(value));

export const bool = (value: boolean): Term => constTerm(boolConst(value));

export const prim = (name: PrimName): Term => constTerm(primConst(name));

/** Curried call: call(f, a, b) = ((f a) b) */
export const call = (fn: Term, ...args: Term[]): Term => appMany(fn, args);

/** Curried lambda: fun(["x", "y"], b) = λx. λy. b */
export const fun = (params: string[], body: Term): Term =>
	params.reduceRight<Term>((acc, p) => lamTerm(p, acc), body);

export const ints = (...values: number[]): Term => listTerm(values.map(int));

/** fix (λf. λn. if n == 0 then 1 else n * f (n - 1)) */
export const factorial: Term = call(
	fixTerm,
	fun(["fact", "n"], {
		kind: "if",
		cond: call(prim("eq"), v("n"), int(0)),
		then: int(1),
		else: call(prim("mul"), v("n"), call(v("fact"), call(prim("sub"), v("n"), int(1)))),
	}),
);
