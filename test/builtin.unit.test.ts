// SPDX-License-Identifier: MIT
// Builtin and Fixpoint Wrappers - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	identityContinuation,
	wrapBuiltin,
	wrapConst,
	wrapFix,
} from "../src/cps/builtin.js";
import { FreshNames } from "../src/cps/fresh.js";
import {
	appTerm,
	builtinTerm,
	constTerm,
	fixTerm,
	intConst,
	lamTerm,
	primConst,
} from "../src/types.js";
import { call, v } from "./term-helpers.js";

describe("identityContinuation", () => {
	it("is a one-parameter identity with a fresh name", () => {
		const fresh = new FreshNames(["x$0"]);
		assert.deepStrictEqual(identityContinuation(fresh), lamTerm("x$1", v("x$1")));
	});
});

describe("wrapBuiltin", () => {
	it("returns an arity-0 term unchanged", () => {
		const term = constTerm(intConst(7));
		assert.equal(wrapBuiltin(term, 0, new FreshNames()), term);
	});

	it("wraps a binary builtin one argument per layer", () => {
		const concat = builtinTerm("concat");
		assert.deepStrictEqual(
			wrapBuiltin(concat, 2, new FreshNames()),
			lamTerm("k$3", lamTerm("a$0", appTerm(
				v("k$3"),
				lamTerm("k$2", lamTerm("a$1", appTerm(
					v("k$2"),
					call(concat, v("a$0"), v("a$1")),
				))),
			))),
		);
	});

	it("wraps a unary builtin", () => {
		const infer = builtinTerm("infer");
		assert.deepStrictEqual(
			wrapBuiltin(infer, 1, new FreshNames()),
			lamTerm("k$1", lamTerm("a$0", appTerm(v("k$1"), appTerm(infer, v("a$0"))))),
		);
	});
});

describe("wrapConst", () => {
	it("leaves literals alone", () => {
		const term = constTerm(intConst(3));
		assert.deepStrictEqual(wrapConst(term, new FreshNames()), term);
	});

	it("wraps only the arguments a partial primitive still needs", () => {
		const term = constTerm(primConst("add", [intConst(1)]));
		assert.deepStrictEqual(
			wrapConst(term, new FreshNames()),
			lamTerm("k$1", lamTerm("a$0", appTerm(v("k$1"), appTerm(term, v("a$0"))))),
		);
	});

	it("wraps an unapplied binary primitive twice", () => {
		const term = constTerm(primConst("add"));
		const wrapped = wrapConst(term, new FreshNames());
		assert.equal(wrapped.kind, "lam");
		if (wrapped.kind !== "lam") return;
		assert.equal(wrapped.param, "k$3");
		assert.deepStrictEqual(wrapped.body, lamTerm("a$0", appTerm(
			v("k$3"),
			lamTerm("k$2", lamTerm("a$1", appTerm(v("k$2"), call(term, v("a$0"), v("a$1"))))),
		)));
	});
});

describe("wrapFix", () => {
	it("hands the identity continuation to the recursive function", () => {
		assert.deepStrictEqual(
			wrapFix(fixTerm, new FreshNames()),
			lamTerm("k$1", lamTerm("v$0", appTerm(
				v("k$1"),
				appTerm(fixTerm, appTerm(v("v$0"), lamTerm("x$2", v("x$2")))),
			))),
		);
	});
});
