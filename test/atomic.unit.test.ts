// SPDX-License-Identifier: MIT
// Atomicity Classifier - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { isAtomic } from "../src/cps/atomic.js";
import {
	builtinTerm,
	closureTerm,
	fixTerm,
	ifTerm,
	lamTerm,
	listTerm,
	matchTerm,
	probTerm,
	recProjTerm,
	recTerm,
	tupProjTerm,
	tupTerm,
	varPat,
	wildPat,
} from "../src/types.js";
import { bool, call, int, v } from "./term-helpers.js";

const fx = call(v("f"), v("x"));

describe("isAtomic", () => {
	describe("leaves", () => {
		it("variables, lambdas and constants are atomic", () => {
			assert.equal(isAtomic(v("x")), true);
			assert.equal(isAtomic(lamTerm("x", v("x"))), true);
			assert.equal(isAtomic(int(3)), true);
			assert.equal(isAtomic(fixTerm), true);
		});

		it("a lambda is atomic even when its body applies a function", () => {
			assert.equal(isAtomic(lamTerm("x", fx)), true);
		});

		it("closures are atomic", () => {
			assert.equal(isAtomic(closureTerm("x", v("x"), new Map())), true);
		});

		it("builtins and probabilistic primitives are atomic", () => {
			for (const kind of ["concat", "infer", "logPdf", "utest"] as const) {
				assert.equal(isAtomic(builtinTerm(kind)), true, kind);
			}
			for (const kind of ["sample", "weight", "dweight"] as const) {
				assert.equal(isAtomic(probTerm(kind)), true, kind);
			}
		});
	});

	describe("application", () => {
		it("is never atomic", () => {
			assert.equal(isAtomic(fx), false);
			assert.equal(isAtomic(call(lamTerm("x", v("x")), int(1))), false);
		});
	});

	describe("conditionals", () => {
		it("if is atomic when condition and both branches are", () => {
			assert.equal(isAtomic(ifTerm(bool(true), v("a"), v("b"))), true);
		});

		it("if is complex when any child is", () => {
			assert.equal(isAtomic(ifTerm(fx, v("a"), v("b"))), false);
			assert.equal(isAtomic(ifTerm(bool(true), fx, v("b"))), false);
			assert.equal(isAtomic(ifTerm(bool(true), v("a"), fx)), false);
		});

		it("match is atomic when scrutinee and every arm are", () => {
			const arms = [
				{ pattern: varPat("y"), body: v("y") },
				{ pattern: wildPat, body: int(0) },
			];
			assert.equal(isAtomic(matchTerm(v("s"), arms)), true);
			assert.equal(isAtomic(matchTerm(fx, arms)), false);
			assert.equal(
				isAtomic(matchTerm(v("s"), [...arms, { pattern: wildPat, body: fx }])),
				false,
			);
		});
	});

	describe("aggregates and projections", () => {
		it("are atomic iff every child is", () => {
			assert.equal(isAtomic(tupTerm([v("a"), int(1)])), true);
			assert.equal(isAtomic(tupTerm([v("a"), fx])), false);
			assert.equal(isAtomic(listTerm([])), true);
			assert.equal(isAtomic(listTerm([fx])), false);
			assert.equal(isAtomic(recTerm([{ label: "a", value: v("a") }])), true);
			assert.equal(isAtomic(recTerm([{ label: "a", value: fx }])), false);
			assert.equal(isAtomic(recProjTerm(v("r"), "a")), true);
			assert.equal(isAtomic(recProjTerm(fx, "a")), false);
			assert.equal(isAtomic(tupProjTerm(v("t"), 0)), true);
			assert.equal(isAtomic(tupProjTerm(fx, 0)), false);
		});
	});

	it("gives the same answer for structurally equal terms", () => {
		const a = tupTerm([v("a"), ifTerm(v("c"), fx, v("b"))]);
		const b = tupTerm([v("a"), ifTerm(v("c"), call(v("f"), v("x")), v("b"))]);
		assert.equal(isAtomic(a), isAtomic(b));
		assert.equal(isAtomic(a), isAtomic(a));
	});
});
