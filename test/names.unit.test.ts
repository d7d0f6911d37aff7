// SPDX-License-Identifier: MIT
// Names and Alpha Equivalence - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	alphaEquivalent,
	collectNames,
	freeVars,
	renameBound,
} from "../src/terms/names.js";
import { childTerms, patternBinders, termSize } from "../src/terms/traverse.js";
import {
	closureTerm,
	consPat,
	ifTerm,
	lamTerm,
	matchTerm,
	recPat,
	recTerm,
	tupPat,
	varPat,
	wildPat,
} from "../src/types.js";
import { call, fun, int, v } from "./term-helpers.js";

const pairMatch = matchTerm(v("p"), [
	{ pattern: tupPat([varPat("a"), varPat("b")]), body: call(v("f"), v("a"), v("b")) },
	{ pattern: wildPat, body: v("z") },
]);

describe("childTerms", () => {
	it("names each child by the path segment leading to it", () => {
		const term = recTerm([{ label: "x", value: int(1) }, { label: "y", value: v("y") }]);
		assert.deepStrictEqual(
			childTerms(term).map(([segment]) => segment),
			["fields.x", "fields.y"],
		);
		assert.deepStrictEqual(
			childTerms(pairMatch).map(([segment]) => segment),
			["scrutinee", "arms[0]", "arms[1]"],
		);
	});
});

describe("patternBinders", () => {
	it("lists binders left to right", () => {
		const pattern = recPat([
			{ label: "l", pattern: consPat(varPat("h"), varPat("t")) },
			{ label: "r", pattern: tupPat([wildPat, varPat("w")]) },
		]);
		assert.deepStrictEqual(patternBinders(pattern), ["h", "t", "w"]);
	});
});

describe("termSize", () => {
	it("counts nodes", () => {
		assert.equal(termSize(v("x")), 1);
		assert.equal(termSize(fun(["x"], call(v("f"), v("x")))), 4);
	});
});

describe("collectNames", () => {
	it("collects references, parameters and pattern binders", () => {
		const term = lamTerm("q", pairMatch);
		assert.deepStrictEqual(
			[...collectNames(term)].sort(),
			["a", "b", "f", "p", "q", "z"],
		);
	});
});

describe("freeVars", () => {
	it("excludes lambda and pattern binders", () => {
		const term = lamTerm("p", pairMatch);
		assert.deepStrictEqual([...freeVars(term)].sort(), ["f", "z"]);
	});

	it("respects an initial bound set", () => {
		assert.deepStrictEqual([...freeVars(call(v("f"), v("x")), new Set(["f"]))], ["x"]);
	});
});

describe("renameBound", () => {
	it("renames binders and their references, not free variables", () => {
		const term = lamTerm("x", call(v("f"), v("x")));
		assert.deepStrictEqual(
			renameBound(term, (name) => name + "'"),
			lamTerm("x'", call(v("f"), v("x'"))),
		);
	});

	it("renames pattern binders inside their arm", () => {
		const renamed = renameBound(pairMatch, (name) => "_" + name);
		assert.deepStrictEqual(renamed, matchTerm(v("p"), [
			{ pattern: tupPat([varPat("_a"), varPat("_b")]), body: call(v("f"), v("_a"), v("_b")) },
			{ pattern: wildPat, body: v("z") },
		]));
	});
});

describe("alphaEquivalent", () => {
	it("identifies terms that differ only in bound names", () => {
		assert.equal(
			alphaEquivalent(fun(["x", "y"], call(v("x"), v("y"))), fun(["a", "b"], call(v("a"), v("b")))),
			true,
		);
		assert.equal(alphaEquivalent(pairMatch, renameBound(pairMatch, (n) => n + "1")), true);
	});

	it("distinguishes binding structure", () => {
		assert.equal(
			alphaEquivalent(fun(["x", "y"], v("x")), fun(["x", "y"], v("y"))),
			false,
		);
	});

	it("distinguishes free variables by name", () => {
		assert.equal(alphaEquivalent(v("f"), v("g")), false);
		assert.equal(alphaEquivalent(lamTerm("x", v("f")), lamTerm("f", v("f"))), false);
	});

	it("compares constants by value", () => {
		assert.equal(alphaEquivalent(int(1), int(1)), true);
		assert.equal(alphaEquivalent(int(1), int(2)), false);
		assert.equal(
			alphaEquivalent(ifTerm(v("c"), int(1), int(2)), ifTerm(v("c"), int(1), int(2))),
			true,
		);
	});

	it("never equates closures", () => {
		const closure = closureTerm("x", v("x"), new Map());
		assert.equal(alphaEquivalent(closure, closure), false);
	});
});
