// SPDX-License-Identifier: MIT
// CPS Error Types - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	CPSError,
	ErrorCodes,
	exhaustive,
	invalidResult,
	validResult,
} from "../src/errors.js";
import { builtinTerm, varTerm } from "../src/types.js";

describe("CPSError class", () => {
	it("constructor sets code, message and name", () => {
		const err = new CPSError(ErrorCodes.TypeError, "test msg");
		assert.equal(err.code, "TypeError");
		assert.equal(err.message, "test msg");
		assert.equal(err.name, "CPSError");
		assert.equal(err.node, undefined);
		assert.ok(err instanceof Error);
	});

	it("separates internal breaches from evaluation errors", () => {
		assert.equal(CPSError.closureBeforeEval("liftApps").isInternal(), true);
		assert.equal(CPSError.malformedCps([]).isInternal(), true);
		assert.equal(CPSError.unboundIdentifier("x").isInternal(), false);
		assert.equal(new CPSError(ErrorCodes.MatchFailure, "bad").isInternal(), false);
	});

	it("has a factory-backed code for every entry", () => {
		assert.deepStrictEqual(Object.keys(ErrorCodes), [
			"ClosureBeforeEval",
			"NonCanonicalBuiltin",
			"ComplexInAtomic",
			"MalformedCPS",
			"TypeError",
			"ArityError",
			"DomainError",
			"UnboundIdentifier",
			"MatchFailure",
			"Unsupported",
			"NonTermination",
		]);
	});
});

describe("CPSError factories", () => {
	it("closureBeforeEval names the pass", () => {
		const err = CPSError.closureBeforeEval("cpsAtomic");
		assert.equal(err.code, ErrorCodes.ClosureBeforeEval);
		assert.equal(err.node, "closure");
		assert.equal(
			err.message,
			"Internal error in cpsAtomic: closure should not exist before evaluation",
		);
	});

	it("nonCanonicalBuiltin names the pass and the builtin", () => {
		const err = CPSError.nonCanonicalBuiltin("liftApps", builtinTerm("concat", varTerm("l")));
		assert.equal(err.node, "concat");
		assert.equal(
			err.message,
			"Internal error in liftApps: concat is partially applied and should not exist before evaluation",
		);
	});

	it("complexInAtomic names the kind", () => {
		const err = CPSError.complexInAtomic({ kind: "app", fn: varTerm("f"), arg: varTerm("x") });
		assert.equal(err.message, "Internal error in cpsAtomic: complex term of kind app");
	});

	it("malformedCps joins the details", () => {
		const err = CPSError.malformedCps(["$.body: bare var in tail position", "$.fn: x"]);
		assert.equal(
			err.message,
			"Internal error: output is not in CPS form ($.body: bare var in tail position; $.fn: x)",
		);
	});

	it("typeError includes an optional context", () => {
		assert.equal(CPSError.typeError("bool", "int").message, "Type error: expected bool, got int");
		assert.equal(
			CPSError.typeError("bool", "int", "if condition").message,
			"Type error (if condition): expected bool, got int",
		);
	});

	it("arityError reports both counts", () => {
		assert.equal(
			CPSError.arityError(2, 3, "add").message,
			"Arity error: add expects 2 arguments, got 3",
		);
	});

	it("unsupported names the primitive", () => {
		const err = CPSError.unsupported("sample");
		assert.equal(err.code, ErrorCodes.Unsupported);
		assert.equal(err.message, "Evaluation of sample requires an inference runtime");
	});
});

describe("validation results", () => {
	it("validResult carries the value", () => {
		assert.deepStrictEqual(validResult(42), { valid: true, errors: [], value: 42 });
	});

	it("invalidResult carries the errors and no value", () => {
		const result = invalidResult<number>([{ path: "$", message: "bad" }]);
		assert.equal(result.valid, false);
		assert.equal(result.value, undefined);
		assert.deepStrictEqual(result.errors, [{ path: "$", message: "bad" }]);
	});
});

describe("exhaustive", () => {
	it("throws when reached", () => {
		assert.throws(() => exhaustive("oops" as never), /Unexpected value: oops/);
	});
});
