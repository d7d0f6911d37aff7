// SPDX-License-Identifier: MIT
// Primitive Operators - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { applyConst, constArity, constEqual, primitives } from "../src/domains/prims.js";
import { CPSError, ErrorCodes } from "../src/errors.js";
import {
	boolConst,
	floatConst,
	intConst,
	primConst,
	stringConst,
	unitConst,
} from "../src/types.js";

function isCode(code: string) {
	return (err: unknown): boolean => err instanceof CPSError && err.code === code;
}

describe("constArity", () => {
	it("is 0 for literals", () => {
		assert.equal(constArity(intConst(1)), 0);
		assert.equal(constArity(stringConst("s")), 0);
		assert.equal(constArity(unitConst), 0);
	});

	it("counts the arguments a primitive still needs", () => {
		assert.equal(constArity(primConst("add")), 2);
		assert.equal(constArity(primConst("add", [intConst(1)])), 1);
		assert.equal(constArity(primConst("neg")), 1);
	});
});

describe("applyConst", () => {
	it("accumulates arguments until saturated", () => {
		const partial = applyConst(primConst("sub"), intConst(10));
		assert.deepStrictEqual(partial, primConst("sub", [intConst(10)]));
		assert.deepStrictEqual(applyConst(partial, intConst(4)), intConst(6));
	});

	it("keeps ints integral and promotes mixed arithmetic to float", () => {
		assert.deepStrictEqual(primitives.div.impl([intConst(7), intConst(2)]), intConst(3));
		assert.deepStrictEqual(primitives.add.impl([intConst(1), floatConst(0.5)]), floatConst(1.5));
	});

	it("compares and combines", () => {
		assert.deepStrictEqual(primitives.lt.impl([intConst(1), intConst(2)]), boolConst(true));
		assert.deepStrictEqual(primitives.eq.impl([stringConst("a"), stringConst("a")]), boolConst(true));
		assert.deepStrictEqual(primitives.neq.impl([intConst(1), boolConst(true)]), boolConst(true));
		assert.deepStrictEqual(primitives.and.impl([boolConst(true), boolConst(false)]), boolConst(false));
		assert.deepStrictEqual(applyConst(primConst("not"), boolConst(false)), boolConst(true));
		assert.deepStrictEqual(applyConst(primConst("neg"), intConst(3)), intConst(-3));
	});

	it("rejects division by zero", () => {
		assert.throws(
			() => primitives.mod.impl([intConst(1), intConst(0)]),
			isCode(ErrorCodes.DomainError),
		);
	});

	it("rejects applying a literal", () => {
		assert.throws(() => applyConst(intConst(1), intConst(2)), isCode(ErrorCodes.TypeError));
	});

	it("rejects ill-typed operands", () => {
		assert.throws(
			() => primitives.mul.impl([stringConst("a"), intConst(2)]),
			isCode(ErrorCodes.TypeError),
		);
	});
});

describe("constEqual", () => {
	it("compares partial primitives by name and arguments", () => {
		assert.equal(constEqual(primConst("add", [intConst(1)]), primConst("add", [intConst(1)])), true);
		assert.equal(constEqual(primConst("add", [intConst(1)]), primConst("add", [intConst(2)])), false);
		assert.equal(constEqual(intConst(1), floatConst(1)), false);
	});
});
