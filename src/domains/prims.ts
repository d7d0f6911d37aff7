// SPDX-License-Identifier: MIT
// Primitive Operators
// Arities and delta rules for the opaque constants of the core language

import { CPSError } from "../errors.js";
import type { ConstValue, PrimName } from "../types.js";
import { boolConst, floatConst, intConst } from "../types.js";

//==============================================================================
// Operator Table
//==============================================================================

export interface Primitive {
	arity: number;
	impl: (args: readonly ConstValue[]) => ConstValue;
}

//==============================================================================
// Helper Functions
//==============================================================================

function getNumeric(v: ConstValue): number {
	if (v.kind === "int" || v.kind === "float") return v.value;
	throw CPSError.typeError("number", v.kind);
}

function expectBool(v: ConstValue): boolean {
	if (v.kind === "bool") return v.value;
	throw CPSError.typeError("bool", v.kind);
}

function arg(args: readonly ConstValue[], index: number): ConstValue {
	const v = args[index];
	if (v === undefined) throw CPSError.arityError(index + 1, args.length, "primitive");
	return v;
}

/** int when both operands are ints, float otherwise */
function arith(op: (a: number, b: number) => number): Primitive {
	return {
		arity: 2,
		impl: (args) => {
			const a = arg(args, 0);
			const b = arg(args, 1);
			const result = op(getNumeric(a), getNumeric(b));
			return a.kind === "int" && b.kind === "int"
				? intConst(Math.trunc(result))
				: floatConst(result);
		},
	};
}

function compare(op: (a: number, b: number) => boolean): Primitive {
	return {
		arity: 2,
		impl: (args) => boolConst(op(getNumeric(arg(args, 0)), getNumeric(arg(args, 1)))),
	};
}

function divisor(b: number): number {
	if (b === 0) throw CPSError.domainError("Division by zero");
	return b;
}

/** Structural equality on first-order constants. */
export function constEqual(a: ConstValue, b: ConstValue): boolean {
	switch (a.kind) {
		case "bool":
		case "int":
		case "float":
		case "string":
			return b.kind === a.kind && b.value === a.value;
		case "unit":
			return b.kind === "unit";
		case "prim":
			return b.kind === "prim" && b.name === a.name &&
				b.args.length === a.args.length &&
				a.args.every((x, i) => {
					const y = b.args[i];
					return y !== undefined && constEqual(x, y);
				});
	}
}

//==============================================================================
// Primitives
//==============================================================================

export const primitives: Readonly<Record<PrimName, Primitive>> = {
	add: arith((a, b) => a + b),
	sub: arith((a, b) => a - b),
	mul: arith((a, b) => a * b),
	div: arith((a, b) => a / divisor(b)),
	mod: arith((a, b) => a % divisor(b)),
	neg: {
		arity: 1,
		impl: (args) => {
			const a = arg(args, 0);
			return a.kind === "int" ? intConst(-a.value) : floatConst(-getNumeric(a));
		},
	},
	eq: { arity: 2, impl: (args) => boolConst(constEqual(arg(args, 0), arg(args, 1))) },
	neq: { arity: 2, impl: (args) => boolConst(!constEqual(arg(args, 0), arg(args, 1))) },
	lt: compare((a, b) => a < b),
	leq: compare((a, b) => a <= b),
	gt: compare((a, b) => a > b),
	geq: compare((a, b) => a >= b),
	not: { arity: 1, impl: (args) => boolConst(!expectBool(arg(args, 0))) },
	and: { arity: 2, impl: (args) => boolConst(expectBool(arg(args, 0)) && expectBool(arg(args, 1))) },
	or: { arity: 2, impl: (args) => boolConst(expectBool(arg(args, 0)) || expectBool(arg(args, 1))) },
};

/**
 * Number of arguments a constant still consumes before it performs its
 * operation. Literals have arity 0.
 */
export function constArity(c: ConstValue): number {
	if (c.kind !== "prim") return 0;
	return Math.max(0, primitives[c.name].arity - c.args.length);
}

/**
 * Apply a constant to one more constant argument. Saturating a primitive
 * runs its delta rule.
 */
export function applyConst(c: ConstValue, a: ConstValue): ConstValue {
	if (c.kind !== "prim") throw CPSError.typeError("function", c.kind, "constant application");
	const args = [...c.args, a];
	const prim = primitives[c.name];
	if (args.length > prim.arity) throw CPSError.arityError(prim.arity, args.length, c.name);
	return args.length === prim.arity ? prim.impl(args) : { kind: "prim", name: c.name, args };
}
