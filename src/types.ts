// SPDX-License-Identifier: MIT
// Core Term Definitions
// Implements the ConstValue, Pattern and Term domains shared by every pass

//==============================================================================
// Constant Domain (c - opaque primitive values)
//==============================================================================

export const PrimNames = [
	"add", "sub", "mul", "div", "mod", "neg",
	"eq", "neq", "lt", "leq", "gt", "geq",
	"not", "and", "or",
] as const;

export type PrimName = (typeof PrimNames)[number];

export type ConstValue =
	| BoolConst
	| IntConst
	| FloatConst
	| StringConst
	| UnitConst
	| PrimConst;

export interface BoolConst {
	readonly kind: "bool";
	readonly value: boolean;
}

export interface IntConst {
	readonly kind: "int";
	readonly value: number;
}

export interface FloatConst {
	readonly kind: "float";
	readonly value: number;
}

export interface StringConst {
	readonly kind: "string";
	readonly value: string;
}

export interface UnitConst {
	readonly kind: "unit";
}

/** A primitive operator together with the constants it has been applied to so far. */
export interface PrimConst {
	readonly kind: "prim";
	readonly name: PrimName;
	readonly args: readonly ConstValue[];
}

//==============================================================================
// Pattern Domain (p - match arm patterns)
//==============================================================================

export type Pattern =
	| VarPattern
	| WildPattern
	| ConstPattern
	| TupPattern
	| RecPattern
	| ListPattern
	| ConsPattern;

export interface VarPattern {
	readonly kind: "pvar";
	readonly name: string;
}

export interface WildPattern {
	readonly kind: "pwild";
}

export interface ConstPattern {
	readonly kind: "pconst";
	readonly value: ConstValue;
}

export interface TupPattern {
	readonly kind: "ptup";
	readonly elements: readonly Pattern[];
}

export interface RecPattern {
	readonly kind: "prec";
	readonly fields: readonly { readonly label: string; readonly pattern: Pattern }[];
}

export interface ListPattern {
	readonly kind: "plist";
	readonly elements: readonly Pattern[];
}

export interface ConsPattern {
	readonly kind: "pcons";
	readonly head: Pattern;
	readonly tail: Pattern;
}

//==============================================================================
// Term Domain (t - core language terms)
//==============================================================================

export type Term =
	| VarTerm
	| LamTerm
	| AppTerm
	| IfTerm
	| MatchTerm
	| RecTerm
	| TupTerm
	| ListTerm
	| RecProjTerm
	| TupProjTerm
	| ConstTerm
	| FixTerm
	| BuiltinTerm
	| ProbTerm
	| ClosureTerm; // runtime only

export interface VarTerm {
	readonly kind: "var";
	readonly name: string;
}

export interface LamTerm {
	readonly kind: "lam";
	readonly param: string;
	readonly body: Term;
}

export interface AppTerm {
	readonly kind: "app";
	readonly fn: Term;
	readonly arg: Term;
}

export interface IfTerm {
	readonly kind: "if";
	readonly cond: Term;
	readonly then: Term;
	readonly else: Term;
}

export interface MatchArm {
	readonly pattern: Pattern;
	readonly body: Term;
}

export interface MatchTerm {
	readonly kind: "match";
	readonly scrutinee: Term;
	readonly arms: readonly MatchArm[];
}

export interface RecField {
	readonly label: string;
	readonly value: Term;
}

export interface RecTerm {
	readonly kind: "rec";
	readonly fields: readonly RecField[];
}

export interface TupTerm {
	readonly kind: "tup";
	readonly elements: readonly Term[];
}

export interface ListTerm {
	readonly kind: "list";
	readonly elements: readonly Term[];
}

export interface RecProjTerm {
	readonly kind: "recProj";
	readonly base: Term;
	readonly label: string;
}

export interface TupProjTerm {
	readonly kind: "tupProj";
	readonly base: Term;
	readonly index: number;
}

export interface ConstTerm {
	readonly kind: "const";
	readonly value: ConstValue;
}

/** The recursion combinator. It carries no payload and is applied with `app`. */
export interface FixTerm {
	readonly kind: "fix";
}

export type BuiltinKind = "concat" | "infer" | "logPdf" | "utest";

/**
 * Opaque builtin. `operand` is null until evaluation applies the builtin to
 * its first argument.
 */
export interface BuiltinTerm {
	readonly kind: BuiltinKind;
	readonly operand: Term | null;
}

export type ProbKind = "sample" | "weight" | "dweight";

/** Probabilistic primitive, already taking its continuation as first argument. */
export interface ProbTerm {
	readonly kind: ProbKind;
	readonly first: Term | null;
	readonly second: Term | null;
}

export type TermEnv = ReadonlyMap<string, Term>;

export interface ClosureTerm {
	readonly kind: "closure";
	readonly param: string;
	readonly body: Term;
	readonly env: TermEnv;
}

export type TermKind = Term["kind"];

//==============================================================================
// Builtin Arities
//==============================================================================

export const builtinArity: Readonly<Record<BuiltinKind, number>> = {
	concat: 2,
	infer: 1,
	logPdf: 2,
	utest: 2,
};

//==============================================================================
// Type Guards
//==============================================================================

export function isBuiltin(t: Term): t is BuiltinTerm {
	return t.kind === "concat" || t.kind === "infer" || t.kind === "logPdf" || t.kind === "utest";
}

export function isProb(t: Term): t is ProbTerm {
	return t.kind === "sample" || t.kind === "weight" || t.kind === "dweight";
}

//==============================================================================
// Constant Constructors
//==============================================================================

export const boolConst = (value: boolean): BoolConst => ({ kind: "bool", value });
export const intConst = (value: number): IntConst => ({ kind: "int", value });
export const floatConst = (value: number): FloatConst => ({ kind: "float", value });
export const stringConst = (value: string): StringConst => ({ kind: "string", value });
export const unitConst: UnitConst = { kind: "unit" };
export const primConst = (
	name: PrimName,
	args: readonly ConstValue[] = [],
): PrimConst => ({ kind: "prim", name, args });

//==============================================================================
// Pattern Constructors
//==============================================================================

export const varPat = (name: string): VarPattern => ({ kind: "pvar", name });
export const wildPat: WildPattern = { kind: "pwild" };
export const constPat = (value: ConstValue): ConstPattern => ({ kind: "pconst", value });
export const tupPat = (elements: readonly Pattern[]): TupPattern => ({ kind: "ptup", elements });
export const recPat = (
	fields: readonly { label: string; pattern: Pattern }[],
): RecPattern => ({ kind: "prec", fields });
export const listPat = (elements: readonly Pattern[]): ListPattern => ({ kind: "plist", elements });
export const consPat = (head: Pattern, tail: Pattern): ConsPattern => ({
	kind: "pcons",
	head,
	tail,
});

//==============================================================================
// Term Constructors
//==============================================================================

export const varTerm = (name: string): VarTerm => ({ kind: "var", name });
export const lamTerm = (param: string, body: Term): LamTerm => ({
	kind: "lam",
	param,
	body,
});
export const appTerm = (fn: Term, arg: Term): AppTerm => ({ kind: "app", fn, arg });
export const ifTerm = (cond: Term, then: Term, otherwise: Term): IfTerm => ({
	kind: "if",
	cond,
	then,
	else: otherwise,
});
export const matchTerm = (scrutinee: Term, arms: readonly MatchArm[]): MatchTerm => ({
	kind: "match",
	scrutinee,
	arms,
});
export const recTerm = (fields: readonly RecField[]): RecTerm => ({ kind: "rec", fields });
export const tupTerm = (elements: readonly Term[]): TupTerm => ({ kind: "tup", elements });
export const listTerm = (elements: readonly Term[]): ListTerm => ({ kind: "list", elements });
export const recProjTerm = (base: Term, label: string): RecProjTerm => ({
	kind: "recProj",
	base,
	label,
});
export const tupProjTerm = (base: Term, index: number): TupProjTerm => ({
	kind: "tupProj",
	base,
	index,
});
export const constTerm = (value: ConstValue): ConstTerm => ({ kind: "const", value });
export const fixTerm: FixTerm = { kind: "fix" };
export const builtinTerm = (kind: BuiltinKind, operand: Term | null = null): BuiltinTerm => ({
	kind,
	operand,
});
export const probTerm = (
	kind: ProbKind,
	first: Term | null = null,
	second: Term | null = null,
): ProbTerm => ({ kind, first, second });
export const closureTerm = (param: string, body: Term, env: TermEnv): ClosureTerm => ({
	kind: "closure",
	param,
	body,
	env,
});

/** Curried application of `fn` to every argument, left to right. */
export function appMany(fn: Term, args: readonly Term[]): Term {
	return args.reduce<Term>((acc, arg) => appTerm(acc, arg), fn);
}
