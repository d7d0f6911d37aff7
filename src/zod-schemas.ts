// SPDX-License-Identifier: MIT
// Zod Schemas
// Schemas for term documents read from JSON. Closures are runtime-only
// and have no schema.
//
// Recursive schemas are annotated with z.ZodType<ExplicitType> against the
// interfaces in types.ts, since z.discriminatedUnion doesn't support recursion.

import { z } from "zod/v4";
import type {
	BuiltinTerm,
	ConsPattern,
	ConstValue,
	IfTerm,
	LamTerm,
	ListPattern,
	ListTerm,
	MatchArm,
	MatchTerm,
	Pattern,
	PrimConst,
	ProbTerm,
	RecPattern,
	RecProjTerm,
	RecTerm,
	Term,
	TupPattern,
	TupProjTerm,
	TupTerm,
	AppTerm,
} from "./types.js";
import { PrimNames } from "./types.js";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

const Identifier = z.string().min(1);

//==============================================================================
// Constant Domain
//==============================================================================

export const BoolConstSchema = z.object({ kind: z.literal("bool"), value: z.boolean() });
export const IntConstSchema = z.object({ kind: z.literal("int"), value: z.number().int() });
export const FloatConstSchema = z.object({ kind: z.literal("float"), value: z.number() });
export const StringConstSchema = z.object({ kind: z.literal("string"), value: z.string() });
export const UnitConstSchema = z.object({ kind: z.literal("unit") });

export const PrimConstSchema: z.ZodType<PrimConst> = z.object({
	kind: z.literal("prim"),
	name: z.enum(PrimNames),
	get args() { return z.array(ConstValueSchema); },
}).meta({ id: "PrimConst", title: "Primitive Operator", description: "Primitive operator with the constants applied to it so far" });

export const ConstValueSchema: z.ZodType<ConstValue> = z.union([
	BoolConstSchema,
	IntConstSchema,
	FloatConstSchema,
	StringConstSchema,
	UnitConstSchema,
	PrimConstSchema,
]).meta({ id: "ConstValue", title: "Constant", description: "Literal or primitive operator" });

//==============================================================================
// Pattern Domain
//==============================================================================

export const VarPatternSchema = z.object({ kind: z.literal("pvar"), name: Identifier });
export const WildPatternSchema = z.object({ kind: z.literal("pwild") });
export const ConstPatternSchema = z.object({ kind: z.literal("pconst"), value: ConstValueSchema });

export const TupPatternSchema: z.ZodType<TupPattern> = z.object({
	kind: z.literal("ptup"),
	get elements() { return z.array(PatternSchema); },
});

export const RecPatternSchema: z.ZodType<RecPattern> = z.object({
	kind: z.literal("prec"),
	get fields() { return z.array(z.object({ label: z.string(), pattern: PatternSchema })); },
});

export const ListPatternSchema: z.ZodType<ListPattern> = z.object({
	kind: z.literal("plist"),
	get elements() { return z.array(PatternSchema); },
});

export const ConsPatternSchema: z.ZodType<ConsPattern> = z.object({
	kind: z.literal("pcons"),
	get head() { return PatternSchema; },
	get tail() { return PatternSchema; },
});

export const PatternSchema: z.ZodType<Pattern> = z.union([
	VarPatternSchema,
	WildPatternSchema,
	ConstPatternSchema,
	TupPatternSchema,
	RecPatternSchema,
	ListPatternSchema,
	ConsPatternSchema,
]).meta({ id: "Pattern", title: "Pattern", description: "Match arm pattern" });

//==============================================================================
// Term Domain
//==============================================================================

export const VarTermSchema = z.object({
	kind: z.literal("var"),
	name: Identifier,
}).meta({ id: "VarTerm", title: "Variable", description: "Reference to a bound identifier" });

export const LamTermSchema: z.ZodType<LamTerm> = z.object({
	kind: z.literal("lam"),
	param: Identifier,
	get body() { return TermSchema; },
}).meta({ id: "LamTerm", title: "Lambda", description: "Single-parameter function literal" });

export const AppTermSchema: z.ZodType<AppTerm> = z.object({
	kind: z.literal("app"),
	get fn() { return TermSchema; },
	get arg() { return TermSchema; },
}).meta({ id: "AppTerm", title: "Application", description: "Function application" });

export const IfTermSchema: z.ZodType<IfTerm> = z.object({
	kind: z.literal("if"),
	get cond() { return TermSchema; },
	get then() { return TermSchema; },
	get else() { return TermSchema; },
}).meta({ id: "IfTerm", title: "Conditional", description: "Conditional with then/else branches" });

export const MatchArmSchema: z.ZodType<MatchArm> = z.object({
	pattern: PatternSchema,
	get body() { return TermSchema; },
});

export const MatchTermSchema: z.ZodType<MatchTerm> = z.object({
	kind: z.literal("match"),
	get scrutinee() { return TermSchema; },
	get arms() { return z.array(MatchArmSchema); },
}).meta({ id: "MatchTerm", title: "Match", description: "Pattern match; the first matching arm wins" });

export const RecTermSchema: z.ZodType<RecTerm> = z.object({
	kind: z.literal("rec"),
	get fields() { return z.array(z.object({ label: z.string(), value: TermSchema })); },
}).meta({ id: "RecTerm", title: "Record", description: "Record literal with ordered fields" });

export const TupTermSchema: z.ZodType<TupTerm> = z.object({
	kind: z.literal("tup"),
	get elements() { return z.array(TermSchema); },
}).meta({ id: "TupTerm", title: "Tuple", description: "Tuple literal" });

export const ListTermSchema: z.ZodType<ListTerm> = z.object({
	kind: z.literal("list"),
	get elements() { return z.array(TermSchema); },
}).meta({ id: "ListTerm", title: "List", description: "List literal" });

export const RecProjTermSchema: z.ZodType<RecProjTerm> = z.object({
	kind: z.literal("recProj"),
	get base() { return TermSchema; },
	label: z.string(),
}).meta({ id: "RecProjTerm", title: "Record Projection", description: "Field of a record" });

export const TupProjTermSchema: z.ZodType<TupProjTerm> = z.object({
	kind: z.literal("tupProj"),
	get base() { return TermSchema; },
	index: z.number().int().nonnegative(),
}).meta({ id: "TupProjTerm", title: "Tuple Projection", description: "Element of a tuple by index" });

export const ConstTermSchema = z.object({
	kind: z.literal("const"),
	value: ConstValueSchema,
}).meta({ id: "ConstTerm", title: "Constant", description: "Opaque primitive value or operator" });

export const FixTermSchema = z.object({
	kind: z.literal("fix"),
}).meta({ id: "FixTerm", title: "Fixpoint", description: "Recursion combinator" });

export const BuiltinTermSchema: z.ZodType<BuiltinTerm> = z.object({
	kind: z.enum(["concat", "infer", "logPdf", "utest"]),
	get operand() { return TermSchema.nullable(); },
}).meta({ id: "BuiltinTerm", title: "Builtin", description: "Opaque builtin; operand is null before evaluation" });

export const ProbTermSchema: z.ZodType<ProbTerm> = z.object({
	kind: z.enum(["sample", "weight", "dweight"]),
	get first() { return TermSchema.nullable(); },
	get second() { return TermSchema.nullable(); },
}).meta({ id: "ProbTerm", title: "Probabilistic Primitive", description: "sample, weight or dweight" });

/** Union of every serializable term variant. Uses z.union due to recursion. */
export const TermSchema: z.ZodType<Term> = z.union([
	VarTermSchema,
	LamTermSchema,
	AppTermSchema,
	IfTermSchema,
	MatchTermSchema,
	RecTermSchema,
	TupTermSchema,
	ListTermSchema,
	RecProjTermSchema,
	TupProjTermSchema,
	ConstTermSchema,
	FixTermSchema,
	BuiltinTermSchema,
	ProbTermSchema,
]).meta({ id: "Term", title: "Term", description: "Core language term" });

//==============================================================================
// Document
//==============================================================================

export interface CPSDocument {
	version: string;
	description?: string | undefined;
	term: Term;
}

export const CPSDocumentSchema: z.ZodType<CPSDocument> = z.object({
	version: SemVer,
	description: z.string().optional(),
	term: TermSchema,
}).meta({ id: "CPSDocument", title: "Term Document", description: "A single core language term to transform" });
