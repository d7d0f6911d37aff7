// SPDX-License-Identifier: MIT
// CPS Conversion Core
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	BoolConst, ConstValue, FloatConst, IntConst, PrimConst, PrimName, StringConst, UnitConst,
	ConsPattern, ConstPattern, ListPattern, Pattern, RecPattern, TupPattern, VarPattern, WildPattern,
	AppTerm, BuiltinKind, BuiltinTerm, ClosureTerm, ConstTerm, FixTerm, IfTerm, LamTerm, ListTerm,
	MatchArm, MatchTerm, ProbKind, ProbTerm, RecField, RecProjTerm, RecTerm, Term, TermEnv, TermKind,
	TupProjTerm, TupTerm, VarTerm,
} from "./types.js";

export type { ErrorCode, ValidationError, ValidationResult } from "./errors.js";

//==============================================================================
// Constructors
//==============================================================================

export {
	boolConst, floatConst, intConst, primConst, stringConst, unitConst,
	consPat, constPat, listPat, recPat, tupPat, varPat, wildPat,
	appMany, appTerm, builtinTerm, closureTerm, constTerm, fixTerm, ifTerm, lamTerm, listTerm,
	matchTerm, probTerm, recProjTerm, recTerm, tupProjTerm, tupTerm, varTerm,
	builtinArity, isBuiltin, isProb, PrimNames,
} from "./types.js";

export { applyConst, constArity, constEqual, primitives, type Primitive } from "./domains/prims.js";

//==============================================================================
// Error Codes
//==============================================================================

export { CPSError, ErrorCodes, exhaustive, invalidResult, validResult } from "./errors.js";

//==============================================================================
// CPS Transformation
//==============================================================================

export { isAtomic } from "./cps/atomic.js";
export { FreshNames } from "./cps/fresh.js";
export { liftApps } from "./cps/lift.js";
export { identityContinuation, wrapBuiltin, wrapConst, wrapFix } from "./cps/builtin.js";
export { cpsAtomic, cpsComplex, cpsTransform, type CPSOptions } from "./cps/transform.js";
export { verifyCps } from "./cps/verify.js";

//==============================================================================
// Term Utilities
//==============================================================================

export { childTerms, patternBinders, termSize } from "./terms/traverse.js";
export { alphaEquivalent, collectNames, freeVars, renameBound } from "./terms/names.js";

//==============================================================================
// Documents and Validation
//==============================================================================

export { CPSDocumentSchema, TermSchema, type CPSDocument } from "./zod-schemas.js";
export { validateDocument, validateTerm } from "./validator.js";
export { transformDocument } from "./compile.js";

//==============================================================================
// Reference Evaluation
//==============================================================================

export { Evaluator, matchPattern, valueEqual, type EvalOptions, type UtestResult } from "./evaluator.js";
