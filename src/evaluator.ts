// SPDX-License-Identifier: MIT
// Reference Evaluator
// Big-step evaluation ρ ⊢ t ⇓ v with a trampoline for calls in tail position,
// so CPS-converted terms run in bounded stack

import { applyConst } from "./domains/prims.js";
import { CPSError, exhaustive } from "./errors.js";
import { alphaEquivalent } from "./terms/names.js";
import type { ConstValue, MatchArm, Pattern, Term, TermEnv } from "./types.js";
import {
	appTerm,
	builtinTerm,
	closureTerm,
	constTerm,
	fixTerm,
	listTerm,
	recTerm,
	tupTerm,
	unitConst,
} from "./types.js";

//==============================================================================
// Evaluation Options
//==============================================================================

export interface EvalOptions {
	maxSteps?: number;
}

//==============================================================================
// Evaluator State
//==============================================================================

interface EvalState {
	steps: number;
	maxSteps: number;
}

/** Result of applying a function value: a value, or a body still to run. */
type Step =
	| { kind: "value"; value: Term }
	| { kind: "tail"; body: Term; env: TermEnv };

export interface UtestResult {
	passed: boolean;
	actual: Term;
	expected: Term;
}

const value = (v: Term): Step => ({ kind: "value", value: v });

function extend(env: TermEnv, name: string, v: Term): TermEnv {
	return new Map(env).set(name, v);
}

function extendMany(env: TermEnv, bindings: ReadonlyMap<string, Term>): TermEnv {
	return new Map([...env, ...bindings]);
}

function expectConst(v: Term, context: string): ConstValue {
	if (v.kind === "const") return v.value;
	throw CPSError.typeError("constant", v.kind, context);
}

function expectList(v: Term, context: string): readonly Term[] {
	if (v.kind === "list") return v.elements;
	throw CPSError.typeError("list", v.kind, context);
}

/** Values compare structurally; functions never compare equal. */
export function valueEqual(a: Term, b: Term): boolean {
	return alphaEquivalent(a, b);
}

//==============================================================================
// Pattern Matching
//==============================================================================

function matchAll(
	patterns: readonly Pattern[],
	values: readonly Term[],
): Map<string, Term> | null {
	if (patterns.length !== values.length) return null;
	const bindings = new Map<string, Term>();
	for (const [i, p] of patterns.entries()) {
		const v = values[i];
		const sub = v === undefined ? null : matchPattern(p, v);
		if (sub === null) return null;
		for (const [name, bound] of sub) bindings.set(name, bound);
	}
	return bindings;
}

export function matchPattern(pattern: Pattern, v: Term): Map<string, Term> | null {
	switch (pattern.kind) {
		case "pvar":
			return new Map([[pattern.name, v]]);
		case "pwild":
			return new Map();
		case "pconst":
			return valueEqual(constTerm(pattern.value), v) ? new Map() : null;
		case "ptup":
			return v.kind === "tup" ? matchAll(pattern.elements, v.elements) : null;
		case "plist":
			return v.kind === "list" ? matchAll(pattern.elements, v.elements) : null;
		case "prec": {
			if (v.kind !== "rec") return null;
			const values: Term[] = [];
			for (const field of pattern.fields) {
				const found = v.fields.find((f) => f.label === field.label);
				if (found === undefined) return null;
				values.push(found.value);
			}
			return matchAll(pattern.fields.map((f) => f.pattern), values);
		}
		case "pcons": {
			if (v.kind !== "list") return null;
			const [head, ...tail] = v.elements;
			if (head === undefined) return null;
			return matchAll([pattern.head, pattern.tail], [head, listTerm(tail)]);
		}
		default:
			return exhaustive(pattern);
	}
}

//==============================================================================
// Evaluator Class
//==============================================================================

export class Evaluator {
	readonly utestResults: UtestResult[] = [];

	/**
	 * Evaluate a term: ρ ⊢ t ⇓ v
	 */
	evaluate(term: Term, env: TermEnv = new Map(), options?: EvalOptions): Term {
		const state: EvalState = {
			steps: 0,
			maxSteps: options?.maxSteps ?? 100000,
		};
		return this.evalTerm(term, env, state);
	}

	private checkSteps(state: EvalState): void {
		state.steps++;
		if (state.steps > state.maxSteps) throw CPSError.nonTermination();
	}

	private evalTerm(term: Term, env: TermEnv, state: EvalState): Term {
		let current: Term = term;
		let scope: TermEnv = env;

		for (;;) {
			this.checkSteps(state);

			switch (current.kind) {
				case "var": {
					const bound = scope.get(current.name);
					if (bound === undefined) throw CPSError.unboundIdentifier(current.name);
					return bound;
				}

				case "lam":
					return closureTerm(current.param, current.body, scope);

				case "closure":
				case "const":
				case "fix":
				case "concat":
				case "infer":
				case "logPdf":
				case "utest":
				case "sample":
				case "weight":
				case "dweight":
					return current;

				case "app": {
					const fn = this.evalTerm(current.fn, scope, state);
					const arg = this.evalTerm(current.arg, scope, state);
					const step = this.apply(fn, arg, state);
					if (step.kind === "value") return step.value;
					current = step.body;
					scope = step.env;
					continue;
				}

				case "if": {
					const cond = expectConst(this.evalTerm(current.cond, scope, state), "if condition");
					if (cond.kind !== "bool") throw CPSError.typeError("bool", cond.kind, "if condition");
					current = cond.value ? current.then : current.else;
					continue;
				}

				case "match": {
					const scrutinee = this.evalTerm(current.scrutinee, scope, state);
					const arm = this.selectArm(current.arms, scrutinee);
					current = arm.body;
					scope = extendMany(scope, arm.bindings);
					continue;
				}

				case "rec":
					return recTerm(current.fields.map((f) => ({
						label: f.label,
						value: this.evalTerm(f.value, scope, state),
					})));

				case "tup":
					return tupTerm(current.elements.map((el) => this.evalTerm(el, scope, state)));

				case "list":
					return listTerm(current.elements.map((el) => this.evalTerm(el, scope, state)));

				case "recProj":
					return this.projectField(this.evalTerm(current.base, scope, state), current.label);

				case "tupProj":
					return this.projectIndex(this.evalTerm(current.base, scope, state), current.index);

				default:
					return exhaustive(current);
			}
		}
	}

	private selectArm(
		arms: readonly MatchArm[],
		scrutinee: Term,
	): { body: Term; bindings: Map<string, Term> } {
		for (const arm of arms) {
			const bindings = matchPattern(arm.pattern, scrutinee);
			if (bindings !== null) return { body: arm.body, bindings };
		}
		throw CPSError.matchFailure();
	}

	private projectField(base: Term, label: string): Term {
		if (base.kind !== "rec") throw CPSError.typeError("record", base.kind, "projection ." + label);
		const field = base.fields.find((f) => f.label === label);
		if (field === undefined) throw CPSError.domainError("Record has no field " + label);
		return field.value;
	}

	private projectIndex(base: Term, index: number): Term {
		if (base.kind !== "tup") throw CPSError.typeError("tuple", base.kind, "projection ." + String(index));
		const el = base.elements[index];
		if (el === undefined) throw CPSError.domainError("Tuple has no element " + String(index));
		return el;
	}

	/**
	 * Apply a function value. A closure body is handed back to the caller's
	 * loop instead of being evaluated here.
	 */
	private apply(fn: Term, arg: Term, state: EvalState): Step {
		switch (fn.kind) {
			case "closure":
				return { kind: "tail", body: fn.body, env: extend(fn.env, fn.param, arg) };

			case "const":
				return value(constTerm(applyConst(fn.value, expectConst(arg, "primitive argument"))));

			case "fix":
				if (arg.kind !== "closure") throw CPSError.typeError("function", arg.kind, "fix");
				return value(appTerm(fixTerm, arg));

			case "app": {
				// fix f, unrolled once per call: f (fix f)
				if (fn.fn.kind !== "fix" || fn.arg.kind !== "closure") {
					throw CPSError.typeError("function", "application", "call");
				}
				const self = fn.arg;
				const unrolled = this.evalTerm(self.body, extend(self.env, self.param, fn), state);
				return this.apply(unrolled, arg, state);
			}

			case "concat":
				if (fn.operand === null) return value(builtinTerm("concat", arg));
				return value(listTerm([
					...expectList(fn.operand, "concat"),
					...expectList(arg, "concat"),
				]));

			case "utest":
				if (fn.operand === null) return value(builtinTerm("utest", arg));
				this.utestResults.push({
					passed: valueEqual(fn.operand, arg),
					actual: fn.operand,
					expected: arg,
				});
				return value(constTerm(unitConst));

			case "infer":
			case "logPdf":
			case "sample":
			case "weight":
			case "dweight":
				throw CPSError.unsupported(fn.kind);

			default:
				throw CPSError.typeError("function", fn.kind, "call");
		}
	}
}
