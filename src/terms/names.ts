// SPDX-License-Identifier: MIT
// Names and Alpha Equivalence
// Name collection, free variables and comparison of terms up to renaming

import { constEqual } from "../domains/prims.js";
import { exhaustive } from "../errors.js";
import type { MatchArm, Pattern, Term } from "../types.js";
import { childTerms, patternBinders } from "./traverse.js";

//==============================================================================
// Name Collection
//==============================================================================

/**
 * Collect every name occurring in a term: variable references, lambda and
 * closure parameters and pattern binders.
 */
export function collectNames(term: Term, into: Set<string> = new Set()): Set<string> {
	switch (term.kind) {
		case "var":
			into.add(term.name);
			break;
		case "lam":
		case "closure":
			into.add(term.param);
			break;
		case "match":
			for (const arm of term.arms) {
				for (const name of patternBinders(arm.pattern)) into.add(name);
			}
			break;
		default:
			break;
	}
	for (const [, child] of childTerms(term)) collectNames(child, into);
	return into;
}

/**
 * Collect the free variables of a term.
 * A variable is free if it is not bound by an enclosing lambda or match arm.
 */
export function freeVars(term: Term, bound: ReadonlySet<string> = new Set()): Set<string> {
	const free = new Set<string>();
	const visit = (t: Term, scope: ReadonlySet<string>): void => {
		switch (t.kind) {
			case "var":
				if (!scope.has(t.name)) free.add(t.name);
				return;
			case "lam":
			case "closure":
				visit(t.body, new Set([...scope, t.param]));
				return;
			case "match":
				visit(t.scrutinee, scope);
				for (const arm of t.arms) {
					visit(arm.body, new Set([...scope, ...patternBinders(arm.pattern)]));
				}
				return;
			default:
				for (const [, child] of childTerms(t)) visit(child, scope);
		}
	};
	visit(term, bound);
	return free;
}

//==============================================================================
// Renaming
//==============================================================================

function renamePattern(pattern: Pattern, renaming: ReadonlyMap<string, string>): Pattern {
	switch (pattern.kind) {
		case "pvar":
			return { kind: "pvar", name: renaming.get(pattern.name) ?? pattern.name };
		case "pwild":
		case "pconst":
			return pattern;
		case "ptup":
		case "plist":
			return { kind: pattern.kind, elements: pattern.elements.map((p) => renamePattern(p, renaming)) };
		case "prec":
			return {
				kind: "prec",
				fields: pattern.fields.map((f) => ({ label: f.label, pattern: renamePattern(f.pattern, renaming) })),
			};
		case "pcons":
			return {
				kind: "pcons",
				head: renamePattern(pattern.head, renaming),
				tail: renamePattern(pattern.tail, renaming),
			};
		default:
			return exhaustive(pattern);
	}
}

/**
 * Rename every bound variable with `rename`, keeping references consistent.
 * Free variables are left alone.
 */
export function renameBound(term: Term, rename: (name: string) => string): Term {
	const go = (t: Term, env: ReadonlyMap<string, string>): Term => {
		switch (t.kind) {
			case "var":
				return { kind: "var", name: env.get(t.name) ?? t.name };
			case "lam": {
				const param = rename(t.param);
				return { kind: "lam", param, body: go(t.body, new Map([...env, [t.param, param]])) };
			}
			case "match": {
				const arms = t.arms.map((arm): MatchArm => {
					const local = new Map(env);
					for (const name of patternBinders(arm.pattern)) local.set(name, rename(name));
					return { pattern: renamePattern(arm.pattern, local), body: go(arm.body, local) };
				});
				return { kind: "match", scrutinee: go(t.scrutinee, env), arms };
			}
			default:
				return mapChildren(t, (child) => go(child, env));
		}
	};
	return go(term, new Map());
}

/** Rebuild a term whose binders are untouched, mapping each direct child. */
function mapChildren(term: Term, f: (t: Term) => Term): Term {
	switch (term.kind) {
		case "var":
		case "const":
		case "fix":
			return term;
		case "lam":
		case "closure":
			return { ...term, body: f(term.body) };
		case "app":
			return { kind: "app", fn: f(term.fn), arg: f(term.arg) };
		case "if":
			return { kind: "if", cond: f(term.cond), then: f(term.then), else: f(term.else) };
		case "match":
			return {
				kind: "match",
				scrutinee: f(term.scrutinee),
				arms: term.arms.map((arm) => ({ pattern: arm.pattern, body: f(arm.body) })),
			};
		case "rec":
			return { kind: "rec", fields: term.fields.map((fl) => ({ label: fl.label, value: f(fl.value) })) };
		case "tup":
		case "list":
			return { kind: term.kind, elements: term.elements.map(f) };
		case "recProj":
			return { kind: "recProj", base: f(term.base), label: term.label };
		case "tupProj":
			return { kind: "tupProj", base: f(term.base), index: term.index };
		case "concat":
		case "infer":
		case "logPdf":
		case "utest":
			return { kind: term.kind, operand: term.operand === null ? null : f(term.operand) };
		case "sample":
		case "weight":
		case "dweight":
			return {
				kind: term.kind,
				first: term.first === null ? null : f(term.first),
				second: term.second === null ? null : f(term.second),
			};
		default:
			return exhaustive(term);
	}
}

//==============================================================================
// Alpha Equivalence
//==============================================================================

interface AlphaScope {
	left: ReadonlyMap<string, number>;
	right: ReadonlyMap<string, number>;
	depth: number;
}

function bind(scope: AlphaScope, leftName: string, rightName: string): AlphaScope {
	return {
		left: new Map([...scope.left, [leftName, scope.depth]]),
		right: new Map([...scope.right, [rightName, scope.depth]]),
		depth: scope.depth + 1,
	};
}

function sameVar(a: string, b: string, scope: AlphaScope): boolean {
	const ia = scope.left.get(a);
	const ib = scope.right.get(b);
	if (ia === undefined && ib === undefined) return a === b;
	return ia === ib;
}

/** Compare two patterns, extending the scope with their binders pairwise. */
function alphaPattern(a: Pattern, b: Pattern, scope: AlphaScope): AlphaScope | null {
	switch (a.kind) {
		case "pvar":
			return b.kind === "pvar" ? bind(scope, a.name, b.name) : null;
		case "pwild":
			return b.kind === "pwild" ? scope : null;
		case "pconst":
			return b.kind === "pconst" && constEqual(a.value, b.value) ? scope : null;
		case "ptup":
		case "plist":
			if ((b.kind !== "ptup" && b.kind !== "plist") || b.kind !== a.kind) return null;
			if (b.elements.length !== a.elements.length) return null;
			return a.elements.reduce<AlphaScope | null>((acc, p, i) => {
				const q = b.elements[i];
				return acc === null || q === undefined ? null : alphaPattern(p, q, acc);
			}, scope);
		case "prec":
			if (b.kind !== "prec" || b.fields.length !== a.fields.length) return null;
			return a.fields.reduce<AlphaScope | null>((acc, f, i) => {
				const g = b.fields[i];
				if (acc === null || g === undefined || g.label !== f.label) return null;
				return alphaPattern(f.pattern, g.pattern, acc);
			}, scope);
		case "pcons": {
			if (b.kind !== "pcons") return null;
			const afterHead = alphaPattern(a.head, b.head, scope);
			return afterHead === null ? null : alphaPattern(a.tail, b.tail, afterHead);
		}
		default:
			return exhaustive(a);
	}
}

function alphaTerm(a: Term, b: Term, scope: AlphaScope): boolean {
	if (a.kind !== b.kind) return false;
	switch (a.kind) {
		case "var":
			return b.kind === "var" && sameVar(a.name, b.name, scope);
		case "lam":
			return b.kind === "lam" && alphaTerm(a.body, b.body, bind(scope, a.param, b.param));
		case "match":
			return b.kind === "match" &&
				alphaTerm(a.scrutinee, b.scrutinee, scope) &&
				a.arms.length === b.arms.length &&
				a.arms.every((arm, i) => {
					const other = b.arms[i];
					if (other === undefined) return false;
					const armScope = alphaPattern(arm.pattern, other.pattern, scope);
					return armScope !== null && alphaTerm(arm.body, other.body, armScope);
				});
		case "const":
			return b.kind === "const" && constEqual(a.value, b.value);
		case "recProj":
			return b.kind === "recProj" && a.label === b.label && alphaTerm(a.base, b.base, scope);
		case "tupProj":
			return b.kind === "tupProj" && a.index === b.index && alphaTerm(a.base, b.base, scope);
		case "closure":
			return false;
		default:
			return sameChildren(a, b, scope);
	}
}

function sameChildren(a: Term, b: Term, scope: AlphaScope): boolean {
	const left = childTerms(a);
	const right = childTerms(b);
	return left.length === right.length && left.every(([segment, child], i) => {
		const other = right[i];
		return other !== undefined && other[0] === segment && alphaTerm(child, other[1], scope);
	});
}

/**
 * Check whether two terms are equal up to consistent renaming of bound
 * variables. Closures never compare equal.
 */
export function alphaEquivalent(a: Term, b: Term): boolean {
	return alphaTerm(a, b, { left: new Map(), right: new Map(), depth: 0 });
}
