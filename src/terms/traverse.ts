// SPDX-License-Identifier: MIT
// Term Traversal
// Direct children of a term, each with the path segment that leads to it

import { exhaustive } from "../errors.js";
import type { Pattern, Term } from "../types.js";

export type Child = readonly [segment: string, term: Term];

/** Direct subterms of a term, in evaluation order. Closure environments are not visited. */
export function childTerms(term: Term): Child[] {
	switch (term.kind) {
		case "var":
		case "const":
		case "fix":
			return [];
		case "lam":
		case "closure":
			return [["body", term.body]];
		case "app":
			return [["fn", term.fn], ["arg", term.arg]];
		case "if":
			return [["cond", term.cond], ["then", term.then], ["else", term.else]];
		case "match":
			return [
				["scrutinee", term.scrutinee],
				...term.arms.map((arm, i): Child => ["arms[" + String(i) + "]", arm.body]),
			];
		case "rec":
			return term.fields.map((field): Child => ["fields." + field.label, field.value]);
		case "tup":
		case "list":
			return term.elements.map((el, i): Child => ["elements[" + String(i) + "]", el]);
		case "recProj":
		case "tupProj":
			return [["base", term.base]];
		case "concat":
		case "infer":
		case "logPdf":
		case "utest":
			return term.operand === null ? [] : [["operand", term.operand]];
		case "sample":
		case "weight":
		case "dweight": {
			const children: Child[] = [];
			if (term.first !== null) children.push(["first", term.first]);
			if (term.second !== null) children.push(["second", term.second]);
			return children;
		}
		default:
			return exhaustive(term);
	}
}

/** Variables bound by a pattern, left to right. */
export function patternBinders(pattern: Pattern): string[] {
	switch (pattern.kind) {
		case "pvar":
			return [pattern.name];
		case "pwild":
		case "pconst":
			return [];
		case "ptup":
		case "plist":
			return pattern.elements.flatMap(patternBinders);
		case "prec":
			return pattern.fields.flatMap((field) => patternBinders(field.pattern));
		case "pcons":
			return [...patternBinders(pattern.head), ...patternBinders(pattern.tail)];
		default:
			return exhaustive(pattern);
	}
}

/** Number of term nodes. */
export function termSize(term: Term): number {
	let size = 1;
	for (const [, child] of childTerms(term)) size += termSize(child);
	return size;
}
