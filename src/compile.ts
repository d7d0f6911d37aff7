// SPDX-License-Identifier: MIT
// Document Compilation
// Validate a JSON term document, then CPS transform its term

import { type ValidationResult, invalidResult, validResult } from "./errors.js";
import { type CPSOptions, cpsTransform } from "./cps/transform.js";
import type { Term } from "./types.js";
import { validateDocument } from "./validator.js";

/**
 * Transform the term of a document. Validation failures are returned, not
 * thrown; a CPSError from the pass itself still propagates.
 */
export function transformDocument(doc: unknown, options?: CPSOptions): ValidationResult<Term> {
	const validated = validateDocument(doc);
	if (!validated.valid || validated.value === undefined) {
		return invalidResult<Term>(validated.errors);
	}
	return validResult(cpsTransform(validated.value.term, options));
}
