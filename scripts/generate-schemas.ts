// Generate the JSON Schema for term documents from the Zod schemas
// Usage: tsx scripts/generate-schemas.ts

import { writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { CPSDocumentSchema } from "../src/zod-schemas.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(__dirname, "..");

/**
 * JSON Schema key priority order.
 * Mirrors the jsonc ordering used for schema files.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "patternProperties", "additionalProperties", "required",
	"items", "additionalItems", "contains", "minItems", "maxItems", "uniqueItems",
	"oneOf", "anyOf", "allOf", "not", "if", "then", "else", "discriminator",
	"minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum", "multipleOf",
	"minLength", "maxLength", "pattern", "format",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Sort keys within a JSON Schema object:
 * 1. Objects with "$ref" → "$ref" first, then alphabetical
 * 2. Objects with "type" or "$schema" → jsonSchemaKeyOrder, then alphabetical
 * 3. Default → alphabetical
 */
function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);

	let priorityOrder: string[];
	if ("$ref" in record) {
		priorityOrder = ["$ref"];
	} else if ("type" in record || "$schema" in record) {
		priorityOrder = jsonSchemaKeyOrder;
	} else {
		priorityOrder = [];
	}

	const prioritySet = new Set(priorityOrder);
	const priorityKeys = priorityOrder.filter(k => keys.includes(k));
	const remainingKeys = keys.filter(k => !prioritySet.has(k)).sort();
	return [...priorityKeys, ...remainingKeys];
}

/** Recursively sort object keys for deterministic output. */
function sortKeys(obj: unknown): unknown {
	if (Array.isArray(obj)) return obj.map(sortKeys);
	if (!isRecord(obj)) return obj;

	const sorted: Record<string, unknown> = {};
	for (const key of sortObjectKeys(obj)) {
		sorted[key] = sortKeys(obj[key]);
	}
	return sorted;
}

const jsonSchema = z.toJSONSchema(CPSDocumentSchema, { target: "draft-2020-12" });
const output = {
	title: "Term Document",
	...jsonSchema,
};

const filePath = resolve(repoRoot, "term.schema.json");
writeFileSync(filePath, JSON.stringify(sortKeys(output), null, "\t") + "\n");
console.log("Generated term.schema.json");
