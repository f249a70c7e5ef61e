// Generate the JSON Schema of the persisted state document from its Zod schema
// Usage: tsx scripts/generate-schemas.ts

import { writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { SystemStateDocumentSchema } from "../src/zod-schemas.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(__dirname, "..");

/**
 * JSON Schema key priority order.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "patternProperties", "additionalProperties", "required",
	"items", "additionalItems", "contains", "minItems", "maxItems", "uniqueItems",
	"oneOf", "anyOf", "allOf", "not", "if", "then", "else",
	"minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum", "multipleOf",
	"minLength", "maxLength", "pattern", "format",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Schema objects put known keys first in jsonSchemaKeyOrder, the rest
 * alphabetically; any other object is sorted alphabetically.
 */
function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);
	const priorityOrder = "type" in record || "$schema" in record ? jsonSchemaKeyOrder : [];
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

const jsonSchema: unknown = z.toJSONSchema(SystemStateDocumentSchema, {
	target: "draft-2020-12",
});

const output = {
	title: "Deadlock Detective System State",
	description: "Processes, resource types, Available vector, Allocation and Request matrices",
	...(isRecord(jsonSchema) ? jsonSchema : {}),
};

const filePath = resolve(repoRoot, "system-state.schema.json");
writeFileSync(filePath, JSON.stringify(sortKeys(output), null, "\t") + "\n");
console.log("Generated system-state.schema.json");
