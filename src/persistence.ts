// Deadlock Detective Persistence
// JSON document form of a SystemState; every field is an integer or a name,
// so a valid state round-trips without loss.

import { readFile, writeFile } from "node:fs/promises";
import { ErrorCodes, ValidationError, type ValidationIssue } from "./errors.js";
import { createSystemState, type SystemState } from "./state.js";
import {
	SCHEMA_VERSION,
	type SystemStateDocument,
	SystemStateDocumentSchema,
} from "./zod-schemas.js";

export function toDocument(state: SystemState, description?: string): SystemStateDocument {
	const doc: SystemStateDocument = { schemaVersion: SCHEMA_VERSION, ...state.toData() };
	if (description !== undefined) doc.description = description;
	return doc;
}

/**
 * Parse a persisted document and validate the state it describes.
 * @throws ValidationError for a malformed document or an invalid state
 */
export function fromDocument(raw: unknown): SystemState {
	const parsed = SystemStateDocumentSchema.safeParse(raw);
	if (!parsed.success) {
		const issues: ValidationIssue[] = parsed.error.issues.map(issue => ({
			rule: ErrorCodes.MalformedInput,
			path: issue.path.map(String).join(".") || "$",
			message: "malformed state document at " + (issue.path.map(String).join(".") || "$") +
				": " + issue.message,
		}));
		throw new ValidationError(issues);
	}
	const { processes, resourceTypes, available, allocation, request } = parsed.data;
	return createSystemState({ processes, resourceTypes, available, allocation, request });
}

export function serializeSystemState(state: SystemState, description?: string): string {
	return JSON.stringify(toDocument(state, description), null, "\t") + "\n";
}

export function parseSystemState(json: string): SystemState {
	let raw: unknown;
	try {
		raw = JSON.parse(json);
	} catch (error) {
		throw ValidationError.fromIssue(
			ErrorCodes.MalformedInput,
			"$",
			"state document is not valid JSON: " + (error instanceof Error ? error.message : String(error)),
		);
	}
	return fromDocument(raw);
}

export async function loadSystemState(filePath: string): Promise<SystemState> {
	const content = await readFile(filePath, "utf-8");
	return parseSystemState(content);
}

export async function saveSystemState(
	state: SystemState,
	filePath: string,
	description?: string,
): Promise<void> {
	await writeFile(filePath, serializeSystemState(state, description), "utf-8");
}
