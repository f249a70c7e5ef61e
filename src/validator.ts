// Deadlock Detective State Validator
// Two-phase validation: Zod safeParse for structure, then invariant checks.

import type { z } from "zod/v4";
import {
	ErrorCodes,
	invalidResult,
	type ValidationIssue,
	type ValidationResult,
	type ValidationRule,
	validResult,
} from "./errors.js";
import type { Matrix, SystemStateInit, Vector } from "./types.js";
import { SystemStateInitSchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationIssue Conversion
//==============================================================================

function zodToValidationIssues(error: z.ZodError): ValidationIssue[] {
	return error.issues.map(issue => ({
		rule: ErrorCodes.MalformedInput,
		path: formatZodPath(issue.path),
		message: "malformed input at " + formatZodPath(issue.path) + ": " + issue.message,
	}));
}

function formatZodPath(path: readonly PropertyKey[]): string {
	let out = "";
	for (const segment of path) {
		out += typeof segment === "number" ? "[" + String(segment) + "]" : (out ? "." : "") + String(segment);
	}
	return out || "$";
}

//==============================================================================
// Validation State
//==============================================================================

interface ValidationState {
	errors: ValidationIssue[];
}

function addError(
	state: ValidationState,
	rule: ValidationRule,
	path: string,
	message: string,
	value?: unknown,
): void {
	const issue: ValidationIssue = { rule, path, message };
	if (value !== undefined) issue.value = value;
	state.errors.push(issue);
}

function cell(name: string, i: number, j?: number): string {
	return j === undefined
		? name + "[" + String(i) + "]"
		: name + "[" + String(i) + "][" + String(j) + "]";
}

//==============================================================================
// Invariant 4: dense ids, and at least one process / resource type
//==============================================================================

function checkIdentities(state: ValidationState, init: SystemStateInit): void {
	if (init.processes.length === 0) {
		addError(state, ErrorCodes.DimensionMismatch, "processes", "at least one process is required");
	}
	if (init.resourceTypes.length === 0) {
		addError(state, ErrorCodes.DimensionMismatch, "resourceTypes", "at least one resource type is required");
	}
	init.processes.forEach((p, i) => {
		if (p.pid !== i) {
			addError(state, ErrorCodes.InvalidId, cell("processes", i) + ".pid",
				"process id at index " + String(i) + " must be " + String(i) + ", got " + String(p.pid), p.pid);
		}
	});
	init.resourceTypes.forEach((r, j) => {
		if (r.rid !== j) {
			addError(state, ErrorCodes.InvalidId, cell("resourceTypes", j) + ".rid",
				"resource id at index " + String(j) + " must be " + String(j) + ", got " + String(r.rid), r.rid);
		}
		if (!Number.isSafeInteger(r.instances) || r.instances < 1) {
			addError(state, ErrorCodes.InvalidInstances, cell("resourceTypes", j) + ".instances",
				"resource " + String(j) + " must have a positive safe-integer instance count, got " + String(r.instances),
				r.instances);
		}
	});
}

//==============================================================================
// Invariant 1: dimensions
//==============================================================================

function checkMatrixShape(
	state: ValidationState,
	name: string,
	matrix: Matrix,
	n: number,
	m: number,
): void {
	if (matrix.length !== n) {
		addError(state, ErrorCodes.DimensionMismatch, name,
			name + " must have " + String(n) + " rows, got " + String(matrix.length));
	}
	matrix.forEach((row, i) => {
		if (row.length !== m) {
			addError(state, ErrorCodes.DimensionMismatch, cell(name, i),
				cell(name, i) + " must have " + String(m) + " columns, got " + String(row.length));
		}
	});
}

function checkDimensions(state: ValidationState, init: SystemStateInit): void {
	const n = init.processes.length;
	const m = init.resourceTypes.length;
	if (init.available.length !== m) {
		addError(state, ErrorCodes.DimensionMismatch, "available",
			"available must have " + String(m) + " entries, got " + String(init.available.length));
	}
	checkMatrixShape(state, "allocation", init.allocation, n, m);
	checkMatrixShape(state, "request", init.request, n, m);
}

//==============================================================================
// Invariant 2: non-negative integers
//==============================================================================

function checkEntry(state: ValidationState, path: string, value: number): void {
	if (!Number.isInteger(value)) {
		addError(state, ErrorCodes.NonInteger, path, "non-integer value at " + path, value);
	} else if (!Number.isSafeInteger(value)) {
		// Sums past 2^53 round, which would hide conservation violations
		addError(state, ErrorCodes.NonInteger, path, "value at " + path + " exceeds the safe integer range", value);
	} else if (value < 0) {
		addError(state, ErrorCodes.NegativeValue, path, "negative value at " + path, value);
	}
}

function checkVectorEntries(state: ValidationState, name: string, vector: Vector): void {
	vector.forEach((value, j) => { checkEntry(state, cell(name, j), value); });
}

function checkMatrixEntries(state: ValidationState, name: string, matrix: Matrix): void {
	matrix.forEach((row, i) => {
		row.forEach((value, j) => { checkEntry(state, cell(name, i, j), value); });
	});
}

//==============================================================================
// Invariant 3: conservation; invariant 5: requests bounded by totals
//==============================================================================

function checkConservation(state: ValidationState, init: SystemStateInit): void {
	init.resourceTypes.forEach((r, j) => {
		const available = init.available[j] ?? 0;
		let allocated = 0;
		for (const row of init.allocation) allocated += row[j] ?? 0;
		if (available + allocated !== r.instances) {
			addError(state, ErrorCodes.ConservationViolation, cell("available", j),
				"resource conservation violated for resource " + String(j) +
				": available(" + String(available) + ")+allocated(" + String(allocated) +
				") != total(" + String(r.instances) + ")");
		}
	});
}

function checkRequestBounds(state: ValidationState, init: SystemStateInit): void {
	init.request.forEach((row, i) => {
		row.forEach((value, j) => {
			const total = init.resourceTypes[j]?.instances ?? 0;
			if (value > total) {
				addError(state, ErrorCodes.RequestExceedsTotal, cell("request", i, j),
					cell("request", i, j) + " = " + String(value) +
					" exceeds total instances of resource " + String(j) + " = " + String(total),
					value);
			}
		});
	});
}

//==============================================================================
// Public Validator
//==============================================================================

/**
 * Validate raw input against every state invariant.
 * Later phases are skipped once an earlier phase fails, since conservation
 * is meaningless over mis-shaped or negative data.
 */
export function validateSystemStateInit(raw: unknown): ValidationResult<SystemStateInit> {
	// Phase 1: Structural validation via Zod
	const parsed = SystemStateInitSchema.safeParse(raw);
	if (!parsed.success) {
		return invalidResult(zodToValidationIssues(parsed.error));
	}
	const init = parsed.data;
	const state: ValidationState = { errors: [] };

	// Phase 2: identities and dimensions
	checkIdentities(state, init);
	checkDimensions(state, init);
	if (state.errors.length > 0) return invalidResult(state.errors);

	// Phase 3: entries
	checkVectorEntries(state, "available", init.available);
	checkMatrixEntries(state, "allocation", init.allocation);
	checkMatrixEntries(state, "request", init.request);
	if (state.errors.length > 0) return invalidResult(state.errors);

	// Phase 4: cross-field invariants
	checkConservation(state, init);
	checkRequestBounds(state, init);
	if (state.errors.length > 0) return invalidResult(state.errors);

	return validResult(init);
}
