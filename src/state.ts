// Deadlock Detective System State
// Validated, immutable snapshot of processes, resources and their matrices

import {
	PreconditionError,
	ValidationError,
	type ValidationResult,
	invalidResult,
	validResult,
} from "./errors.js";
import type {
	Matrix,
	Process,
	ResourceType,
	SystemStateData,
	SystemStateInit,
	Vector,
} from "./types.js";
import { validateSystemStateInit } from "./validator.js";

//==============================================================================
// Freezing Helpers
//==============================================================================

function freezeVector(v: Vector): Vector {
	return Object.freeze([...v]);
}

function freezeMatrix(m: Matrix): Matrix {
	return Object.freeze(m.map(freezeVector));
}

//==============================================================================
// SystemState
//==============================================================================

/**
 * A validated resource-allocation snapshot.
 *
 * Instances only come from SystemState.validate, so every instance satisfies
 * the conservation invariant. All arrays are frozen.
 */
export class SystemState {
	readonly processes: readonly Process[];
	readonly resourceTypes: readonly ResourceType[];
	readonly available: Vector;
	readonly allocation: Matrix;
	readonly request: Matrix;

	private constructor(init: SystemStateInit) {
		this.processes = Object.freeze(init.processes.map(p => Object.freeze({ pid: p.pid, name: p.name })));
		this.resourceTypes = Object.freeze(init.resourceTypes.map(r =>
			Object.freeze({ rid: r.rid, name: r.name, instances: r.instances })));
		this.available = freezeVector(init.available);
		this.allocation = freezeMatrix(init.allocation);
		this.request = freezeMatrix(init.request);
		Object.freeze(this);
	}

	/**
	 * Validate raw input and build a SystemState, reporting every violation.
	 * The only path to the private constructor.
	 */
	static validate(raw: unknown): ValidationResult<SystemState> {
		const result = validateSystemStateInit(raw);
		if (!result.valid || result.value === undefined) {
			return invalidResult(result.errors);
		}
		return validResult(new SystemState(result.value));
	}

	/** Number of processes */
	get n(): number {
		return this.processes.length;
	}

	/** Number of resource types */
	get m(): number {
		return this.resourceTypes.length;
	}

	/**
	 * True iff every resource type has exactly one instance.
	 * Callers use this to choose between the wait-for and reachability detectors.
	 */
	isSingleInstance(): boolean {
		return this.resourceTypes.every(r => r.instances === 1);
	}

	/** Plain mutable copy of the raw arrays */
	toData(): SystemStateData {
		return {
			processes: this.processes.map(p => ({ pid: p.pid, name: p.name })),
			resourceTypes: this.resourceTypes.map(r => ({ rid: r.rid, name: r.name, instances: r.instances })),
			available: [...this.available],
			allocation: this.allocation.map(row => [...row]),
			request: this.request.map(row => [...row]),
		};
	}

	/**
	 * New state in which the given processes hold and request nothing,
	 * their holdings returned to `available`.
	 */
	releaseProcesses(pids: Iterable<number>): SystemState {
		const released = new Set<number>();
		for (const pid of pids) {
			this.assertProcess(pid);
			released.add(pid);
		}
		const available = [...this.available];
		const allocation = this.allocation.map((row, i) => {
			if (!released.has(i)) return [...row];
			row.forEach((held, j) => { available[j] = (available[j] ?? 0) + held; });
			return row.map(() => 0);
		});
		const request = this.request.map((row, i) => released.has(i) ? row.map(() => 0) : [...row]);
		return createSystemState({ ...this.toData(), available, allocation, request });
	}

	/**
	 * New state with one instance of `resource` moved from `donor` to `recipient`.
	 * The recipient's outstanding request for it shrinks by the granted instance.
	 */
	transfer(resource: number, donor: number, recipient: number): SystemState {
		this.assertProcess(donor);
		this.assertProcess(recipient);
		this.assertResource(resource);
		if (donor === recipient) {
			throw PreconditionError.invalidArgument("donor and recipient must differ, got P" + String(donor));
		}
		if ((this.allocation[donor]?.[resource] ?? 0) < 1) {
			throw PreconditionError.invalidArgument(
				"P" + String(donor) + " holds no instance of R" + String(resource));
		}
		const init = this.toData();
		const allocation = init.allocation.map(row => [...row]);
		const request = init.request.map(row => [...row]);
		adjust(allocation, donor, resource, -1);
		adjust(allocation, recipient, resource, 1);
		if ((request[recipient]?.[resource] ?? 0) > 0) adjust(request, recipient, resource, -1);
		return createSystemState({ ...init, allocation, request });
	}

	private assertProcess(pid: number): void {
		if (!Number.isInteger(pid) || pid < 0 || pid >= this.n) {
			throw PreconditionError.invalidArgument("unknown process id " + String(pid));
		}
	}

	private assertResource(rid: number): void {
		if (!Number.isInteger(rid) || rid < 0 || rid >= this.m) {
			throw PreconditionError.invalidArgument("unknown resource id " + String(rid));
		}
	}
}

function adjust(matrix: number[][], i: number, j: number, delta: number): void {
	const row = matrix[i];
	if (row) row[j] = (row[j] ?? 0) + delta;
}

//==============================================================================
// Construction
//==============================================================================

/**
 * Validate raw input and build a SystemState, reporting every violation.
 */
export function validateSystemState(raw: unknown): ValidationResult<SystemState> {
	return SystemState.validate(raw);
}

/**
 * Build a SystemState or throw a ValidationError naming the failed invariant.
 * Validation is atomic: no partially valid state is ever returned.
 */
export function createSystemState(raw: unknown): SystemState {
	const result = validateSystemState(raw);
	if (!result.valid || result.value === undefined) {
		throw new ValidationError(result.errors);
	}
	return result.value;
}

/**
 * All-zero state with single-instance resources, every instance free.
 */
export function createEmptySystemState(processCount: number, resourceCount: number): SystemState {
	const processes = Array.from({ length: processCount }, (_, i) => ({ pid: i, name: "P" + String(i) }));
	const resourceTypes = Array.from({ length: resourceCount }, (_, j) => ({
		rid: j, name: "R" + String(j), instances: 1,
	}));
	const zeros = (): number[][] => processes.map(() => resourceTypes.map(() => 0));
	return createSystemState({
		processes,
		resourceTypes,
		available: resourceTypes.map(() => 1),
		allocation: zeros(),
		request: zeros(),
	});
}
