// Deadlock Detective - shared test fixtures

import { createSystemState, type SystemState } from "../src/state.js";
import type { SystemStateInit } from "../src/types.js";

/**
 * Build raw state input with generated names (P0.., R0..).
 */
export function rawState(
	instances: number[],
	available: number[],
	allocation: number[][],
	request: number[][],
): SystemStateInit {
	return {
		processes: allocation.map((_, i) => ({ pid: i, name: "P" + String(i) })),
		resourceTypes: instances.map((count, j) => ({ rid: j, name: "R" + String(j), instances: count })),
		available,
		allocation,
		request,
	};
}

export function makeState(
	instances: number[],
	available: number[],
	allocation: number[][],
	request: number[][],
): SystemState {
	return createSystemState(rawState(instances, available, allocation, request));
}

/** Three single-instance resources in a circular wait P0 -> P1 -> P2 -> P0 */
export function scenarioA(): SystemState {
	return makeState(
		[1, 1, 1],
		[0, 0, 0],
		[[1, 0, 0], [0, 1, 0], [0, 0, 1]],
		[[0, 1, 0], [0, 0, 1], [1, 0, 0]],
	);
}

/** Two single-instance resources, each held, nobody requesting */
export function scenarioB(): SystemState {
	return makeState(
		[1, 1],
		[0, 0],
		[[1, 0], [0, 1]],
		[[0, 0], [0, 0]],
	);
}

/** Multi-instance system with a safe sequence */
export function scenarioC(): SystemState {
	return makeState(
		[8, 4, 4],
		[3, 3, 2],
		[[0, 1, 0], [2, 0, 0], [3, 0, 2]],
		[[0, 0, 0], [1, 0, 2], [0, 0, 0]],
	);
}

/** Two instances of each resource, all held; every process needs more */
export function multiInstanceDeadlock(): SystemState {
	return makeState(
		[2, 2, 2],
		[0, 0, 0],
		[[1, 0, 1], [1, 1, 0], [0, 1, 1]],
		[[1, 1, 0], [0, 1, 1], [1, 0, 1]],
	);
}

/**
 * Two disjoint single-instance cycles: P0 <-> P1 over R0/R1, P2 <-> P3 over R2/R3.
 * P4 waits on R0 held by P0 without being on a cycle.
 */
export function twoCyclesWithBystander(): SystemState {
	return makeState(
		[1, 1, 1, 1],
		[0, 0, 0, 0],
		[[1, 0, 0, 0], [0, 1, 0, 0], [0, 0, 1, 0], [0, 0, 0, 1], [0, 0, 0, 0]],
		[[0, 1, 0, 0], [1, 0, 0, 0], [0, 0, 0, 1], [0, 0, 1, 0], [1, 0, 0, 0]],
	);
}
