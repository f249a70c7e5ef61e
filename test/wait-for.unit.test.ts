// Deadlock Detective Wait-For Detector - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ErrorCodes,
	PreconditionError,
	SearchBoundError,
} from "../src/errors.js";
import { detectReachability } from "../src/reachability.js";
import type { TraceStep } from "../src/types.js";
import {
	buildWaitForGraph,
	detectWaitFor,
	findElementaryCycles,
} from "../src/wait-for.js";
import {
	makeState,
	scenarioA,
	scenarioB,
	scenarioC,
	twoCyclesWithBystander,
} from "./fixtures.js";

//==============================================================================
// Fixtures
//==============================================================================

/** P0 waits on P1 and P2; P1 waits on P0; P2 waits on P1 */
function sharedVertexCycles() {
	return makeState(
		[1, 1, 1],
		[0, 0, 0],
		[[1, 0, 0], [0, 1, 0], [0, 0, 1]],
		[[0, 1, 1], [1, 0, 0], [0, 1, 0]],
	);
}

/**
 * P1 closes a two-cycle with P0 and fans out through P2 and P3 into P4 -> P5,
 * which only leads back to P1. From P0 the branch is a dead end.
 */
function fanOutDeadEnd() {
	const identity = Array.from({ length: 6 }, (_, i) => Array.from({ length: 6 }, (_, j) => (i === j ? 1 : 0)));
	const waits = [[1], [0, 2, 3], [4], [4], [5], [1]];
	const request = waits.map(targets => Array.from({ length: 6 }, (_, j) => (targets.includes(j) ? 1 : 0)));
	return makeState(new Array<number>(6).fill(1), new Array<number>(6).fill(0), identity, request);
}

/** Every process waits on every other: a complete directed graph on four vertices */
function completeWaits() {
	const allocation = Array.from({ length: 4 }, (_, i) => Array.from({ length: 4 }, (_, j) => (i === j ? 1 : 0)));
	const request = allocation.map(row => row.map(held => 1 - held));
	return makeState([1, 1, 1, 1], [0, 0, 0, 0], allocation, request);
}

//==============================================================================
// Test Suite
//==============================================================================

describe("Wait-For Detector - Unit Tests", () => {

	//==========================================================================
	// Graph Construction
	//==========================================================================

	describe("buildWaitForGraph", () => {
		it("should add one edge per requested resource and holder", () => {
			const graph = buildWaitForGraph(scenarioA());
			assert.deepEqual(graph.edges, [
				{ from: 0, to: 1, resource: 1 },
				{ from: 1, to: 2, resource: 2 },
				{ from: 2, to: 0, resource: 0 },
			]);
			assert.deepEqual(graph.successors, [[1], [2], [0]]);
		});

		it("should sort successors ascending", () => {
			const graph = buildWaitForGraph(sharedVertexCycles());
			assert.deepEqual(graph.successors, [[1, 2], [0], [1]]);
		});

		it("should record requests for unheld resources without an edge", () => {
			const trace: TraceStep[] = [];
			const graph = buildWaitForGraph(makeState([1], [1], [[0]], [[1]]), new Set(), trace);
			assert.deepEqual(graph.edges, []);
			assert.deepEqual(trace, [{ kind: "unheld", process: 0, resource: 0 }]);
		});

		it("should give a process waiting on its own holding a self-loop", () => {
			const graph = buildWaitForGraph(makeState([1], [0], [[1]], [[1]]));
			assert.deepEqual(graph.edges, [{ from: 0, to: 0, resource: 0 }]);
		});
	});

	//==========================================================================
	// Cycle Enumeration
	//==========================================================================

	describe("findElementaryCycles", () => {
		it("should find every cycle through a shared vertex", () => {
			const cycles = findElementaryCycles(buildWaitForGraph(sharedVertexCycles()));
			assert.deepEqual(cycles, [
				{ processes: [0, 1, 0], resources: [1, 0] },
				{ processes: [0, 2, 1, 0], resources: [2, 1, 0] },
			]);
		});

		it("should root each cycle at its smallest process id", () => {
			const cycles = findElementaryCycles(buildWaitForGraph(twoCyclesWithBystander()));
			assert.deepEqual(cycles.map(c => c.processes), [[0, 1, 0], [2, 3, 2]]);
		});

		it("should walk a dead-end branch once until a cycle releases it", () => {
			const trace: TraceStep[] = [];
			const cycles = findElementaryCycles(buildWaitForGraph(fanOutDeadEnd()), undefined, trace);
			assert.deepEqual(cycles, [
				{ processes: [0, 1, 0], resources: [1, 0] },
				{ processes: [1, 2, 4, 5, 1], resources: [2, 4, 5, 1] },
				{ processes: [1, 3, 4, 5, 1], resources: [3, 4, 5, 1] },
			]);
			const visits = trace.flatMap(step => (step.kind === "visit" ? [[step.process, step.depth]] : []));
			assert.deepEqual(visits, [
				[0, 0], [1, 1], [2, 2], [4, 3], [5, 4], [3, 2],
				[1, 0], [2, 1], [4, 2], [5, 3], [3, 1], [4, 2], [5, 3],
			]);
		});

		it("should count every elementary cycle of a complete graph", () => {
			const cycles = findElementaryCycles(buildWaitForGraph(completeWaits()));
			// 6 two-cycles, 8 three-cycles, 6 four-cycles
			assert.equal(cycles.length, 20);
			const keys = new Set(cycles.map(c => c.processes.join(",")));
			assert.equal(keys.size, 20);
		});

		it("should throw SearchBoundError past maxCycles", () => {
			const graph = buildWaitForGraph(twoCyclesWithBystander());
			assert.throws(
				() => findElementaryCycles(graph, 1),
				(err: unknown) => err instanceof SearchBoundError &&
					err.code === ErrorCodes.SearchBoundExceeded &&
					err.limit === 1,
			);
		});
	});

	//==========================================================================
	// Detection
	//==========================================================================

	describe("detectWaitFor", () => {
		it("should detect a three-process circular wait", () => {
			const result = detectWaitFor(scenarioA());
			assert.equal(result.deadlocked, true);
			assert.deepEqual(result.deadlockedProcesses, [0, 1, 2]);
			assert.deepEqual(result.cycles, [{ processes: [0, 1, 2, 0], resources: [1, 2, 0] }]);
			assert.deepEqual(result.blockedProcesses, []);
			assert.deepEqual(result.warnings, []);
		});

		it("should emit a trace in edge, visit, cycle, verdict order", () => {
			const result = detectWaitFor(scenarioA());
			assert.deepEqual(result.trace, [
				{ kind: "start", algorithm: "wait-for", processCount: 3, resourceCount: 3, excluded: [] },
				{ kind: "edge", from: 0, to: 1, resource: 1 },
				{ kind: "edge", from: 1, to: 2, resource: 2 },
				{ kind: "edge", from: 2, to: 0, resource: 0 },
				{ kind: "visit", process: 0, depth: 0 },
				{ kind: "visit", process: 1, depth: 1 },
				{ kind: "visit", process: 2, depth: 2 },
				{ kind: "cycle", processes: [0, 1, 2, 0], resources: [1, 2, 0] },
				{ kind: "verdict", deadlocked: true, processes: [0, 1, 2] },
			]);
		});

		it("should report no deadlock when nobody waits", () => {
			const result = detectWaitFor(scenarioB());
			assert.equal(result.deadlocked, false);
			assert.deepEqual(result.deadlockedProcesses, []);
			assert.deepEqual(result.edges, []);
			assert.deepEqual(result.cycles, []);
		});

		it("should count a self-loop as a deadlock", () => {
			const state = makeState([1], [0], [[1]], [[1]]);
			const result = detectWaitFor(state);
			assert.deepEqual(result.cycles, [{ processes: [0, 0], resources: [0] }]);
			assert.deepEqual(result.deadlockedProcesses, detectReachability(state).deadlockedProcesses);
		});

		it("should include every member of overlapping cycles", () => {
			const result = detectWaitFor(sharedVertexCycles());
			assert.deepEqual(result.deadlockedProcesses, [0, 1, 2]);
		});

		it("should keep processes that only wait on a cycle out of the deadlocked set", () => {
			const result = detectWaitFor(twoCyclesWithBystander());
			assert.deepEqual(result.deadlockedProcesses, [0, 1, 2, 3]);
			assert.deepEqual(result.blockedProcesses, [4]);
		});

		it("should ignore excluded processes", () => {
			const result = detectWaitFor(scenarioA(), { excluded: [0] });
			assert.equal(result.deadlocked, false);
			assert.deepEqual(result.edges, [{ from: 1, to: 2, resource: 2 }]);
			assert.deepEqual(result.trace[0], {
				kind: "start", algorithm: "wait-for", processCount: 3, resourceCount: 3, excluded: [0],
			});
		});

		it("should warn on a multi-instance state", () => {
			const result = detectWaitFor(scenarioC());
			assert.deepEqual(result.warnings, [
				"not every resource type has a single instance; wait-for cycles may miss or overstate multi-instance deadlocks",
			]);
			assert.equal(result.trace[1]?.kind, "warning");
		});

		it("should reject a mode mismatch with the caller's bookkeeping", () => {
			assert.throws(
				() => detectWaitFor(scenarioA(), { expectSingleInstance: false }),
				(err: unknown) => err instanceof PreconditionError && err.code === ErrorCodes.ModeMismatch,
			);
		});

		it("should accept matching bookkeeping", () => {
			const result = detectWaitFor(scenarioA(), { expectSingleInstance: true });
			assert.equal(result.deadlocked, true);
		});

		it("should be deterministic and leave the state untouched", () => {
			const state = scenarioA();
			const before = state.toData();
			const first = detectWaitFor(state);
			const second = detectWaitFor(state);
			assert.deepEqual(first, second);
			assert.deepEqual(state.toData(), before);
		});
	});
});
