// Deadlock Detective Recovery Engine - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes, PreconditionError, SearchBoundError } from "../src/errors.js";
import { detectReachability } from "../src/reachability.js";
import {
	candidateTransfers,
	findMinimalTerminationSets,
	recover,
	suggestPreemptions,
	terminationResolves,
} from "../src/recovery.js";
import { detectWaitFor } from "../src/wait-for.js";
import {
	multiInstanceDeadlock,
	scenarioA,
	scenarioB,
	twoCyclesWithBystander,
} from "./fixtures.js";

//==============================================================================
// Test Suite
//==============================================================================

describe("Recovery Engine - Unit Tests", () => {

	//==========================================================================
	// Preconditions
	//==========================================================================

	describe("preconditions", () => {
		it("should refuse a result that is not deadlocked", () => {
			const state = scenarioB();
			const result = detectWaitFor(state);
			for (const call of [
				() => recover(state, result),
				() => findMinimalTerminationSets(state, result),
				() => suggestPreemptions(state, result),
			]) {
				assert.throws(call, (err: unknown) =>
					err instanceof PreconditionError && err.code === ErrorCodes.NotDeadlocked);
			}
		});
	});

	//==========================================================================
	// Termination
	//==========================================================================

	describe("findMinimalTerminationSets", () => {
		it("should offer each member of a single cycle alone", () => {
			const state = scenarioA();
			const sets = findMinimalTerminationSets(state, detectWaitFor(state));
			assert.deepEqual(sets, [
				{ kind: "termination", processes: [0] },
				{ kind: "termination", processes: [1] },
				{ kind: "termination", processes: [2] },
			]);
		});

		it("should need one victim per disjoint cycle", () => {
			const state = twoCyclesWithBystander();
			const sets = findMinimalTerminationSets(state, detectWaitFor(state));
			assert.deepEqual(sets.map(s => s.processes), [[0, 2], [0, 3], [1, 2], [1, 3]]);
		});

		it("should re-detect with the reachability algorithm for reachability results", () => {
			const state = multiInstanceDeadlock();
			const sets = findMinimalTerminationSets(state, detectReachability(state));
			assert.deepEqual(sets.map(s => s.processes), [[0], [1], [2]]);
		});

		it("should only return sets that actually resolve the deadlock", () => {
			const state = twoCyclesWithBystander();
			const result = detectWaitFor(state);
			for (const set of findMinimalTerminationSets(state, result)) {
				assert.equal(terminationResolves(state, result, set.processes), true);
			}
			for (const pid of result.deadlockedProcesses) {
				assert.equal(terminationResolves(state, result, [pid]), false);
			}
		});

		it("should fail with SearchBoundError instead of answering partially", () => {
			const state = twoCyclesWithBystander();
			const result = detectWaitFor(state);
			assert.throws(
				() => findMinimalTerminationSets(state, result, { maxTerminationSubsets: 4 }),
				(err: unknown) => {
					assert.ok(err instanceof SearchBoundError);
					assert.equal(err.limit, 4);
					assert.equal(err.required, 10);
					assert.equal(
						err.message,
						"Deadlocked set too large for exhaustive minimal-set search: 4 processes need 10 candidate subsets, limit is 4",
					);
					return true;
				},
			);
		});

		it("should search when the bound covers the successful size", () => {
			const state = twoCyclesWithBystander();
			const sets = findMinimalTerminationSets(state, detectWaitFor(state), { maxTerminationSubsets: 10 });
			assert.equal(sets.length, 4);
		});
	});

	//==========================================================================
	// Preemption
	//==========================================================================

	describe("candidateTransfers", () => {
		it("should pair deadlocked holders with deadlocked requesters", () => {
			const state = scenarioA();
			assert.deepEqual(candidateTransfers(state, detectWaitFor(state)), [
				{ resource: 0, donor: 0, recipient: 2 },
				{ resource: 1, donor: 1, recipient: 0 },
				{ resource: 2, donor: 2, recipient: 1 },
			]);
		});
	});

	describe("suggestPreemptions", () => {
		it("should verify a transfer that breaks the only cycle", () => {
			const state = scenarioA();
			const [first] = suggestPreemptions(state, detectWaitFor(state));
			assert.ok(first);
			assert.equal(first.status, "verified");
			assert.deepEqual(first.unblocked, [0, 1, 2]);
			assert.equal(first.outcome?.deadlocked, false);
		});

		it("should leave a transfer that unblocks nobody speculative", () => {
			const state = multiInstanceDeadlock();
			const [first] = suggestPreemptions(state, detectReachability(state));
			assert.ok(first);
			assert.equal(first.resource, 0);
			assert.equal(first.donor, 0);
			assert.equal(first.recipient, 2);
			assert.equal(first.status, "speculative");
			assert.deepEqual(first.unblocked, []);
			assert.deepEqual(first.outcome?.deadlockedProcesses, [0, 1, 2]);
		});

		it("should mark everything speculative when verification is off", () => {
			const state = scenarioA();
			const suggestions = suggestPreemptions(state, detectWaitFor(state), { verifyPreemptions: false });
			assert.deepEqual(suggestions, [
				{ kind: "preemption", resource: 0, donor: 0, recipient: 2, status: "speculative", unblocked: [] },
				{ kind: "preemption", resource: 1, donor: 1, recipient: 0, status: "speculative", unblocked: [] },
				{ kind: "preemption", resource: 2, donor: 2, recipient: 1, status: "speculative", unblocked: [] },
			]);
		});
	});

	//==========================================================================
	// Combined
	//==========================================================================

	describe("recover", () => {
		it("should return both strategies without touching the state", () => {
			const state = scenarioA();
			const before = state.toData();
			const plan = recover(state, detectWaitFor(state));
			assert.equal(plan.terminations.length, 3);
			assert.equal(plan.preemptions.length, 3);
			assert.deepEqual(state.toData(), before);
		});
	});
});
