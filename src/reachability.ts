// Deadlock Detective Reachability Detector
// Work/finish simulation (generalized Banker's reduction) for any system

import { type DetectionOptions, excludedSet } from "./options.js";
import type { SystemState } from "./state.js";
import type { CheckStep, ReachabilityResult, TraceStep } from "./types.js";
import { addInto, firstExceeding } from "./vectors.js";

//==============================================================================
// Simulation State
//==============================================================================

/** Private scratch vectors; the input state is never written */
interface Simulation {
	work: number[];
	finish: boolean[];
	safeSequence: number[];
	trace: TraceStep[];
}

/**
 * Test every unfinished process once, in ascending pid order.
 * A process that fits finishes at once and its release is visible to the
 * rest of the same pass.
 *
 * @returns whether any process finished during the pass
 */
function runPass(state: SystemState, sim: Simulation, pass: number): boolean {
	let progressed = false;
	sim.trace.push({ kind: "pass", pass, work: [...sim.work] });

	state.request.forEach((request, i) => {
		if (sim.finish[i]) return;
		const blocking = firstExceeding(request, sim.work);
		const check: CheckStep = {
			kind: "check",
			pass,
			process: i,
			request: [...request],
			work: [...sim.work],
			satisfied: blocking === undefined,
		};
		if (blocking !== undefined) check.blockingResource = blocking;
		sim.trace.push(check);
		if (blocking !== undefined) return;

		const released = state.allocation[i] ?? [];
		sim.finish[i] = true;
		addInto(sim.work, released);
		sim.safeSequence.push(i);
		sim.trace.push({ kind: "finish", process: i, released: [...released], work: [...sim.work] });
		progressed = true;
	});

	return progressed;
}

//==============================================================================
// Detector
//==============================================================================

/**
 * Detect deadlock with the work/finish simulation.
 *
 * Work starts as a copy of `available`; any process whose request fits in
 * Work finishes and returns its allocation. Passes repeat until one makes no
 * progress. Unfinished processes are deadlocked; otherwise the finishing
 * order is a safe sequence.
 */
export function detectReachability(
	state: SystemState,
	options: DetectionOptions = {},
): ReachabilityResult {
	const excluded = excludedSet(options);
	const sim: Simulation = {
		work: [...state.available],
		finish: state.processes.map(p => excluded.has(p.pid)),
		safeSequence: [],
		trace: [{
			kind: "start",
			algorithm: "reachability",
			processCount: state.n,
			resourceCount: state.m,
			excluded: [...excluded].sort((a, b) => a - b),
		}],
	};

	let pass = 1;
	while (sim.finish.some(done => !done) && runPass(state, sim, pass)) {
		pass++;
	}

	const deadlockedProcesses = sim.finish.flatMap((done, i) => done ? [] : [i]);
	const deadlocked = deadlockedProcesses.length > 0;
	sim.trace.push({ kind: "verdict", deadlocked, processes: [...deadlockedProcesses] });

	return {
		algorithm: "reachability",
		deadlocked,
		deadlockedProcesses,
		trace: sim.trace,
		warnings: [],
		safeSequence: sim.safeSequence,
		finish: sim.finish,
		work: sim.work,
	};
}

/**
 * Replay a safe sequence from `available`, checking each request against
 * the accumulated Work before releasing that process's allocation.
 */
export function isSafeSequence(state: SystemState, sequence: readonly number[]): boolean {
	const work = [...state.available];
	const seen = new Set<number>();
	for (const pid of sequence) {
		const request = state.request[pid];
		const allocation = state.allocation[pid];
		if (!request || !allocation || seen.has(pid)) return false;
		if (firstExceeding(request, work) !== undefined) return false;
		addInto(work, allocation);
		seen.add(pid);
	}
	return true;
}
