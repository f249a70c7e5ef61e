// Deadlock Detective Recovery Engine
// Minimal process-termination sets and verified resource preemptions

import { binomial, combinations } from "./combinations.js";
import { detect } from "./detect.js";
import { PreconditionError, SearchBoundError } from "./errors.js";
import {
	DEFAULT_RECOVERY_OPTIONS,
	type DetectionOptions,
	type RecoveryOptions,
} from "./options.js";
import type { SystemState } from "./state.js";
import type {
	DetectionResult,
	PreemptionSuggestion,
	RecoveryPlan,
	TerminationSuggestion,
} from "./types.js";

//==============================================================================
// Options
//==============================================================================

type ResolvedRecoveryOptions = Required<RecoveryOptions>;

function resolveOptions(options: RecoveryOptions): ResolvedRecoveryOptions {
	return {
		maxTerminationSubsets: options.maxTerminationSubsets ?? DEFAULT_RECOVERY_OPTIONS.maxTerminationSubsets,
		verifyPreemptions: options.verifyPreemptions ?? DEFAULT_RECOVERY_OPTIONS.verifyPreemptions,
		maxCycles: options.maxCycles ?? DEFAULT_RECOVERY_OPTIONS.maxCycles,
	};
}

function requireDeadlock(result: DetectionResult): void {
	if (!result.deadlocked) throw PreconditionError.notDeadlocked();
}

//==============================================================================
// Termination Strategy
//==============================================================================

/**
 * Whether terminating `victims` leaves the remaining processes deadlock-free.
 * The victims release what they hold and drop out of consideration.
 */
export function terminationResolves(
	state: SystemState,
	result: DetectionResult,
	victims: readonly number[],
	options: DetectionOptions = {},
): boolean {
	const reduced = state.releaseProcesses(victims);
	const outcome = detect(reduced, result.algorithm, { ...options, excluded: victims });
	return !outcome.deadlocked;
}

/**
 * Every smallest set of deadlocked processes whose termination ends the deadlock.
 *
 * Subsets are tried by increasing size and, within a size, in lexicographic
 * pid order; all successful subsets of the first successful size are returned.
 * Before each size the cumulative number of candidates is checked against
 * `maxTerminationSubsets`.
 *
 * @throws PreconditionError when the result is not deadlocked
 * @throws SearchBoundError when the search would exceed its bound
 */
export function findMinimalTerminationSets(
	state: SystemState,
	result: DetectionResult,
	options: RecoveryOptions = {},
): TerminationSuggestion[] {
	requireDeadlock(result);
	const opts = resolveOptions(options);
	const candidates = result.deadlockedProcesses;
	const detection: DetectionOptions = { maxCycles: opts.maxCycles };

	let examined = 0;
	for (let size = 1; size <= candidates.length; size++) {
		examined += binomial(candidates.length, size);
		if (examined > opts.maxTerminationSubsets) {
			throw SearchBoundError.terminationSearch(candidates.length, opts.maxTerminationSubsets, examined);
		}
		const found: TerminationSuggestion[] = [];
		for (const subset of combinations(candidates, size)) {
			if (terminationResolves(state, result, subset, detection)) {
				found.push({ kind: "termination", processes: subset });
			}
		}
		if (found.length > 0) return found;
	}

	// Unreachable for a consistent result: terminating every deadlocked process always succeeds
	throw PreconditionError.invalidArgument(
		"detection result does not match the state: no termination set resolves it");
}

//==============================================================================
// Preemption Strategy
//==============================================================================

interface Transfer {
	resource: number;
	donor: number;
	recipient: number;
}

/**
 * One instance held by a deadlocked donor and wanted by another deadlocked
 * recipient, ordered by resource, donor, recipient.
 */
export function candidateTransfers(state: SystemState, result: DetectionResult): Transfer[] {
	const members = result.deadlockedProcesses;
	const transfers: Transfer[] = [];
	for (let resource = 0; resource < state.m; resource++) {
		for (const donor of members) {
			if ((state.allocation[donor]?.[resource] ?? 0) === 0) continue;
			for (const recipient of members) {
				if (recipient === donor) continue;
				if ((state.request[recipient]?.[resource] ?? 0) === 0) continue;
				transfers.push({ resource, donor, recipient });
			}
		}
	}
	return transfers;
}

function simulateTransfer(
	state: SystemState,
	result: DetectionResult,
	transfer: Transfer,
	maxCycles: number,
): PreemptionSuggestion {
	const after = state.transfer(transfer.resource, transfer.donor, transfer.recipient);
	const outcome = detect(after, result.algorithm, { maxCycles });
	const before = new Set(result.deadlockedProcesses);
	const still = new Set(outcome.deadlockedProcesses);
	const unblocked = result.deadlockedProcesses.filter(pid => !still.has(pid));
	const newlyDeadlocked = outcome.deadlockedProcesses.some(pid => !before.has(pid));
	return {
		kind: "preemption",
		...transfer,
		status: unblocked.length > 0 && !newlyDeadlocked ? "verified" : "speculative",
		outcome,
		unblocked,
	};
}

/**
 * Propose moving single resource instances between deadlocked processes.
 *
 * With `verifyPreemptions` each transfer is simulated and detection re-run;
 * only a transfer that unblocks at least one deadlocked process, without
 * deadlocking anyone new, is labeled verified. Everything else, and every
 * suggestion when verification is off, is speculative.
 *
 * @throws PreconditionError when the result is not deadlocked
 */
export function suggestPreemptions(
	state: SystemState,
	result: DetectionResult,
	options: RecoveryOptions = {},
): PreemptionSuggestion[] {
	requireDeadlock(result);
	const opts = resolveOptions(options);
	return candidateTransfers(state, result).map((transfer): PreemptionSuggestion =>
		opts.verifyPreemptions
			? simulateTransfer(state, result, transfer, opts.maxCycles)
			: { kind: "preemption", ...transfer, status: "speculative", unblocked: [] });
}

//==============================================================================
// Combined Recovery
//==============================================================================

/**
 * Both recovery strategies for a deadlocked detection result.
 */
export function recover(
	state: SystemState,
	result: DetectionResult,
	options: RecoveryOptions = {},
): RecoveryPlan {
	return {
		terminations: findMinimalTerminationSets(state, result, options),
		preemptions: suggestPreemptions(state, result, options),
	};
}
