// Deadlock Detective Formatting
// Human-readable rendering of traces, cycles and recovery suggestions

import { exhaustive } from "./errors.js";
import type {
	DetectionResult,
	PreemptionSuggestion,
	RecoveryPlan,
	TerminationSuggestion,
	TraceStep,
	WaitCycle,
} from "./types.js";

function p(pid: number): string {
	return "P" + String(pid);
}

function r(rid: number): string {
	return "R" + String(rid);
}

function vec(v: readonly number[]): string {
	return "[" + v.join(", ") + "]";
}

function processSet(pids: readonly number[]): string {
	return "{" + pids.map(p).join(", ") + "}";
}

/**
 * Format a cycle as a closed walk, e.g. `P0 -(R1)-> P1 -(R2)-> P2 -(R0)-> P0`.
 */
export function formatCycle(cycle: WaitCycle): string {
	const first = cycle.processes[0];
	let out = first === undefined ? "" : p(first);
	cycle.resources.forEach((rid, k) => {
		const next = cycle.processes[k + 1];
		if (next !== undefined) out += " -(" + r(rid) + ")-> " + p(next);
	});
	return out;
}

/** Generate a human-readable deadlock description */
export function describeCycle(cycle: WaitCycle): string {
	const parts = cycle.resources.map((rid, k) => {
		const waiter = cycle.processes[k] ?? -1;
		const holder = cycle.processes[k + 1] ?? -1;
		return p(waiter) + " waits for " + r(rid) + " held by " + p(holder);
	});
	return "Circular wait: " + parts.join(", ");
}

/**
 * Render one trace step as a single line.
 */
export function formatTraceStep(step: TraceStep): string {
	switch (step.kind) {
	case "start":
		return "=== " + (step.algorithm === "wait-for" ? "Wait-For Graph" : "Work/Finish Reachability") +
			" detection: " + String(step.processCount) + " processes, " +
			String(step.resourceCount) + " resource types" +
			(step.excluded.length > 0 ? ", excluding " + processSet(step.excluded) : "") + " ===";
	case "warning":
		return "WARNING: " + step.message;
	case "edge":
		return "edge " + p(step.from) + " -> " + p(step.to) + " (" + r(step.resource) + ")";
	case "unheld":
		return p(step.process) + " requests " + r(step.resource) + ", which no process holds: no edge";
	case "visit":
		return "  ".repeat(step.depth) + "visit " + p(step.process);
	case "cycle":
		return "cycle found: " + formatCycle(step);
	case "pass":
		return "pass " + String(step.pass) + ": Work = " + vec(step.work);
	case "check":
		return "  " + p(step.process) + ": Request " + vec(step.request) +
			(step.satisfied ? " <= " : " > ") + "Work " + vec(step.work) +
			(step.blockingResource !== undefined ? " (short on " + r(step.blockingResource) + ")" : "");
	case "finish":
		return "  " + p(step.process) + " finishes, releases " + vec(step.released) +
			", Work = " + vec(step.work);
	case "verdict":
		return step.deadlocked
			? "Result: DEADLOCK DETECTED among " + processSet(step.processes)
			: "Result: NO DEADLOCK";
	default:
		return exhaustive(step);
	}
}

export function formatTrace(trace: readonly TraceStep[]): string[] {
	return trace.map(formatTraceStep);
}

/**
 * Summary lines for a detection result (verdict, cycles or safe sequence).
 */
export function formatDetection(result: DetectionResult): string[] {
	const lines: string[] = [];
	for (const warning of result.warnings) lines.push("WARNING: " + warning);
	lines.push(result.deadlocked
		? "Deadlocked processes: " + processSet(result.deadlockedProcesses)
		: "No deadlock");
	if (result.algorithm === "wait-for") {
		for (const cycle of result.cycles) lines.push("  " + formatCycle(cycle));
		if (result.blockedProcesses.length > 0) {
			lines.push("Blocked behind a cycle (not deadlocked): " + processSet(result.blockedProcesses));
		}
	} else {
		lines.push((result.deadlocked ? "Finished before stalling: " : "Safe sequence: ") +
			(result.safeSequence.length > 0 ? result.safeSequence.map(p).join(" -> ") : "(none)"));
		lines.push("Final Work: " + vec(result.work));
	}
	return lines;
}

export function formatTermination(suggestion: TerminationSuggestion): string {
	return "terminate " + processSet(suggestion.processes);
}

export function formatPreemption(suggestion: PreemptionSuggestion): string {
	const base = "move one " + r(suggestion.resource) + " from " + p(suggestion.donor) +
		" to " + p(suggestion.recipient) + " [" + suggestion.status + "]";
	return suggestion.unblocked.length > 0
		? base + ", unblocks " + processSet(suggestion.unblocked)
		: base;
}

export function formatRecovery(plan: RecoveryPlan): string[] {
	const lines = ["Minimal termination sets:"];
	for (const t of plan.terminations) lines.push("  " + formatTermination(t));
	lines.push("Preemption suggestions:");
	if (plan.preemptions.length === 0) lines.push("  (none)");
	for (const s of plan.preemptions) lines.push("  " + formatPreemption(s));
	return lines;
}
