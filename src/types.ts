// Deadlock Detective Core Types
// Processes, resources, detection results, trace steps and recovery suggestions

//==============================================================================
// Model Types
//==============================================================================

export interface Process {
	readonly pid: number;
	readonly name: string;
}

export interface ResourceType {
	readonly rid: number;
	readonly name: string;
	/** Total copies in existence, at least 1 */
	readonly instances: number;
}

export type Vector = readonly number[];
export type Matrix = readonly Vector[];

/** Raw arrays supplied by the caller before validation */
export interface SystemStateInit {
	processes: readonly Process[];
	resourceTypes: readonly ResourceType[];
	available: Vector;
	allocation: Matrix;
	request: Matrix;
}

/** Plain mutable copy of a state's arrays */
export interface SystemStateData {
	processes: Process[];
	resourceTypes: ResourceType[];
	available: number[];
	allocation: number[][];
	request: number[][];
}

export type DetectionMode = "wait-for" | "reachability";

//==============================================================================
// Trace Steps
//==============================================================================

export interface StartStep {
	kind: "start";
	algorithm: DetectionMode;
	processCount: number;
	resourceCount: number;
	excluded: number[];
}

export interface WarningStep {
	kind: "warning";
	message: string;
}

/** Wait-for edge emitted: `from` waits on `resource` held by `to` */
export interface EdgeStep {
	kind: "edge";
	from: number;
	to: number;
	resource: number;
}

/** Requested resource with no holder: no edge */
export interface UnheldStep {
	kind: "unheld";
	process: number;
	resource: number;
}

export interface VisitStep {
	kind: "visit";
	process: number;
	depth: number;
}

export interface CycleStep {
	kind: "cycle";
	processes: number[];
	resources: number[];
}

export interface PassStep {
	kind: "pass";
	pass: number;
	work: number[];
}

/** Comparison of `request[process] <= work` */
export interface CheckStep {
	kind: "check";
	pass: number;
	process: number;
	request: number[];
	work: number[];
	satisfied: boolean;
	/** First resource whose request exceeds work, when not satisfied */
	blockingResource?: number;
}

/** A satisfiable process finishes and releases its allocation */
export interface FinishStep {
	kind: "finish";
	process: number;
	released: number[];
	work: number[];
}

export interface VerdictStep {
	kind: "verdict";
	deadlocked: boolean;
	processes: number[];
}

export type TraceStep =
	| StartStep
	| WarningStep
	| EdgeStep
	| UnheldStep
	| VisitStep
	| CycleStep
	| PassStep
	| CheckStep
	| FinishStep
	| VerdictStep;

//==============================================================================
// Detection Results
//==============================================================================

export interface WaitForEdge {
	from: number;
	to: number;
	resource: number;
}

/** An elementary cycle as a closed walk, e.g. processes [0, 1, 2, 0] */
export interface WaitCycle {
	processes: number[];
	/** `resources[k]` is the resource `processes[k]` waits on from `processes[k + 1]` */
	resources: number[];
}

interface DetectionResultBase {
	deadlocked: boolean;
	/** Sorted ascending; empty iff not deadlocked */
	deadlockedProcesses: number[];
	trace: TraceStep[];
	warnings: string[];
}

export interface WaitForResult extends DetectionResultBase {
	algorithm: "wait-for";
	edges: WaitForEdge[];
	cycles: WaitCycle[];
	/** Processes that reach a cycle without lying on one */
	blockedProcesses: number[];
}

export interface ReachabilityResult extends DetectionResultBase {
	algorithm: "reachability";
	/** Order in which processes finished; complete iff not deadlocked */
	safeSequence: number[];
	finish: boolean[];
	work: number[];
}

export type DetectionResult = WaitForResult | ReachabilityResult;

//==============================================================================
// Recovery Suggestions
//==============================================================================

export interface TerminationSuggestion {
	kind: "termination";
	processes: number[];
}

export type PreemptionStatus = "verified" | "speculative";

export interface PreemptionSuggestion {
	kind: "preemption";
	resource: number;
	donor: number;
	recipient: number;
	status: PreemptionStatus;
	/** Detection result after the hypothetical transfer, when simulated */
	outcome?: DetectionResult;
	/** Previously deadlocked processes that are no longer deadlocked */
	unblocked: number[];
}

export type RecoverySuggestion = TerminationSuggestion | PreemptionSuggestion;

export interface RecoveryPlan {
	terminations: TerminationSuggestion[];
	preemptions: PreemptionSuggestion[];
}
