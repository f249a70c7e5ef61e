// Deadlock Detective - deadlock detection and recovery on resource-allocation snapshots
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Process, ResourceType, Vector, Matrix, SystemStateInit, SystemStateData,
	DetectionMode, DetectionResult, WaitForResult, ReachabilityResult,
	WaitForEdge, WaitCycle, TraceStep,
	RecoverySuggestion, TerminationSuggestion, PreemptionSuggestion,
	PreemptionStatus, RecoveryPlan,
} from "./types.js";

export type { ErrorCode, ValidationIssue, ValidationResult, ValidationRule } from "./errors.js";

export type { DetectionOptions, RecoveryOptions } from "./options.js";

//==============================================================================
// Errors
//==============================================================================

export {
	ErrorCodes, DetectiveError, ValidationError, PreconditionError, SearchBoundError,
	invalidResult, validResult,
} from "./errors.js";

//==============================================================================
// State Model
//==============================================================================

export {
	SystemState, createSystemState, validateSystemState, createEmptySystemState,
} from "./state.js";

//==============================================================================
// Detection
//==============================================================================

export { detect, recommendedMode } from "./detect.js";
export { detectWaitFor, buildWaitForGraph, findElementaryCycles, type WaitForGraph } from "./wait-for.js";
export { detectReachability, isSafeSequence } from "./reachability.js";
export { DEFAULT_DETECTION_OPTIONS, DEFAULT_RECOVERY_OPTIONS } from "./options.js";

//==============================================================================
// Recovery
//==============================================================================

export {
	recover, findMinimalTerminationSets, suggestPreemptions, terminationResolves,
} from "./recovery.js";

//==============================================================================
// Formatting, Persistence, Samples
//==============================================================================

export {
	formatCycle, describeCycle, formatTrace, formatTraceStep,
	formatDetection, formatRecovery, formatTermination, formatPreemption,
} from "./format.js";

export {
	toDocument, fromDocument, serializeSystemState, parseSystemState,
	loadSystemState, saveSystemState,
} from "./persistence.js";

export { SCHEMA_VERSION, SystemStateDocumentSchema, type SystemStateDocument } from "./zod-schemas.js";

export { SAMPLES, getSampleNames, loadSample, type SampleInfo } from "./samples.js";
