// Deadlock Detective Detector Dispatch
// The caller picks the algorithm; nothing here switches on its own.

import { exhaustive } from "./errors.js";
import type { DetectionOptions } from "./options.js";
import { detectReachability } from "./reachability.js";
import type { SystemState } from "./state.js";
import type { DetectionMode, DetectionResult } from "./types.js";
import { detectWaitFor } from "./wait-for.js";

/**
 * The detector a caller should choose: wait-for for single-instance
 * systems, reachability otherwise.
 */
export function recommendedMode(state: SystemState): DetectionMode {
	return state.isSingleInstance() ? "wait-for" : "reachability";
}

/**
 * Run exactly the named detector.
 */
export function detect(
	state: SystemState,
	mode: DetectionMode,
	options: DetectionOptions = {},
): DetectionResult {
	switch (mode) {
	case "wait-for":
		return detectWaitFor(state, options);
	case "reachability":
		return detectReachability(state, options);
	default:
		return exhaustive(mode);
	}
}
