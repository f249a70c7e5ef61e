// Deadlock Detective Engine Options

//==============================================================================
// Detection Options
//==============================================================================

/**
 * Configuration options for the wait-for and reachability detectors
 */
export interface DetectionOptions {
	/**
	 * Processes removed from consideration (e.g. hypothetically terminated).
	 * They contribute no wait-for edges and never appear in a safe sequence.
	 */
	excluded?: Iterable<number>;

	/**
	 * The caller's own single-instance bookkeeping. When set, the wait-for
	 * detector rejects a state whose isSingleInstance() disagrees.
	 */
	expectSingleInstance?: boolean;

	/**
	 * Maximum number of elementary cycles the wait-for detector enumerates
	 */
	maxCycles?: number;
}

//==============================================================================
// Recovery Options
//==============================================================================

/**
 * Configuration options for the recovery engine
 */
export interface RecoveryOptions {
	/**
	 * Upper bound on candidate subsets the termination search may examine.
	 * The search fails with SearchBoundError rather than answering partially.
	 */
	maxTerminationSubsets?: number;

	/**
	 * Simulate every preemption and re-run detection before labeling it verified
	 */
	verifyPreemptions?: boolean;

	/**
	 * Cycle bound applied to re-detections in wait-for mode
	 */
	maxCycles?: number;
}

//==============================================================================
// Defaults
//==============================================================================

export const DEFAULT_MAX_CYCLES = 10_000;

export const DEFAULT_DETECTION_OPTIONS = {
	maxCycles: DEFAULT_MAX_CYCLES,
} as const satisfies DetectionOptions;

export const DEFAULT_RECOVERY_OPTIONS = {
	maxTerminationSubsets: 100_000,
	verifyPreemptions: true,
	maxCycles: DEFAULT_MAX_CYCLES,
} as const satisfies Required<RecoveryOptions>;

/** Resolved excluded set */
export function excludedSet(options: DetectionOptions): ReadonlySet<number> {
	return new Set(options.excluded ?? []);
}
