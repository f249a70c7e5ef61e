// Deadlock Detective Sample Datasets
// Bundled states under samples/, one JSON document per sample

import { readFileSync } from "node:fs";
import { PreconditionError } from "./errors.js";
import { parseSystemState } from "./persistence.js";
import type { SystemState } from "./state.js";

export interface SampleInfo {
	name: string;
	title: string;
	/** Verdict every applicable detector must reach */
	expectDeadlock: boolean;
}

export const SAMPLES: readonly SampleInfo[] = [
	{ name: "single-instance-deadlock", title: "Single-Instance: Deadlock (Cycle)", expectDeadlock: true },
	{ name: "single-instance-no-deadlock", title: "Single-Instance: No Deadlock", expectDeadlock: false },
	{ name: "multi-instance-deadlock", title: "Multi-Instance: Deadlock", expectDeadlock: true },
	{ name: "multi-instance-no-deadlock", title: "Multi-Instance: No Deadlock", expectDeadlock: false },
	{ name: "empty", title: "Empty Template", expectDeadlock: false },
];

export const SAMPLES_DIR = new URL("../samples/", import.meta.url);

export function getSampleNames(): string[] {
	return SAMPLES.map(s => s.name);
}

export function sampleUrl(name: string): URL {
	return new URL(name + ".json", SAMPLES_DIR);
}

/**
 * Load a bundled sample by name.
 * @throws PreconditionError for an unknown name
 */
export function loadSample(name: string): SystemState {
	if (!SAMPLES.some(s => s.name === name)) {
		throw PreconditionError.invalidArgument(
			"sample '" + name + "' not found. Available: " + getSampleNames().join(", "));
	}
	return parseSystemState(readFileSync(sampleUrl(name), "utf-8"));
}
