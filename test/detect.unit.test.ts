// Deadlock Detective Detector Dispatch - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { detect, recommendedMode } from "../src/detect.js";
import { multiInstanceDeadlock, scenarioA, scenarioC } from "./fixtures.js";

describe("Detector Dispatch - Unit Tests", () => {
	describe("recommendedMode", () => {
		it("should recommend wait-for for single-instance systems", () => {
			assert.equal(recommendedMode(scenarioA()), "wait-for");
		});

		it("should recommend reachability otherwise", () => {
			assert.equal(recommendedMode(scenarioC()), "reachability");
		});
	});

	describe("detect", () => {
		it("should run exactly the named algorithm", () => {
			assert.equal(detect(scenarioA(), "wait-for").algorithm, "wait-for");
			assert.equal(detect(scenarioA(), "reachability").algorithm, "reachability");
		});

		it("should give both algorithms the same verdict on a single-instance state", () => {
			const state = scenarioA();
			assert.deepEqual(
				detect(state, "wait-for").deadlockedProcesses,
				detect(state, "reachability").deadlockedProcesses,
			);
		});

		it("should pass options through to the detector", () => {
			const result = detect(multiInstanceDeadlock(), "reachability", { excluded: [1] });
			assert.deepEqual(result.deadlockedProcesses, [0, 2]);
		});
	});
});
