// Verify that every bundled sample produces its expected verdict
// Usage: tsx scripts/validate-samples.ts

import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { glob } from "glob";
import { detectReachability } from "../src/reachability.js";
import { SAMPLES, SAMPLES_DIR, loadSample } from "../src/samples.js";
import { detectWaitFor } from "../src/wait-for.js";

interface SampleReport {
	name: string;
	verdict: string;
	ok: boolean;
}

function checkSample(name: string): SampleReport {
	const info = SAMPLES.find(s => s.name === name);
	if (!info) {
		return { name, verdict: "UNREGISTERED", ok: false };
	}
	const state = loadSample(name);
	const matrix = detectReachability(state);
	const verdict = matrix.deadlocked ? "DEADLOCK" : "NO DEADLOCK";
	console.log(`  ${String(state.n)} processes, ${String(state.m)} resource types`);
	console.log(`  reachability: ${verdict}`);

	let ok = matrix.deadlocked === info.expectDeadlock;
	if (state.isSingleInstance()) {
		const wfg = detectWaitFor(state, { expectSingleInstance: true });
		console.log(`  wait-for:     ${wfg.deadlocked ? "DEADLOCK" : "NO DEADLOCK"}`);
		if (wfg.deadlocked !== matrix.deadlocked) {
			console.log("  detectors disagree");
			ok = false;
		}
	}
	return { name, verdict, ok };
}

const files = (await glob("*.json", { cwd: fileURLToPath(SAMPLES_DIR) })).sort();
const reports: SampleReport[] = [];

for (const file of files) {
	const name = basename(file, ".json");
	console.log(`Testing: ${name}`);
	try {
		reports.push(checkSample(name));
	} catch (error) {
		console.log(`  error: ${error instanceof Error ? error.message : String(error)}`);
		reports.push({ name, verdict: "ERROR", ok: false });
	}
}

const failed = reports.filter(r => !r.ok);
for (const r of reports) {
	console.log(`${r.ok ? "PASS" : "FAIL"} - ${r.name}: ${r.verdict}`);
}
console.log(`Total: ${String(reports.length)}, passed: ${String(reports.length - failed.length)}, failed: ${String(failed.length)}`);
process.exitCode = failed.length === 0 ? 0 : 1;
