// Deadlock Detective command-line front end

import { detect } from "./detect.js";
import { DetectiveError } from "./errors.js";
import {
	formatDetection,
	formatRecovery,
	formatTrace,
} from "./format.js";
import { loadSystemState, saveSystemState } from "./persistence.js";
import { recover } from "./recovery.js";
import { SAMPLES, loadSample } from "./samples.js";
import type { SystemState } from "./state.js";
import type { RecoveryOptions } from "./options.js";
import {
	type ExitCode,
	ExitCodes,
	type Options,
	parseArgs,
	resolveMode,
	usage,
} from "./cli-utils.js";

export interface CliIO {
	out: (line: string) => void;
	err: (line: string) => void;
}

const consoleIO: CliIO = {
	out: (line) => { console.log(line); },
	err: (line) => { console.error(line); },
};

async function loadState(path: string | null, options: Options): Promise<SystemState | null> {
	if (options.sample !== undefined) return loadSample(options.sample);
	if (path !== null) return loadSystemState(path);
	return null;
}

function recoveryOptions(options: Options): RecoveryOptions {
	const opts: RecoveryOptions = { verifyPreemptions: options.verify };
	if (options.maxSubsets !== undefined) opts.maxTerminationSubsets = options.maxSubsets;
	return opts;
}

async function analyze(state: SystemState, options: Options, io: CliIO): Promise<ExitCode> {
	const mode = resolveMode(state, options.mode);
	const result = detect(state, mode);
	const plan = options.recover && result.deadlocked
		? recover(state, result, recoveryOptions(options))
		: undefined;

	if (options.json) {
		io.out(JSON.stringify({ mode, result, recovery: plan }, null, "\t"));
	} else {
		if (options.trace) for (const line of formatTrace(result.trace)) io.out(line);
		for (const line of formatDetection(result)) io.out(line);
		if (plan) for (const line of formatRecovery(plan)) io.out(line);
	}

	if (options.save !== undefined) await saveSystemState(state, options.save);
	return result.deadlocked ? ExitCodes.Deadlock : ExitCodes.NoDeadlock;
}

/**
 * Run the CLI with the given arguments and return its exit code.
 * Engine errors are reported on `io.err`, never thrown.
 */
export async function run(args: string[], io: CliIO = consoleIO): Promise<ExitCode> {
	const { path, options, errors } = parseArgs(args);
	if (errors.length > 0) {
		for (const e of errors) io.err("error: " + e);
		io.err(usage());
		return ExitCodes.InvalidInput;
	}
	if (options.help) {
		io.out(usage());
		return ExitCodes.NoDeadlock;
	}
	if (options.list) {
		for (const s of SAMPLES) io.out(s.name.padEnd(30) + s.title);
		return ExitCodes.NoDeadlock;
	}

	try {
		const state = await loadState(path, options);
		if (state === null) {
			io.err(usage());
			return ExitCodes.InvalidInput;
		}
		return await analyze(state, options, io);
	} catch (error) {
		if (error instanceof DetectiveError) {
			io.err(error.name + " [" + error.code + "]: " + error.message);
			return ExitCodes.InvalidInput;
		}
		// File system failures (ENOENT, EISDIR, EACCES, ...) on load or --save
		if (error instanceof Error && "code" in error && typeof error.code === "string") {
			io.err("error: " + error.message);
			return ExitCodes.InvalidInput;
		}
		throw error;
	}
}
