/**
 * Deadlock Detective CLI Utilities
 *
 * Extracted CLI functions for testability:
 * - Argument parsing (flags, options with values, subcommands)
 * - Mode resolution (explicit or recommended by the state)
 * - Exit codes
 */

import { recommendedMode } from "./detect.js";
import type { SystemState } from "./state.js";
import type { DetectionMode } from "./types.js";

/**
 * CLI options interface
 */
export interface Options {
	help: boolean;
	list: boolean;
	trace: boolean;
	recover: boolean;
	verify: boolean;
	json: boolean;
	mode: DetectionMode | "auto";
	sample?: string;
	maxSubsets?: number;
	save?: string;
}

export const ExitCodes = {
	NoDeadlock: 0,
	Deadlock: 1,
	InvalidInput: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function defaultOptions(): Options {
	return {
		help: false, list: false, trace: false, recover: false,
		verify: true, json: false, mode: "auto",
	};
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 * @returns Object with parsed path, options and any usage errors
 *
 * Supports:
 *   - Positional path argument (a state document)
 *   - Flags: --help/-h, --list/-l, --trace/-t, --recover/-r, --no-verify, --json
 *   - Options with values: --mode <wait-for|reachability|auto>, --sample <name>,
 *     --max-subsets <n>, --save <path>
 *   - Subcommand style: list, help
 */
function normalizeArgs(args: string[]): string[] {
	const subcommands: Record<string, string> = {
		list: "--list",
		help: "--help",
	};
	return args.flatMap((arg) => [subcommands[arg] ?? arg]);
}

function consumeNextArg(normalized: string[], i: number): string | undefined {
	if (i + 1 < normalized.length) {
		const nextArg = normalized[i + 1];
		if (nextArg && !nextArg.startsWith("-")) return nextArg;
	}
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--help": case "-h": options.help = true; return true;
	case "--list": case "-l": options.list = true; return true;
	case "--trace": case "-t": options.trace = true; return true;
	case "--recover": case "-r": options.recover = true; return true;
	case "--no-verify": options.verify = false; return true;
	case "--json": options.json = true; return true;
	default: return false;
	}
}

const VALUE_OPTIONS = ["--mode", "--sample", "--max-subsets", "--save"];

function isMode(value: string): value is Options["mode"] {
	return value === "wait-for" || value === "reachability" || value === "auto";
}

function processValueOption(options: Options, arg: string, nextVal: string): string | undefined {
	switch (arg) {
	case "--mode":
		if (!isMode(nextVal)) return "invalid mode '" + nextVal + "' (expected wait-for, reachability or auto)";
		options.mode = nextVal;
		return undefined;
	case "--sample":
		options.sample = nextVal;
		return undefined;
	case "--max-subsets": {
		const n = Number(nextVal);
		if (!Number.isInteger(n) || n < 1) return "--max-subsets expects a positive integer, got '" + nextVal + "'";
		options.maxSubsets = n;
		return undefined;
	}
	case "--save":
		options.save = nextVal;
		return undefined;
	default:
		return "unknown option " + arg;
	}
}

interface ArgContext {
	options: Options;
	normalized: string[];
	errors: string[];
	i: number;
}

function processArg(ctx: ArgContext, arg: string): { i: number; path?: string } {
	if (processFlag(ctx.options, arg)) return { i: ctx.i };
	if (VALUE_OPTIONS.includes(arg)) {
		const nextVal = consumeNextArg(ctx.normalized, ctx.i);
		if (nextVal === undefined) {
			ctx.errors.push(arg + " expects a value");
			return { i: ctx.i };
		}
		const error = processValueOption(ctx.options, arg, nextVal);
		if (error) ctx.errors.push(error);
		return { i: ctx.i + 1 };
	}
	if (arg.startsWith("-")) {
		ctx.errors.push("unknown option " + arg);
		return { i: ctx.i };
	}
	return { i: ctx.i, path: arg };
}

export function parseArgs(args: string[]): { path: string | null; options: Options; errors: string[] } {
	const normalized = normalizeArgs(args);
	const options = defaultOptions();
	const errors: string[] = [];
	let path: string | null = null;

	for (let i = 0; i < normalized.length; i++) {
		const arg = normalized[i];
		if (arg === undefined) break;
		const result = processArg({ options, normalized, errors, i }, arg);
		i = result.i;
		if (result.path !== undefined) path = result.path;
	}

	if (path !== null && options.sample !== undefined) {
		errors.push("--sample cannot be combined with a state file path");
	}

	return { path, options, errors };
}

/**
 * The detector to run: the explicit mode, or the state's recommendation for "auto".
 */
export function resolveMode(state: SystemState, mode: Options["mode"]): DetectionMode {
	return mode === "auto" ? recommendedMode(state) : mode;
}

export function usage(): string {
	return [
		"Usage: deadlock-detective [options] <state.json>",
		"       deadlock-detective --sample <name> [options]",
		"       deadlock-detective list",
		"",
		"Options:",
		"  -h, --help              Show this help",
		"  -l, --list              List bundled samples",
		"  -t, --trace             Print the step-by-step trace",
		"  -r, --recover           Compute recovery suggestions when deadlocked",
		"      --no-verify         Do not simulate preemptions (all speculative)",
		"      --json              Print results as JSON",
		"      --mode <mode>       wait-for | reachability | auto (default: auto)",
		"      --sample <name>     Analyze a bundled sample",
		"      --max-subsets <n>   Bound on termination-search candidates",
		"      --save <path>       Write the analyzed state to a JSON document",
		"",
		"Exit codes: 0 no deadlock, 1 deadlock, 2 invalid input or usage",
	].join("\n");
}
