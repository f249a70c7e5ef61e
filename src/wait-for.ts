// Deadlock Detective Wait-For Detector
// Cycle detection over the wait-for relation of a single-instance system

import { PreconditionError, SearchBoundError } from "./errors.js";
import {
	DEFAULT_DETECTION_OPTIONS,
	DEFAULT_MAX_CYCLES,
	type DetectionOptions,
	excludedSet,
} from "./options.js";
import type { SystemState } from "./state.js";
import type {
	TraceStep,
	WaitCycle,
	WaitForEdge,
	WaitForResult,
} from "./types.js";

//==============================================================================
// Wait-For Graph
//==============================================================================

/**
 * Directed wait-for graph over process ids.
 * `successors[i]` is sorted ascending; `labels` maps "i>k" to the
 * smallest resource id on which i waits for k.
 */
export interface WaitForGraph {
	edges: WaitForEdge[];
	successors: number[][];
	labels: Map<string, number>;
}

function edgeKey(from: number, to: number): string {
	return String(from) + ">" + String(to);
}

/** Process ids holding at least one instance of each resource */
function holdersByResource(state: SystemState, excluded: ReadonlySet<number>): number[][] {
	const holders: number[][] = state.resourceTypes.map(() => []);
	state.allocation.forEach((row, k) => {
		if (excluded.has(k)) return;
		row.forEach((held, j) => {
			if (held > 0) holders[j]?.push(k);
		});
	});
	return holders;
}

/**
 * Build the wait-for graph: an edge i -> k labeled j for every resource j
 * that i requests and k holds. A process waiting on a resource it holds
 * itself gets a self-loop.
 */
export function buildWaitForGraph(
	state: SystemState,
	excluded: ReadonlySet<number> = new Set(),
	trace: TraceStep[] = [],
): WaitForGraph {
	const holders = holdersByResource(state, excluded);
	const edges: WaitForEdge[] = [];
	const successorSets = state.processes.map(() => new Set<number>());
	const labels = new Map<string, number>();

	state.request.forEach((row, i) => {
		if (excluded.has(i)) return;
		row.forEach((wanted, j) => {
			if (wanted === 0) return;
			const heldBy = holders[j] ?? [];
			if (heldBy.length === 0) {
				trace.push({ kind: "unheld", process: i, resource: j });
				return;
			}
			for (const k of heldBy) {
				edges.push({ from: i, to: k, resource: j });
				trace.push({ kind: "edge", from: i, to: k, resource: j });
				successorSets[i]?.add(k);
				const key = edgeKey(i, k);
				if (!labels.has(key)) labels.set(key, j);
			}
		});
	});

	const successors = successorSets.map(set => [...set].sort((a, b) => a - b));
	return { edges, successors, labels };
}

//==============================================================================
// Elementary Cycle Search
//==============================================================================

/** DFS traversal state for one start vertex */
interface DFSState {
	start: number;
	/** Vertices on the path, plus those known not to reach start past the current path */
	blocked: Set<number>;
	/** blockMap[w]: blocked vertices to release once w is released */
	blockMap: Map<number, Set<number>>;
	path: number[];
	/** Vertices >= start from which start is reachable; all others are explored dead ends */
	live: ReadonlySet<number>;
	cycles: WaitCycle[];
	trace: TraceStep[];
	maxCycles: number;
}

/**
 * Vertices with id >= start that can reach start through vertices >= start
 */
function verticesReaching(graph: WaitForGraph, start: number): Set<number> {
	const predecessors = new Map<number, number[]>();
	graph.successors.forEach((succ, from) => {
		if (from < start) return;
		for (const to of succ) {
			if (to < start) continue;
			getOrCreateList(predecessors, to).push(from);
		}
	});
	const reached = new Set<number>();
	const queue = [start];
	while (queue.length > 0) {
		const node = queue.shift();
		if (node === undefined) break;
		for (const pred of predecessors.get(node) ?? []) {
			if (!reached.has(pred)) {
				reached.add(pred);
				queue.push(pred);
			}
		}
	}
	return reached;
}

function isSearchable(state: DFSState, node: number): boolean {
	return node > state.start && state.live.has(node);
}

function unblock(state: DFSState, node: number): void {
	state.blocked.delete(node);
	const waiting = state.blockMap.get(node);
	if (!waiting) return;
	state.blockMap.delete(node);
	for (const w of waiting) {
		if (state.blocked.has(w)) unblock(state, w);
	}
}

/**
 * Johnson's circuit search: a vertex that found no cycle stays blocked until
 * a vertex it depends on is released, so each dead end is walked once per
 * cycle found rather than once per path leading to it.
 */
function visit(graph: WaitForGraph, node: number, state: DFSState): boolean {
	let found = false;
	state.blocked.add(node);
	state.path.push(node);
	state.trace.push({ kind: "visit", process: node, depth: state.path.length - 1 });

	const successors = graph.successors[node] ?? [];
	for (const next of successors) {
		if (next === state.start) {
			recordCycle(graph, state);
			found = true;
		} else if (isSearchable(state, next) && !state.blocked.has(next)) {
			if (visit(graph, next, state)) found = true;
		}
	}

	if (found) {
		unblock(state, node);
	} else {
		for (const next of successors) {
			if (isSearchable(state, next)) getOrCreateSet(state.blockMap, next).add(node);
		}
	}
	state.path.pop();
	return found;
}

function recordCycle(graph: WaitForGraph, state: DFSState): void {
	if (state.cycles.length >= state.maxCycles) {
		throw SearchBoundError.cycleEnumeration(state.maxCycles);
	}
	const processes = [...state.path, state.start];
	const resources = state.path.map((from, k) =>
		graph.labels.get(edgeKey(from, processes[k + 1] ?? state.start)) ?? -1);
	const cycle: WaitCycle = { processes, resources };
	state.cycles.push(cycle);
	state.trace.push({ kind: "cycle", processes: [...processes], resources: [...resources] });
}

/**
 * Enumerate every elementary cycle exactly once.
 *
 * Each cycle is rooted at its smallest process id. Start vertices and
 * neighbours are taken in ascending order, so identical graphs always yield
 * the same cycles in the same order. Runs in O((V + E)(V + C)) for C cycles,
 * which `maxCycles` bounds.
 */
export function findElementaryCycles(
	graph: WaitForGraph,
	maxCycles: number = DEFAULT_MAX_CYCLES,
	trace: TraceStep[] = [],
): WaitCycle[] {
	const cycles: WaitCycle[] = [];
	for (let start = 0; start < graph.successors.length; start++) {
		const live = verticesReaching(graph, start);
		if (!live.has(start)) continue;
		visit(graph, start, {
			start, blocked: new Set(), blockMap: new Map(), path: [], live, cycles, trace, maxCycles,
		});
	}
	return cycles;
}

//==============================================================================
// Detector
//==============================================================================

/** Processes off every cycle that can still reach a deadlocked process */
function blockedBy(graph: WaitForGraph, deadlocked: ReadonlySet<number>): number[] {
	const blocked: number[] = [];
	graph.successors.forEach((_, node) => {
		if (deadlocked.has(node)) return;
		const seen = new Set<number>([node]);
		const stack = [node];
		while (stack.length > 0) {
			const current = stack.pop();
			if (current === undefined) break;
			for (const next of graph.successors[current] ?? []) {
				if (deadlocked.has(next)) {
					blocked.push(node);
					return;
				}
				if (!seen.has(next)) {
					seen.add(next);
					stack.push(next);
				}
			}
		}
	});
	return blocked;
}

/**
 * Detect deadlock by finding cycles in the wait-for graph.
 *
 * Exact for single-instance systems. On a multi-instance state the result
 * carries a warning: a cycle there is only a possible deadlock, and some
 * multi-instance deadlocks have no cycle at all.
 */
export function detectWaitFor(
	state: SystemState,
	options: DetectionOptions = {},
): WaitForResult {
	const opts = { ...DEFAULT_DETECTION_OPTIONS, ...options };
	const singleInstance = state.isSingleInstance();
	if (opts.expectSingleInstance !== undefined && opts.expectSingleInstance !== singleInstance) {
		throw PreconditionError.modeMismatch(opts.expectSingleInstance, singleInstance);
	}

	const excluded = excludedSet(opts);
	const trace: TraceStep[] = [{
		kind: "start",
		algorithm: "wait-for",
		processCount: state.n,
		resourceCount: state.m,
		excluded: [...excluded].sort((a, b) => a - b),
	}];
	const warnings: string[] = [];
	if (!singleInstance) {
		const message = "not every resource type has a single instance; " +
			"wait-for cycles may miss or overstate multi-instance deadlocks";
		warnings.push(message);
		trace.push({ kind: "warning", message });
	}

	const graph = buildWaitForGraph(state, excluded, trace);
	const cycles = findElementaryCycles(graph, opts.maxCycles ?? DEFAULT_MAX_CYCLES, trace);

	const members = new Set<number>();
	for (const cycle of cycles) {
		for (const pid of cycle.processes) members.add(pid);
	}
	const deadlockedProcesses = [...members].sort((a, b) => a - b);
	trace.push({ kind: "verdict", deadlocked: cycles.length > 0, processes: [...deadlockedProcesses] });

	return {
		algorithm: "wait-for",
		deadlocked: cycles.length > 0,
		deadlockedProcesses,
		trace,
		warnings,
		edges: graph.edges,
		cycles,
		blockedProcesses: blockedBy(graph, members),
	};
}

//==============================================================================
// Helpers
//==============================================================================

/** Get or create a set in a Map */
function getOrCreateSet<K, V>(map: Map<K, Set<V>>, key: K): Set<V> {
	let set = map.get(key);
	if (!set) { set = new Set(); map.set(key, set); }
	return set;
}

/** Get or create a list in a Map */
function getOrCreateList<K, V>(map: Map<K, V[]>, key: K): V[] {
	let list = map.get(key);
	if (!list) { list = []; map.set(key, list); }
	return list;
}
