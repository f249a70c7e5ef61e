// Integer vector helpers for the work/finish simulation

import type { Vector } from "./types.js";

/** Index of the first component where `a[j] > b[j]`, if any */
export function firstExceeding(a: Vector, b: Vector): number | undefined {
	for (let j = 0; j < a.length; j++) {
		if ((a[j] ?? 0) > (b[j] ?? 0)) return j;
	}
	return undefined;
}

/** Add `b` into `target` in place */
export function addInto(target: number[], b: Vector): void {
	for (let j = 0; j < target.length; j++) {
		target[j] = (target[j] ?? 0) + (b[j] ?? 0);
	}
}
