// Iterative k-subset enumeration over an index set

/**
 * Number of k-subsets of an n-set. Saturates at Infinity instead of losing
 * precision past Number.MAX_SAFE_INTEGER.
 */
export function binomial(n: number, k: number): number {
	if (k < 0 || k > n) return 0;
	const r = Math.min(k, n - k);
	let result = 1;
	for (let i = 1; i <= r; i++) {
		result = (result * (n - r + i)) / i;
		if (result > Number.MAX_SAFE_INTEGER) return Infinity;
	}
	return Math.round(result);
}

/**
 * Yield every k-subset of `items` in lexicographic order of positions.
 * With sorted `items` this is lexicographic order of the values as well.
 * A single index array is advanced in place; each yielded array is a copy.
 */
export function* combinations<T>(items: readonly T[], k: number): Generator<T[]> {
	const n = items.length;
	if (k < 0 || k > n) return;
	const idx = Array.from({ length: k }, (_, i) => i);

	for (;;) {
		yield idx.map(i => items[i]).filter((v): v is T => v !== undefined);

		// Rightmost position that can still move right
		let pos = k - 1;
		while (pos >= 0 && idx[pos] === n - k + pos) pos--;
		if (pos < 0) return;

		idx[pos] = (idx[pos] ?? 0) + 1;
		for (let p = pos + 1; p < k; p++) {
			idx[p] = (idx[p - 1] ?? 0) + 1;
		}
	}
}
