// ---------------------------------------------------------------------------
// String similarity for title resolution
// ---------------------------------------------------------------------------

/**
 * Length of the longest common subsequence of `a` and `b`, using one
 * rolling row of O(min(a, b)) space.
 */
export function longestCommonSubsequence(a: string, b: string): number {
	if (a.length > b.length) {
		[a, b] = [b, a];
	}
	if (a.length === 0) return 0;

	let prev = new Uint32Array(a.length + 1);
	let curr = new Uint32Array(a.length + 1);

	for (let j = 1; j <= b.length; j++) {
		curr[0] = 0;
		for (let i = 1; i <= a.length; i++) {
			curr[i] =
				a[i - 1] === b[j - 1]
					? prev[i - 1] + 1
					: Math.max(prev[i], curr[i - 1]);
		}
		[prev, curr] = [curr, prev];
	}

	return prev[a.length];
}

/**
 * `2 · LCS(a, b) / (|a| + |b|)` over the lowercased strings: `1` for
 * identical strings (including two empty ones), `0` when nothing is shared.
 */
export function similarityRatio(a: string, b: string): number {
	const left = a.toLowerCase();
	const right = b.toLowerCase();
	const total = left.length + right.length;
	if (total === 0) return 1;
	return (2 * longestCommonSubsequence(left, right)) / total;
}
