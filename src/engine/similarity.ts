// ---------------------------------------------------------------------------
// Cosine Similarity Engine
// ---------------------------------------------------------------------------
//
// Scores one row against every other row on request. Rows are already
// L2-normalised, so cosine similarity is a sparse dot product. Only
// truncated top-N lists are cached, never the pairwise matrix.
// ---------------------------------------------------------------------------

import { createRowOutOfRangeError } from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { createLruCache } from '../utils/lru-cache.js';
import type {
	ScoredRow,
	SimilarityEngine,
	SparseVector,
	VectorSpace,
} from './types.js';

/**
 * Dot product of two sparse vectors whose columns are ascending.
 */
export function sparseDot(a: SparseVector, b: SparseVector): number {
	let i = 0;
	let j = 0;
	let dot = 0;
	while (i < a.columns.length && j < b.columns.length) {
		const ca = a.columns[i];
		const cb = b.columns[j];
		if (ca === cb) {
			dot += a.weights[i] * b.weights[j];
			i++;
			j++;
		} else if (ca < cb) {
			i++;
		} else {
			j++;
		}
	}
	return dot;
}

// Non-negative weights keep the result in [0, 1] up to rounding
const clampScore = (value: number): number =>
	Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;

export const compareScoredRows = (a: ScoredRow, b: ScoredRow): number =>
	b.score - a.score || a.row - b.row;

const UNIT_NORM_TOLERANCE = 1e-9;

export interface CosineEngineOptions {
	/** Cached `topN` results. `0` disables the cache. Defaults to `256`. */
	readonly cacheEntries?: number;
	readonly logger?: Logger;
}

export function createCosineSimilarityEngine(
	space: VectorSpace,
	options: CosineEngineOptions = {},
): SimilarityEngine {
	const logger = (options.logger ?? getDefaultLogger()).child('similarity');
	const cache = createLruCache<string, readonly ScoredRow[]>({
		maxEntries: options.cacheEntries ?? 256,
	});

	const assertRow = (row: number): void => {
		if (!Number.isInteger(row) || row < 0 || row >= space.rowCount) {
			throw createRowOutOfRangeError(row, space.rowCount);
		}
	};

	const rank = (vector: SparseVector, exclude?: number): ScoredRow[] => {
		const scored: ScoredRow[] = [];
		for (let row = 0; row < space.rowCount; row++) {
			if (row === exclude) continue;
			scored.push({ row, score: clampScore(sparseDot(vector, space.row(row))) });
		}
		return scored.sort(compareScoredRows);
	};

	const similarityOf = (row: number): readonly ScoredRow[] => {
		assertRow(row);
		return rank(space.row(row), row);
	};

	const topN = (row: number, n: number): readonly ScoredRow[] => {
		assertRow(row);
		const limit = Math.floor(n);
		if (!(limit > 0)) return [];

		const key = `${row}:${limit}`;
		const cached = cache.get(key);
		if (cached) return cached;

		const started = performance.now();
		const result = Object.freeze(rank(space.row(row), row).slice(0, limit));
		cache.set(key, result);
		logger.debug('Computed similarity', {
			row,
			n: limit,
			durationMs: Math.round(performance.now() - started),
		});
		return result;
	};

	const score = (a: number, b: number): number => {
		assertRow(a);
		assertRow(b);
		return clampScore(sparseDot(space.row(a), space.row(b)));
	};

	const rankVector = (
		vector: SparseVector,
		n: number,
		exclude?: number,
	): readonly ScoredRow[] => {
		const limit = Math.floor(n);
		if (!(limit > 0)) return [];
		return rank(vector, exclude).slice(0, limit);
	};

	const selfSimilarity = (row: number): number => {
		assertRow(row);
		const vector = space.row(row);
		return sparseDot(vector, vector);
	};

	for (let row = 0; row < space.rowCount; row++) {
		if (space.row(row).columns.length === 0) continue;
		const self = selfSimilarity(row);
		if (Math.abs(self - 1) > UNIT_NORM_TOLERANCE) {
			logger.warn('Row is not unit length', { row, selfSimilarity: self });
		}
	}

	return Object.freeze({
		similarityOf,
		topN,
		score,
		rankVector,
		selfSimilarity,
	});
}
