// ---------------------------------------------------------------------------
// TF-IDF Vectorizer
// ---------------------------------------------------------------------------
//
// Fits a capped vocabulary over the catalogue's tag text and produces one
// sparse, L2-normalised tf·idf row per document. The result is immutable.
// ---------------------------------------------------------------------------

import { createEmptyCorpusError } from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { resolveStopWords, tokenize } from './tokenize.js';
import type { SparseVector, VectorizerOptions, VectorSpace } from './types.js';

export const DEFAULT_MAX_FEATURES = 5000;

const EMPTY_VECTOR: SparseVector = Object.freeze({
	columns: Object.freeze([]),
	weights: Object.freeze([]),
});

function countTerms(
	text: string,
	stopWords: ReadonlySet<string>,
): Map<string, number> {
	const counts = new Map<string, number>();
	for (const token of tokenize(text)) {
		if (stopWords.has(token)) continue;
		counts.set(token, (counts.get(token) ?? 0) + 1);
	}
	return counts;
}

const compareTerms = (a: string, b: string): number =>
	a < b ? -1 : a > b ? 1 : 0;

/**
 * Keep the `maxFeatures` terms with the highest corpus-wide counts (ties
 * alphabetical), then number the survivors alphabetically.
 */
function selectVocabulary(
	totals: ReadonlyMap<string, number>,
	maxFeatures: number,
): string[] {
	const terms = [...totals.keys()];
	if (terms.length > maxFeatures) {
		terms.sort(
			(a, b) =>
				(totals.get(b) ?? 0) - (totals.get(a) ?? 0) || compareTerms(a, b),
		);
		terms.length = maxFeatures;
	}
	return terms.sort(compareTerms);
}

function buildVector(
	counts: ReadonlyMap<string, number>,
	columnByTerm: ReadonlyMap<string, number>,
	idfByColumn: readonly number[],
): SparseVector {
	const cells: Array<[number, number]> = [];
	for (const [term, count] of counts) {
		const column = columnByTerm.get(term);
		if (column === undefined) continue;
		cells.push([column, count * idfByColumn[column]]);
	}
	if (cells.length === 0) return EMPTY_VECTOR;

	cells.sort((a, b) => a[0] - b[0]);

	let norm = 0;
	for (const [, weight] of cells) norm += weight * weight;
	norm = Math.sqrt(norm);

	return Object.freeze({
		columns: Object.freeze(cells.map(([column]) => column)),
		weights: Object.freeze(cells.map(([, weight]) => weight / norm)),
	});
}

export interface FitOptions extends VectorizerOptions {
	readonly logger?: Logger;
}

/**
 * Fit a TF-IDF space over `documents`. Uses the smoothed
 * `idf = ln((1 + n) / (1 + df)) + 1`.
 *
 * @throws `VECTORIZER_EMPTY_CORPUS` when no document yields a term.
 */
export function fitVectorizer(
	documents: readonly string[],
	options: FitOptions = {},
): VectorSpace {
	const logger = (options.logger ?? getDefaultLogger()).child('vectorizer');
	const maxFeatures = Math.max(
		1,
		Math.floor(options.maxFeatures ?? DEFAULT_MAX_FEATURES),
	);
	const stopWords = resolveStopWords(options.stopWords ?? 'english');

	const documentCounts = documents.map((doc) => countTerms(doc, stopWords));

	const totals = new Map<string, number>();
	for (const counts of documentCounts) {
		for (const [term, count] of counts) {
			totals.set(term, (totals.get(term) ?? 0) + count);
		}
	}
	if (totals.size === 0) {
		throw createEmptyCorpusError(documents.length);
	}

	const terms = Object.freeze(selectVocabulary(totals, maxFeatures));
	const columnByTerm = new Map<string, number>();
	terms.forEach((term, column) => columnByTerm.set(term, column));

	const documentFrequency = new Array<number>(terms.length).fill(0);
	for (const counts of documentCounts) {
		for (const term of counts.keys()) {
			const column = columnByTerm.get(term);
			if (column !== undefined) documentFrequency[column]++;
		}
	}

	const n = documents.length;
	const idfByColumn = Object.freeze(
		documentFrequency.map((df) => Math.log((1 + n) / (1 + df)) + 1),
	);

	const rows = Object.freeze(
		documentCounts.map((counts) =>
			buildVector(counts, columnByTerm, idfByColumn),
		),
	);

	const emptyRows = rows.filter((row) => row.columns.length === 0).length;
	logger.info('Vectorizer fitted', {
		documents: n,
		vocabularySize: terms.length,
		emptyRows,
	});

	const idf = (term: string): number | undefined => {
		const column = columnByTerm.get(term.toLowerCase());
		return column === undefined ? undefined : idfByColumn[column];
	};

	return Object.freeze({
		rowCount: rows.length,
		vocabularySize: terms.length,
		terms,
		columnOf: (term: string) => columnByTerm.get(term.toLowerCase()),
		idf,
		row: (index: number): SparseVector => rows[index] ?? EMPTY_VECTOR,
		transform: (text: string): SparseVector =>
			buildVector(countTerms(text, stopWords), columnByTerm, idfByColumn),
	});
}
