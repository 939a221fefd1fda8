// ---------------------------------------------------------------------------
// Engine: Type definitions
// ---------------------------------------------------------------------------

/**
 * A sparse, L2-normalised row. `columns` is strictly ascending and
 * `weights[i]` belongs to `columns[i]`.
 */
export interface SparseVector {
	readonly columns: readonly number[];
	readonly weights: readonly number[];
}

export type StopWordsOption = 'english' | 'none';

export interface VectorizerOptions {
	/** Vocabulary cap. Defaults to `5000`. */
	readonly maxFeatures?: number;
	/** Defaults to `'english'`. */
	readonly stopWords?: StopWordsOption;
}

/**
 * The fitted TF-IDF space. Built once per catalogue load and never
 * updated; row `i` belongs to catalogue row `i`.
 */
export interface VectorSpace {
	readonly rowCount: number;
	readonly vocabularySize: number;
	/** Column index → term, in alphabetical order. */
	readonly terms: readonly string[];
	readonly columnOf: (term: string) => number | undefined;
	readonly idf: (term: string) => number | undefined;
	readonly row: (index: number) => SparseVector;
	/** Vectorise free text against the fitted vocabulary. */
	readonly transform: (text: string) => SparseVector;
}

export interface ScoredRow {
	readonly row: number;
	/** Cosine similarity in [0, 1]. */
	readonly score: number;
}

/**
 * Ranks catalogue rows by similarity on demand. Callers only see this
 * interface, so an approximate nearest-neighbour index can replace the
 * exact cosine implementation.
 */
export interface SimilarityEngine {
	/** Every other row, descending by score, ties by ascending row. */
	readonly similarityOf: (row: number) => readonly ScoredRow[];
	/** The first `n` of `similarityOf(row)`; fewer when the catalogue is small. */
	readonly topN: (row: number, n: number) => readonly ScoredRow[];
	readonly score: (a: number, b: number) => number;
	/** Rank rows against an arbitrary vector, skipping `exclude`. */
	readonly rankVector: (
		vector: SparseVector,
		n: number,
		exclude?: number,
	) => readonly ScoredRow[];
	/** `1` (± rounding) for rows with terms, `0` for empty rows. */
	readonly selfSimilarity: (row: number) => number;
}
