export {
	type CosineEngineOptions,
	compareScoredRows,
	createCosineSimilarityEngine,
	sparseDot,
} from './similarity.js';
export { resolveStopWords, tokenize } from './tokenize.js';
export type {
	ScoredRow,
	SimilarityEngine,
	SparseVector,
	StopWordsOption,
	VectorizerOptions,
	VectorSpace,
} from './types.js';
export {
	DEFAULT_MAX_FEATURES,
	type FitOptions,
	fitVectorizer,
} from './vectorizer.js';
