export { type EnrichOptions, enrichRecommendations } from './enrich.js';
export {
	createRecommender,
	DEFAULT_TOP_N,
	type RecommenderOptions,
} from './recommender.js';
export type {
	EnrichedRecommendation,
	Recommendation,
	RecommendationQuery,
	RecommendFound,
	RecommendNotFound,
	RecommendOutcome,
	Recommender,
	TextRecommendation,
} from './types.js';
export { toOutcomeJson } from './serialize.js';
