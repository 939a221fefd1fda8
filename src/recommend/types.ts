// ---------------------------------------------------------------------------
// Recommendation: Type definitions
// ---------------------------------------------------------------------------

import type { ExternalServiceError, TitleNotFoundError } from '../errors/index.js';
import type { MovieDetails } from '../metadata/index.js';
import type { MatchKind } from '../resolver/index.js';

export interface Recommendation {
	readonly title: string;
	readonly movieId: number;
	readonly score: number;
	readonly row: number;
}

export interface RecommendationQuery {
	readonly movieId: number;
	readonly title: string;
	readonly row: number;
	/** How the input was matched; `'id'` for lookups by movie id. */
	readonly match: MatchKind | 'id';
}

export interface RecommendFound {
	readonly status: 'ok';
	readonly query: RecommendationQuery;
	readonly results: readonly Recommendation[];
}

export interface RecommendNotFound {
	readonly status: 'not_found';
	/** The raw input that failed to resolve. */
	readonly query: string;
	readonly reason: string;
	readonly error: TitleNotFoundError;
	/** Always empty. */
	readonly results: readonly Recommendation[];
}

export type RecommendOutcome = RecommendFound | RecommendNotFound;

export interface TextRecommendation {
	readonly query: string;
	readonly results: readonly Recommendation[];
}

export interface Recommender {
	readonly recommend: (titleText: string, topN?: number) => RecommendOutcome;
	readonly recommendById: (movieId: number, topN?: number) => RecommendOutcome;
	readonly recommendByText: (
		description: string,
		topN?: number,
	) => TextRecommendation;
}

export interface EnrichedRecommendation extends Recommendation {
	readonly poster: string;
	readonly details: MovieDetails;
	/** `true` when either lookup fell back to its default. */
	readonly degraded: boolean;
	readonly errors: readonly ExternalServiceError[];
}
