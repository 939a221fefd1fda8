// ---------------------------------------------------------------------------
// Recommendation Façade
// ---------------------------------------------------------------------------
//
// Resolver → similarity engine → catalogue enrichment. Unresolvable input
// becomes a structured `not_found` outcome; nothing here throws for a
// user-supplied title.
// ---------------------------------------------------------------------------

import type { Catalogue, CatalogueEntry } from '../catalogue/index.js';
import type { ScoredRow, SimilarityEngine, VectorSpace } from '../engine/index.js';
import { createTitleNotFoundError, type TitleNotFoundError } from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { resolveTitle } from '../resolver/index.js';
import type {
	Recommendation,
	RecommendationQuery,
	RecommendNotFound,
	RecommendOutcome,
	Recommender,
	TextRecommendation,
} from './types.js';

export const DEFAULT_TOP_N = 12;

export interface RecommenderOptions {
	readonly catalogue: Catalogue;
	readonly space: VectorSpace;
	readonly engine: SimilarityEngine;
	/** Defaults to `12`. */
	readonly defaultTopN?: number;
	readonly logger?: Logger;
}

const notFound = (
	query: string,
	error: TitleNotFoundError,
): RecommendNotFound =>
	Object.freeze({
		status: 'not_found',
		query,
		reason: error.message,
		error,
		results: Object.freeze([]),
	});

export function createRecommender(options: RecommenderOptions): Recommender {
	const { catalogue, space, engine } = options;
	const logger = (options.logger ?? getDefaultLogger()).child('recommender');
	const defaultTopN = options.defaultTopN ?? DEFAULT_TOP_N;

	const toRecommendation = (scored: ScoredRow): Recommendation => {
		const entry = catalogue.entries[scored.row];
		return Object.freeze({
			title: entry.title,
			movieId: entry.movieId,
			score: scored.score,
			row: scored.row,
		});
	};

	const recommendFor = (
		entry: CatalogueEntry,
		match: RecommendationQuery['match'],
		topN: number,
	): RecommendOutcome => {
		const results = engine.topN(entry.row, topN).map(toRecommendation);
		logger.debug('Recommendations ready', {
			movieId: entry.movieId,
			match,
			count: results.length,
		});
		return Object.freeze({
			status: 'ok',
			query: Object.freeze({
				movieId: entry.movieId,
				title: entry.title,
				row: entry.row,
				match,
			}),
			results: Object.freeze(results),
		});
	};

	const recommend = (
		titleText: string,
		topN = defaultTopN,
	): RecommendOutcome => {
		const resolved = resolveTitle(titleText, catalogue);
		if (!resolved.ok) {
			logger.info('No catalogue match', { query: titleText });
			return notFound(titleText, resolved.error);
		}
		return recommendFor(resolved.entry, resolved.match, topN);
	};

	const recommendById = (
		movieId: number,
		topN = defaultTopN,
	): RecommendOutcome => {
		const entry = catalogue.lookupById(movieId);
		if (!entry) {
			const query = String(movieId);
			return notFound(query, createTitleNotFoundError(query));
		}
		return recommendFor(entry, 'id', topN);
	};

	const recommendByText = (
		description: string,
		topN = defaultTopN,
	): TextRecommendation => {
		const vector = space.transform(description);
		const results =
			vector.columns.length === 0
				? []
				: engine.rankVector(vector, topN).map(toRecommendation);
		return Object.freeze({
			query: description,
			results: Object.freeze(results),
		});
	};

	return Object.freeze({ recommend, recommendById, recommendByText });
}
