import type { RecommendOutcome } from './types.js';

/** Plain JSON body for an outcome; a not-found outcome drops its error object. */
export const toOutcomeJson = (outcome: RecommendOutcome) =>
	outcome.status === 'ok'
		? {
				status: outcome.status,
				query: outcome.query,
				results: outcome.results,
			}
		: {
				status: outcome.status,
				query: outcome.query,
				reason: outcome.reason,
				results: outcome.results,
			};
