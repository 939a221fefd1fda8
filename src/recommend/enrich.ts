// ---------------------------------------------------------------------------
// Recommendation enrichment: posters and details for display
// ---------------------------------------------------------------------------

import type { ExternalServiceError } from '../errors/index.js';
import type { MetadataClient } from '../metadata/index.js';
import { mapLimit } from '../utils/map-limit.js';
import type { EnrichedRecommendation, Recommendation } from './types.js';

export interface EnrichOptions {
	/** Lookups in flight at once. Defaults to `5`. */
	readonly concurrency?: number;
}

/**
 * Attach poster URL and details to each recommendation, preserving order.
 * Collaborator failures are recorded on the item and never reject.
 */
export async function enrichRecommendations(
	results: readonly Recommendation[],
	client: MetadataClient,
	options: EnrichOptions = {},
): Promise<EnrichedRecommendation[]> {
	return mapLimit(results, options.concurrency ?? 5, async (result) => {
		const [details, poster] = await Promise.all([
			client.fetchDetails(result.movieId),
			client.fetchPoster(result.movieId),
		]);

		const errors: ExternalServiceError[] = [];
		if (!details.ok) errors.push(details.error);
		if (!poster.ok) errors.push(poster.error);

		return Object.freeze({
			...result,
			poster: poster.value,
			details: details.value,
			degraded: errors.length > 0,
			errors: Object.freeze(errors),
		});
	});
}
