// ---------------------------------------------------------------------------
// Catalogue context for the chat assistant
// ---------------------------------------------------------------------------
//
// The assistant only knows the catalogue through this text block, so it
// lists concrete titles to copy verbatim.
// ---------------------------------------------------------------------------

import type { Catalogue, CatalogueEntry } from '../catalogue/index.js';
import {
	type MetadataClient,
	UNKNOWN_RELEASE_DATE,
} from '../metadata/index.js';
import { mapLimit } from '../utils/map-limit.js';
import { GENRE_KEYWORDS } from './prompts.js';

export interface CatalogueContextOptions {
	/** Search hits to list. Defaults to `15`. */
	readonly limit?: number;
	/** When given, each hit carries its year, genres, and rating. */
	readonly metadata?: MetadataClient;
	readonly concurrency?: number;
}

async function describeEntries(
	entries: readonly CatalogueEntry[],
	options: CatalogueContextOptions,
): Promise<string[]> {
	const { metadata } = options;
	if (!metadata) {
		return entries.map((entry) => `- ${entry.title} (ID: ${entry.movieId})`);
	}

	return mapLimit(entries, options.concurrency ?? 5, async (entry) => {
		const { value: details } = await metadata.fetchDetails(entry.movieId);
		const year =
			details.releaseDate === UNKNOWN_RELEASE_DATE
				? 'N/A'
				: details.releaseDate.slice(0, 4);
		const genres = details.genres.length > 0 ? details.genres.join(', ') : 'N/A';
		return `- ${entry.title} (ID: ${entry.movieId}, ${year}) | Genres: ${genres} | Rating: ${details.rating.toFixed(1)}/10`;
	});
}

/**
 * Genre keywords mentioned in `query`, in keyword-list order.
 */
export function detectGenres(query: string): string[] {
	const lower = query.toLowerCase();
	return GENRE_KEYWORDS.filter((keyword) => lower.includes(keyword));
}

export async function buildCatalogueContext(
	query: string,
	catalogue: Catalogue,
	options: CatalogueContextOptions = {},
): Promise<string> {
	const limit = options.limit ?? 15;
	const lines = [`Database Info: ${catalogue.size} movies available.`, ''];

	const hits = catalogue.search(query.trim(), limit);
	if (hits.length > 0) {
		lines.push('Movies available in our database (USE EXACT TITLES):');
		lines.push(...(await describeEntries(hits, options)));
	} else {
		const [genre] = detectGenres(query);
		const genreHits = genre ? catalogue.search(genre, limit) : [];
		if (genre && genreHits.length > 0) {
			const label = genre.charAt(0).toUpperCase() + genre.slice(1);
			lines.push(`${label} movies in database (USE EXACT TITLES):`);
			lines.push(...(await describeEntries(genreHits, options)));
		}
	}

	lines.push('', 'Note: Recommend 10-15 movies total. Prioritize database movies.');
	return lines.join('\n');
}
