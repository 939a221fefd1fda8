// ---------------------------------------------------------------------------
// Caching decorator for a MetadataClient
// ---------------------------------------------------------------------------
//
// Successful outcomes are kept for `ttlMs`; failures are never cached, so
// the next request retries the collaborator.
// ---------------------------------------------------------------------------

import { createLruCache, type LruCache } from '../utils/lru-cache.js';
import type {
	ExternalMovieInfo,
	ExternalOutcome,
	MetadataClient,
	MovieDetails,
} from './types.js';

export interface CachedMetadataOptions {
	/** Defaults to one hour. */
	readonly ttlMs?: number;
	/** Per lookup kind. Defaults to `1000`. */
	readonly maxEntries?: number;
	readonly now?: () => number;
}

async function cached<K, T>(
	cache: LruCache<K, T>,
	key: K,
	load: () => Promise<ExternalOutcome<T>>,
): Promise<ExternalOutcome<T>> {
	const hit = cache.get(key);
	if (hit !== undefined) return { ok: true, value: hit };

	const outcome = await load();
	if (outcome.ok) cache.set(key, outcome.value);
	return outcome;
}

export function createCachedMetadataClient(
	client: MetadataClient,
	options: CachedMetadataOptions = {},
): MetadataClient {
	const cacheOptions = {
		ttlMs: options.ttlMs ?? 3_600_000,
		maxEntries: options.maxEntries ?? 1000,
		now: options.now,
	};
	const details = createLruCache<number, MovieDetails>(cacheOptions);
	const posters = createLruCache<number, string>(cacheOptions);
	const searches = createLruCache<string, ExternalMovieInfo>(cacheOptions);

	return Object.freeze({
		fetchDetails: (movieId: number) =>
			cached(details, movieId, () => client.fetchDetails(movieId)),
		fetchPoster: (movieId: number) =>
			cached(posters, movieId, () => client.fetchPoster(movieId)),
		searchExternal: (title: string, year?: number) =>
			cached(searches, `${title.toLowerCase()}|${year ?? ''}`, () =>
				client.searchExternal(title, year),
			),
	});
}
