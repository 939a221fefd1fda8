export {
	type CachedMetadataOptions,
	createCachedMetadataClient,
} from './cached-client.js';
export {
	createTmdbClient,
	FALLBACK_DETAILS,
	joinImageUrl,
	NO_OVERVIEW,
	type TmdbClientOptions,
	TOP_CAST_COUNT,
	toMovieDetails,
	trailerOf,
	UNKNOWN_RELEASE_DATE,
} from './tmdb-client.js';
export type {
	ExternalMovieInfo,
	ExternalOutcome,
	MetadataClient,
	MovieDetails,
	MovieVideo,
} from './types.js';
