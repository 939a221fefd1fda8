// ---------------------------------------------------------------------------
// TMDB-compatible metadata client
// ---------------------------------------------------------------------------
//
// Every call resolves to an `ExternalOutcome`; network, HTTP and schema
// failures degrade to the documented fallbacks instead of rejecting.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import {
	createExternalInvalidResponseError,
	type ExternalService,
	type ExternalServiceError,
} from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { type FetchLike, requestJson, wrapFetchError } from '../utils/http.js';
import type {
	ExternalMovieInfo,
	ExternalOutcome,
	MetadataClient,
	MovieDetails,
	MovieVideo,
} from './types.js';

export const TOP_CAST_COUNT = 5;
export const UNKNOWN_RELEASE_DATE = 'Unknown';
export const NO_OVERVIEW = 'No description available.';

export const FALLBACK_DETAILS: MovieDetails = Object.freeze({
	rating: 0,
	voteCount: 0,
	overview: NO_OVERVIEW,
	runtime: 0,
	releaseDate: UNKNOWN_RELEASE_DATE,
	genres: Object.freeze([]),
	cast: Object.freeze([]),
	videos: Object.freeze([]),
});

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const videoSchema = z.object({
	type: z.string(),
	key: z.string(),
	site: z.string().optional(),
});

const movieSchema = z.object({
	id: z.number().optional(),
	vote_average: z.number().nullish(),
	vote_count: z.number().nullish(),
	overview: z.string().nullish(),
	runtime: z.number().nullish(),
	release_date: z.string().nullish(),
	poster_path: z.string().nullish(),
	genres: z.array(z.object({ name: z.string() })).nullish(),
	videos: z.object({ results: z.array(videoSchema) }).nullish(),
	credits: z
		.object({ cast: z.array(z.object({ name: z.string() })) })
		.nullish(),
});

const searchSchema = z.object({
	results: z.array(movieSchema),
});

type TmdbMovie = z.infer<typeof movieSchema>;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface TmdbClientOptions {
	readonly baseUrl: string;
	readonly imageBaseUrl: string;
	readonly apiKey?: string;
	readonly language: string;
	readonly timeoutMs: number;
	readonly placeholderPosterUrl: string;
	/** Injected for tests; defaults to the global `fetch`. */
	readonly fetch?: FetchLike;
	readonly logger?: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const trimSlash = (value: string): string => value.replace(/\/+$/, '');

export function joinImageUrl(imageBaseUrl: string, posterPath: string): string {
	const path = posterPath.startsWith('/') ? posterPath : `/${posterPath}`;
	return `${trimSlash(imageBaseUrl)}${path}`;
}

const releaseDateOf = (movie: TmdbMovie): string =>
	movie.release_date ? movie.release_date : UNKNOWN_RELEASE_DATE;

export function toMovieDetails(movie: TmdbMovie): MovieDetails {
	const videos: MovieVideo[] = (movie.videos?.results ?? []).map((video) =>
		Object.freeze({ type: video.type, key: video.key, site: video.site }),
	);

	return Object.freeze({
		rating: movie.vote_average ?? 0,
		voteCount: movie.vote_count ?? 0,
		overview: movie.overview ? movie.overview : NO_OVERVIEW,
		runtime: movie.runtime ?? 0,
		releaseDate: releaseDateOf(movie),
		genres: Object.freeze((movie.genres ?? []).map((genre) => genre.name)),
		cast: Object.freeze(
			(movie.credits?.cast ?? [])
				.slice(0, TOP_CAST_COUNT)
				.map((member) => member.name),
		),
		videos: Object.freeze(videos),
	});
}

/**
 * First `Trailer` video as a YouTube watch URL.
 */
export function trailerOf(details: MovieDetails): string | undefined {
	const trailer = details.videos.find((video) => video.type === 'Trailer');
	return trailer
		? `https://www.youtube.com/watch?v=${encodeURIComponent(trailer.key)}`
		: undefined;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTmdbClient(options: TmdbClientOptions): MetadataClient {
	const logger = (options.logger ?? getDefaultLogger()).child('metadata');
	const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
	const baseUrl = trimSlash(options.baseUrl);

	const fallbackSearch: ExternalMovieInfo = Object.freeze({
		posterUrl: options.placeholderPosterUrl,
		rating: 0,
		releaseDate: UNKNOWN_RELEASE_DATE,
		overview: NO_OVERVIEW,
		tmdbId: null,
	});

	const buildUrl = (
		path: string,
		params: Readonly<Record<string, string | undefined>>,
	): string => {
		const url = new URL(`${baseUrl}${path}`);
		if (options.apiKey) url.searchParams.set('api_key', options.apiKey);
		url.searchParams.set('language', options.language);
		for (const [key, value] of Object.entries(params)) {
			if (value !== undefined) url.searchParams.set(key, value);
		}
		return url.toString();
	};

	const getValidated = async <S extends z.ZodTypeAny>(
		service: ExternalService,
		url: string,
		schema: S,
	): Promise<z.infer<S>> => {
		const body = await requestJson(
			service,
			fetchImpl,
			url,
			{ method: 'GET', headers: { Accept: 'application/json' } },
			options.timeoutMs,
		);
		const parsed = schema.safeParse(body);
		if (!parsed.success) {
			throw createExternalInvalidResponseError(
				service,
				`${service} response did not match the expected shape`,
				{ cause: parsed.error },
			);
		}
		return parsed.data;
	};

	const attempt = async <T>(
		service: ExternalService,
		operation: string,
		fallback: T,
		run: () => Promise<T>,
		context: Readonly<Record<string, unknown>>,
	): Promise<ExternalOutcome<T>> => {
		try {
			return { ok: true, value: await run() };
		} catch (error) {
			const wrapped: ExternalServiceError = wrapFetchError(
				service,
				error,
				options.timeoutMs,
			);
			logger.warn(`${operation} failed, using fallback`, {
				...context,
				code: wrapped.code,
				error: wrapped.message,
			});
			return { ok: false, error: wrapped, value: fallback };
		}
	};

	const fetchDetails = (movieId: number) =>
		attempt(
			'metadata',
			'fetchDetails',
			FALLBACK_DETAILS,
			async () =>
				toMovieDetails(
					await getValidated(
						'metadata',
						buildUrl(`/movie/${movieId}`, {
							append_to_response: 'videos,credits',
						}),
						movieSchema,
					),
				),
			{ movieId },
		);

	const fetchPoster = (movieId: number) =>
		attempt(
			'poster',
			'fetchPoster',
			options.placeholderPosterUrl,
			async () => {
				const movie = await getValidated(
					'poster',
					buildUrl(`/movie/${movieId}`, {}),
					movieSchema,
				);
				return movie.poster_path
					? joinImageUrl(options.imageBaseUrl, movie.poster_path)
					: options.placeholderPosterUrl;
			},
			{ movieId },
		);

	const searchExternal = (title: string, year?: number) =>
		attempt(
			'metadata',
			'searchExternal',
			fallbackSearch,
			async (): Promise<ExternalMovieInfo> => {
				const { results } = await getValidated(
					'metadata',
					buildUrl('/search/movie', {
						query: title,
						year: year === undefined ? undefined : String(year),
					}),
					searchSchema,
				);
				const movie = results[0];
				if (!movie) return fallbackSearch;
				return Object.freeze({
					posterUrl: movie.poster_path
						? joinImageUrl(options.imageBaseUrl, movie.poster_path)
						: options.placeholderPosterUrl,
					rating: movie.vote_average ?? 0,
					releaseDate: releaseDateOf(movie),
					overview: movie.overview ? movie.overview : NO_OVERVIEW,
					tmdbId: movie.id ?? null,
				});
			},
			{ title, year },
		);

	return Object.freeze({ fetchDetails, fetchPoster, searchExternal });
}
