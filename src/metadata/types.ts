// ---------------------------------------------------------------------------
// Metadata collaborator: Type definitions
// ---------------------------------------------------------------------------

import type { ExternalServiceError } from '../errors/index.js';

export interface MovieVideo {
	readonly type: string;
	readonly key: string;
	readonly site?: string;
}

export interface MovieDetails {
	/** Average vote, 0–10. */
	readonly rating: number;
	readonly voteCount: number;
	readonly overview: string;
	/** Minutes. */
	readonly runtime: number;
	/** `YYYY-MM-DD`, or `"Unknown"`. */
	readonly releaseDate: string;
	readonly genres: readonly string[];
	/** Top-billed cast names. */
	readonly cast: readonly string[];
	readonly videos: readonly MovieVideo[];
}

export interface ExternalMovieInfo {
	readonly posterUrl: string;
	readonly rating: number;
	readonly releaseDate: string;
	readonly overview: string;
	readonly tmdbId: number | null;
}

/**
 * Collaborator calls never reject. A failed call carries the error and
 * the documented fallback value, so callers can always render something.
 */
export type ExternalOutcome<T> =
	| { readonly ok: true; readonly value: T }
	| {
			readonly ok: false;
			readonly error: ExternalServiceError;
			readonly value: T;
	  };

export interface MetadataClient {
	readonly fetchDetails: (
		movieId: number,
	) => Promise<ExternalOutcome<MovieDetails>>;
	readonly fetchPoster: (movieId: number) => Promise<ExternalOutcome<string>>;
	readonly searchExternal: (
		title: string,
		year?: number,
	) => Promise<ExternalOutcome<ExternalMovieInfo>>;
}
