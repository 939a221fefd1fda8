// ---------------------------------------------------------------------------
// Chat response parsing and catalogue revalidation
// ---------------------------------------------------------------------------

import { z } from 'zod';
import type { Catalogue } from '../catalogue/index.js';
import type { ChatReply, DatabaseMovie, ExternalMovie } from './types.js';

const yearSchema = z
	.union([z.number().int(), z.string().regex(/^\d{4}$/).transform(Number)])
	.nullish()
	.catch(undefined);

const replySchema = z.object({
	message: z.string(),
	database_movies: z
		.array(
			z.object({
				title: z.string(),
				reason: z.string().optional(),
			}),
		)
		.optional(),
	external_movies: z
		.array(
			z.object({
				title: z.string(),
				year: yearSchema,
				reason: z.string().optional(),
			}),
		)
		.optional(),
});

const JSON_OBJECT = /\{[\s\S]*\}/;

export const freeTextReply = (message: string): ChatReply =>
	Object.freeze({
		message,
		databaseMovies: Object.freeze([]),
		externalMovies: Object.freeze([]),
		structured: false,
	});

/**
 * Parse assistant output. The outermost `{...}` is read as the structured
 * payload; anything unparseable is returned as free text. Catalogue picks
 * are kept only when their title exists exactly (case-insensitive), and
 * take the catalogue's own title and id.
 */
export function parseChatResponse(
	text: string,
	catalogue: Catalogue,
): ChatReply {
	const match = JSON_OBJECT.exec(text);
	if (!match) return freeTextReply(text);

	let raw: unknown;
	try {
		raw = JSON.parse(match[0]);
	} catch {
		return freeTextReply(text);
	}

	const parsed = replySchema.safeParse(raw);
	if (!parsed.success) return freeTextReply(text);

	const databaseMovies: DatabaseMovie[] = [];
	const seen = new Set<number>();
	for (const movie of parsed.data.database_movies ?? []) {
		const entry = catalogue.lookupByTitleExact(movie.title.trim());
		if (!entry || seen.has(entry.movieId)) continue;
		seen.add(entry.movieId);
		databaseMovies.push(
			Object.freeze({
				title: entry.title,
				movieId: entry.movieId,
				reason: movie.reason ?? '',
			}),
		);
	}

	const externalMovies: ExternalMovie[] = (
		parsed.data.external_movies ?? []
	).map((movie) =>
		Object.freeze({
			title: movie.title,
			year: movie.year ?? undefined,
			reason: movie.reason ?? '',
		}),
	);

	return Object.freeze({
		message: parsed.data.message,
		databaseMovies: Object.freeze(databaseMovies),
		externalMovies: Object.freeze(externalMovies),
		structured: true,
	});
}
