// ---------------------------------------------------------------------------
// Title Resolver
// ---------------------------------------------------------------------------
//
// Maps free text to exactly one catalogue row, in strict precedence:
//   1. case-insensitive exact title (first row wins on duplicates)
//   2. case-insensitive substring, best similarity ratio (lowest row on ties)
//   3. not found
// Pure: no logging, no state.
// ---------------------------------------------------------------------------

import type { Catalogue, CatalogueEntry } from '../catalogue/index.js';
import {
	createTitleNotFoundError,
	type TitleNotFoundError,
} from '../errors/index.js';
import { similarityRatio } from './text-similarity.js';

export type MatchKind = 'exact' | 'substring';

export interface ResolvedTitle {
	readonly ok: true;
	readonly row: number;
	readonly entry: CatalogueEntry;
	readonly match: MatchKind;
	/** Similarity ratio between the input and the chosen title. */
	readonly ratio: number;
}

export interface UnresolvedTitle {
	readonly ok: false;
	readonly error: TitleNotFoundError;
}

export type ResolveOutcome = ResolvedTitle | UnresolvedTitle;

const notFound = (query: string): UnresolvedTitle =>
	Object.freeze({ ok: false, error: createTitleNotFoundError(query) });

export function resolveTitle(
	text: string,
	catalogue: Catalogue,
): ResolveOutcome {
	const query = text.trim();
	if (query.length === 0) return notFound(query);

	const exactRows = catalogue.rowsByTitle(query);
	if (exactRows.length > 0) {
		const entry = catalogue.entries[exactRows[0]];
		return Object.freeze({
			ok: true,
			row: entry.row,
			entry,
			match: 'exact',
			ratio: 1,
		});
	}

	const needle = query.toLowerCase();
	let best: CatalogueEntry | undefined;
	let bestRatio = -1;

	for (const entry of catalogue.entries) {
		if (!entry.title.toLowerCase().includes(needle)) continue;
		const ratio = similarityRatio(query, entry.title);
		// Strict comparison keeps the lowest row on ties
		if (ratio > bestRatio) {
			best = entry;
			bestRatio = ratio;
		}
	}

	if (!best) return notFound(query);

	return Object.freeze({
		ok: true,
		row: best.row,
		entry: best,
		match: 'substring',
		ratio: bestRatio,
	});
}
