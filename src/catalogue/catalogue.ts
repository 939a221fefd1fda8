// ---------------------------------------------------------------------------
// Catalogue Store
// ---------------------------------------------------------------------------
//
// Loads the persisted movie records once, validates them, and exposes
// read-only lookups. There are no mutation operations.
// ---------------------------------------------------------------------------

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
	createCatalogueLoadError,
	isCatalogueLoadError,
	toError,
} from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import type {
	Catalogue,
	CatalogueEntry,
	CataloguePage,
	CatalogueRecord,
} from './types.js';

export const DEFAULT_SEARCH_LIMIT = 15;
export const DEFAULT_PAGE_SIZE = 12;

// ---------------------------------------------------------------------------
// Record schemas
// ---------------------------------------------------------------------------

const movieIdSchema = z.union([
	z.number().int().safe(),
	z
		.string()
		.regex(/^-?\d+$/, 'must be an integer')
		.transform((value) => Number(value))
		.pipe(z.number().int().safe()),
]);

export const catalogueRecordSchema = z.object({
	movie_id: movieIdSchema,
	title: z.string(),
	tags: z.string(),
});

const columnarCatalogueSchema = z.object({
	movie_id: z.record(z.unknown()),
	title: z.record(z.unknown()),
	tags: z.record(z.unknown()),
});

const formatIssue = (issue: z.ZodIssue): string =>
	issue.path.length > 0
		? `${issue.path.join('.')}: ${issue.message}`
		: issue.message;

// ---------------------------------------------------------------------------
// Normalisation of the two accepted source shapes
// ---------------------------------------------------------------------------

/**
 * Turn `{ movie_id: { "0": .. }, title: { "0": .. }, tags: { "0": .. } }`
 * into an array of row objects, ordered by numeric row key.
 */
const columnsToRows = (
	columns: z.infer<typeof columnarCatalogueSchema>,
): unknown[] => {
	const keys = Object.keys(columns.movie_id).sort((a, b) => {
		const diff = Number(a) - Number(b);
		return Number.isNaN(diff) ? a.localeCompare(b) : diff;
	});
	return keys.map((key) => ({
		movie_id: columns.movie_id[key],
		title: columns.title[key],
		tags: columns.tags[key],
	}));
};

const toRawRows = (source: string, data: unknown): readonly unknown[] => {
	if (Array.isArray(data)) return data;

	const columns = columnarCatalogueSchema.safeParse(data);
	if (columns.success) return columnsToRows(columns.data);

	throw createCatalogueLoadError(source, 'malformed', {
		detail: 'expected an array of records or a column-oriented object',
	});
};

const parseRecords = (
	source: string,
	rows: readonly unknown[],
): CatalogueRecord[] => {
	const records: CatalogueRecord[] = [];
	for (let i = 0; i < rows.length; i++) {
		const parsed = catalogueRecordSchema.safeParse(rows[i]);
		if (!parsed.success) {
			throw createCatalogueLoadError(source, 'invalid_record', {
				detail: `record ${i}: ${formatIssue(parsed.error.issues[0])}`,
				metadata: { index: i },
			});
		}
		records.push(parsed.data);
	}
	return records;
};

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CatalogueOptions {
	/** Label used in errors and logs. Defaults to `"memory"`. */
	readonly source?: string;
	readonly logger?: Logger;
}

/**
 * Build an immutable catalogue from raw records. Fails with a
 * `CATALOGUE_LOAD` error on invalid records, duplicate ids, or an empty
 * set.
 */
export function createCatalogue(
	rawRecords: readonly unknown[],
	options: CatalogueOptions = {},
): Catalogue {
	const source = options.source ?? 'memory';
	const records = parseRecords(source, rawRecords);

	if (records.length === 0) {
		throw createCatalogueLoadError(source, 'empty');
	}

	const entries: CatalogueEntry[] = [];
	const rowById = new Map<number, number>();
	const rowsByLowerTitle = new Map<string, number[]>();

	for (let row = 0; row < records.length; row++) {
		const record = records[row];
		if (rowById.has(record.movie_id)) {
			throw createCatalogueLoadError(source, 'duplicate_id', {
				detail: `movie_id ${record.movie_id} at record ${row}`,
				metadata: { movieId: record.movie_id, index: row },
			});
		}
		rowById.set(record.movie_id, row);

		const key = record.title.toLowerCase();
		const sameTitle = rowsByLowerTitle.get(key);
		if (sameTitle) sameTitle.push(row);
		else rowsByLowerTitle.set(key, [row]);

		entries.push(
			Object.freeze({
				movieId: record.movie_id,
				title: record.title,
				tags: record.tags,
				row,
			}),
		);
	}
	Object.freeze(entries);

	const lowerTags = entries.map((entry) => entry.tags.toLowerCase());

	const entryAt = (row: number): CatalogueEntry | undefined =>
		Number.isInteger(row) ? entries[row] : undefined;

	const rowOf = (movieId: number): number | undefined => rowById.get(movieId);

	const lookupById = (movieId: number): CatalogueEntry | undefined => {
		const row = rowById.get(movieId);
		return row === undefined ? undefined : entries[row];
	};

	const rowsByTitle = (title: string): readonly number[] =>
		rowsByLowerTitle.get(title.toLowerCase()) ?? [];

	const lookupByTitleExact = (title: string): CatalogueEntry | undefined => {
		const rows = rowsByTitle(title);
		return rows.length > 0 ? entries[rows[0]] : undefined;
	};

	const search = (
		query: string,
		limit = DEFAULT_SEARCH_LIMIT,
	): readonly CatalogueEntry[] => {
		const needle = query.toLowerCase();
		if (needle.length === 0 || limit <= 0) return [];

		const seen = new Set<number>();
		const hits: CatalogueEntry[] = [];
		const collect = (matches: (entry: CatalogueEntry) => boolean): void => {
			for (const entry of entries) {
				if (hits.length >= limit) return;
				if (seen.has(entry.movieId) || !matches(entry)) continue;
				seen.add(entry.movieId);
				hits.push(entry);
			}
		};

		collect((entry) => entry.title.toLowerCase().includes(needle));
		collect((entry) => lowerTags[entry.row].includes(needle));
		return hits;
	};

	const filterByTag = (term: string): readonly CatalogueEntry[] => {
		const needle = term.toLowerCase();
		if (needle.length === 0) return entries;
		return entries.filter((entry) => lowerTags[entry.row].includes(needle));
	};

	const pageByTag = (
		term: string,
		page = 1,
		pageSize = DEFAULT_PAGE_SIZE,
	): CataloguePage => {
		const safePage = Math.max(1, Math.floor(page));
		const safeSize = Math.max(1, Math.floor(pageSize));
		const matching = filterByTag(term);
		const start = (safePage - 1) * safeSize;

		return Object.freeze({
			entries: matching.slice(start, start + safeSize),
			page: safePage,
			pageSize: safeSize,
			total: matching.length,
			hasMore: matching.length > start + safeSize,
		});
	};

	options.logger?.debug('Catalogue built', { source, size: entries.length });

	return Object.freeze({
		source,
		size: entries.length,
		entries,
		entryAt,
		rowOf,
		lookupById,
		lookupByTitleExact,
		rowsByTitle,
		search,
		filterByTag,
		pageByTag,
	});
}

// ---------------------------------------------------------------------------
// Loading from disk
// ---------------------------------------------------------------------------

const hasErrnoCode = (error: unknown, code: string): boolean =>
	error instanceof Error && 'code' in error && error.code === code;

/**
 * Read a JSON catalogue from `path`. Accepts an array of
 * `{ movie_id, title, tags }` records or the column-oriented object a
 * data-frame export produces.
 */
export async function loadCatalogue(
	path: string,
	options: Omit<CatalogueOptions, 'source'> = {},
): Promise<Catalogue> {
	const logger = (options.logger ?? getDefaultLogger()).child('catalogue');

	let text: string;
	try {
		text = await readFile(path, 'utf-8');
	} catch (error) {
		throw createCatalogueLoadError(
			path,
			hasErrnoCode(error, 'ENOENT') ? 'missing' : 'unreadable',
			{ cause: error },
		);
	}

	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (error) {
		throw createCatalogueLoadError(path, 'malformed', {
			detail: toError(error).message,
			cause: error,
		});
	}

	try {
		const catalogue = createCatalogue(toRawRows(path, data), {
			source: path,
			logger,
		});
		logger.info('Catalogue loaded', { source: path, size: catalogue.size });
		return catalogue;
	} catch (error) {
		if (isCatalogueLoadError(error)) {
			logger.error('Catalogue rejected', error);
		}
		throw error;
	}
}
