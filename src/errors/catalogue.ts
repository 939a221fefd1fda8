// ---------------------------------------------------------------------------
// Catalogue Errors
// ---------------------------------------------------------------------------

import type { ReelmatchError } from './base.js';
import { createReelmatchError, isReelmatchError, withFields } from './base.js';

export type CatalogueLoadReason =
	| 'missing'
	| 'unreadable'
	| 'malformed'
	| 'invalid_record'
	| 'duplicate_id'
	| 'empty';

export type CatalogueLoadError = ReelmatchError & {
	readonly source: string;
	readonly reason: CatalogueLoadReason;
};

const REASON_TEXT: Readonly<Record<CatalogueLoadReason, string>> =
	Object.freeze({
		missing: 'catalogue source not found',
		unreadable: 'catalogue source could not be read',
		malformed: 'catalogue source is malformed',
		invalid_record: 'catalogue contains an invalid record',
		duplicate_id: 'catalogue contains a duplicate movie_id',
		empty: 'catalogue contains no records',
	});

/**
 * Fatal start-up failure: the catalogue is missing, malformed, or has
 * records without the required `movie_id` / `title` / `tags` fields.
 * No partial catalogue is ever served.
 */
export const createCatalogueLoadError = (
	source: string,
	reason: CatalogueLoadReason,
	options: {
		detail?: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	} = {},
): CatalogueLoadError => {
	const base = `Failed to load catalogue (${source}): ${REASON_TEXT[reason]}`;
	const message = options.detail ? `${base}: ${options.detail}` : base;

	return withFields(
		createReelmatchError(message, {
			name: 'LoadError',
			code: 'CATALOGUE_LOAD',
			statusCode: 500,
			cause: options.cause,
			metadata: { ...options.metadata, source, reason },
		}),
		{ source, reason },
	);
};

export const isCatalogueLoadError = (
	value: unknown,
): value is CatalogueLoadError =>
	isReelmatchError(value) && value.code === 'CATALOGUE_LOAD';
