// ---------------------------------------------------------------------------
// Engine Errors: vectorizer, similarity, title resolution, readiness
// ---------------------------------------------------------------------------

import type { ReelmatchError } from './base.js';
import { createReelmatchError, isReelmatchError, withFields } from './base.js';

export const createEmptyCorpusError = (
	documentCount: number,
): ReelmatchError & { readonly documentCount: number } =>
	withFields(
		createReelmatchError(
			documentCount === 0
				? 'Cannot fit vectorizer: corpus has no documents'
				: `Cannot fit vectorizer: none of ${documentCount} documents contain a usable term`,
			{
				name: 'EmptyCorpusError',
				code: 'VECTORIZER_EMPTY_CORPUS',
				statusCode: 500,
				metadata: { documentCount },
			},
		),
		{ documentCount },
	);

export type TitleNotFoundError = ReelmatchError & { readonly query: string };

export const createTitleNotFoundError = (query: string): TitleNotFoundError =>
	withFields(
		createReelmatchError(`No movie matches "${query}"`, {
			name: 'NotFoundError',
			code: 'TITLE_NOT_FOUND',
			statusCode: 404,
			metadata: { query },
		}),
		{ query },
	);

export const createEngineNotReadyError = (
	status: string,
): ReelmatchError & { readonly status: string } =>
	withFields(
		createReelmatchError(
			`Recommendation engine is not ready (status: ${status})`,
			{
				name: 'EngineNotReadyError',
				code: 'ENGINE_NOT_READY',
				statusCode: 503,
				metadata: { status },
			},
		),
		{ status },
	);

export const createRowOutOfRangeError = (
	row: number,
	rowCount: number,
): ReelmatchError =>
	createReelmatchError(
		`Row ${row} is outside the vector space (0..${rowCount - 1})`,
		{
			name: 'RowOutOfRangeError',
			code: 'ENGINE_ROW_OUT_OF_RANGE',
			statusCode: 400,
			metadata: { row, rowCount },
		},
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isEngineError = (value: unknown): value is ReelmatchError =>
	isReelmatchError(value) &&
	(value.code.startsWith('VECTORIZER_') ||
		value.code.startsWith('ENGINE_') ||
		value.code.startsWith('TITLE_'));

export const isEmptyCorpusError = (value: unknown): value is ReelmatchError =>
	isReelmatchError(value) && value.code === 'VECTORIZER_EMPTY_CORPUS';

export const isTitleNotFoundError = (
	value: unknown,
): value is TitleNotFoundError =>
	isReelmatchError(value) && value.code === 'TITLE_NOT_FOUND';

export const isEngineNotReadyError = (
	value: unknown,
): value is ReelmatchError =>
	isReelmatchError(value) && value.code === 'ENGINE_NOT_READY';

export const isRowOutOfRangeError = (value: unknown): value is ReelmatchError =>
	isReelmatchError(value) && value.code === 'ENGINE_ROW_OUT_OF_RANGE';
