// ---------------------------------------------------------------------------
// External Service Errors: metadata, poster, and chat collaborators
// ---------------------------------------------------------------------------

import type { ReelmatchError } from './base.js';
import { createReelmatchError, isReelmatchError, withFields } from './base.js';

export type ExternalService = 'metadata' | 'poster' | 'chat';

export type ExternalServiceError = ReelmatchError & {
	readonly service: ExternalService;
};

export const createExternalServiceError = (
	service: ExternalService,
	message: string,
	options: {
		name?: string;
		code?: string;
		statusCode?: number;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	} = {},
): ExternalServiceError =>
	withFields(
		createReelmatchError(message, {
			name: options.name ?? 'ExternalServiceError',
			code: options.code ?? 'EXTERNAL_SERVICE',
			statusCode: options.statusCode ?? 502,
			cause: options.cause,
			metadata: { ...options.metadata, service },
		}),
		{ service },
	);

export const createExternalTimeoutError = (
	service: ExternalService,
	timeoutMs: number,
	options: { cause?: unknown } = {},
): ExternalServiceError =>
	createExternalServiceError(
		service,
		`${service} request timed out after ${timeoutMs}ms`,
		{
			name: 'ExternalTimeoutError',
			code: 'EXTERNAL_TIMEOUT',
			statusCode: 504,
			cause: options.cause,
			metadata: { timeoutMs },
		},
	);

export const createExternalHTTPError = (
	service: ExternalService,
	status: number,
	options: { body?: string; cause?: unknown } = {},
): ExternalServiceError & { readonly status: number } =>
	withFields(
		createExternalServiceError(
			service,
			`${service} request failed with HTTP ${status}`,
			{
				name: 'ExternalHTTPError',
				code: 'EXTERNAL_HTTP',
				statusCode: 502,
				cause: options.cause,
				metadata: { status, body: options.body },
			},
		),
		{ status },
	);

export const createExternalAuthError = (
	service: ExternalService,
	options: { cause?: unknown } = {},
): ExternalServiceError =>
	createExternalServiceError(service, `${service} rejected the API key`, {
		name: 'ExternalAuthError',
		code: 'EXTERNAL_AUTH',
		statusCode: 401,
		cause: options.cause,
	});

export const createExternalRateLimitError = (
	service: ExternalService,
	options: { retryAfter?: string; cause?: unknown } = {},
): ExternalServiceError =>
	createExternalServiceError(service, `${service} rate limit reached`, {
		name: 'ExternalRateLimitError',
		code: 'EXTERNAL_RATE_LIMIT',
		statusCode: 429,
		cause: options.cause,
		metadata: options.retryAfter ? { retryAfter: options.retryAfter } : {},
	});

export const createExternalInvalidResponseError = (
	service: ExternalService,
	message: string,
	options: { cause?: unknown } = {},
): ExternalServiceError =>
	createExternalServiceError(service, message, {
		name: 'ExternalInvalidResponseError',
		code: 'EXTERNAL_INVALID_RESPONSE',
		statusCode: 502,
		cause: options.cause,
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isExternalServiceError = (
	value: unknown,
): value is ExternalServiceError =>
	isReelmatchError(value) &&
	value.code.startsWith('EXTERNAL_') &&
	'service' in value &&
	typeof value.service === 'string';

export const isExternalTimeoutError = (
	value: unknown,
): value is ExternalServiceError =>
	isExternalServiceError(value) && value.code === 'EXTERNAL_TIMEOUT';

export const isExternalHTTPError = (
	value: unknown,
): value is ExternalServiceError & { readonly status: number } =>
	isExternalServiceError(value) &&
	value.code === 'EXTERNAL_HTTP' &&
	'status' in value &&
	typeof value.status === 'number';

export const isExternalAuthError = (
	value: unknown,
): value is ExternalServiceError & { readonly code: 'EXTERNAL_AUTH' } =>
	isExternalServiceError(value) && value.code === 'EXTERNAL_AUTH';

export const isExternalRateLimitError = (
	value: unknown,
): value is ExternalServiceError & { readonly code: 'EXTERNAL_RATE_LIMIT' } =>
	isExternalServiceError(value) && value.code === 'EXTERNAL_RATE_LIMIT';

export const isExternalInvalidResponseError = (
	value: unknown,
): value is ExternalServiceError =>
	isExternalServiceError(value) && value.code === 'EXTERNAL_INVALID_RESPONSE';
