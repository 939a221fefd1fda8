// ---------------------------------------------------------------------------
// HTTP helpers shared by the metadata and chat collaborators
// ---------------------------------------------------------------------------

import {
	createExternalAuthError,
	createExternalHTTPError,
	createExternalInvalidResponseError,
	createExternalRateLimitError,
	createExternalServiceError,
	createExternalTimeoutError,
	type ExternalService,
	type ExternalServiceError,
	isExternalServiceError,
	toError,
} from '../errors/index.js';

export type FetchLike = (
	input: string,
	init?: RequestInit,
) => Promise<Response>;

export async function fetchWithTimeout(
	fetchImpl: FetchLike,
	url: string,
	init: RequestInit,
	timeoutMs: number,
): Promise<Response> {
	const controller = new AbortController();
	const timer = setTimeout(() => controller.abort(), timeoutMs);

	try {
		return await fetchImpl(url, { ...init, signal: controller.signal });
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Classify a thrown fetch failure. Aborts and socket timeouts become
 * `EXTERNAL_TIMEOUT`; everything else is a generic `EXTERNAL_SERVICE`.
 */
export function wrapFetchError(
	service: ExternalService,
	error: unknown,
	timeoutMs: number,
): ExternalServiceError {
	if (isExternalServiceError(error)) return error;

	const err = toError(error);
	const message = err.message.toLowerCase();

	if (
		err.name === 'AbortError' ||
		message.includes('abort') ||
		message.includes('timeout') ||
		message.includes('etimedout')
	) {
		return createExternalTimeoutError(service, timeoutMs, { cause: error });
	}

	return createExternalServiceError(
		service,
		`${service} request failed: ${err.message}`,
		{ cause: error },
	);
}

/**
 * Turn a non-2xx response into the matching external error.
 */
export async function errorFromResponse(
	service: ExternalService,
	response: Response,
): Promise<ExternalServiceError> {
	if (response.status === 401 || response.status === 403) {
		return createExternalAuthError(service);
	}
	if (response.status === 429) {
		return createExternalRateLimitError(service, {
			retryAfter: response.headers.get('retry-after') ?? undefined,
		});
	}
	const body = await response.text().catch(() => '');
	return createExternalHTTPError(service, response.status, {
		body: body.slice(0, 500),
	});
}

/**
 * GET (or POST) a JSON document, throwing classified external errors.
 */
export async function requestJson(
	service: ExternalService,
	fetchImpl: FetchLike,
	url: string,
	init: RequestInit,
	timeoutMs: number,
): Promise<unknown> {
	let response: Response;
	try {
		response = await fetchWithTimeout(fetchImpl, url, init, timeoutMs);
	} catch (error) {
		throw wrapFetchError(service, error, timeoutMs);
	}

	if (!response.ok) {
		throw await errorFromResponse(service, response);
	}

	try {
		return await response.json();
	} catch (error) {
		throw createExternalInvalidResponseError(
			service,
			`${service} returned a body that is not JSON`,
			{ cause: error },
		);
	}
}
