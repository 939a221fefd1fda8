// ---------------------------------------------------------------------------
// ReelmatchError: base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * The shape of every error produced by reelmatch. Consumers discriminate
 * errors via the `code` field and the type-guard functions exported from
 * sibling modules.
 */
export interface ReelmatchError extends Error {
	/** Machine-readable error code (e.g. "CATALOGUE_LOAD", "TITLE_NOT_FOUND"). */
	readonly code: string;
	/** HTTP-style status hint for API responses. */
	readonly statusCode: number;
	/** Arbitrary structured context attached to the error. */
	readonly metadata: Readonly<Record<string, unknown>>;
	/** Return a plain-object representation suitable for logging / serialisation. */
	readonly toJSON: () => Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Options type shared by all factory helpers
// ---------------------------------------------------------------------------

export interface ReelmatchErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly statusCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

const describeCause = (cause: unknown): unknown => {
	if (cause instanceof Error) {
		return { name: cause.name, message: cause.message };
	}
	return cause;
};

// ---------------------------------------------------------------------------
// Base factory
// ---------------------------------------------------------------------------

/**
 * Create a `ReelmatchError`: a plain `Error` object augmented with
 * structured fields. This is the only place in the codebase where
 * `new Error` is used for domain failures.
 */
export const createReelmatchError = (
	message: string,
	options: ReelmatchErrorOptions = {},
): ReelmatchError => {
	const err = new Error(message, { cause: options.cause });
	err.name = options.name ?? 'ReelmatchError';

	const code = options.code ?? 'REELMATCH_ERROR';
	const statusCode = options.statusCode ?? 500;
	const metadata = Object.freeze({ ...(options.metadata ?? {}) });

	const toJSON = (): Record<string, unknown> => ({
		name: err.name,
		code,
		message: err.message,
		statusCode,
		metadata,
		cause: describeCause(err.cause),
		stack: err.stack,
	});

	const structured = Object.assign(err, { code, statusCode, metadata, toJSON });

	Object.defineProperties(structured, {
		code: { writable: false, enumerable: true },
		statusCode: { writable: false, enumerable: true },
		metadata: { writable: false, enumerable: true },
		toJSON: { writable: false, enumerable: false },
	});

	return structured;
};

/**
 * Attach extra read-only fields to an error created by one of the
 * factories (e.g. `source` on a catalogue load error).
 */
export const withFields = <
	E extends ReelmatchError,
	F extends Record<string, unknown>,
>(
	err: E,
	fields: F,
): E & Readonly<F> => {
	const extended = Object.assign(err, fields);
	for (const key of Object.keys(fields)) {
		Object.defineProperty(extended, key, { writable: false, enumerable: true });
	}
	return extended;
};

// ---------------------------------------------------------------------------
// Base type guard
// ---------------------------------------------------------------------------

/**
 * Type-guard that checks whether a value is a `ReelmatchError`.
 * Uses duck-typing on the `code` field rather than `instanceof`.
 */
export const isReelmatchError = (value: unknown): value is ReelmatchError =>
	value instanceof Error &&
	'code' in value &&
	typeof value.code === 'string' &&
	'statusCode' in value &&
	typeof value.statusCode === 'number' &&
	'toJSON' in value &&
	typeof value.toJSON === 'function';

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

/**
 * Normalise an unknown thrown value into a proper `Error` instance.
 * If it is already an `Error`, returns it directly.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	if (typeof value === 'string') return new Error(value);
	return new Error(String(value));
};

/**
 * Wrap an unknown cause in a `ReelmatchError` with an optional error code.
 * The original value is attached as `cause` for chaining.
 */
export const wrapError = (
	message: string,
	cause: unknown,
	code?: string,
): ReelmatchError => createReelmatchError(message, { cause, code });
