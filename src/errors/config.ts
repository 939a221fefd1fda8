// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { ReelmatchError } from './base.js';
import { createReelmatchError, isReelmatchError, withFields } from './base.js';

export interface ConfigIssue {
	readonly path: string;
	readonly message: string;
}

export const createConfigError = (
	message: string,
	options: {
		code?: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	} = {},
): ReelmatchError =>
	createReelmatchError(message, {
		name: 'ConfigError',
		code: options.code ?? 'CONFIG_ERROR',
		statusCode: 400,
		cause: options.cause,
		metadata: options.metadata,
	});

export const createConfigNotFoundError = (
	configPath: string,
	options: { cause?: unknown } = {},
): ReelmatchError =>
	createReelmatchError(`Configuration file not found: ${configPath}`, {
		name: 'ConfigNotFoundError',
		code: 'CONFIG_NOT_FOUND',
		statusCode: 400,
		cause: options.cause,
		metadata: { configPath },
	});

export const createConfigValidationError = (
	issues: readonly ConfigIssue[],
	options: { cause?: unknown } = {},
): ReelmatchError & { readonly issues: readonly ConfigIssue[] } => {
	const summary =
		issues.length === 1
			? issues[0].message
			: `${issues.length} validation errors`;

	const frozenIssues = Object.freeze([...issues]);

	return withFields(
		createReelmatchError(`Invalid configuration: ${summary}`, {
			name: 'ConfigValidationError',
			code: 'CONFIG_VALIDATION',
			statusCode: 400,
			cause: options.cause,
			metadata: { issues: frozenIssues },
		}),
		{ issues: frozenIssues },
	);
};

export const createConfigParseError = (
	configPath: string,
	options: { cause?: unknown } = {},
): ReelmatchError =>
	createReelmatchError(`Failed to parse configuration file: ${configPath}`, {
		name: 'ConfigParseError',
		code: 'CONFIG_PARSE',
		statusCode: 400,
		cause: options.cause,
		metadata: { configPath },
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigError = (
	value: unknown,
): value is ReelmatchError & { readonly code: `CONFIG_${string}` } =>
	isReelmatchError(value) && value.code.startsWith('CONFIG_');

export const isConfigNotFoundError = (
	value: unknown,
): value is ReelmatchError =>
	isReelmatchError(value) && value.code === 'CONFIG_NOT_FOUND';

export const isConfigValidationError = (
	value: unknown,
): value is ReelmatchError & { readonly issues: readonly ConfigIssue[] } =>
	isReelmatchError(value) &&
	value.code === 'CONFIG_VALIDATION' &&
	'issues' in value &&
	Array.isArray(value.issues);

export const isConfigParseError = (value: unknown): value is ReelmatchError =>
	isReelmatchError(value) && value.code === 'CONFIG_PARSE';
