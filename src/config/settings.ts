// ---------------------------------------------------------------------------
// Configuration: pure interfaces + functional validation
// ---------------------------------------------------------------------------
//
// `defineConfig` is a pure function that validates a plain object and
// returns a frozen, fully-resolved `AppConfig`. `loadConfigFile` reads the
// same shape from a JSON file.
// ---------------------------------------------------------------------------

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import type { StopWordsOption } from '../engine/index.js';
import {
	createConfigNotFoundError,
	createConfigParseError,
	createConfigValidationError,
} from '../errors/index.js';
import type { LogLevel } from '../logger.js';
import {
	type AppConfigInput,
	type CatalogueConfigInput,
	type ChatConfigInput,
	LOG_LEVELS,
	type MetadataConfigInput,
	type RecommendConfigInput,
	type ServerConfigInput,
	type ValidationIssue,
	type VectorizerConfigInput,
	validateAppConfig,
} from './schema.js';

export type {
	AppConfigInput,
	CatalogueConfigInput,
	ChatConfigInput,
	MetadataConfigInput,
	RecommendConfigInput,
	ServerConfigInput,
	ValidationIssue,
	VectorizerConfigInput,
};

// ---------------------------------------------------------------------------
// Resolved config interfaces (output: all defaults applied)
// ---------------------------------------------------------------------------

export interface CatalogueConfig {
	readonly path: string;
}

export interface VectorizerConfig {
	readonly maxFeatures: number;
	readonly stopWords: StopWordsOption;
}

export interface RecommendConfig {
	readonly defaultTopN: number;
	readonly cacheEntries: number;
}

export interface MetadataConfig {
	readonly baseUrl: string;
	readonly imageBaseUrl: string;
	readonly apiKey?: string;
	readonly language: string;
	readonly timeoutMs: number;
	readonly cacheTtlMs: number;
	readonly placeholderPosterUrl: string;
	readonly concurrency: number;
}

export interface ChatConfig {
	readonly baseUrl: string;
	readonly model: string;
	readonly apiKey?: string;
	readonly maxTokens: number;
	readonly temperature: number;
	readonly historyLimit: number;
	readonly contextLimit: number;
	readonly timeoutMs: number;
}

export interface ServerConfig {
	readonly host: string;
	readonly port: number;
}

export interface AppConfig {
	readonly catalogue: CatalogueConfig;
	readonly vectorizer: VectorizerConfig;
	readonly recommend: RecommendConfig;
	readonly metadata: MetadataConfig;
	readonly chat: ChatConfig;
	readonly server: ServerConfig;
	readonly logLevel: LogLevel;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_METADATA_BASE_URL = 'https://api.themoviedb.org/3';
export const DEFAULT_IMAGE_BASE_URL = 'https://image.tmdb.org/t/p/w500';
export const DEFAULT_PLACEHOLDER_POSTER_URL =
	'https://via.placeholder.com/500x750?text=No+Image';
export const DEFAULT_CHAT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

// ---------------------------------------------------------------------------
// Options for defineConfig
// ---------------------------------------------------------------------------

export interface DefineConfigOptions {
	/**
	 * If `true`, invalid fields fall back to their defaults and the issues
	 * are passed to `onWarn` instead of throwing. The catalogue path is
	 * required either way. Defaults to `false`.
	 */
	readonly lenient?: boolean;
	readonly onWarn?: (issues: readonly ValidationIssue[]) => void;
	/** Environment used for API key fallbacks. Defaults to `process.env`. */
	readonly env?: Readonly<Record<string, string | undefined>>;
}

// ---------------------------------------------------------------------------
// defineConfig
// ---------------------------------------------------------------------------

/**
 * Create a validated `AppConfig` from a user-supplied configuration object.
 *
 * API keys fall back to `TMDB_API_KEY` and `OPENAI_API_KEY`.
 *
 * @throws {ConfigValidationError} when validation fails (unless lenient).
 *
 * @example
 * ```ts
 * const config = defineConfig({
 *   catalogue: { path: "./data/movies.json" },
 *   recommend: { defaultTopN: 8 },
 * });
 * ```
 */
export const defineConfig = (
	input: AppConfigInput,
	options: DefineConfigOptions = {},
): AppConfig => {
	const env = options.env ?? process.env;
	const issues = validateAppConfig(input);

	if (issues.length > 0) {
		const catalogueInvalid = issues.some((i) => i.path.startsWith('catalogue'));
		if (!options.lenient || catalogueInvalid) {
			throw createConfigValidationError(issues);
		}
		options.onWarn?.(issues);
	}

	const invalid = new Set(issues.map((i) => i.path));
	const valid = <T>(value: T | undefined, path: string): T | undefined =>
		invalid.has(path) ? undefined : value;

	const { vectorizer, recommend, metadata, chat, server } = input;

	return Object.freeze({
		catalogue: Object.freeze({ path: input.catalogue.path }),
		vectorizer: Object.freeze({
			maxFeatures:
				valid(vectorizer?.maxFeatures, 'vectorizer.maxFeatures') ?? 5000,
			stopWords: valid(vectorizer?.stopWords, 'vectorizer.stopWords') ?? 'english',
		}),
		recommend: Object.freeze({
			defaultTopN: valid(recommend?.defaultTopN, 'recommend.defaultTopN') ?? 12,
			cacheEntries:
				valid(recommend?.cacheEntries, 'recommend.cacheEntries') ?? 256,
		}),
		metadata: Object.freeze({
			baseUrl:
				valid(metadata?.baseUrl, 'metadata.baseUrl') ??
				DEFAULT_METADATA_BASE_URL,
			imageBaseUrl:
				valid(metadata?.imageBaseUrl, 'metadata.imageBaseUrl') ??
				DEFAULT_IMAGE_BASE_URL,
			apiKey:
				valid(metadata?.apiKey, 'metadata.apiKey') ??
				(env.TMDB_API_KEY || undefined),
			language: valid(metadata?.language, 'metadata.language') ?? 'en-US',
			timeoutMs: valid(metadata?.timeoutMs, 'metadata.timeoutMs') ?? 5000,
			cacheTtlMs:
				valid(metadata?.cacheTtlMs, 'metadata.cacheTtlMs') ?? 3_600_000,
			placeholderPosterUrl:
				valid(metadata?.placeholderPosterUrl, 'metadata.placeholderPosterUrl') ??
				DEFAULT_PLACEHOLDER_POSTER_URL,
			concurrency: valid(metadata?.concurrency, 'metadata.concurrency') ?? 5,
		}),
		chat: Object.freeze({
			baseUrl: valid(chat?.baseUrl, 'chat.baseUrl') ?? DEFAULT_CHAT_BASE_URL,
			model: valid(chat?.model, 'chat.model') ?? DEFAULT_CHAT_MODEL,
			apiKey:
				valid(chat?.apiKey, 'chat.apiKey') ?? (env.OPENAI_API_KEY || undefined),
			maxTokens: valid(chat?.maxTokens, 'chat.maxTokens') ?? 1500,
			temperature: valid(chat?.temperature, 'chat.temperature') ?? 0.7,
			historyLimit: valid(chat?.historyLimit, 'chat.historyLimit') ?? 10,
			contextLimit: valid(chat?.contextLimit, 'chat.contextLimit') ?? 15,
			timeoutMs: valid(chat?.timeoutMs, 'chat.timeoutMs') ?? 30_000,
		}),
		server: Object.freeze({
			host: valid(server?.host, 'server.host') ?? '127.0.0.1',
			port: valid(server?.port, 'server.port') ?? 3000,
		}),
		logLevel: valid(input.logLevel, 'logLevel') ?? 'info',
	});
};

// ---------------------------------------------------------------------------
// Loading from disk
// ---------------------------------------------------------------------------

const configFileSchema = z.object({
	catalogue: z.object({ path: z.string() }),
	vectorizer: z
		.object({
			maxFeatures: z.number().optional(),
			stopWords: z.enum(['english', 'none']).optional(),
		})
		.optional(),
	recommend: z
		.object({
			defaultTopN: z.number().optional(),
			cacheEntries: z.number().optional(),
		})
		.optional(),
	metadata: z
		.object({
			baseUrl: z.string().optional(),
			imageBaseUrl: z.string().optional(),
			apiKey: z.string().optional(),
			language: z.string().optional(),
			timeoutMs: z.number().optional(),
			cacheTtlMs: z.number().optional(),
			placeholderPosterUrl: z.string().optional(),
			concurrency: z.number().optional(),
		})
		.optional(),
	chat: z
		.object({
			baseUrl: z.string().optional(),
			model: z.string().optional(),
			apiKey: z.string().optional(),
			maxTokens: z.number().optional(),
			temperature: z.number().optional(),
			historyLimit: z.number().optional(),
			contextLimit: z.number().optional(),
			timeoutMs: z.number().optional(),
		})
		.optional(),
	server: z
		.object({
			host: z.string().optional(),
			port: z.number().optional(),
		})
		.optional(),
	logLevel: z.enum(LOG_LEVELS).optional(),
});

const hasErrnoCode = (error: unknown, code: string): boolean =>
	error instanceof Error && 'code' in error && error.code === code;

/**
 * Read and resolve a JSON config file. A relative `catalogue.path` is
 * resolved against the file's directory.
 */
export const loadConfigFile = async (
	configPath: string,
	options: DefineConfigOptions = {},
): Promise<AppConfig> => {
	let text: string;
	try {
		text = await readFile(configPath, 'utf-8');
	} catch (error) {
		if (hasErrnoCode(error, 'ENOENT')) {
			throw createConfigNotFoundError(configPath, { cause: error });
		}
		throw createConfigParseError(configPath, { cause: error });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw createConfigParseError(configPath, { cause: error });
	}

	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		throw createConfigValidationError(
			parsed.error.issues.map((i) => ({
				path: i.path.join('.'),
				message: i.message,
			})),
		);
	}

	const input = parsed.data;
	const cataloguePath =
		input.catalogue.path.trim() === '' || isAbsolute(input.catalogue.path)
			? input.catalogue.path
			: resolve(dirname(configPath), input.catalogue.path);

	return defineConfig(
		{ ...input, catalogue: { path: cataloguePath } },
		options,
	);
};
