// ---------------------------------------------------------------------------
// Configuration Validation
// ---------------------------------------------------------------------------
//
// Validators accept the typed input interfaces; TypeScript covers
// structure, these only check semantic constraints: URL format, numeric
// ranges, enumerations, and non-empty strings.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Validation primitives
// ---------------------------------------------------------------------------

export interface ValidationIssue {
	readonly path: string;
	readonly message: string;
}

const issue = (path: string, message: string): readonly ValidationIssue[] =>
	Object.freeze([Object.freeze({ path, message })]);

const ok: readonly ValidationIssue[] = Object.freeze([]);

const combine = (
	...results: ReadonlyArray<readonly ValidationIssue[]>
): readonly ValidationIssue[] => Object.freeze(results.flat());

// ---------------------------------------------------------------------------
// Reusable semantic validators
// ---------------------------------------------------------------------------

const validateNonEmpty = (
	value: string | undefined,
	path: string,
	label: string,
): readonly ValidationIssue[] => {
	if (value === undefined) return ok;
	if (value.trim().length === 0) return issue(path, `${label} cannot be empty`);
	return ok;
};

const validateUrl = (
	value: string | undefined,
	path: string,
	label: string,
): readonly ValidationIssue[] => {
	if (value === undefined) return ok;
	try {
		new URL(value);
		return ok;
	} catch {
		return issue(path, `${label} must be a valid URL`);
	}
};

const validateRange = (
	value: number | undefined,
	path: string,
	label: string,
	constraints: {
		readonly min?: number;
		readonly max?: number;
		readonly integer?: boolean;
	},
): readonly ValidationIssue[] => {
	if (value === undefined) return ok;
	if (typeof value !== 'number' || Number.isNaN(value))
		return issue(path, `${label} must be a number`);
	if (constraints.integer && !Number.isInteger(value))
		return issue(path, `${label} must be an integer`);
	if (constraints.min !== undefined && value < constraints.min)
		return issue(path, `${label} must be at least ${constraints.min}`);
	if (constraints.max !== undefined && value > constraints.max)
		return issue(path, `${label} must be at most ${constraints.max}`);
	return ok;
};

const validateOneOf = (
	value: string | undefined,
	allowed: readonly string[],
	path: string,
	label: string,
): readonly ValidationIssue[] => {
	if (value === undefined || allowed.includes(value)) return ok;
	return issue(path, `${label} must be one of: ${allowed.join(', ')}`);
};

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

export interface CatalogueConfigInput {
	/** Path to the JSON catalogue. Required. */
	readonly path: string;
}

export const validateCatalogueConfig = (
	input: CatalogueConfigInput | undefined,
	path = 'catalogue',
): readonly ValidationIssue[] => {
	if (!input || typeof input.path !== 'string') {
		return issue(`${path}.path`, 'Catalogue path is required');
	}
	return validateNonEmpty(input.path, `${path}.path`, 'Catalogue path');
};

// ---------------------------------------------------------------------------
// Vectorizer
// ---------------------------------------------------------------------------

export interface VectorizerConfigInput {
	readonly maxFeatures?: number;
	readonly stopWords?: 'english' | 'none';
}

export const validateVectorizerConfig = (
	input: VectorizerConfigInput | undefined,
	path = 'vectorizer',
): readonly ValidationIssue[] => {
	if (!input) return ok;
	return combine(
		validateRange(input.maxFeatures, `${path}.maxFeatures`, 'maxFeatures', {
			min: 1,
			max: 1_000_000,
			integer: true,
		}),
		validateOneOf(
			input.stopWords,
			['english', 'none'],
			`${path}.stopWords`,
			'stopWords',
		),
	);
};

// ---------------------------------------------------------------------------
// Recommendation
// ---------------------------------------------------------------------------

export interface RecommendConfigInput {
	readonly defaultTopN?: number;
	readonly cacheEntries?: number;
}

export const validateRecommendConfig = (
	input: RecommendConfigInput | undefined,
	path = 'recommend',
): readonly ValidationIssue[] => {
	if (!input) return ok;
	return combine(
		validateRange(input.defaultTopN, `${path}.defaultTopN`, 'defaultTopN', {
			min: 1,
			max: 100,
			integer: true,
		}),
		validateRange(
			input.cacheEntries,
			`${path}.cacheEntries`,
			'cacheEntries',
			{ min: 0, max: 100_000, integer: true },
		),
	);
};

// ---------------------------------------------------------------------------
// Metadata collaborator
// ---------------------------------------------------------------------------

export interface MetadataConfigInput {
	readonly baseUrl?: string;
	readonly imageBaseUrl?: string;
	readonly apiKey?: string;
	readonly language?: string;
	readonly timeoutMs?: number;
	readonly cacheTtlMs?: number;
	readonly placeholderPosterUrl?: string;
	readonly concurrency?: number;
}

export const validateMetadataConfig = (
	input: MetadataConfigInput | undefined,
	path = 'metadata',
): readonly ValidationIssue[] => {
	if (!input) return ok;
	return combine(
		validateUrl(input.baseUrl, `${path}.baseUrl`, 'Metadata base URL'),
		validateUrl(
			input.imageBaseUrl,
			`${path}.imageBaseUrl`,
			'Metadata image base URL',
		),
		validateUrl(
			input.placeholderPosterUrl,
			`${path}.placeholderPosterUrl`,
			'Placeholder poster URL',
		),
		validateNonEmpty(input.apiKey, `${path}.apiKey`, 'Metadata API key'),
		validateNonEmpty(input.language, `${path}.language`, 'Metadata language'),
		validateRange(input.timeoutMs, `${path}.timeoutMs`, 'timeoutMs', {
			min: 100,
			max: 60_000,
			integer: true,
		}),
		validateRange(input.cacheTtlMs, `${path}.cacheTtlMs`, 'cacheTtlMs', {
			min: 0,
			integer: true,
		}),
		validateRange(input.concurrency, `${path}.concurrency`, 'concurrency', {
			min: 1,
			max: 32,
			integer: true,
		}),
	);
};

// ---------------------------------------------------------------------------
// Chat collaborator
// ---------------------------------------------------------------------------

export interface ChatConfigInput {
	readonly baseUrl?: string;
	readonly model?: string;
	readonly apiKey?: string;
	readonly maxTokens?: number;
	readonly temperature?: number;
	readonly historyLimit?: number;
	readonly contextLimit?: number;
	readonly timeoutMs?: number;
}

export const validateChatConfig = (
	input: ChatConfigInput | undefined,
	path = 'chat',
): readonly ValidationIssue[] => {
	if (!input) return ok;
	return combine(
		validateUrl(input.baseUrl, `${path}.baseUrl`, 'Chat base URL'),
		validateNonEmpty(input.model, `${path}.model`, 'Chat model'),
		validateNonEmpty(input.apiKey, `${path}.apiKey`, 'Chat API key'),
		validateRange(input.maxTokens, `${path}.maxTokens`, 'maxTokens', {
			min: 1,
			max: 128_000,
			integer: true,
		}),
		validateRange(input.temperature, `${path}.temperature`, 'temperature', {
			min: 0,
			max: 2,
		}),
		validateRange(input.historyLimit, `${path}.historyLimit`, 'historyLimit', {
			min: 0,
			max: 100,
			integer: true,
		}),
		validateRange(input.contextLimit, `${path}.contextLimit`, 'contextLimit', {
			min: 1,
			max: 100,
			integer: true,
		}),
		validateRange(input.timeoutMs, `${path}.timeoutMs`, 'timeoutMs', {
			min: 100,
			max: 300_000,
			integer: true,
		}),
	);
};

// ---------------------------------------------------------------------------
// HTTP server
// ---------------------------------------------------------------------------

export interface ServerConfigInput {
	readonly host?: string;
	readonly port?: number;
}

export const validateServerConfig = (
	input: ServerConfigInput | undefined,
	path = 'server',
): readonly ValidationIssue[] => {
	if (!input) return ok;
	return combine(
		validateNonEmpty(input.host, `${path}.host`, 'Server host'),
		validateRange(input.port, `${path}.port`, 'port', {
			min: 0,
			max: 65_535,
			integer: true,
		}),
	);
};

// ---------------------------------------------------------------------------
// Top-level
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'none'] as const;

export interface AppConfigInput {
	readonly catalogue: CatalogueConfigInput;
	readonly vectorizer?: VectorizerConfigInput;
	readonly recommend?: RecommendConfigInput;
	readonly metadata?: MetadataConfigInput;
	readonly chat?: ChatConfigInput;
	readonly server?: ServerConfigInput;
	readonly logLevel?: (typeof LOG_LEVELS)[number];
}

export const validateAppConfig = (
	input: AppConfigInput,
): readonly ValidationIssue[] =>
	combine(
		validateCatalogueConfig(input.catalogue),
		validateVectorizerConfig(input.vectorizer),
		validateRecommendConfig(input.recommend),
		validateMetadataConfig(input.metadata),
		validateChatConfig(input.chat),
		validateServerConfig(input.server),
		validateOneOf(input.logLevel, LOG_LEVELS, 'logLevel', 'logLevel'),
	);

export const formatValidationIssues = (
	issues: readonly ValidationIssue[],
): string => issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n');
