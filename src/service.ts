// ---------------------------------------------------------------------------
// Reelmatch runtime: load-once initialisation and the public API
// ---------------------------------------------------------------------------
//
// `load()` reads the catalogue and fits the vector space exactly once.
// Until it has finished, every query rejects with ENGINE_NOT_READY; the
// hosting layer decides whether to wait or report "not ready".
// ---------------------------------------------------------------------------

import {
	type Catalogue,
	type CatalogueEntry,
	type CataloguePage,
	loadCatalogue,
} from './catalogue/index.js';
import {
	type ChatAssistant,
	type ChatProvider,
	createChatAssistant,
	createHttpChatProvider,
} from './chat/index.js';
import type { AppConfig } from './config/settings.js';
import {
	createCosineSimilarityEngine,
	fitVectorizer,
	type SimilarityEngine,
	type VectorSpace,
} from './engine/index.js';
import { createEngineNotReadyError, toError } from './errors/index.js';
import { getDefaultLogger, type Logger } from './logger.js';
import {
	createCachedMetadataClient,
	createTmdbClient,
	type MetadataClient,
} from './metadata/index.js';
import {
	createRecommender,
	type EnrichedRecommendation,
	enrichRecommendations,
	type Recommendation,
	type RecommendOutcome,
	type Recommender,
	type TextRecommendation,
} from './recommend/index.js';
import { type ResolveOutcome, resolveTitle } from './resolver/index.js';

export type ReelmatchStatus = 'idle' | 'loading' | 'ready' | 'failed';

export interface Reelmatch {
	readonly status: ReelmatchStatus;
	readonly config: AppConfig;
	/** Idempotent; concurrent callers share one load. Rethrows load errors. */
	readonly load: () => Promise<void>;
	readonly catalogue: Catalogue;
	readonly space: VectorSpace;
	readonly engine: SimilarityEngine;
	readonly metadata: MetadataClient;
	/** `undefined` when no chat API key is configured. */
	readonly chat: ChatAssistant | undefined;
	readonly recommend: (titleText: string, topN?: number) => RecommendOutcome;
	readonly recommendById: (movieId: number, topN?: number) => RecommendOutcome;
	readonly recommendByText: (
		description: string,
		topN?: number,
	) => TextRecommendation;
	readonly resolveTitle: (text: string) => ResolveOutcome;
	readonly lookup: (movieId: number) => CatalogueEntry | undefined;
	readonly browse: (
		tag: string,
		page?: number,
		pageSize?: number,
	) => CataloguePage;
	readonly search: (query: string, limit?: number) => readonly CatalogueEntry[];
	readonly enrich: (
		results: readonly Recommendation[],
	) => Promise<EnrichedRecommendation[]>;
}

export interface ReelmatchOptions {
	readonly logger?: Logger;
	/** Replaces the TMDB client (wrapped in the cache either way). */
	readonly metadataClient?: MetadataClient;
	/** Replaces the HTTP chat provider. */
	readonly chatProvider?: ChatProvider;
}

interface Loaded {
	readonly catalogue: Catalogue;
	readonly space: VectorSpace;
	readonly engine: SimilarityEngine;
	readonly recommender: Recommender;
	readonly chat: ChatAssistant | undefined;
}

export function createReelmatch(
	config: AppConfig,
	options: ReelmatchOptions = {},
): Reelmatch {
	const rootLogger = options.logger ?? getDefaultLogger();
	const logger = rootLogger.child('service');

	const metadata = createCachedMetadataClient(
		options.metadataClient ??
			createTmdbClient({ ...config.metadata, logger: rootLogger }),
		{ ttlMs: config.metadata.cacheTtlMs },
	);

	let status: ReelmatchStatus = 'idle';
	let loaded: Loaded | undefined;
	let loading: Promise<void> | undefined;

	const ready = (): Loaded => {
		if (status !== 'ready' || !loaded) {
			throw createEngineNotReadyError(status);
		}
		return loaded;
	};

	const buildChat = (catalogue: Catalogue): ChatAssistant | undefined => {
		const provider =
			options.chatProvider ??
			(config.chat.apiKey
				? createHttpChatProvider({
						baseUrl: config.chat.baseUrl,
						apiKey: config.chat.apiKey,
						timeoutMs: config.chat.timeoutMs,
					})
				: undefined);
		if (!provider) return undefined;
		return createChatAssistant({
			provider,
			catalogue,
			config: config.chat,
			metadata,
			logger: rootLogger,
		});
	};

	const doLoad = async (): Promise<void> => {
		const started = performance.now();
		const catalogue = await loadCatalogue(config.catalogue.path, {
			logger: rootLogger,
		});
		const space = fitVectorizer(
			catalogue.entries.map((entry) => entry.tags),
			{ ...config.vectorizer, logger: rootLogger },
		);
		const engine = createCosineSimilarityEngine(space, {
			cacheEntries: config.recommend.cacheEntries,
			logger: rootLogger,
		});
		const recommender = createRecommender({
			catalogue,
			space,
			engine,
			defaultTopN: config.recommend.defaultTopN,
			logger: rootLogger,
		});
		loaded = Object.freeze({
			catalogue,
			space,
			engine,
			recommender,
			chat: buildChat(catalogue),
		});
		logger.info('Ready', {
			movies: catalogue.size,
			vocabularySize: space.vocabularySize,
			durationMs: Math.round(performance.now() - started),
		});
	};

	const load = (): Promise<void> => {
		if (status === 'ready') return Promise.resolve();
		if (loading) return loading;

		status = 'loading';
		loading = doLoad().then(
			() => {
				status = 'ready';
				loading = undefined;
			},
			(error: unknown) => {
				status = 'failed';
				loading = undefined;
				logger.error('Load failed', toError(error));
				throw error;
			},
		);
		return loading;
	};

	return Object.freeze({
		get status() {
			return status;
		},
		config,
		load,
		get catalogue() {
			return ready().catalogue;
		},
		get space() {
			return ready().space;
		},
		get engine() {
			return ready().engine;
		},
		metadata,
		get chat() {
			return ready().chat;
		},
		recommend: (titleText: string, topN?: number) =>
			ready().recommender.recommend(titleText, topN),
		recommendById: (movieId: number, topN?: number) =>
			ready().recommender.recommendById(movieId, topN),
		recommendByText: (description: string, topN?: number) =>
			ready().recommender.recommendByText(description, topN),
		resolveTitle: (text: string) => resolveTitle(text, ready().catalogue),
		lookup: (movieId: number) => ready().catalogue.lookupById(movieId),
		browse: (tag: string, page?: number, pageSize?: number) =>
			ready().catalogue.pageByTag(tag, page, pageSize),
		search: (query: string, limit?: number) =>
			ready().catalogue.search(query, limit),
		enrich: (results: readonly Recommendation[]) =>
			enrichRecommendations(results, metadata, {
				concurrency: config.metadata.concurrency,
			}),
	});
}
