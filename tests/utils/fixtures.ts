// ---------------------------------------------------------------------------
// Shared test fixtures and fakes
// ---------------------------------------------------------------------------

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createServer, type Server } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { type Catalogue, createCatalogue } from '../../src/catalogue/index.js';
import type { ChatProvider } from '../../src/chat/index.js';
import { type AppConfig, defineConfig } from '../../src/config/index.js';
import {
	createCosineSimilarityEngine,
	fitVectorizer,
	type SimilarityEngine,
	type VectorSpace,
} from '../../src/engine/index.js';
import {
	createLogger,
	createMemoryTransport,
	type Logger,
	type MemoryTransportHandle,
} from '../../src/logger.js';
import {
	FALLBACK_DETAILS,
	type MetadataClient,
	type MovieDetails,
} from '../../src/metadata/index.js';
import type { FetchLike } from '../../src/utils/http.js';

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export function createTestLogger(): {
	logger: Logger;
	transport: MemoryTransportHandle;
} {
	const transport = createMemoryTransport();
	const logger = createLogger({
		context: 'test',
		level: 'debug',
		transports: [transport],
	});
	return { logger, transport };
}

export const silentLogger = (): Logger =>
	createLogger({ level: 'none', transports: [] });

// ---------------------------------------------------------------------------
// Catalogues
// ---------------------------------------------------------------------------

/** The three-movie catalogue from the end-to-end scenario. */
export const ABC_RECORDS = [
	{ movie_id: 1, title: 'A', tags: 'action hero fight' },
	{ movie_id: 2, title: 'B', tags: 'action hero battle' },
	{ movie_id: 3, title: 'C', tags: 'romance love story' },
];

export const FILM_RECORDS = [
	{ movie_id: 10, title: 'Inception', tags: 'dream heist thriller mind' },
	{ movie_id: 11, title: 'Interstellar', tags: 'space wormhole astronaut drama' },
	{ movie_id: 12, title: 'Toy Story', tags: 'animation toy friendship comedy' },
	{ movie_id: 13, title: 'Toy Story 2', tags: 'animation toy rescue comedy' },
	{ movie_id: 14, title: 'The Dark Knight', tags: 'batman joker crime thriller' },
	{ movie_id: 15, title: 'Batman Begins', tags: 'batman origin crime' },
	{ movie_id: 16, title: 'Gravity', tags: 'space astronaut survival' },
];

export interface Engine {
	readonly catalogue: Catalogue;
	readonly space: VectorSpace;
	readonly engine: SimilarityEngine;
}

export function buildEngine(
	records: readonly unknown[],
	logger: Logger = silentLogger(),
): Engine {
	const catalogue = createCatalogue(records, { logger });
	const space = fitVectorizer(
		catalogue.entries.map((entry) => entry.tags),
		{ logger },
	);
	const engine = createCosineSimilarityEngine(space, { logger });
	return { catalogue, space, engine };
}

/**
 * Write `records` to a fresh temp directory. Call `cleanup` when done.
 */
export async function writeCatalogueFile(
	records: readonly unknown[] | string,
): Promise<{ path: string; cleanup: () => Promise<void> }> {
	const dir = await mkdtemp(join(tmpdir(), 'reelmatch-'));
	const path = join(dir, 'movies.json');
	await writeFile(
		path,
		typeof records === 'string' ? records : JSON.stringify(records),
	);
	return { path, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function testConfig(cataloguePath = 'unused.json'): AppConfig {
	return defineConfig(
		{ catalogue: { path: cataloguePath } },
		{ env: {} },
	);
}

// ---------------------------------------------------------------------------
// Collaborator fakes
// ---------------------------------------------------------------------------

export const SAMPLE_DETAILS: MovieDetails = {
	rating: 8.4,
	voteCount: 1200,
	overview: 'A thief who steals secrets through dreams.',
	runtime: 148,
	releaseDate: '2010-07-16',
	genres: ['Action', 'Science Fiction'],
	cast: ['Lead Actor', 'Second Actor'],
	videos: [{ type: 'Trailer', key: 'abc123', site: 'YouTube' }],
};

export function createFakeMetadataClient(
	overrides: Partial<MetadataClient> = {},
): MetadataClient {
	return {
		fetchDetails: vi.fn(async () => ({ ok: true as const, value: SAMPLE_DETAILS })),
		fetchPoster: vi.fn(async (movieId: number) => ({
			ok: true as const,
			value: `https://img.test/${movieId}.jpg`,
		})),
		searchExternal: vi.fn(async () => ({
			ok: true as const,
			value: {
				posterUrl: 'https://img.test/external.jpg',
				rating: 7,
				releaseDate: '1999-03-31',
				overview: FALLBACK_DETAILS.overview,
				tmdbId: 99,
			},
		})),
		...overrides,
	};
}

export function createFakeChatProvider(reply: string | Error): ChatProvider {
	return {
		complete: vi.fn(async () => {
			if (reply instanceof Error) throw reply;
			return reply;
		}),
	};
}

export interface RecordedRequest {
	readonly url: string;
	readonly init?: RequestInit;
}

/**
 * A `fetch` stand-in that answers every request through `handler` and
 * records what was asked.
 */
export function createFakeFetch(
	handler: (url: string, init?: RequestInit) => Response | Promise<Response>,
): { fetch: FetchLike; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];
	const fetch: FetchLike = async (url, init) => {
		requests.push({ url, init });
		return handler(url, init);
	};
	return { fetch, requests };
}

export const jsonResponse = (body: unknown, status = 200): Response =>
	new Response(JSON.stringify(body), {
		status,
		headers: { 'Content-Type': 'application/json' },
	});

/** Hold a loopback port so a second listener fails with EADDRINUSE. */
export async function holdPort(): Promise<{ port: number; release: () => Promise<void> }> {
	const blocker: Server = createServer();
	await new Promise<void>((resolve) => blocker.listen(0, '127.0.0.1', resolve));
	const address = blocker.address();
	const port = typeof address === 'object' && address !== null ? address.port : 0;
	return {
		port,
		release: () => new Promise<void>((resolve) => blocker.close(() => resolve())),
	};
}
