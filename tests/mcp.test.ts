import { beforeAll, afterAll, describe, expect, it } from 'vitest';
import {
	createReelmatchToolHandlers,
	formatRecommendations,
	type ReelmatchToolHandlers,
	type ToolResult,
} from '../src/mcp/index.js';
import { createReelmatch } from '../src/service.js';
import {
	createFakeMetadataClient,
	FILM_RECORDS,
	silentLogger,
	testConfig,
	writeCatalogueFile,
} from './utils/fixtures.js';

const textOf = (result: ToolResult): string => result.content.map((c) => c.text).join('');

describe('formatRecommendations', () => {
	it('should number each result with a three-decimal score', () => {
		expect(
			formatRecommendations([
				{ title: 'B', movieId: 2, score: 0.5363499141, row: 1 },
				{ title: 'C', movieId: 3, score: 0, row: 2 },
			]),
		).toBe('1. B (ID: 2) score 0.536\n2. C (ID: 3) score 0.000');
	});
});

describe('tool handlers', () => {
	let handlers: ReelmatchToolHandlers;
	let cleanup: () => Promise<void>;

	beforeAll(async () => {
		const file = await writeCatalogueFile(FILM_RECORDS);
		cleanup = file.cleanup;
		const service = createReelmatch(testConfig(file.path), {
			logger: silentLogger(),
			metadataClient: createFakeMetadataClient(),
		});
		await service.load();
		handlers = createReelmatchToolHandlers(service, silentLogger());
	});

	afterAll(async () => {
		await cleanup();
	});

	it('recommends movies as text', () => {
		const result = handlers.recommendMovies({ title: 'toy story', n: 1 });
		expect(result.isError).toBeUndefined();
		expect(textOf(result)).toBe('Because you liked Toy Story:\n1. Toy Story 2 (ID: 13) score 0.674');
	});

	it('recommends movies as JSON', () => {
		const result = handlers.recommendMovies({ title: 'Gravity', n: 1, format: 'json' });
		expect(JSON.parse(textOf(result))).toMatchObject({
			status: 'ok',
			query: { movieId: 16, title: 'Gravity', match: 'exact' },
			results: [{ title: 'Interstellar', movieId: 11 }],
		});
	});

	it('should flag unknown titles as errors', () => {
		const result = handlers.recommendMovies({ title: 'xyzzy' });
		expect(result).toEqual({
			content: [{ type: 'text', text: 'Not found: No movie matches "xyzzy"' }],
			isError: true,
		});
	});

	it('recommends by description', () => {
		expect(textOf(handlers.recommendByDescription({ description: 'batman', n: 2 }))).toMatch(
			/^1\. (The Dark Knight|Batman Begins) \(ID: 1[45]\) score 0\.\d{3}\n2\. /,
		);
		expect(textOf(handlers.recommendByDescription({ description: 'the of' }))).toBe(
			'No catalogue movie matches that description.',
		);
	});

	it('resolves titles', () => {
		expect(JSON.parse(textOf(handlers.resolveTitle({ title: 'INCEPTION' })))).toEqual({
			movieId: 10,
			title: 'Inception',
			match: 'exact',
			ratio: 1,
		});
		expect(handlers.resolveTitle({ title: 'xyzzy' }).isError).toBe(true);
	});

	it('should search the catalogue', () => {
		expect(JSON.parse(textOf(handlers.searchCatalogue({ query: 'space', limit: 5 })))).toEqual([
			{ movieId: 11, title: 'Interstellar' },
			{ movieId: 16, title: 'Gravity' },
		]);
	});
});

describe('tool handlers before loading', () => {
	it('reports the engine as not ready', () => {
		const service = createReelmatch(testConfig(), {
			logger: silentLogger(),
			metadataClient: createFakeMetadataClient(),
		});
		const handlers = createReelmatchToolHandlers(service, silentLogger());

		expect(handlers.searchCatalogue({ query: 'space' })).toEqual({
			content: [
				{ type: 'text', text: 'Error: Recommendation engine is not ready (status: idle)' },
			],
			isError: true,
		});
	});
});
