import { describe, expect, it, vi } from 'vitest';
import { createExternalTimeoutError } from '../src/errors/index.js';
import { createCachedMetadataClient, FALLBACK_DETAILS } from '../src/metadata/index.js';
import { enrichRecommendations } from '../src/recommend/index.js';
import { createFakeMetadataClient, SAMPLE_DETAILS } from './utils/fixtures.js';

describe('createCachedMetadataClient', () => {
	it('should serve repeated lookups from the cache', async () => {
		const inner = createFakeMetadataClient();
		const client = createCachedMetadataClient(inner);

		await client.fetchDetails(1);
		const second = await client.fetchDetails(1);
		await client.fetchDetails(2);

		expect(second).toEqual({ ok: true, value: SAMPLE_DETAILS });
		expect(inner.fetchDetails).toHaveBeenCalledTimes(2);
	});

	it('does not cache failures', async () => {
		const fetchPoster = vi
			.fn()
			.mockResolvedValueOnce({
				ok: false,
				error: createExternalTimeoutError('poster', 100),
				value: 'placeholder',
			})
			.mockResolvedValueOnce({ ok: true, value: 'https://img.test/1.jpg' });
		const client = createCachedMetadataClient(createFakeMetadataClient({ fetchPoster }));

		expect((await client.fetchPoster(1)).ok).toBe(false);
		expect(await client.fetchPoster(1)).toEqual({ ok: true, value: 'https://img.test/1.jpg' });
		expect(await client.fetchPoster(1)).toEqual({ ok: true, value: 'https://img.test/1.jpg' });
		expect(fetchPoster).toHaveBeenCalledTimes(2);
	});

	it('expires entries after the ttl', async () => {
		let clock = 0;
		const inner = createFakeMetadataClient();
		const client = createCachedMetadataClient(inner, { ttlMs: 1000, now: () => clock });

		await client.fetchPoster(1);
		clock = 999;
		await client.fetchPoster(1);
		clock = 1000;
		await client.fetchPoster(1);

		expect(inner.fetchPoster).toHaveBeenCalledTimes(2);
	});

	it('keys searches by lowercased title and year', async () => {
		const inner = createFakeMetadataClient();
		const client = createCachedMetadataClient(inner);

		await client.searchExternal('Heat', 1995);
		await client.searchExternal('HEAT', 1995);
		await client.searchExternal('Heat');

		expect(inner.searchExternal).toHaveBeenCalledTimes(2);
	});
});

describe('enrichRecommendations', () => {
	const results = [
		{ title: 'A', movieId: 1, score: 0.9, row: 0 },
		{ title: 'B', movieId: 2, score: 0.5, row: 1 },
	];

	it('attaches poster and details in order', async () => {
		const enriched = await enrichRecommendations(results, createFakeMetadataClient());

		expect(enriched.map((e) => [e.movieId, e.poster])).toEqual([
			[1, 'https://img.test/1.jpg'],
			[2, 'https://img.test/2.jpg'],
		]);
		expect(enriched[0].details).toBe(SAMPLE_DETAILS);
		expect(enriched[0].degraded).toBe(false);
		expect(enriched[0].errors).toEqual([]);
	});

	it('should mark items whose lookups fell back', async () => {
		const error = createExternalTimeoutError('metadata', 100);
		const client = createFakeMetadataClient({
			fetchDetails: vi.fn(async (movieId: number) =>
				movieId === 2
					? { ok: false as const, error, value: FALLBACK_DETAILS }
					: { ok: true as const, value: SAMPLE_DETAILS },
			),
		});

		const enriched = await enrichRecommendations(results, client, { concurrency: 1 });

		expect(enriched[0].degraded).toBe(false);
		expect(enriched[1].degraded).toBe(true);
		expect(enriched[1].details).toBe(FALLBACK_DETAILS);
		expect(enriched[1].errors).toEqual([error]);
		expect(enriched[1].score).toBe(0.5);
	});
});
