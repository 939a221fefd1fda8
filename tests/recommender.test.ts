import { describe, expect, it } from 'vitest';
import {
	createRecommender,
	DEFAULT_TOP_N,
	type Recommender,
	toOutcomeJson,
} from '../src/recommend/index.js';
import {
	ABC_RECORDS,
	buildEngine,
	createTestLogger,
	FILM_RECORDS,
	silentLogger,
} from './utils/fixtures.js';

const recommenderFor = (
	records: readonly unknown[],
	defaultTopN?: number,
): Recommender => {
	const logger = silentLogger();
	return createRecommender({ ...buildEngine(records, logger), defaultTopN, logger });
};

/** Twenty movies over a small shared vocabulary, so many rows overlap. */
const GRID_RECORDS = Array.from({ length: 20 }, (_, i) => ({
	movie_id: 100 + i,
	title: `Movie ${i}`,
	tags: ['drama', i % 2 ? 'space' : 'crime', i % 3 ? 'heist' : 'romance', `unique${i}`].join(' '),
}));

describe('recommend', () => {
	it('should rank the movie with more shared vocabulary first', () => {
		const outcome = recommenderFor(ABC_RECORDS).recommend('A', 2);

		expect(outcome.status).toBe('ok');
		if (outcome.status !== 'ok') return;
		expect(outcome.query).toEqual({ movieId: 1, title: 'A', row: 0, match: 'exact' });
		expect(outcome.results.map((r) => r.movieId)).toEqual([2, 3]);
		expect(outcome.results[0].score).toBeCloseTo(0.5363499141, 9);
		expect(outcome.results[1]).toEqual({ title: 'C', movieId: 3, score: 0, row: 2 });
	});

	it('never includes the queried movie', () => {
		const recommender = recommenderFor(GRID_RECORDS);
		for (const record of GRID_RECORDS) {
			const outcome = recommender.recommend(record.title, 50);
			expect(outcome.status === 'ok' && outcome.results.some((r) => r.movieId === record.movie_id)).toBe(
				false,
			);
		}
	});

	it('returns exactly n results in non-increasing score order', () => {
		const outcome = recommenderFor(GRID_RECORDS).recommend('Movie 4', 7);

		expect(outcome.status === 'ok' && outcome.results).toHaveLength(7);
		if (outcome.status !== 'ok') return;
		for (let i = 1; i < outcome.results.length; i++) {
			const prev = outcome.results[i - 1];
			const curr = outcome.results[i];
			expect(prev.score).toBeGreaterThanOrEqual(curr.score);
			if (prev.score === curr.score) expect(prev.row).toBeLessThan(curr.row);
		}
	});

	it('should return every other movie when the catalogue is small', () => {
		const outcome = recommenderFor(ABC_RECORDS).recommend('B', 12);
		expect(outcome.status === 'ok' && outcome.results.map((r) => r.movieId)).toEqual([1, 3]);
	});

	it('is deterministic across calls', () => {
		const recommender = recommenderFor(GRID_RECORDS);
		const first = recommender.recommend('Movie 9', 10);
		const second = recommender.recommend('Movie 9', 10);
		expect(second).toEqual(first);
	});

	it('uses the default top-n', () => {
		expect(DEFAULT_TOP_N).toBe(12);
		const outcome = recommenderFor(GRID_RECORDS).recommend('Movie 0');
		expect(outcome.status === 'ok' && outcome.results).toHaveLength(12);

		const custom = recommenderFor(GRID_RECORDS, 3).recommend('Movie 0');
		expect(custom.status === 'ok' && custom.results).toHaveLength(3);
	});

	it('should resolve partial titles', () => {
		const outcome = recommenderFor(FILM_RECORDS).recommend('dark knight', 2);
		expect(outcome.status === 'ok' && outcome.query.match).toBe('substring');
		expect(outcome.status === 'ok' && outcome.results[0].title).toBe('Batman Begins');
	});

	it('returns a structured not-found outcome', () => {
		const { logger, transport } = createTestLogger();
		const recommender = createRecommender({ ...buildEngine(FILM_RECORDS), logger });

		const outcome = recommender.recommend('xyzzynotamovie');

		expect(outcome.status).toBe('not_found');
		expect(outcome.results).toEqual([]);
		if (outcome.status === 'not_found') {
			expect(outcome.query).toBe('xyzzynotamovie');
			expect(outcome.reason).toBe('No movie matches "xyzzynotamovie"');
			expect(outcome.error.code).toBe('TITLE_NOT_FOUND');
		}
		expect(transport.filter('info')[0].message).toBe('No catalogue match');
	});
});

describe('recommendById', () => {
	it('skips title resolution', () => {
		const outcome = recommenderFor(ABC_RECORDS).recommendById(3, 1);
		expect(outcome.status === 'ok' && outcome.query.match).toBe('id');
		expect(outcome.status === 'ok' && outcome.results).toHaveLength(1);
	});

	it('should report unknown ids as not found', () => {
		const outcome = recommenderFor(ABC_RECORDS).recommendById(404);
		expect(outcome.status).toBe('not_found');
		expect(outcome.status === 'not_found' && outcome.reason).toBe('No movie matches "404"');
	});
});

describe('recommendByText', () => {
	it('ranks catalogue movies against a description', () => {
		const { results } = recommenderFor(FILM_RECORDS).recommendByText('space astronaut', 1);
		expect(results.map((r) => r.title)).toEqual(['Gravity']);
	});

	it('returns nothing when no term is in the vocabulary', () => {
		const outcome = recommenderFor(FILM_RECORDS).recommendByText('the of and');
		expect(outcome).toEqual({ query: 'the of and', results: [] });
	});
});

describe('toOutcomeJson', () => {
	it('should drop the error object from a not-found outcome', () => {
		const outcome = recommenderFor(ABC_RECORDS).recommend('nothing like it');
		expect(toOutcomeJson(outcome)).toEqual({
			status: 'not_found',
			query: 'nothing like it',
			reason: 'No movie matches "nothing like it"',
			results: [],
		});
	});
});
