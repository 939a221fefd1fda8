/**
 * Reelmatch: Basic Usage Example
 *
 * Demonstrates:
 * - Configuration with defineConfig()
 * - Loading the catalogue and fitting the vector space
 * - Recommendations by title (exact, case-insensitive and partial) and by id
 * - Free-text recommendations
 * - Browsing by tag
 * - Logging
 *
 * Metadata enrichment runs only when TMDB_API_KEY is set.
 *
 * Run:
 *   npx tsx example/basic.ts
 */

import { fileURLToPath } from 'node:url';
import {
	createConsoleTransport,
	createLogger,
	createReelmatch,
	defineConfig,
	formatRecommendations,
} from '../src/lib.js';

const logger = createLogger({
	context: 'example',
	level: 'info',
	transports: [createConsoleTransport()],
});

const config = defineConfig({
	catalogue: {
		path: fileURLToPath(new URL('../data/movies.json', import.meta.url)),
	},
	recommend: { defaultTopN: 5 },
});

const reelmatch = createReelmatch(config, { logger });
await reelmatch.load();

// ---- By title -------------------------------------------------------------
for (const query of ['The Dark Knight', 'toy story', 'matrix']) {
	const outcome = reelmatch.recommend(query);
	if (outcome.status === 'not_found') {
		logger.warn('No match', { query, reason: outcome.reason });
		continue;
	}
	logger.info(`"${query}" resolved to ${outcome.query.title} (${outcome.query.match})`);
	console.log(formatRecommendations(outcome.results));
}

// ---- By id ----------------------------------------------------------------
const byId = reelmatch.recommendById(603, 3);
if (byId.status === 'ok') console.log(formatRecommendations(byId.results));

// ---- Free text ------------------------------------------------------------
const { results } = reelmatch.recommendByText('space astronaut future', 3);
console.log(formatRecommendations(results));

// ---- Browse ---------------------------------------------------------------
const page = reelmatch.browse('animation', 1, 4);
logger.info('Animation', {
	titles: page.entries.map((e) => e.title),
	total: page.total,
	hasMore: page.hasMore,
});

// ---- Enrichment -----------------------------------------------------------
if (config.metadata.apiKey) {
	const outcome = reelmatch.recommend('Inception', 3);
	if (outcome.status === 'ok') {
		for (const movie of await reelmatch.enrich(outcome.results)) {
			logger.info(movie.title, {
				poster: movie.poster,
				rating: movie.details.rating,
				degraded: movie.degraded,
			});
		}
	}
}
