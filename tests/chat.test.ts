import { describe, expect, it } from 'vitest';
import { createCatalogue } from '../src/catalogue/index.js';
import {
	buildCatalogueContext,
	CHAT_SYSTEM_PROMPT,
	type ChatMessage,
	createChatAssistant,
	createHttpChatProvider,
	detectGenres,
	parseChatResponse,
} from '../src/chat/index.js';
import {
	createExternalAuthError,
	createExternalRateLimitError,
} from '../src/errors/index.js';
import {
	createFakeChatProvider,
	createFakeFetch,
	createFakeMetadataClient,
	createTestLogger,
	FILM_RECORDS,
	jsonResponse,
	silentLogger,
} from './utils/fixtures.js';

const catalogue = createCatalogue(FILM_RECORDS);

const NOTE = 'Note: Recommend 10-15 movies total. Prioritize database movies.';

const CHAT_CONFIG = {
	model: 'test-model',
	maxTokens: 100,
	temperature: 0.5,
	historyLimit: 2,
	contextLimit: 15,
};

describe('detectGenres', () => {
	it('should list mentioned genres in keyword order', () => {
		expect(detectGenres('Sci-Fi action and DRAMA')).toEqual(['action', 'drama', 'sci-fi']);
		expect(detectGenres('something good')).toEqual([]);
	});
});

describe('buildCatalogueContext', () => {
	it('lists matching titles verbatim', async () => {
		const context = await buildCatalogueContext('toy', catalogue);
		expect(context.split('\n')).toEqual([
			'Database Info: 7 movies available.',
			'',
			'Movies available in our database (USE EXACT TITLES):',
			'- Toy Story (ID: 12)',
			'- Toy Story 2 (ID: 13)',
			'',
			NOTE,
		]);
	});

	it('falls back to a mentioned genre', async () => {
		const context = await buildCatalogueContext('a funny comedy please', catalogue);
		expect(context.split('\n')).toEqual([
			'Database Info: 7 movies available.',
			'',
			'Comedy movies in database (USE EXACT TITLES):',
			'- Toy Story (ID: 12)',
			'- Toy Story 2 (ID: 13)',
			'',
			NOTE,
		]);
	});

	it('should list nothing when neither search finds a movie', async () => {
		const context = await buildCatalogueContext('a scary horror night', catalogue);
		expect(context.split('\n')).toEqual(['Database Info: 7 movies available.', '', '', NOTE]);
	});

	it('adds year, genres and rating when metadata is available', async () => {
		const context = await buildCatalogueContext('gravity', catalogue, {
			metadata: createFakeMetadataClient(),
		});
		expect(context.split('\n')[3]).toBe(
			'- Gravity (ID: 16, 2010) | Genres: Action, Science Fiction | Rating: 8.4/10',
		);
	});

	it('caps the listed hits', async () => {
		const context = await buildCatalogueContext('toy', catalogue, { limit: 1 });
		expect(context.split('\n').filter((line) => line.startsWith('- '))).toEqual([
			'- Toy Story (ID: 12)',
		]);
	});
});

describe('parseChatResponse', () => {
	it('should revalidate catalogue picks and keep external ones', () => {
		const text = `Sure! ${JSON.stringify({
			message: 'Try these',
			database_movies: [
				{ title: 'toy story', reason: 'fun' },
				{ title: 'TOY STORY' },
				{ title: 'Not Here', reason: 'made up' },
			],
			external_movies: [
				{ title: 'Up', year: '2009', reason: 'heart' },
				{ title: 'Coco', year: 'soon' },
			],
		})} Enjoy.`;

		const reply = parseChatResponse(text, catalogue);

		expect(reply.structured).toBe(true);
		expect(reply.message).toBe('Try these');
		expect(reply.databaseMovies).toEqual([{ title: 'Toy Story', movieId: 12, reason: 'fun' }]);
		expect(reply.externalMovies).toEqual([
			{ title: 'Up', year: 2009, reason: 'heart' },
			{ title: 'Coco', year: undefined, reason: '' },
		]);
	});

	it('returns free text when there is no usable payload', () => {
		for (const text of ['Just watch Inception.', '{not json}', '{"reply": "no message field"}']) {
			expect(parseChatResponse(text, catalogue)).toEqual({
				message: text,
				databaseMovies: [],
				externalMovies: [],
				structured: false,
			});
		}
	});
});

describe('createChatAssistant', () => {
	it('sends the prompt, context, recent history and message', async () => {
		const provider = createFakeChatProvider('{"message": "Enjoy", "database_movies": [{"title": "Gravity"}]}');
		const assistant = createChatAssistant({
			provider,
			catalogue,
			config: CHAT_CONFIG,
			logger: silentLogger(),
		});
		const history: ChatMessage[] = [
			{ role: 'user', content: 'first' },
			{ role: 'assistant', content: 'second' },
			{ role: 'user', content: 'third' },
		];

		const outcome = await assistant.respond('gravity', history);

		expect(outcome.ok).toBe(true);
		expect(outcome.reply.databaseMovies).toEqual([{ title: 'Gravity', movieId: 16, reason: '' }]);
		expect(provider.complete).toHaveBeenCalledWith(
			[
				{ role: 'system', content: CHAT_SYSTEM_PROMPT },
				{
					role: 'system',
					content: [
						'Database Info: 7 movies available.',
						'',
						'Movies available in our database (USE EXACT TITLES):',
						'- Gravity (ID: 16)',
						'',
						NOTE,
					].join('\n'),
				},
				{ role: 'assistant', content: 'second' },
				{ role: 'user', content: 'third' },
				{ role: 'user', content: 'gravity' },
			],
			{ model: 'test-model', maxTokens: 100, temperature: 0.5 },
		);
	});

	it('should explain provider failures to the user', async () => {
		const cases: [Error, string][] = [
			[createExternalAuthError('chat'), 'Invalid API key.'],
			[createExternalRateLimitError('chat'), 'Rate limit reached. Try again later.'],
			[new Error('boom'), 'Error: chat request failed: boom'],
		];

		for (const [error, message] of cases) {
			const { logger, transport } = createTestLogger();
			const assistant = createChatAssistant({
				provider: createFakeChatProvider(error),
				catalogue,
				config: CHAT_CONFIG,
				logger,
			});

			const outcome = await assistant.respond('anything');

			expect(outcome.ok).toBe(false);
			expect(outcome.reply.message).toBe(message);
			expect(outcome.reply.structured).toBe(false);
			expect(transport.filter('warn')[0].message).toBe('Chat provider failed');
		}
	});
});

describe('createHttpChatProvider', () => {
	const messages: ChatMessage[] = [{ role: 'user', content: 'hi' }];
	const completion = { model: 'test-model', maxTokens: 50, temperature: 0.2 };

	it('posts an OpenAI-style completion request', async () => {
		const { fetch, requests } = createFakeFetch(() =>
			jsonResponse({ choices: [{ message: { content: 'hello' } }] }),
		);
		const provider = createHttpChatProvider({
			baseUrl: 'https://llm.test/v1/',
			apiKey: 'test-secret',
			timeoutMs: 1000,
			fetch,
		});

		expect(await provider.complete(messages, completion)).toBe('hello');
		expect(requests[0].url).toBe('https://llm.test/v1/chat/completions');
		expect(requests[0].init?.method).toBe('POST');
		expect(requests[0].init?.headers).toEqual({
			'Content-Type': 'application/json',
			Accept: 'application/json',
			Authorization: 'Bearer test-secret',
		});
		expect(JSON.parse(String(requests[0].init?.body))).toEqual({
			model: 'test-model',
			messages,
			max_tokens: 50,
			temperature: 0.2,
		});
	});

	it('treats a null content as an empty reply', async () => {
		const { fetch } = createFakeFetch(() => jsonResponse({ choices: [{ message: { content: null } }] }));
		const provider = createHttpChatProvider({
			baseUrl: 'https://llm.test/v1',
			apiKey: 'test-secret',
			timeoutMs: 1000,
			fetch,
		});
		expect(await provider.complete(messages, completion)).toBe('');
	});

	it('should reject with classified errors', async () => {
		const empty = createFakeFetch(() => jsonResponse({ choices: [] }));
		await expect(
			createHttpChatProvider({
				baseUrl: 'https://llm.test/v1',
				apiKey: 'test-secret',
				timeoutMs: 1000,
				fetch: empty.fetch,
			}).complete(messages, completion),
		).rejects.toMatchObject({ code: 'EXTERNAL_INVALID_RESPONSE', service: 'chat' });

		const denied = createFakeFetch(() => new Response('', { status: 401 }));
		await expect(
			createHttpChatProvider({
				baseUrl: 'https://llm.test/v1',
				apiKey: 'test-secret',
				timeoutMs: 1000,
				fetch: denied.fetch,
			}).complete(messages, completion),
		).rejects.toMatchObject({ code: 'EXTERNAL_AUTH' });
	});
});
