// ---------------------------------------------------------------------------
// HTTP API: Hono app and Node server lifecycle
// ---------------------------------------------------------------------------

import type { EventEmitter } from 'node:events';
import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { z } from 'zod';
import type { ChatMessage } from '../chat/index.js';
import {
	isEngineNotReadyError,
	isReelmatchError,
	isRowOutOfRangeError,
	toError,
} from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { trailerOf } from '../metadata/index.js';
import { toOutcomeJson } from '../recommend/index.js';
import type { Reelmatch } from '../service.js';
import type { ReelmatchServer, ReelmatchServerConfig } from './types.js';

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const topNSchema = z.coerce.number().int().min(1).max(100).optional();

const recommendQuerySchema = z.object({
	title: z.string().trim().min(1),
	n: topNSchema,
});

const idParamSchema = z.coerce.number().int();

const browseQuerySchema = z.object({
	page: z.coerce.number().int().min(1).optional(),
	size: z.coerce.number().int().min(1).max(100).optional(),
});

const searchQuerySchema = z.object({
	q: z.string().trim().min(1),
	limit: z.coerce.number().int().min(1).max(100).optional(),
});

const chatBodySchema = z.object({
	message: z.string().trim().min(1),
	history: z
		.array(
			z.object({
				role: z.enum(['user', 'assistant']),
				content: z.string(),
			}),
		)
		.optional(),
});

const describeIssues = (error: z.ZodError): string =>
	error.issues
		.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
		.join('; ');

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export function createReelmatchApp(
	service: Reelmatch,
	options: { readonly logger?: Logger } = {},
): Hono {
	const logger = (options.logger ?? getDefaultLogger()).child('server');
	const app = new Hono();

	app.onError((err, c) => {
		if (isEngineNotReadyError(err)) {
			return c.json({ error: err.message, code: err.code }, 503);
		}
		if (isRowOutOfRangeError(err)) {
			return c.json({ error: err.message, code: err.code }, 400);
		}
		logger.error('Request failed', toError(err));
		const code = isReelmatchError(err) ? err.code : 'INTERNAL_ERROR';
		return c.json({ error: 'internal error', code }, 500);
	});

	// ---- Health check -------------------------------------------------------
	app.get('/health', (c) => {
		if (service.status !== 'ready') {
			return c.json({ status: service.status, ready: false }, 503);
		}
		return c.json(
			{ status: service.status, ready: true, movies: service.catalogue.size },
			200,
		);
	});

	// ---- Recommendations ----------------------------------------------------
	app.get('/recommend', (c) => {
		const query = recommendQuerySchema.safeParse(c.req.query());
		if (!query.success) {
			return c.json({ error: describeIssues(query.error) }, 400);
		}
		const outcome = service.recommend(query.data.title, query.data.n);
		return c.json(toOutcomeJson(outcome), outcome.status === 'ok' ? 200 : 404);
	});

	app.get('/recommend/:id', (c) => {
		const id = idParamSchema.safeParse(c.req.param('id'));
		const n = topNSchema.safeParse(c.req.query('n'));
		if (!id.success || !n.success) {
			return c.json({ error: 'invalid movie id or n' }, 400);
		}
		const outcome = service.recommendById(id.data, n.data);
		return c.json(toOutcomeJson(outcome), outcome.status === 'ok' ? 200 : 404);
	});

	app.get('/resolve', (c) => {
		const title = c.req.query('title')?.trim() ?? '';
		if (title.length === 0) {
			return c.json({ error: 'title is required' }, 400);
		}
		const resolved = service.resolveTitle(title);
		if (!resolved.ok) {
			return c.json({ status: 'not_found', query: title, reason: resolved.error.message }, 404);
		}
		return c.json(
			{
				status: 'ok',
				movieId: resolved.entry.movieId,
				title: resolved.entry.title,
				row: resolved.row,
				match: resolved.match,
				ratio: resolved.ratio,
			},
			200,
		);
	});

	// ---- Catalogue ----------------------------------------------------------
	app.get('/movies/:id', async (c) => {
		const id = idParamSchema.safeParse(c.req.param('id'));
		if (!id.success) return c.json({ error: 'invalid movie id' }, 400);

		const entry = service.lookup(id.data);
		if (!entry) return c.json({ error: 'movie not found' }, 404);

		const [details, poster] = await Promise.all([
			service.metadata.fetchDetails(entry.movieId),
			service.metadata.fetchPoster(entry.movieId),
		]);
		return c.json(
			{
				movieId: entry.movieId,
				title: entry.title,
				poster: poster.value,
				details: details.value,
				trailer: trailerOf(details.value) ?? null,
				degraded: !details.ok || !poster.ok,
			},
			200,
		);
	});

	app.get('/browse/:tag', (c) => {
		const query = browseQuerySchema.safeParse(c.req.query());
		if (!query.success) {
			return c.json({ error: describeIssues(query.error) }, 400);
		}
		const page = service.browse(c.req.param('tag'), query.data.page, query.data.size);
		return c.json(page, 200);
	});

	app.get('/search', (c) => {
		const query = searchQuerySchema.safeParse(c.req.query());
		if (!query.success) {
			return c.json({ error: describeIssues(query.error) }, 400);
		}
		return c.json({ results: service.search(query.data.q, query.data.limit) }, 200);
	});

	// ---- Chat ---------------------------------------------------------------
	app.post('/chat', async (c) => {
		const chat = service.chat;
		if (!chat) return c.json({ error: 'chat assistant is not configured' }, 503);

		const body = chatBodySchema.safeParse(await c.req.json().catch(() => null));
		if (!body.success) {
			return c.json({ error: describeIssues(body.error) }, 400);
		}
		const history: ChatMessage[] = body.data.history ?? [];
		const outcome = await chat.respond(body.data.message, history);
		return c.json(
			outcome.ok
				? { ok: true, reply: outcome.reply }
				: { ok: false, code: outcome.error.code, reply: outcome.reply },
			200,
		);
	});

	return app;
}

// ---------------------------------------------------------------------------
// Server lifecycle
// ---------------------------------------------------------------------------

export function createReelmatchServer(
	service: Reelmatch,
	config: ReelmatchServerConfig = {},
): ReelmatchServer {
	const host = config.host ?? '127.0.0.1';
	const requestedPort = config.port ?? 3000;
	const logger = (config.logger ?? getDefaultLogger()).child('server');
	const app = createReelmatchApp(service, { logger: config.logger });

	let server: ServerType | undefined;
	let resolvedPort = 0;

	// Bind failures (EADDRINUSE, EACCES) arrive as 'error' events, not throws
	const start = (): Promise<void> =>
		new Promise((resolve, reject) => {
			const onError = (err: Error): void => {
				server = undefined;
				logger.error('Listen failed', err);
				reject(err);
			};
			const current = serve(
				{ fetch: app.fetch, port: requestedPort, hostname: host },
				(info) => {
					events.off('error', onError);
					resolvedPort = info.port;
					logger.info('Listening', { url: `http://${host}:${resolvedPort}` });
					resolve();
				},
			);
			const events: EventEmitter = current;
			events.once('error', onError);
			server = current;
		});

	const stop = (): Promise<void> =>
		new Promise((resolve, reject) => {
			const current = server;
			server = undefined;
			if (!current) {
				resolve();
				return;
			}
			current.close((err) => (err ? reject(err) : resolve()));
		});

	return Object.freeze({
		start,
		stop,
		get port() {
			return resolvedPort;
		},
		get url() {
			return `http://${host}:${resolvedPort}`;
		},
	});
}
