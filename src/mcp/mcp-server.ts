import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { isEngineNotReadyError, toError } from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import type { Recommendation } from '../recommend/index.js';
import type { Reelmatch } from '../service.js';

// ---------------------------------------------------------------------------
// Tool results
// ---------------------------------------------------------------------------

export type ToolResult = {
	content: { type: 'text'; text: string }[];
	isError?: boolean;
};

const text = (value: string, isError = false): ToolResult =>
	isError
		? { content: [{ type: 'text', text: value }], isError: true }
		: { content: [{ type: 'text', text: value }] };

const json = (value: unknown): ToolResult =>
	text(JSON.stringify(value, null, 2));

export const formatRecommendations = (
	results: readonly Recommendation[],
): string =>
	results
		.map(
			(r, i) =>
				`${i + 1}. ${r.title} (ID: ${r.movieId}) score ${r.score.toFixed(3)}`,
		)
		.join('\n');

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export interface ReelmatchToolHandlers {
	readonly recommendMovies: (args: {
		title: string;
		n?: number;
		format?: 'text' | 'json';
	}) => ToolResult;
	readonly recommendByDescription: (args: {
		description: string;
		n?: number;
	}) => ToolResult;
	readonly resolveTitle: (args: { title: string }) => ToolResult;
	readonly searchCatalogue: (args: { query: string; limit?: number }) => ToolResult;
}

/**
 * Tool callbacks, separate from registration so they can be called
 * without a transport. Engine errors become `isError` results.
 */
export function createReelmatchToolHandlers(
	service: Reelmatch,
	logger: Logger = getDefaultLogger(),
): ReelmatchToolHandlers {
	const log = logger.child('mcp');

	const guard =
		<A>(name: string, fn: (args: A) => ToolResult) =>
		(args: A): ToolResult => {
			try {
				return fn(args);
			} catch (error) {
				if (isEngineNotReadyError(error)) {
					return text(`Error: ${error.message}`, true);
				}
				const err = toError(error);
				log.error(`Tool ${name} failed`, err);
				return text(`Error: ${err.message}`, true);
			}
		};

	return Object.freeze({
		recommendMovies: guard<Parameters<ReelmatchToolHandlers['recommendMovies']>[0]>('recommend_movies', ({ title, n, format }) => {
			const outcome = service.recommend(title, n);
			if (outcome.status === 'not_found') {
				return text(`Not found: ${outcome.reason}`, true);
			}
			if (format === 'json') return json(outcome);
			const header = `Because you liked ${outcome.query.title}:`;
			return text(
				outcome.results.length === 0
					? `${header}\n(no similar movies)`
					: `${header}\n${formatRecommendations(outcome.results)}`,
			);
		}),

		recommendByDescription: guard<Parameters<ReelmatchToolHandlers['recommendByDescription']>[0]>(
			'recommend_by_description',
			({ description, n }) => {
				const { results } = service.recommendByText(description, n);
				return text(
					results.length === 0
						? 'No catalogue movie matches that description.'
						: formatRecommendations(results),
				);
			},
		),

		resolveTitle: guard<Parameters<ReelmatchToolHandlers['resolveTitle']>[0]>('resolve_title', ({ title }) => {
			const resolved = service.resolveTitle(title);
			if (!resolved.ok) return text(`Not found: ${resolved.error.message}`, true);
			return json({
				movieId: resolved.entry.movieId,
				title: resolved.entry.title,
				match: resolved.match,
				ratio: resolved.ratio,
			});
		}),

		searchCatalogue: guard<Parameters<ReelmatchToolHandlers['searchCatalogue']>[0]>('search_catalogue', ({ query, limit }) => {
			const hits = service.search(query, limit);
			return json(hits.map((e) => ({ movieId: e.movieId, title: e.title })));
		}),
	});
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export interface ReelmatchMcpServer {
	readonly start: () => Promise<void>;
	readonly stop: () => Promise<void>;
}

export interface McpServerOptions {
	readonly name?: string;
	readonly version?: string;
	readonly logger?: Logger;
}

export function createReelmatchMcpServer(
	service: Reelmatch,
	options: McpServerOptions = {},
): ReelmatchMcpServer {
	const logger = options.logger ?? getDefaultLogger();
	const handlers = createReelmatchToolHandlers(service, logger);
	const server = new McpServer({
		name: options.name ?? 'reelmatch',
		version: options.version ?? '0.1.0',
	});

	const registerTools = (): void => {
		server.registerTool(
			'recommend_movies',
			{
				title: 'Recommend Movies',
				description:
					'Recommend catalogue movies similar to a title. The title may be partial.',
				inputSchema: {
					title: z.string().min(1).describe('Movie title to start from'),
					n: z
						.number()
						.int()
						.min(1)
						.max(100)
						.optional()
						.describe('How many recommendations to return'),
					format: z.enum(['text', 'json']).optional().describe('Output format'),
				},
			},
			async (args) => handlers.recommendMovies(args),
		);

		server.registerTool(
			'recommend_by_description',
			{
				title: 'Recommend By Description',
				description:
					'Recommend catalogue movies matching a free-text description of plot, cast or genre.',
				inputSchema: {
					description: z.string().min(1).describe('What the user wants to watch'),
					n: z.number().int().min(1).max(100).optional(),
				},
			},
			async (args) => handlers.recommendByDescription(args),
		);

		server.registerTool(
			'resolve_title',
			{
				title: 'Resolve Title',
				description: 'Find the catalogue movie a title refers to',
				inputSchema: {
					title: z.string().min(1).describe('Title text to resolve'),
				},
			},
			async (args) => handlers.resolveTitle(args),
		);

		server.registerTool(
			'search_catalogue',
			{
				title: 'Search Catalogue',
				description: 'Case-insensitive substring search over catalogue titles',
				inputSchema: {
					query: z.string().min(1).describe('Substring to look for'),
					limit: z.number().int().min(1).max(100).optional(),
				},
			},
			async (args) => handlers.searchCatalogue(args),
		);
	};

	registerTools();

	let started = false;
	let startPromise: Promise<void> | null = null;

	const start = async (): Promise<void> => {
		if (started) return;
		if (startPromise) return startPromise;

		startPromise = (async () => {
			await service.load();

			const transport = new StdioServerTransport();
			await server.connect(transport);
			started = true;
			logger.child('mcp').info('MCP server connected on stdio');
		})().finally(() => {
			startPromise = null;
		});

		return startPromise;
	};

	const stop = async (): Promise<void> => {
		await server.close();
		started = false;
	};

	return Object.freeze({ start, stop });
}
