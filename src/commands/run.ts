// ---------------------------------------------------------------------------
// CLI: command dispatch
// ---------------------------------------------------------------------------
//
// `runCli` returns an exit code instead of calling `process.exit`, so the
// bin entry stays a one-liner and tests can drive every command.
// ---------------------------------------------------------------------------

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
	type AppConfig,
	defineConfig,
	formatValidationIssues,
	loadConfigFile,
} from '../config/index.js';
import {
	isConfigError,
	isConfigValidationError,
	isReelmatchError,
	toError,
} from '../errors/index.js';
import {
	createConsoleTransport,
	createJsonTransport,
	createLogger,
	type Logger,
} from '../logger.js';
import { createReelmatchMcpServer } from '../mcp/index.js';
import { type RecommendFound, toOutcomeJson } from '../recommend/index.js';
import { createReelmatchServer } from '../server/index.js';
import {
	createReelmatch,
	type Reelmatch,
	type ReelmatchOptions,
} from '../service.js';
import { type CliArgs, parseCliArgs, USAGE } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;

export const DEFAULT_CATALOGUE_PATH = 'data/movies.json';

export interface CliIO {
	readonly stdout: (line: string) => void;
	readonly stderr: (line: string) => void;
	readonly env?: Readonly<Record<string, string | undefined>>;
	/** `false` strips colour; omitted uses chalk's terminal detection. */
	readonly color?: boolean;
	readonly logger?: Logger;
	readonly serviceOptions?: Omit<ReelmatchOptions, 'logger'>;
	/** Resolves when a long-running command should shut down. */
	readonly untilShutdown?: () => Promise<void>;
}

const waitForSignal = (): Promise<void> =>
	new Promise((resolve) => {
		const done = () => resolve();
		process.once('SIGINT', done);
		process.once('SIGTERM', done);
	});

// ---------------------------------------------------------------------------
// Config resolution
// ---------------------------------------------------------------------------

export async function resolveCliConfig(
	args: CliArgs,
	env: Readonly<Record<string, string | undefined>>,
): Promise<AppConfig> {
	const base = args.configPath
		? await loadConfigFile(args.configPath, { env })
		: defineConfig(
				{
					catalogue: {
						path:
							args.cataloguePath ??
							env.REELMATCH_CATALOGUE ??
							DEFAULT_CATALOGUE_PATH,
					},
				},
				{ env },
			);

	return Object.freeze({
		...base,
		catalogue: args.cataloguePath
			? Object.freeze({ path: args.cataloguePath })
			: base.catalogue,
		server: Object.freeze({
			host: args.host ?? base.server.host,
			port: args.port ?? base.server.port,
		}),
		logLevel: args.logLevel ?? base.logLevel,
	});
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function formatRecommendationText(
	outcome: RecommendFound,
	c: ChalkInstance,
): string[] {
	const { query, results } = outcome;
	const lines = [
		`${c.bold(`Because you liked ${query.title}`)} ${c.dim(`(ID: ${query.movieId}, ${query.match} match)`)}`,
	];
	if (results.length === 0) {
		lines.push(c.yellow('  No similar movies found.'));
		return lines;
	}
	results.forEach((r, i) => {
		lines.push(
			`  ${String(i + 1).padStart(2)}. ${r.title} ${c.dim(`(ID: ${r.movieId})`)} ${c.cyan(r.score.toFixed(3))}`,
		);
	});
	return lines;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

const reportFailure = (error: unknown, io: CliIO, c: ChalkInstance): void => {
	const err = toError(error);
	io.stderr(c.red(`Error: ${err.message}`));
	if (isConfigValidationError(error) && error.issues.length > 1) {
		io.stderr(formatValidationIssues(error.issues));
	}
	if (isReelmatchError(error) && !isConfigError(error)) {
		io.stderr(c.dim(`(${error.code})`));
	}
};

const recommendCommand = (
	service: Reelmatch,
	args: CliArgs,
	io: CliIO,
	c: ChalkInstance,
): number => {
	const outcome = service.recommend(args.title, args.n);
	if (args.format === 'json') {
		io.stdout(JSON.stringify(toOutcomeJson(outcome), null, 2));
		return outcome.status === 'ok' ? EXIT_OK : EXIT_NOT_FOUND;
	}
	if (outcome.status === 'not_found') {
		io.stderr(c.red(outcome.reason));
		return EXIT_NOT_FOUND;
	}
	for (const line of formatRecommendationText(outcome, c)) io.stdout(line);
	return EXIT_OK;
};

const resolveCommand = (
	service: Reelmatch,
	args: CliArgs,
	io: CliIO,
	c: ChalkInstance,
): number => {
	const resolved = service.resolveTitle(args.title);
	if (!resolved.ok) {
		if (args.format === 'json') {
			io.stdout(
				JSON.stringify(
					{ status: 'not_found', query: args.title, reason: resolved.error.message },
					null,
					2,
				),
			);
		} else {
			io.stderr(c.red(resolved.error.message));
		}
		return EXIT_NOT_FOUND;
	}

	const { entry, match, ratio } = resolved;
	if (args.format === 'json') {
		io.stdout(
			JSON.stringify(
				{ status: 'ok', movieId: entry.movieId, title: entry.title, match, ratio },
				null,
				2,
			),
		);
	} else {
		io.stdout(
			`${c.bold(entry.title)} ${c.dim(`(ID: ${entry.movieId}, ${match} match, ratio ${ratio.toFixed(2)})`)}`,
		);
	}
	return EXIT_OK;
};

const serveCommand = async (
	service: Reelmatch,
	io: CliIO,
	logger: Logger,
	c: ChalkInstance,
): Promise<number> => {
	const server = createReelmatchServer(service, {
		host: service.config.server.host,
		port: service.config.server.port,
		logger,
	});
	try {
		await server.start();
	} catch (error) {
		reportFailure(error, io, c);
		return EXIT_FAILURE;
	}
	io.stderr(c.green(`reelmatch listening on ${server.url}`));
	await (io.untilShutdown ?? waitForSignal)();
	await server.stop();
	return EXIT_OK;
};

const mcpCommand = async (
	service: Reelmatch,
	io: CliIO,
	logger: Logger,
): Promise<number> => {
	const server = createReelmatchMcpServer(service, { logger });
	await server.start();
	await (io.untilShutdown ?? waitForSignal)();
	await server.stop();
	return EXIT_OK;
};

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export async function runCli(
	argv: readonly string[],
	io: CliIO,
): Promise<number> {
	const c = io.color === undefined ? chalk : new Chalk({ level: io.color ? 1 : 0 });

	const parsed = parseCliArgs(argv);
	if (!parsed.ok) {
		io.stderr(c.red(parsed.message));
		io.stderr(USAGE);
		return EXIT_FAILURE;
	}
	const { args } = parsed;
	if (args.command === 'help') {
		io.stdout(USAGE);
		return EXIT_OK;
	}

	const env = io.env ?? process.env;
	let service: Reelmatch;
	let logger: Logger;
	try {
		const config = await resolveCliConfig(args, env);
		const oneShot = args.command === 'recommend' || args.command === 'resolve';
		logger =
			io.logger ??
			createLogger({
				context: 'reelmatch',
				level: args.logLevel ?? (oneShot ? 'warn' : config.logLevel),
				transports: [
					args.command === 'mcp' ? createJsonTransport() : createConsoleTransport(),
				],
			});
		service = createReelmatch(config, { ...io.serviceOptions, logger });
		await service.load();
	} catch (error) {
		reportFailure(error, io, c);
		return EXIT_FAILURE;
	}

	switch (args.command) {
		case 'recommend':
			return recommendCommand(service, args, io, c);
		case 'resolve':
			return resolveCommand(service, args, io, c);
		case 'serve':
			return serveCommand(service, io, logger, c);
		case 'mcp':
			return mcpCommand(service, io, logger);
	}
}
