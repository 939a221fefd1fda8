import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
	EXIT_FAILURE,
	EXIT_NOT_FOUND,
	EXIT_OK,
	parseCliArgs,
	resolveCliConfig,
	runCli,
	USAGE,
} from '../src/commands/index.js';
import {
	createFakeMetadataClient,
	FILM_RECORDS,
	holdPort,
	silentLogger,
	writeCatalogueFile,
} from './utils/fixtures.js';

describe('parseCliArgs', () => {
	it('should join positional words into the title', () => {
		expect(parseCliArgs(['recommend', 'toy', 'story', '--n', '3', '--format', 'json'])).toEqual({
			ok: true,
			args: {
				command: 'recommend',
				title: 'toy story',
				n: 3,
				cataloguePath: undefined,
				configPath: undefined,
				format: 'json',
				port: undefined,
				host: undefined,
				logLevel: undefined,
			},
		});
	});

	it('treats no arguments as help', () => {
		expect(parseCliArgs([])).toEqual({
			ok: true,
			args: { command: 'help', title: '', format: 'text' },
		});
		expect(parseCliArgs(['-h']).ok).toBe(true);
	});

	it('reports bad input', () => {
		const cases: [string[], string][] = [
			[['play'], 'Unknown command "play"'],
			[['recommend', 'Heat', '--n'], 'Missing value for --n'],
			[['recommend', 'Heat', '--n', '0'], '--n must be a positive integer'],
			[['recommend', 'Heat', '--format', 'xml'], '--format must be text or json'],
			[['serve', '--port', '70000'], '--port must be between 1 and 65535'],
			[['serve', '--log-level', 'loud'], 'Unknown log level "loud"'],
			[['serve', '--verbose', 'yes'], 'Unknown option --verbose'],
			[['resolve'], 'resolve needs a title'],
		];
		for (const [argv, message] of cases) {
			expect(parseCliArgs(argv)).toEqual({ ok: false, message });
		}
	});
});

describe('resolveCliConfig', () => {
	it('should take the catalogue from the flag, then the environment, then the default', async () => {
		const parse = (argv: string[]) => {
			const parsed = parseCliArgs(argv);
			if (!parsed.ok) throw new Error(parsed.message);
			return parsed.args;
		};

		const flagged = await resolveCliConfig(parse(['serve', '--catalogue', 'a.json']), {
			REELMATCH_CATALOGUE: 'b.json',
		});
		expect(flagged.catalogue.path).toBe('a.json');

		const fromEnv = await resolveCliConfig(parse(['serve']), { REELMATCH_CATALOGUE: 'b.json' });
		expect(fromEnv.catalogue.path).toBe('b.json');

		const fallback = await resolveCliConfig(parse(['serve', '--port', '8080', '--host', '0.0.0.0']), {});
		expect(fallback.catalogue.path).toBe('data/movies.json');
		expect(fallback.server).toEqual({ host: '0.0.0.0', port: 8080 });
	});
});

describe('runCli', () => {
	let path: string;
	let cleanup: () => Promise<void>;

	beforeAll(async () => {
		({ path, cleanup } = await writeCatalogueFile(FILM_RECORDS));
	});

	afterAll(async () => {
		await cleanup();
	});

	const run = async (argv: string[]) => {
		const stdout: string[] = [];
		const stderr: string[] = [];
		const code = await runCli(argv, {
			stdout: (line) => stdout.push(line),
			stderr: (line) => stderr.push(line),
			env: {},
			color: false,
			logger: silentLogger(),
			serviceOptions: { metadataClient: createFakeMetadataClient() },
		});
		return { code, stdout, stderr };
	};

	it('prints usage for help', async () => {
		const { code, stdout } = await run(['--help']);
		expect(code).toBe(EXIT_OK);
		expect(stdout).toEqual([USAGE]);
	});

	it('prints the parse error and usage for bad arguments', async () => {
		const { code, stderr } = await run(['play']);
		expect(code).toBe(EXIT_FAILURE);
		expect(stderr).toEqual(['Unknown command "play"', USAGE]);
	});

	it('should print recommendations as text', async () => {
		const { code, stdout } = await run(['recommend', 'toy', 'story', '--n', '1', '--catalogue', path]);
		expect(code).toBe(EXIT_OK);
		expect(stdout).toEqual([
			'Because you liked Toy Story (ID: 12, exact match)',
			'   1. Toy Story 2 (ID: 13) 0.674',
		]);
	});

	it('prints recommendations as JSON', async () => {
		const { code, stdout } = await run([
			'recommend',
			'Gravity',
			'--n',
			'1',
			'--format',
			'json',
			'--catalogue',
			path,
		]);
		expect(code).toBe(EXIT_OK);
		expect(JSON.parse(stdout.join('\n'))).toMatchObject({
			status: 'ok',
			query: { movieId: 16, title: 'Gravity' },
			results: [{ movieId: 11, title: 'Interstellar' }],
		});
	});

	it('exits with the not-found code for unknown titles', async () => {
		const text = await run(['recommend', 'xyzzy', '--catalogue', path]);
		expect(text.code).toBe(EXIT_NOT_FOUND);
		expect(text.stderr).toEqual(['No movie matches "xyzzy"']);

		const json = await run(['recommend', 'xyzzy', '--format', 'json', '--catalogue', path]);
		expect(json.code).toBe(EXIT_NOT_FOUND);
		expect(JSON.parse(json.stdout.join('\n'))).toEqual({
			status: 'not_found',
			query: 'xyzzy',
			reason: 'No movie matches "xyzzy"',
			results: [],
		});
	});

	it('shows how a title resolves', async () => {
		const { code, stdout } = await run(['resolve', 'dark', '--catalogue', path]);
		expect(code).toBe(EXIT_OK);
		expect(stdout).toEqual(['The Dark Knight (ID: 14, substring match, ratio 0.42)']);
	});

	it('should report a missing catalogue', async () => {
		const missing = `${path}.missing`;
		const { code, stderr } = await run(['recommend', 'Heat', '--catalogue', missing]);
		expect(code).toBe(EXIT_FAILURE);
		expect(stderr).toEqual([
			`Error: Failed to load catalogue (${missing}): catalogue source not found`,
			'(CATALOGUE_LOAD)',
		]);
	});

	it('should exit with a failure when serve cannot bind its port', async () => {
		const { port, release } = await holdPort();
		try {
			const { code, stderr } = await run([
				'serve',
				'--catalogue',
				path,
				'--host',
				'127.0.0.1',
				'--port',
				String(port),
			]);
			expect(code).toBe(EXIT_FAILURE);
			expect(stderr).toEqual([`Error: listen EADDRINUSE: address already in use 127.0.0.1:${port}`]);
		} finally {
			await release();
		}
	});
});
