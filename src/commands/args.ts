// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

import { isLogLevel, type LogLevel } from '../logger.js';

export type CliCommand = 'recommend' | 'resolve' | 'serve' | 'mcp' | 'help';

export interface CliArgs {
	readonly command: CliCommand;
	/** Positional words after the command, joined by spaces. */
	readonly title: string;
	readonly n?: number;
	readonly cataloguePath?: string;
	readonly configPath?: string;
	readonly format: 'text' | 'json';
	readonly port?: number;
	readonly host?: string;
	readonly logLevel?: LogLevel;
}

export type ParseResult =
	| { readonly ok: true; readonly args: CliArgs }
	| { readonly ok: false; readonly message: string };

export const USAGE = `Usage: reelmatch <command> [options]

Commands:
  recommend <title>   Recommend movies similar to a title
  resolve <title>     Show which catalogue movie a title resolves to
  serve               Start the HTTP API
  mcp                 Start the MCP server on stdio

Options:
  --n <count>             Number of recommendations
  --catalogue <path>      Catalogue JSON file
  --config <path>         Config JSON file
  --format <text|json>    Output format (default: text)
  --port <port>           HTTP port for serve
  --host <host>           HTTP host for serve
  --log-level <level>     debug, info, warn, error or none`;

const COMMANDS: readonly CliCommand[] = [
	'recommend',
	'resolve',
	'serve',
	'mcp',
	'help',
];

const isCommand = (value: string): value is CliCommand =>
	COMMANDS.some((c) => c === value);

const parsePositiveInt = (value: string): number | undefined => {
	if (!/^\d+$/.test(value)) return undefined;
	const n = Number(value);
	return n > 0 ? n : undefined;
};

/**
 * Parse `process.argv.slice(2)`.
 */
export function parseCliArgs(argv: readonly string[]): ParseResult {
	const [first, ...rest] = argv;
	if (first === undefined || first === '--help' || first === '-h') {
		return { ok: true, args: { command: 'help', title: '', format: 'text' } };
	}
	if (!isCommand(first)) {
		return { ok: false, message: `Unknown command "${first}"` };
	}

	const words: string[] = [];
	let n: number | undefined;
	let cataloguePath: string | undefined;
	let configPath: string | undefined;
	let format: 'text' | 'json' = 'text';
	let port: number | undefined;
	let host: string | undefined;
	let logLevel: LogLevel | undefined;

	for (let i = 0; i < rest.length; i++) {
		const arg = rest[i];
		if (arg === undefined) continue;
		if (!arg.startsWith('--')) {
			words.push(arg);
			continue;
		}

		const value = rest[i + 1];
		if (value === undefined) {
			return { ok: false, message: `Missing value for ${arg}` };
		}
		i++;

		switch (arg) {
			case '--n': {
				n = parsePositiveInt(value);
				if (n === undefined) {
					return { ok: false, message: `--n must be a positive integer` };
				}
				break;
			}
			case '--catalogue':
				cataloguePath = value;
				break;
			case '--config':
				configPath = value;
				break;
			case '--format': {
				if (value !== 'text' && value !== 'json') {
					return { ok: false, message: `--format must be text or json` };
				}
				format = value;
				break;
			}
			case '--port': {
				port = parsePositiveInt(value);
				if (port === undefined || port > 65535) {
					return { ok: false, message: `--port must be between 1 and 65535` };
				}
				break;
			}
			case '--host':
				host = value;
				break;
			case '--log-level': {
				if (!isLogLevel(value)) {
					return { ok: false, message: `Unknown log level "${value}"` };
				}
				logLevel = value;
				break;
			}
			default:
				return { ok: false, message: `Unknown option ${arg}` };
		}
	}

	const title = words.join(' ').trim();
	if ((first === 'recommend' || first === 'resolve') && title === '') {
		return { ok: false, message: `${first} needs a title` };
	}

	return {
		ok: true,
		args: Object.freeze({
			command: first,
			title,
			n,
			cataloguePath,
			configPath,
			format,
			port,
			host,
			logLevel,
		}),
	};
}
