// ---------------------------------------------------------------------------
// Structured Logger: Functional API
// ---------------------------------------------------------------------------
//
// Logger "instances" are frozen records of functions that close over a
// shared state object. Children share level and transports with their
// parent by reference.
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = Object.freeze({
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	none: 4,
});

export const isLogLevel = (value: unknown): value is LogLevel =>
	typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value);

export type LogMetadata = Readonly<Record<string, unknown>>;

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	readonly timestamp: string;
	readonly context?: string;
	readonly metadata?: LogMetadata;
}

export interface LogTransport {
	readonly write: (entry: LogEntry) => void;
}

// ---------------------------------------------------------------------------
// Built-in Transports
// ---------------------------------------------------------------------------

const COLOURS: Readonly<Record<LogLevel | 'reset', string>> = Object.freeze({
	debug: '\x1b[90m',
	info: '\x1b[36m',
	warn: '\x1b[33m',
	error: '\x1b[31m',
	none: '',
	reset: '\x1b[0m',
});

/**
 * Create a transport that writes formatted log entries to the console.
 */
export const createConsoleTransport = (): LogTransport =>
	Object.freeze({
		write(entry: LogEntry): void {
			const colour = COLOURS[entry.level];
			const reset = COLOURS.reset;
			const prefix = entry.context ? `[${entry.context}]` : '';
			const tag = entry.level.toUpperCase().padEnd(5);

			const base = `${colour}${tag}${reset} ${entry.timestamp} ${prefix} ${entry.message}`;
			const hasMetadata =
				entry.metadata !== undefined && Object.keys(entry.metadata).length > 0;

			const logFn =
				entry.level === 'error'
					? console.error
					: entry.level === 'warn'
						? console.warn
						: entry.level === 'debug'
							? console.debug
							: console.log;

			if (hasMetadata) logFn(base, entry.metadata);
			else logFn(base);
		},
	});

/**
 * One JSON object per line, for the HTTP server where logs are shipped
 * elsewhere. Writes to stderr by default so stdout stays free for the
 * MCP stdio transport.
 */
export const createJsonTransport = (
	write: (line: string) => void = (line) => {
		process.stderr.write(line);
	},
): LogTransport =>
	Object.freeze({
		write(entry: LogEntry): void {
			write(`${JSON.stringify(entry)}\n`);
		},
	});

/**
 * A transport backed by a mutable array, for tests.
 */
export interface MemoryTransportHandle extends LogTransport {
	readonly entries: LogEntry[];
	readonly clear: () => void;
	readonly filter: (level: LogLevel) => readonly LogEntry[];
}

export const createMemoryTransport = (): MemoryTransportHandle => {
	const entries: LogEntry[] = [];

	return {
		entries,
		write(entry: LogEntry): void {
			entries.push(entry);
		},
		clear(): void {
			entries.length = 0;
		},
		filter(level: LogLevel): readonly LogEntry[] {
			return entries.filter((e) => e.level === level);
		},
	};
};

// ---------------------------------------------------------------------------
// Logger interface: a record of functions
// ---------------------------------------------------------------------------

export interface Logger {
	readonly debug: (message: string, metadata?: LogMetadata) => void;
	readonly info: (message: string, metadata?: LogMetadata) => void;
	readonly warn: (message: string, metadata?: LogMetadata) => void;
	readonly error: (message: string, errorOrMetadata?: unknown) => void;
	readonly child: (childContext: string) => Logger;
	readonly setLevel: (level: LogLevel) => void;
	readonly getLevel: () => LogLevel;
	readonly addTransport: (transport: LogTransport) => void;
	readonly clearTransports: () => void;
}

export interface LoggerOptions {
	readonly context?: string;
	readonly level?: LogLevel;
	readonly transports?: readonly LogTransport[];
}

// ---------------------------------------------------------------------------
// createLogger: the primary factory
// ---------------------------------------------------------------------------

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const describeErrorCause = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);

/**
 * Flatten an `Error` into metadata; pass metadata records through as-is.
 * Anything else is recorded under `detail`.
 */
const resolveErrorMetadata = (
	errorOrMetadata: unknown,
): LogMetadata | undefined => {
	if (errorOrMetadata === undefined) return undefined;

	if (errorOrMetadata instanceof Error) {
		const code =
			'code' in errorOrMetadata && typeof errorOrMetadata.code === 'string'
				? { code: errorOrMetadata.code }
				: {};
		return {
			errorName: errorOrMetadata.name,
			errorMessage: errorOrMetadata.message,
			...code,
			stack: errorOrMetadata.stack,
			...(errorOrMetadata.cause != null
				? { cause: describeErrorCause(errorOrMetadata.cause) }
				: {}),
		};
	}

	if (isPlainRecord(errorOrMetadata)) return errorOrMetadata;
	return { detail: String(errorOrMetadata) };
};

interface LoggerState {
	level: LogLevel;
	readonly transports: LogTransport[];
}

const buildLogger = (state: LoggerState, context?: string): Logger => {
	const log = (
		level: LogLevel,
		message: string,
		metadata?: LogMetadata,
	): void => {
		if (level === 'none') return;
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) return;

		const entry: LogEntry = Object.freeze({
			level,
			message,
			timestamp: new Date().toISOString(),
			context,
			metadata,
		});

		for (const transport of state.transports) {
			transport.write(entry);
		}
	};

	return Object.freeze({
		debug: (message: string, metadata?: LogMetadata) =>
			log('debug', message, metadata),
		info: (message: string, metadata?: LogMetadata) =>
			log('info', message, metadata),
		warn: (message: string, metadata?: LogMetadata) =>
			log('warn', message, metadata),
		error: (message: string, errorOrMetadata?: unknown) =>
			log('error', message, resolveErrorMetadata(errorOrMetadata)),

		child: (childContext: string): Logger =>
			buildLogger(state, context ? `${context}:${childContext}` : childContext),

		setLevel: (level: LogLevel): void => {
			state.level = level;
		},
		getLevel: (): LogLevel => state.level,

		addTransport: (transport: LogTransport): void => {
			state.transports.push(transport);
		},
		clearTransports: (): void => {
			state.transports.length = 0;
		},
	});
};

export const createLogger = (options: LoggerOptions = {}): Logger =>
	buildLogger(
		{
			level: options.level ?? 'info',
			transports: options.transports
				? [...options.transports]
				: [createConsoleTransport()],
		},
		options.context,
	);

// ---------------------------------------------------------------------------
// Default singleton
// ---------------------------------------------------------------------------

let defaultLogger: Logger | undefined;

/**
 * Get (or create) the default application-wide logger.
 * Call `setDefaultLogger()` to replace it.
 */
export const getDefaultLogger = (): Logger => {
	if (!defaultLogger) {
		defaultLogger = createLogger({ context: 'reelmatch' });
	}
	return defaultLogger;
};

export const setDefaultLogger = (logger: Logger): void => {
	defaultLogger = logger;
};
