import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTitleNotFoundError } from '../src/errors/index.js';
import {
	createConsoleTransport,
	createJsonTransport,
	createLogger,
	createMemoryTransport,
	getDefaultLogger,
	isLogLevel,
	type Logger,
	type MemoryTransportHandle,
	setDefaultLogger,
} from '../src/logger.js';

// ===========================================================================
// Transports
// ===========================================================================

describe('createMemoryTransport', () => {
	it('stores, filters and clears entries', () => {
		const transport = createMemoryTransport();
		transport.write({ level: 'info', message: 'i1', timestamp: 't' });
		transport.write({ level: 'warn', message: 'w', timestamp: 't' });
		transport.write({ level: 'info', message: 'i2', timestamp: 't' });

		expect(transport.filter('info').map((e) => e.message)).toEqual(['i1', 'i2']);
		expect(transport.filter('error')).toHaveLength(0);

		transport.clear();
		expect(transport.entries).toHaveLength(0);
	});
});

describe('createConsoleTransport', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should route levels to the matching console method', () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const transport = createConsoleTransport();

		transport.write({ level: 'error', message: 'e', timestamp: 't' });
		transport.write({ level: 'warn', message: 'w', timestamp: 't' });
		transport.write({ level: 'info', message: 'i', timestamp: 't' });

		expect(error).toHaveBeenCalledTimes(1);
		expect(warn).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledTimes(1);
	});

	it('passes metadata as a second argument only when non-empty', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const transport = createConsoleTransport();

		transport.write({ level: 'info', message: 'a', timestamp: 't', metadata: { k: 1 } });
		transport.write({ level: 'info', message: 'b', timestamp: 't', metadata: {} });

		expect(log.mock.calls[0]).toHaveLength(2);
		expect(log.mock.calls[1]).toHaveLength(1);
	});

	it('prefixes the context', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		createConsoleTransport().write({
			level: 'info',
			message: 'hello',
			timestamp: 't',
			context: 'catalogue',
		});
		expect(String(log.mock.calls[0][0])).toContain('[catalogue] hello');
	});
});

describe('createJsonTransport', () => {
	it('writes one JSON object per line', () => {
		const lines: string[] = [];
		const transport = createJsonTransport((line) => lines.push(line));

		transport.write({ level: 'warn', message: 'slow', timestamp: 't', metadata: { ms: 5 } });

		expect(lines).toEqual([
			'{"level":"warn","message":"slow","timestamp":"t","metadata":{"ms":5}}\n',
		]);
	});
});

// ===========================================================================
// Logger
// ===========================================================================

describe('createLogger', () => {
	let transport: MemoryTransportHandle;
	let logger: Logger;

	beforeEach(() => {
		transport = createMemoryTransport();
		logger = createLogger({ context: 'test', level: 'debug', transports: [transport] });
	});

	it('records level, message, context and metadata', () => {
		logger.info('loaded', { size: 3 });

		const [entry] = transport.entries;
		expect(entry.level).toBe('info');
		expect(entry.message).toBe('loaded');
		expect(entry.context).toBe('test');
		expect(entry.metadata).toEqual({ size: 3 });
		expect(new Date(entry.timestamp).toISOString()).toBe(entry.timestamp);
	});

	it('filters messages below the configured level', () => {
		const warnLogger = createLogger({ level: 'warn', transports: [transport] });
		warnLogger.debug('no');
		warnLogger.info('no');
		warnLogger.warn('yes');
		warnLogger.error('yes');

		expect(transport.entries.map((e) => e.level)).toEqual(['warn', 'error']);
	});

	it("logs nothing at 'none'", () => {
		const silent = createLogger({ level: 'none', transports: [transport] });
		silent.error('nope');
		expect(transport.entries).toHaveLength(0);
	});

	it('flattens errors, including code and cause', () => {
		const cause = new Error('root cause');
		logger.error('failed', new Error('wrapper', { cause }));
		logger.error('not found', createTitleNotFoundError('zzz'));

		const [plain, coded] = transport.entries;
		expect(plain.metadata?.errorName).toBe('Error');
		expect(plain.metadata?.errorMessage).toBe('wrapper');
		expect(plain.metadata?.cause).toBe('root cause');
		expect(coded.metadata?.errorName).toBe('NotFoundError');
		expect(coded.metadata?.code).toBe('TITLE_NOT_FOUND');
	});

	it('passes plain metadata through and wraps other values', () => {
		logger.error('with metadata', { status: 500 });
		logger.error('with string', 'boom');

		expect(transport.entries[0].metadata).toEqual({ status: 500 });
		expect(transport.entries[1].metadata).toEqual({ detail: 'boom' });
	});

	it('nests child contexts and shares level with the parent', () => {
		const child = logger.child('engine').child('similarity');
		child.debug('computed');
		expect(transport.entries[0].context).toBe('test:engine:similarity');

		logger.setLevel('error');
		child.info('dropped');
		expect(transport.entries).toHaveLength(1);
		expect(child.getLevel()).toBe('error');
	});

	it('should add and clear transports', () => {
		const extra = createMemoryTransport();
		logger.addTransport(extra);
		logger.info('both');
		logger.clearTransports();
		logger.info('neither');

		expect(transport.entries).toHaveLength(1);
		expect(extra.entries).toHaveLength(1);
	});
});

describe('default logger', () => {
	it('can be replaced', () => {
		const replacement = createLogger({ level: 'none', transports: [] });
		setDefaultLogger(replacement);
		expect(getDefaultLogger()).toBe(replacement);
	});
});

describe('isLogLevel', () => {
	it('accepts only known levels', () => {
		expect(isLogLevel('warn')).toBe(true);
		expect(isLogLevel('verbose')).toBe(false);
		expect(isLogLevel(3)).toBe(false);
	});
});
