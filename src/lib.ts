// ---------------------------------------------------------------------------
// Reelmatch: public library API
//
// Everything needed to load a catalogue, fit the vector space, and serve
// recommendations programmatically, over HTTP, or to MCP clients.
// ---------------------------------------------------------------------------

// ---- Catalogue ------------------------------------------------------------
export * from './catalogue/index.js';
// ---- Chat assistant -------------------------------------------------------
export * from './chat/index.js';
// ---- CLI ------------------------------------------------------------------
export * from './commands/index.js';
// ---- Config ---------------------------------------------------------------
export * from './config/index.js';
// ---- Engine (vectorizer + similarity) -------------------------------------
export * from './engine/index.js';
// ---- Errors ---------------------------------------------------------------
export * from './errors/index.js';
// ---- Logger ---------------------------------------------------------------
export {
	createConsoleTransport,
	createJsonTransport,
	createLogger,
	createMemoryTransport,
	getDefaultLogger,
	isLogLevel,
	type LogEntry,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	type LogMetadata,
	type LogTransport,
	type MemoryTransportHandle,
	setDefaultLogger,
} from './logger.js';
// ---- MCP ------------------------------------------------------------------
export * from './mcp/index.js';
// ---- Metadata -------------------------------------------------------------
export * from './metadata/index.js';
// ---- Recommendations ------------------------------------------------------
export * from './recommend/index.js';
// ---- Title resolution -----------------------------------------------------
export * from './resolver/index.js';
// ---- HTTP server ----------------------------------------------------------
export * from './server/index.js';
// ---- Runtime --------------------------------------------------------------
export {
	createReelmatch,
	type Reelmatch,
	type ReelmatchOptions,
	type ReelmatchStatus,
} from './service.js';
// ---- Utilities ------------------------------------------------------------
export { createLruCache, type LruCache, type LruCacheOptions } from './utils/lru-cache.js';
export { mapLimit } from './utils/map-limit.js';
