// ---------------------------------------------------------------------------
// Server: Type definitions
// ---------------------------------------------------------------------------

import type { Logger } from '../logger.js';

export interface ReelmatchServerConfig {
	/** Port to listen on. Use 0 for random assignment. */
	readonly port?: number;
	/** Hostname to bind to. Defaults to '127.0.0.1'. */
	readonly host?: string;
	readonly logger?: Logger;
}

/**
 * A running HTTP server instance.
 */
export interface ReelmatchServer {
	/** Start accepting connections. */
	readonly start: () => Promise<void>;
	/** Close the listener and wait for open connections. */
	readonly stop: () => Promise<void>;
	/** The port the server is listening on (resolved after start). */
	readonly port: number;
	/** The full URL the server is listening on (resolved after start). */
	readonly url: string;
}
