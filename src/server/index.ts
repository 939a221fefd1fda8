export { createReelmatchApp, createReelmatchServer } from './server.js';
export type { ReelmatchServer, ReelmatchServerConfig } from './types.js';
