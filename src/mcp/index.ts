export {
	createReelmatchMcpServer,
	createReelmatchToolHandlers,
	formatRecommendations,
	type McpServerOptions,
	type ReelmatchMcpServer,
	type ReelmatchToolHandlers,
	type ToolResult,
} from './mcp-server.js';
