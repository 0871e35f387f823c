export { bootstrap } from './bootstrap.js';
export type { BootstrapOptions, AppServer } from './bootstrap.js';

export { createMcpServer, renderResponse } from './mcp-server.js';
export type { McpServerOptions } from './mcp-server.js';
