/**
 * MCP Server for Banline
 *
 * Lets MCP clients score and label content via Model Context Protocol.
 */

export { runMcpServer } from './server.js';
export { createToolHandler, tools } from './tools.js';
