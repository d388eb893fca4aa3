/**
 * Banline MCP Server
 *
 * Exposes scoring and labelling tools to MCP-compatible clients over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { findProjectRoot, initProject } from '../config/index.js';
import { openClassifier } from '../cli/session.js';
import { createToolHandler, tools } from './tools.js';

/**
 * Initialize and run the MCP server
 */
export async function runMcpServer(): Promise<void> {
  // stdout carries the protocol, so initialise without console output
  let projectRoot = findProjectRoot();
  if (!projectRoot) {
    projectRoot = process.cwd();
    initProject(projectRoot);
  }

  const classifier = openClassifier(projectRoot);
  const handle = createToolHandler(classifier, () => classifier.save());

  const server = new Server(
    {
      name: 'banline',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handle(name, args);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
}
