/**
 * MCP Server
 *
 * Creates the scratchgraph MCP server with every tool in the dispatch table.
 * Uses stateless Streamable HTTP transport for simple request/response operations.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { WebStandardStreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js';
import type { Context } from 'hono';
import { runTool } from './dispatch';
import { tools } from './tools';
import type { ToolContext } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handler function type returned by createMcpServer.
 */
export type McpHandler = (c: Context) => Promise<Response>;

export const SERVER_INFO = {
  name: 'scratchgraph',
  version: '0.1.0'
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// Server Factory
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build an MCP server with all tools registered against `ctx`.
 */
export function buildMcpServer(ctx: ToolContext): McpServer {
  const server = new McpServer(SERVER_INFO);

  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.schema.shape
      },
      (args: unknown) => runTool(tool, args, ctx)
    );
  }

  return server;
}

/**
 * Creates the request handler for the /mcp endpoint.
 *
 * Graph state lives in `ctx.store`, so each request gets a fresh server and
 * transport (stateless mode) while every request sees the same graphs.
 *
 * Supports:
 * - POST: Tool calls, initialization (Streamable HTTP)
 * - GET: Not supported in stateless mode (would be SSE for notifications)
 * - DELETE: Not supported in stateless mode (session termination)
 */
export function createMcpServer(ctx: ToolContext): McpHandler {
  return async function handleRequest(c: Context): Promise<Response> {
    const server = buildMcpServer(ctx);
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // Stateless mode
      enableJsonResponse: true // Return JSON instead of SSE for simple requests
    });

    await server.connect(transport);

    try {
      return await transport.handleRequest(c.req.raw);
    } finally {
      await transport.close();
    }
  };
}
