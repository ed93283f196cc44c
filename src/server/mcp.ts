/**
 * Binds the graph tool server to the /mcp route. The handler is built on the
 * first request, once the session store and matcher settings are ready.
 */

import type { Context } from 'hono';
import { getConfig } from '@/config/config';
import { createMcpServer, type McpHandler } from '@/mcp';
import { getClients } from './clients';

let mcpHandler: McpHandler | null = null;

export async function handleMcp(c: Context): Promise<Response> {
  if (!mcpHandler) {
    const { store } = await getClients();
    mcpHandler = createMcpServer({
      store,
      analysis: { maxPathLength: getConfig().analysis.maxPathLength }
    });
  }

  return mcpHandler(c);
}
