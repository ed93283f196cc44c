/**
 * HTTP application: the MCP endpoint plus a health probe. The entry point
 * serves it with @hono/node-server.
 */

import { Hono } from 'hono';
import { handleMcp } from './mcp';

const app = new Hono();

app.all('/mcp', handleMcp);
app.get('/health', (c) => c.json({ status: 'ok' }));

export { app };
