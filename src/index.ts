/**
 * scratchgraph Server Entry Point
 *
 * Loads config, prints the startup display and serves the Hono app on Node.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { SERVER_INFO, tools } from '@/mcp';
import { getClients } from '@/server/clients';
import { app } from '@/server/index';
import { buildStartupInfo, displayBanner, displayStartup } from '@/utils';

const config = getConfig();

displayBanner(SERVER_INFO.version);

// Fail fast on embedding misconfiguration
await getClients();
await displayStartup(config, buildStartupInfo(config, tools.length));

serve({ fetch: app.fetch, port: config.server.port });
