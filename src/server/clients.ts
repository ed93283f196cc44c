/**
 * Shared Client Initialization
 *
 * Lazy initialization of the process-wide services: the embedding client
 * (shared by every graph session) and the session store.
 * Created once on first request; concurrent first callers share one
 * initialization through the cached promise.
 */

import { getConfig } from '@/config/config';
import { SessionStore } from '@/core';
import { createEmbeddingClient } from '@/providers/embedding/factory';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { logEmbeddingWarning } from '@/utils/logger';

/**
 * Shared clients used by the MCP endpoint.
 */
export interface Clients {
  /** Null when no embedding provider is configured */
  embeddingClient: EmbeddingClient | null;
  store: SessionStore;
}

/** Cached clients instance */
let clients: Clients | null = null;
let initPromise: Promise<Clients> | null = null;

/**
 * Get initialized clients.
 * Lazy initialization ensures clients are only created when needed.
 */
export async function getClients(): Promise<Clients> {
  if (clients) return clients;

  if (!initPromise) {
    initPromise = initializeClients();
  }

  clients = await initPromise;
  return clients;
}

/**
 * Initialize all shared clients.
 */
async function initializeClients(): Promise<Clients> {
  const config = getConfig();

  const embeddingClient = config.embedding ? createEmbeddingClient(config.embedding) : null;

  const store = new SessionStore({
    embeddingClient,
    matching: config.matching,
    onEmbeddingError: logEmbeddingWarning
  });

  return { embeddingClient, store };
}
