/**
 * Utility endpoints (stats, health, root).
 */

import type { FastifyPluginAsync } from 'fastify';
import { KNOWN_TABLES } from '../catalog.js';
import type { Store } from '../services/database.js';
import type { Pipeline } from '../services/pipeline.js';
import { API_NAME, API_VERSION } from '../server.js';

export interface UtilityRoutesOptions {
  pipeline: Pipeline;
  store: Store;
}

export const utilityRoutes: FastifyPluginAsync<UtilityRoutesOptions> = async (
  fastify,
  { pipeline, store }
) => {
  // GET /stats - Pipeline statistics (for CLI)
  fastify.get('/stats', async () => {
    return pipeline.getStats();
  });

  // GET /health - Health check
  fastify.get('/health', async () => {
    const tables: string[] = [];
    for (const table of KNOWN_TABLES) {
      if (await store.hasTable(table)) {
        tables.push(table);
      }
    }

    return {
      status: 'ok',
      initialized: pipeline.isReady,
      database: {
        client: store.client,
        tables,
      },
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: API_NAME,
      version: API_VERSION,
      description: 'Natural-language questions over invoice data',
      docs: '/docs',
    };
  });
};
