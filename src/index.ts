/**
 * tabletalk server - main entry point
 */

import { createApp } from './app.js';
import { config } from './config.js';
import { buildServer } from './server.js';
import { errorMessage } from './types/errors.js';
import { logger } from './utils/logger.js';

export interface StartOptions {
  host?: string;
  port?: number;
}

/**
 * Build the pipeline, initialize it and listen.
 */
export async function startServer(options: StartOptions = {}): Promise<void> {
  const host = options.host ?? config.HOST;
  const port = options.port ?? config.PORT;

  logger.info('Starting tabletalk API server...');
  const { store, pipeline } = createApp(config);
  const fastify = await buildServer({ pipeline, store });

  fastify.addHook('onReady', async () => {
    await pipeline.initialize();
  });

  fastify.addHook('onClose', async () => {
    logger.info('Shutting down tabletalk API server...');
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    });
  }

  await fastify.listen({ port, host });
  logger.info(`Server running at http://localhost:${port}`);
  logger.info(`API docs at http://localhost:${port}/docs`);
}

export { createApp, type AppContext, type CreateAppOptions } from './app.js';
export { buildServer, type ServerOptions } from './server.js';
export { Pipeline, type PipelineComponents } from './services/pipeline.js';
export type { LanguageModelClient } from './services/llm.js';
export type * from './types/models.js';
