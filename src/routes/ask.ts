/**
 * Question endpoints.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { Pipeline } from '../services/pipeline.js';
import { AskRequestSchema, MAX_QUESTION_LENGTH } from '../types/models.js';

export interface AskRoutesOptions {
  pipeline: Pipeline;
}

export const askRoutes: FastifyPluginAsync<AskRoutesOptions> = async (fastify, { pipeline }) => {
  // POST /ask - Main question endpoint
  fastify.post(
    '/ask',
    {
      schema: {
        description: 'Answer a natural-language question about the invoice data',
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1, maxLength: MAX_QUESTION_LENGTH },
          },
          required: ['question'],
        },
      },
    },
    async (request) => {
      const { question } = AskRequestSchema.parse(request.body);
      return pipeline.ask(question);
    }
  );

  // GET /ask?q= - Convenience endpoint
  fastify.get(
    '/ask',
    {
      schema: {
        description: 'Answer a natural-language question (GET)',
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', minLength: 1, maxLength: MAX_QUESTION_LENGTH },
          },
          required: ['q'],
        },
      },
    },
    async (request) => {
      const query: unknown = request.query;
      const q = typeof query === 'object' && query !== null && 'q' in query ? query.q : undefined;
      const { question } = AskRequestSchema.parse({ question: q });
      return pipeline.ask(question);
    }
  );
};
