import Fastify, { type FastifyInstance } from 'fastify';
import { registerOllamaRoutes, type OllamaRoutesOptions } from './routes/ollama';
import { ProxyError } from './types/errors';
import type { ModelRouter } from './types/router';
import { logger } from './utils/logger';

// Base64 images make chat bodies large
const BODY_LIMIT = 100 * 1024 * 1024;

/**
 * Builds the Fastify instance serving the Ollama API. Nothing is bound to
 * a port here, so tests drive it with `inject`.
 */
export async function buildServer(router: ModelRouter, options: OllamaRoutesOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ bodyLimit: BODY_LIMIT });

  // Ollama clients do not always send a JSON content type
  fastify.addContentTypeParser('*', { parseAs: 'string' }, fastify.getDefaultJsonParser('ignore', 'ignore'));

  fastify.addHook('onRequest', async (request) => {
    logger.debug(`${request.method} ${request.url}`);
  });

  // Echo the caller's origin once, unless a handler already set one
  fastify.addHook('onSend', async (request, reply, payload) => {
    const origin = request.headers.origin;
    if (origin && !reply.hasHeader('access-control-allow-origin')) {
      reply.header('Access-Control-Allow-Origin', origin);
    }
    return payload;
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ProxyError) {
      if (error.status >= 500) {
        logger.error(`${request.method} ${request.url} failed: ${error.message}`);
      } else {
        logger.debug(`${request.method} ${request.url} rejected: ${error.message}`);
      }
      return reply.code(error.status).send(error.toJSON());
    }

    // Body parser failures (malformed JSON, empty body) and the like
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const message = error.statusCode === 400 ? `Invalid request: ${error.message}` : error.message;
      return reply.code(error.statusCode).send({ error: message });
    }

    logger.error(`Unhandled error on ${request.method} ${request.url}`, error);
    return reply.code(500).send({ error: error.message || 'Internal server error' });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({ error: `Route ${request.method} ${request.url} not found` });
  });

  await registerOllamaRoutes(fastify, router, options);
  return fastify;
}
