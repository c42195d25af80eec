import type { OllamaVersionResponse } from '@llamabridge/types';
import type { FastifyInstance } from 'fastify';
import { getConfig } from '../../config';
import { ProxyError } from '../../types/errors';

export const HEARTBEAT_TEXT = 'Ollama is running';

const NOT_IMPLEMENTED_MESSAGE = 'This Ollama API endpoint is not implemented in llamabridge.';

export async function registerSystemRoutes(fastify: FastifyInstance) {
  // Clients probe the root path to detect a running server. Fastify
  // answers HEAD from the GET route.
  fastify.get('/', async (_request, reply) => {
    return reply.type('text/plain; charset=utf-8').send(HEARTBEAT_TEXT);
  });

  fastify.get('/api/version', async (_request, reply) => {
    const body: OllamaVersionResponse = { version: getConfig().version };
    return reply.send(body);
  });

  // Model management belongs to the process manager, not to this API
  const notImplemented = async () => {
    throw ProxyError.notImplemented(NOT_IMPLEMENTED_MESSAGE);
  };
  fastify.post('/api/create', notImplemented);
  fastify.post('/api/copy', notImplemented);
  fastify.post('/api/pull', notImplemented);
  fastify.post('/api/push', notImplemented);
  fastify.delete('/api/delete', notImplemented);
  fastify.route({ method: ['HEAD', 'POST'], url: '/api/blobs/:digest', handler: notImplemented });
}
