import type { FastifyInstance } from 'fastify';
import type { ModelRouter } from '../../types/router';
import { registerChatRoutes } from './chat';
import { registerEmbeddingsRoutes } from './embeddings';
import { registerModelsRoutes } from './models';
import { registerSystemRoutes } from './system';

export interface OllamaRoutesOptions {
  now?: () => Date;
}

export async function registerOllamaRoutes(
  fastify: FastifyInstance,
  router: ModelRouter,
  options: OllamaRoutesOptions = {}
) {
  const now = options.now ?? (() => new Date());

  await registerSystemRoutes(fastify);
  await registerModelsRoutes(fastify, router, now);
  await registerChatRoutes(fastify, router);
  await registerEmbeddingsRoutes(fastify, router);
}
