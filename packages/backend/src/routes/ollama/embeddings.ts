import type { FastifyInstance } from 'fastify';
import { handleInference } from '../../services/inference-handler';
import { EmbedTransformer, LegacyEmbeddingsTransformer } from '../../transformers/ollama';
import type { ModelRouter } from '../../types/router';

export async function registerEmbeddingsRoutes(fastify: FastifyInstance, router: ModelRouter) {
  const embed = new EmbedTransformer();
  const legacy = new LegacyEmbeddingsTransformer();

  fastify.post('/api/embed', async (request, reply) => {
    return handleInference(request, reply, router, embed);
  });

  // Pre-0.3 endpoint: single prompt in, single vector out
  fastify.post('/api/embeddings', async (request, reply) => {
    return handleInference(request, reply, router, legacy);
  });
}
