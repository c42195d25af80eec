import type { FastifyInstance } from 'fastify';
import { handleInference } from '../../services/inference-handler';
import { ChatTransformer, GenerateTransformer } from '../../transformers/ollama';
import type { ModelRouter } from '../../types/router';

export async function registerChatRoutes(fastify: FastifyInstance, router: ModelRouter) {
  const chat = new ChatTransformer();
  const generate = new GenerateTransformer();

  /**
   * POST /api/chat
   * Ollama chat, served by the backend's /v1/chat/completions.
   */
  fastify.post('/api/chat', async (request, reply) => {
    return handleInference(request, reply, router, chat);
  });

  /**
   * POST /api/generate
   * Ollama prompt completion, served by the backend's /v1/completions.
   */
  fastify.post('/api/generate', async (request, reply) => {
    return handleInference(request, reply, router, generate);
  });
}
