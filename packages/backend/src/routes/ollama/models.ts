import type { OllamaListTagsResponse, OllamaProcessResponse } from '@llamabridge/types';
import { ollamaShowRequestSchema } from '@llamabridge/types';
import type { FastifyInstance } from 'fastify';
import { toModelResponse, toProcessResponse, toShowResponse } from '../../services/model-catalog';
import { parseBody } from '../../transformers/ollama/parse';
import { ProxyError } from '../../types/errors';
import type { ModelRouter } from '../../types/router';

export async function registerModelsRoutes(fastify: FastifyInstance, router: ModelRouter, now: () => Date) {
  /**
   * GET /api/tags
   * Every configured model that is not marked unlisted.
   */
  fastify.get('/api/tags', async (_request, reply) => {
    const modifiedAt = now().toISOString();
    const body: OllamaListTagsResponse = {
      models: router
        .listModels()
        .filter((model) => !model.config.unlisted)
        .map((model) => toModelResponse(model, modifiedAt)),
    };
    return reply.send(body);
  });

  fastify.post('/api/show', async (request, reply) => {
    const body = parseBody(ollamaShowRequestSchema, request.body);
    // "name" is the pre-0.5 spelling of "model"
    const name = body.model || body.name;
    if (!name) {
      throw ProxyError.badRequest('Model name is required.');
    }

    const model = router.findModel(name);
    if (!model) {
      throw ProxyError.notFound(`Model '${name}' not found.`);
    }
    return reply.send(toShowResponse(model));
  });

  /**
   * GET /api/ps
   * Models whose backend instance is currently ready.
   */
  fastify.get('/api/ps', async (_request, reply) => {
    const current = now();
    const models = new Map(router.listModels().map((model) => [model.id, model]));

    const body: OllamaProcessResponse = { models: [] };
    for (const status of router.instances()) {
      const model = models.get(status.id);
      if (model && status.state === 'ready') {
        body.models.push(toProcessResponse(model, status, current));
      }
    }
    return reply.send(body);
  });
}
