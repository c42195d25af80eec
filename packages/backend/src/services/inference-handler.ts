import type { FastifyReply, FastifyRequest } from 'fastify';
import { Readable } from 'stream';
import { createOllamaStreamTransform } from '../transformers/ollama/stream-transformer';
import { translateUpstreamError } from '../transformers/ollama/response-transformer';
import { ProxyError, errorMessage } from '../types/errors';
import type { ModelRouter } from '../types/router';
import type { Transformer } from '../types/transformer';
import { logger } from '../utils/logger';

/**
 * handleInference
 *
 * Runs one Ollama inference request end to end:
 * 1. Parses the Ollama body and resolves the model.
 * 2. Forwards the translated request to the backend instance.
 * 3. Replies with a translated JSON body, or pipes the backend's event
 *    stream through the NDJSON transform.
 *
 * Backend failures become an error response before anything is streamed.
 */
export async function handleInference<TRequest, TResponse>(
  request: FastifyRequest,
  reply: FastifyReply,
  router: ModelRouter,
  transformer: Transformer<TRequest, TResponse>
) {
  const parsed = await transformer.parseRequest(request.body);
  const model = router.resolveModel(parsed.model);
  const upstreamBody = await transformer.transformRequest(parsed.body, model.upstreamName);

  logger.debug(`Incoming ${transformer.name} request for ${parsed.model} (stream: ${parsed.stream})`);

  // A client that goes away cancels the backend request
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      logger.debug(`Client closed ${transformer.name} request for ${parsed.model}`);
      controller.abort();
    }
  });

  const response = await router.forward(model, transformer.defaultEndpoint, upstreamBody, {
    signal: controller.signal,
    keepAlive: parsed.keepAlive,
  });

  if (!response.ok) {
    const text = await response.text();
    logger.warn(`Backend for ${model.id} returned ${response.status}`);
    throw translateUpstreamError(response.status, text);
  }

  // --- Streaming ---
  if (parsed.stream && transformer.streamMode && response.body) {
    const frames = response.body.pipeThrough(
      createOllamaStreamTransform({ model: parsed.model, mode: transformer.streamMode })
    );

    reply.header('Content-Type', 'application/x-ndjson');
    reply.header('Cache-Control', 'no-cache');
    return reply.send(Readable.fromWeb(frames));
  }

  // --- Unary ---
  const text = await response.text();
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (e) {
    throw ProxyError.internal(`Error parsing backend response: ${errorMessage(e)}`);
  }

  const responseBody = await transformer.transformResponse(payload, parsed.model);
  logger.silly(`Outgoing ${transformer.name} response`, responseBody);
  return reply.send(responseBody);
}
