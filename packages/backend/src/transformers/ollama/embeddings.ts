import {
  ollamaEmbedRequestSchema,
  ollamaLegacyEmbeddingsRequestSchema,
  type OllamaEmbedRequest,
  type OllamaEmbedResponse,
  type OllamaLegacyEmbeddingsRequest,
  type OllamaLegacyEmbeddingsResponse,
} from '@llamabridge/types';
import { ProxyError } from '../../types/errors';
import type { ParsedRequest, Transformer } from '../../types/transformer';
import { parseBody, toParsedRequest } from './parse';
import { buildEmbeddingRequestBody } from './request-builder';
import { translateEmbedResponse, translateLegacyEmbeddingsResponse } from './response-transformer';

/**
 * Embeddings never stream; both Ollama endpoints share the backend's
 * /v1/embeddings and differ only in their response shape.
 */
export class EmbedTransformer implements Transformer<OllamaEmbedRequest, OllamaEmbedResponse> {
  readonly name = 'embed';
  readonly defaultEndpoint = '/v1/embeddings';

  async parseRequest(input: unknown): Promise<ParsedRequest<OllamaEmbedRequest>> {
    const parsed = toParsedRequest(parseBody(ollamaEmbedRequestSchema, input));
    return { ...parsed, stream: false };
  }

  async transformRequest(request: OllamaEmbedRequest, upstreamModel: string): Promise<Record<string, unknown>> {
    return buildEmbeddingRequestBody(request, upstreamModel);
  }

  async transformResponse(response: unknown, model: string): Promise<OllamaEmbedResponse> {
    return translateEmbedResponse(response, model);
  }
}

export class LegacyEmbeddingsTransformer
  implements Transformer<OllamaLegacyEmbeddingsRequest, OllamaLegacyEmbeddingsResponse>
{
  readonly name = 'embeddings';
  readonly defaultEndpoint = '/v1/embeddings';

  async parseRequest(input: unknown): Promise<ParsedRequest<OllamaLegacyEmbeddingsRequest>> {
    const parsed = toParsedRequest(parseBody(ollamaLegacyEmbeddingsRequestSchema, input));
    if (!parsed.body.prompt) {
      throw ProxyError.badRequest('Prompt is required.');
    }
    return { ...parsed, stream: false };
  }

  async transformRequest(
    request: OllamaLegacyEmbeddingsRequest,
    upstreamModel: string
  ): Promise<Record<string, unknown>> {
    return buildEmbeddingRequestBody(request, upstreamModel);
  }

  async transformResponse(response: unknown): Promise<OllamaLegacyEmbeddingsResponse> {
    return translateLegacyEmbeddingsResponse(response);
  }
}
