import {
  ollamaGenerateRequestSchema,
  type OllamaGenerateRequest,
  type OllamaGenerateResponse,
} from '@llamabridge/types';
import type { ParsedRequest, Transformer } from '../../types/transformer';
import { parseBody, toParsedRequest } from './parse';
import { buildCompletionRequestBody } from './request-builder';
import { translateGenerateResponse } from './response-transformer';

/** /api/generate, served by the backend's legacy completions endpoint. */
export class GenerateTransformer implements Transformer<OllamaGenerateRequest, OllamaGenerateResponse> {
  readonly name = 'generate';
  readonly defaultEndpoint = '/v1/completions';
  readonly streamMode = 'generate';

  async parseRequest(input: unknown): Promise<ParsedRequest<OllamaGenerateRequest>> {
    return toParsedRequest(parseBody(ollamaGenerateRequestSchema, input));
  }

  async transformRequest(request: OllamaGenerateRequest, upstreamModel: string): Promise<Record<string, unknown>> {
    return buildCompletionRequestBody(request, upstreamModel);
  }

  async transformResponse(response: unknown, model: string): Promise<OllamaGenerateResponse> {
    return translateGenerateResponse(response, model);
  }
}
