import { ollamaChatRequestSchema, type OllamaChatRequest, type OllamaChatResponse } from '@llamabridge/types';
import type { ParsedRequest, Transformer } from '../../types/transformer';
import { parseBody, toParsedRequest } from './parse';
import { buildChatRequestBody } from './request-builder';
import { translateChatResponse } from './response-transformer';
import { validateToolRequest } from './tool-mapper';

export class ChatTransformer implements Transformer<OllamaChatRequest, OllamaChatResponse> {
  readonly name = 'chat';
  readonly defaultEndpoint = '/v1/chat/completions';
  readonly streamMode = 'chat';

  async parseRequest(input: unknown): Promise<ParsedRequest<OllamaChatRequest>> {
    // Tool validation runs before the model check, as a malformed tool list
    // is the more specific complaint
    const request = validateToolRequest(parseBody(ollamaChatRequestSchema, input));
    return toParsedRequest(request);
  }

  async transformRequest(request: OllamaChatRequest, upstreamModel: string): Promise<Record<string, unknown>> {
    return buildChatRequestBody(request, upstreamModel);
  }

  async transformResponse(response: unknown, model: string): Promise<OllamaChatResponse> {
    return translateChatResponse(response, model);
  }
}
