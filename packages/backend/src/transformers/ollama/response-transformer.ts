import {
  openAIChatCompletionSchema,
  openAICompletionSchema,
  openAIEmbeddingResponseSchema,
  openAIErrorEnvelopeSchema,
  type OllamaChatResponse,
  type OllamaEmbedResponse,
  type OllamaGenerateResponse,
  type OllamaLegacyEmbeddingsResponse,
  type OllamaResponseMessage,
  type OpenAIUsage,
} from '@llamabridge/types';
import type { z } from 'zod';
import { ProxyError } from '../../types/errors';
import { openAIToolCallsToOllama } from './tool-mapper';

const KNOWN_FINISH_REASONS = new Set(['stop', 'length', 'content_filter', 'tool_calls']);

/**
 * Known finish reasons pass through, any other non-empty value becomes
 * "unknown", and empty stays empty.
 */
export function mapFinishReason(reason: string | null | undefined): string {
  if (!reason) return '';
  return KNOWN_FINISH_REASONS.has(reason) ? reason : 'unknown';
}

/** Roles are not policed: anything unrecognized passes through unchanged. */
export function mapRole(role: string | null | undefined): string {
  switch (role) {
    case 'system':
    case 'user':
    case 'assistant':
      return role;
    default:
      return role ?? '';
  }
}

export function unixToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function usageCounters(usage: OpenAIUsage | null | undefined): {
  prompt_eval_count?: number;
  eval_count?: number;
} {
  if (!usage) return {};
  return { prompt_eval_count: usage.prompt_tokens, eval_count: usage.completion_tokens };
}

/**
 * Builds the error for a non-2xx backend response: the envelope's message
 * when there is one, else the raw body, under the backend's status.
 */
export function translateUpstreamError(status: number, body: string): ProxyError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return ProxyError.upstream(status, body);
  }

  const envelope = openAIErrorEnvelopeSchema.safeParse(parsed);
  if (envelope.success && envelope.data.error.message) {
    return ProxyError.upstream(status, envelope.data.error.message);
  }
  return ProxyError.upstream(status, body);
}

function decode<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw ProxyError.internal(`Error parsing backend response: ${result.error.message}`);
  }
  return result.data;
}

export function translateChatResponse(payload: unknown, model: string): OllamaChatResponse {
  const response = decode(openAIChatCompletionSchema, payload);
  const choice = response.choices?.[0];
  if (!choice) {
    throw ProxyError.internal('Backend response contained no choices.');
  }

  const message: OllamaResponseMessage = {
    role: mapRole(choice.message.role),
    content: choice.message.content ?? '',
  };
  // Empty reasoning is never serialized
  if (choice.message.reasoning_content) {
    message.thinking = choice.message.reasoning_content;
  }
  if (choice.message.tool_calls && choice.message.tool_calls.length > 0) {
    message.tool_calls = openAIToolCallsToOllama(choice.message.tool_calls);
  }

  const result: OllamaChatResponse = {
    model,
    created_at: unixToIso(response.created),
    message,
    done: true,
    ...usageCounters(response.usage),
  };
  const doneReason = mapFinishReason(choice.finish_reason);
  if (doneReason) {
    result.done_reason = doneReason;
  }
  return result;
}

export function translateGenerateResponse(payload: unknown, model: string): OllamaGenerateResponse {
  const response = decode(openAICompletionSchema, payload);
  const choice = response.choices?.[0];
  if (!choice) {
    throw ProxyError.internal('Backend response contained no choices.');
  }

  const result: OllamaGenerateResponse = {
    model,
    created_at: unixToIso(response.created),
    response: choice.text,
    done: true,
    ...usageCounters(response.usage),
  };
  const doneReason = mapFinishReason(choice.finish_reason);
  if (doneReason) {
    result.done_reason = doneReason;
  }
  return result;
}

export function translateEmbedResponse(payload: unknown, model: string): OllamaEmbedResponse {
  const response = decode(openAIEmbeddingResponseSchema, payload);
  return {
    model,
    embeddings: response.data.map((item) => item.embedding),
    prompt_eval_count: response.usage?.prompt_tokens ?? 0,
  };
}

export function translateLegacyEmbeddingsResponse(payload: unknown): OllamaLegacyEmbeddingsResponse {
  const response = decode(openAIEmbeddingResponseSchema, payload);
  const first = response.data[0];
  if (!first) {
    throw ProxyError.internal('Backend response contained no embeddings.');
  }
  return { embedding: first.embedding };
}
