import { z } from 'zod';

// Error Response Schema
export const ollamaErrorResponseSchema = z.object({
  error: z.string(),
});

export type OllamaErrorResponse = z.infer<typeof ollamaErrorResponseSchema>;

// Tool Schemas

export const ollamaToolSchema = z.object({
  type: z.string().default(''),
  function: z
    .object({
      name: z.string().default(''),
      description: z.string().default(''),
      parameters: z.record(z.unknown()).nullish(),
    })
    .default({}),
});

export type OllamaTool = z.infer<typeof ollamaToolSchema>;

export const ollamaToolCallSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  function: z
    .object({
      index: z.number().int().optional(),
      name: z.string().default(''),
      arguments: z.record(z.unknown()).nullish(),
    })
    .default({}),
});

export type OllamaToolCall = z.infer<typeof ollamaToolCallSchema>;

// Message Schema

export const ollamaMessageSchema = z.object({
  role: z.string(),
  content: z.string().default(''),
  thinking: z.string().optional(),
  images: z.array(z.string()).optional(),
  tool_calls: z.array(ollamaToolCallSchema).optional(),
  tool_call_id: z.string().optional(),
  tool_name: z.string().optional(),
});

export type OllamaMessage = z.infer<typeof ollamaMessageSchema>;

// Request Schemas

/**
 * keep_alive arrives as a duration string or a number of seconds; format and
 * tool_choice are polymorphic. All three stay untyped here and are resolved
 * by the transformers.
 */
export const ollamaChatRequestSchema = z.object({
  model: z.string().default(''),
  messages: z.array(ollamaMessageSchema).default([]),
  stream: z.boolean().optional(),
  format: z.unknown().optional(),
  keep_alive: z.unknown().optional(),
  options: z.record(z.unknown()).nullish(),
  tools: z.array(ollamaToolSchema).optional(),
  tool_choice: z.unknown().optional(),
  think: z.boolean().nullish(),
});

export type OllamaChatRequest = z.infer<typeof ollamaChatRequestSchema>;

export const ollamaGenerateRequestSchema = z.object({
  model: z.string().default(''),
  prompt: z.string().default(''),
  system: z.string().optional(),
  template: z.string().optional(),
  context: z.array(z.number()).optional(),
  stream: z.boolean().optional(),
  raw: z.boolean().optional(),
  format: z.unknown().optional(),
  images: z.array(z.string()).optional(),
  keep_alive: z.unknown().optional(),
  options: z.record(z.unknown()).nullish(),
});

export type OllamaGenerateRequest = z.infer<typeof ollamaGenerateRequestSchema>;

export const ollamaEmbedRequestSchema = z.object({
  model: z.string().default(''),
  input: z.union([z.string(), z.array(z.string())]).default(''),
  truncate: z.boolean().optional(),
  options: z.record(z.unknown()).nullish(),
  keep_alive: z.unknown().optional(),
});

export type OllamaEmbedRequest = z.infer<typeof ollamaEmbedRequestSchema>;

export const ollamaLegacyEmbeddingsRequestSchema = z.object({
  model: z.string().default(''),
  prompt: z.string().default(''),
  options: z.record(z.unknown()).nullish(),
  keep_alive: z.unknown().optional(),
});

export type OllamaLegacyEmbeddingsRequest = z.infer<typeof ollamaLegacyEmbeddingsRequestSchema>;

export const ollamaShowRequestSchema = z.object({
  model: z.string().default(''),
  name: z.string().default(''),
});

export type OllamaShowRequest = z.infer<typeof ollamaShowRequestSchema>;

// Response Types

export interface OllamaResponseToolCall {
  id?: string;
  type?: string;
  function: {
    index: number;
    name: string;
    arguments: Record<string, unknown>;
  };
}

export interface OllamaResponseMessage {
  role: string;
  content: string;
  thinking?: string;
  tool_calls?: OllamaResponseToolCall[];
}

export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: OllamaResponseMessage;
  done: boolean;
  done_reason?: string;
  total_duration?: number;
  load_duration?: number;
  prompt_eval_count?: number;
  eval_count?: number;
}

export interface OllamaGenerateResponse {
  model: string;
  created_at: string;
  response: string;
  done: boolean;
  done_reason?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
  prompt_eval_count?: number;
}

export interface OllamaLegacyEmbeddingsResponse {
  embedding: number[];
}

export interface OllamaVersionResponse {
  version: string;
}

export interface OllamaModelDetails {
  parent_model?: string;
  format?: string;
  family?: string;
  families?: string[];
  parameter_size?: string;
  quantization_level?: string;
}

export interface OllamaModelResponse {
  name: string;
  model: string;
  modified_at: string;
  size: number;
  digest: string;
  details: OllamaModelDetails;
}

export interface OllamaListTagsResponse {
  models: OllamaModelResponse[];
}

export interface OllamaShowResponse {
  details: OllamaModelDetails;
  model_info: Record<string, string | number>;
  capabilities: string[];
}

export interface OllamaProcessModelResponse {
  name: string;
  model: string;
  size: number;
  digest: string;
  details: OllamaModelDetails;
  expires_at: string;
  size_vram: number;
}

export interface OllamaProcessResponse {
  models: OllamaProcessModelResponse[];
}

/** One line of an `application/x-ndjson` stream. */
export type OllamaStreamFrame = OllamaChatResponse | OllamaGenerateResponse | OllamaErrorResponse;
