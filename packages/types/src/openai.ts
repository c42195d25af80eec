import { z } from 'zod';

// Error Envelope

export const openAIErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string().default(''),
    type: z.string().nullish(),
  }),
});

export type OpenAIErrorEnvelope = z.infer<typeof openAIErrorEnvelopeSchema>;

// Usage

export const openAIUsageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  total_tokens: z.number().default(0),
});

export type OpenAIUsage = z.infer<typeof openAIUsageSchema>;

// Chat Completions (non-streaming)

export const openAIToolCallSchema = z.object({
  id: z.string().default(''),
  type: z.string().default(''),
  function: z.object({
    name: z.string().default(''),
    arguments: z.string().default(''),
  }),
});

export type OpenAIToolCall = z.infer<typeof openAIToolCallSchema>;

export const openAIChatCompletionSchema = z.object({
  id: z.string().nullish(),
  object: z.string().nullish(),
  created: z.number().default(0),
  model: z.string().nullish(),
  choices: z
    .array(
      z.object({
        index: z.number().default(0),
        message: z.object({
          role: z.string().nullish(),
          content: z.string().nullish(),
          reasoning_content: z.string().nullish(),
          tool_calls: z.array(openAIToolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .nullish(),
  usage: openAIUsageSchema.nullish(),
});

export type OpenAIChatCompletion = z.infer<typeof openAIChatCompletionSchema>;

// Chat Completions (streaming)

export const openAIToolCallDeltaSchema = z.object({
  index: z.number().int().default(0),
  id: z.string().nullish(),
  type: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

export type OpenAIToolCallDelta = z.infer<typeof openAIToolCallDeltaSchema>;

export const openAIChatStreamEventSchema = z.object({
  id: z.string().nullish(),
  object: z.string().nullish(),
  created: z.number().nullish(),
  model: z.string().nullish(),
  choices: z
    .array(
      z.object({
        index: z.number().default(0),
        delta: z
          .object({
            role: z.string().nullish(),
            content: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            tool_calls: z.array(openAIToolCallDeltaSchema).nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      })
    )
    .nullish(),
  usage: openAIUsageSchema.nullish(),
});

export type OpenAIChatStreamEvent = z.infer<typeof openAIChatStreamEventSchema>;

// Legacy Completions (streaming and non-streaming share the choice shape)

export const openAICompletionSchema = z.object({
  id: z.string().nullish(),
  object: z.string().nullish(),
  created: z.number().default(0),
  model: z.string().nullish(),
  choices: z
    .array(
      z.object({
        text: z.string().default(''),
        index: z.number().default(0),
        finish_reason: z.string().nullish(),
      })
    )
    .nullish(),
  usage: openAIUsageSchema.nullish(),
});

export type OpenAICompletion = z.infer<typeof openAICompletionSchema>;

// Embeddings

export const openAIEmbeddingResponseSchema = z.object({
  object: z.string().nullish(),
  model: z.string().nullish(),
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
    })
    .nullish(),
});

export type OpenAIEmbeddingResponse = z.infer<typeof openAIEmbeddingResponseSchema>;

// Request Bodies

export type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface OpenAIRequestToolCall {
  id: string;
  type: string;
  function: {
    name: string;
    arguments: string;
  };
}

export interface OpenAIRequestMessage {
  role: string;
  content: string | OpenAIContentPart[];
  tool_calls?: OpenAIRequestToolCall[];
  tool_call_id?: string;
}

export interface OpenAIRequestTool {
  type: string;
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown> | null;
  };
}

export type OpenAIResponseFormat =
  | { type: 'json_object' }
  | { type: 'json_schema'; schema: Record<string, unknown> };

/**
 * Free-form `options` from the client are merged in as extra top-level keys,
 * hence the index signature.
 */
export interface OpenAIChatRequestBody {
  model: string;
  messages: OpenAIRequestMessage[];
  stream: boolean;
  tools?: OpenAIRequestTool[];
  tool_choice?: unknown;
  chat_template_kwargs?: { enable_thinking: boolean };
  response_format?: OpenAIResponseFormat;
  [option: string]: unknown;
}

export interface OpenAICompletionRequestBody {
  model: string;
  prompt: string;
  stream: boolean;
  [option: string]: unknown;
}

export interface OpenAIEmbeddingRequestBody {
  model: string;
  input: string | string[];
  [option: string]: unknown;
}
