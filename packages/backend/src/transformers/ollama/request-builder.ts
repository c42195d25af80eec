import type {
  OllamaChatRequest,
  OllamaEmbedRequest,
  OllamaGenerateRequest,
  OllamaLegacyEmbeddingsRequest,
  OllamaMessage,
  OpenAIChatRequestBody,
  OpenAICompletionRequestBody,
  OpenAIContentPart,
  OpenAIEmbeddingRequestBody,
  OpenAIRequestMessage,
  OpenAIResponseFormat,
} from '@llamabridge/types';
import { ProxyError } from '../../types/errors';
import { toolCallsToOpenAI, toolsToOpenAI } from './tool-mapper';

/** Polymorphic directive (format, tool_choice), resolved once per request. */
export type Directive =
  | { kind: 'none' }
  | { kind: 'literal'; value: string }
  | { kind: 'schema'; schema: Record<string, unknown> }
  | { kind: 'passthrough'; value: unknown };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveDirective(value: unknown): Directive {
  if (value === null || value === undefined) return { kind: 'none' };
  if (typeof value === 'string') return { kind: 'literal', value };
  if (isPlainObject(value)) return { kind: 'schema', schema: value };
  return { kind: 'passthrough', value };
}

/** "json" asks for a JSON object; a schema object asks for that schema. */
export function toResponseFormat(format: Directive): OpenAIResponseFormat | undefined {
  switch (format.kind) {
    case 'literal':
      return format.value === 'json' ? { type: 'json_object' } : undefined;
    case 'schema':
      return { type: 'json_schema', schema: format.schema };
    default:
      return undefined;
  }
}

function toolChoiceValue(toolChoice: Directive): unknown {
  switch (toolChoice.kind) {
    case 'none':
      return undefined;
    case 'literal':
      return toolChoice.value;
    case 'schema':
      return toolChoice.schema;
    case 'passthrough':
      return toolChoice.value;
  }
}

/**
 * Copies free-form options into the body. Keys already set by structured
 * fields are left alone.
 */
export function mergeOptions<T extends Record<string, unknown>>(
  body: T,
  options: Record<string, unknown> | null | undefined
): T {
  if (!options) return body;

  for (const [key, value] of Object.entries(options)) {
    if (!(key in body)) {
      Object.assign(body, { [key]: value });
    }
  }
  return body;
}

const IMAGE_SIGNATURES: Array<[prefix: string, mediaType: string]> = [
  ['/9j/', 'image/jpeg'],
  ['iVBOR', 'image/png'],
  ['R0lGOD', 'image/gif'],
  ['UklGR', 'image/webp'],
];

export function imageDataUrl(base64: string): string {
  if (base64.startsWith('data:')) return base64;
  const match = IMAGE_SIGNATURES.find(([prefix]) => base64.startsWith(prefix));
  return `data:${match ? match[1] : 'image/png'};base64,${base64}`;
}

function messageContent(message: OllamaMessage): string | OpenAIContentPart[] {
  if (!message.images || message.images.length === 0) {
    return message.content;
  }
  if (message.role !== 'user') {
    throw ProxyError.notImplemented(`Image input is only supported on user messages (got '${message.role}').`);
  }

  const parts: OpenAIContentPart[] = [];
  if (message.content) {
    parts.push({ type: 'text', text: message.content });
  }
  for (const image of message.images) {
    parts.push({ type: 'image_url', image_url: { url: imageDataUrl(image) } });
  }
  return parts;
}

export function messagesToOpenAI(messages: OllamaMessage[]): OpenAIRequestMessage[] {
  return messages.map((message, i) => {
    const converted: OpenAIRequestMessage = {
      role: message.role,
      content: messageContent(message),
    };

    if (message.tool_calls && message.tool_calls.length > 0) {
      const calls = toolCallsToOpenAI(message.tool_calls, i);
      if (calls.length > 0) {
        converted.tool_calls = calls;
      }
    }

    // tool_call_id (OpenAI style) wins over tool_name (Ollama native)
    if (message.role === 'tool') {
      if (message.tool_call_id) {
        converted.tool_call_id = message.tool_call_id;
      } else if (message.tool_name) {
        converted.tool_call_id = `call_${message.tool_name}_${i}`;
      }
      // The backend rejects empty content on tool messages
      if (message.content === '') {
        converted.content = 'null';
      }
    }

    return converted;
  });
}

export function buildChatRequestBody(request: OllamaChatRequest, upstreamModel: string): OpenAIChatRequestBody {
  const body: OpenAIChatRequestBody = {
    model: upstreamModel,
    messages: messagesToOpenAI(request.messages),
    stream: request.stream === true,
  };

  const tools = toolsToOpenAI(request.tools);
  if (tools) {
    body.tools = tools;
  }

  const toolChoice = toolChoiceValue(resolveDirective(request.tool_choice));
  if (toolChoice !== undefined) {
    body.tool_choice = toolChoice;
  }

  mergeOptions(body, request.options);

  // think: false and an absent think are different wire states
  if (request.think !== undefined && request.think !== null) {
    body.chat_template_kwargs = { enable_thinking: request.think };
  }

  const responseFormat = toResponseFormat(resolveDirective(request.format));
  if (responseFormat) {
    body.response_format = responseFormat;
  }

  return body;
}

/**
 * Legacy /api/generate maps onto /v1/completions. Raw prompts and images
 * have no equivalent there and are refused.
 */
export function buildCompletionRequestBody(
  request: OllamaGenerateRequest,
  upstreamModel: string
): OpenAICompletionRequestBody {
  if (request.raw) {
    throw ProxyError.notImplemented('Raw mode for /api/generate is not implemented.');
  }
  if (request.images && request.images.length > 0) {
    throw ProxyError.notImplemented('Image input for /api/generate is not implemented.');
  }

  const prompt = request.system ? `${request.system}\n\n${request.prompt}` : request.prompt;

  const body: OpenAICompletionRequestBody = {
    model: upstreamModel,
    prompt,
    stream: request.stream === true,
  };
  return mergeOptions(body, request.options);
}

export function buildEmbeddingRequestBody(
  request: OllamaEmbedRequest | OllamaLegacyEmbeddingsRequest,
  upstreamModel: string
): OpenAIEmbeddingRequestBody {
  const body: OpenAIEmbeddingRequestBody = {
    model: upstreamModel,
    input: 'input' in request ? request.input : request.prompt,
  };
  return mergeOptions(body, request.options);
}
