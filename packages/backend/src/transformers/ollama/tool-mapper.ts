import type {
  OllamaChatRequest,
  OllamaMessage,
  OllamaResponseToolCall,
  OllamaTool,
  OllamaToolCall,
  OpenAIRequestTool,
  OpenAIRequestToolCall,
  OpenAIToolCall,
} from '@llamabridge/types';
import { ProxyError } from '../../types/errors';

/**
 * Checks tool definitions and strips tool calls the model hallucinated.
 *
 * Tool definitions must be of type "function" with a name, otherwise the
 * request is rejected. Assistant tool calls without a function name are
 * dropped silently, and so is every tool message that carries neither a
 * tool_call_id nor a tool_name (the answers to those dropped calls).
 * Returns a new request; running it twice gives the same messages.
 */
export function validateToolRequest(request: OllamaChatRequest): OllamaChatRequest {
  (request.tools ?? []).forEach((tool, i) => {
    if (tool.type !== 'function') {
      throw ProxyError.badRequest(`tool ${i}: only 'function' type is supported`);
    }
    if (!tool.function.name) {
      throw ProxyError.badRequest(`tool ${i}: missing function name`);
    }
  });

  // First pass: calls. Second pass: orphaned tool responses.
  const withValidCalls = request.messages.map((message): OllamaMessage => {
    if (message.role !== 'assistant' || !message.tool_calls || message.tool_calls.length === 0) {
      return message;
    }
    return { ...message, tool_calls: message.tool_calls.filter((call) => call.function.name !== '') };
  });

  const messages = withValidCalls.filter(
    (message) => !(message.role === 'tool' && !message.tool_call_id && !message.tool_name)
  );

  return { ...request, messages };
}

export function toolsToOpenAI(tools: OllamaTool[] | undefined): OpenAIRequestTool[] | undefined {
  if (!tools || tools.length === 0) return undefined;

  return tools.map((tool) => ({
    type: tool.type,
    function: {
      name: tool.function.name,
      description: tool.function.description,
      // Sent as an object, never as a JSON string
      parameters: tool.function.parameters ?? null,
    },
  }));
}

/**
 * Re-expresses assistant tool calls in the backend shape. Calls without a
 * name are skipped; missing ids become `call_<messageIndex>_<validCallIndex>`.
 */
export function toolCallsToOpenAI(calls: OllamaToolCall[], messageIndex: number): OpenAIRequestToolCall[] {
  const result: OpenAIRequestToolCall[] = [];

  for (const call of calls) {
    if (!call.function.name) continue;

    result.push({
      id: call.id || `call_${messageIndex}_${result.length}`,
      type: call.type || 'function',
      function: {
        name: call.function.name,
        arguments: JSON.stringify(call.function.arguments ?? {}),
      },
    });
  }

  return result;
}

/**
 * Best-effort parse of a JSON arguments string. Anything that is not a JSON
 * object yields an empty mapping.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }

  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return {};
}

/** Maps backend tool calls to Ollama, keeping the backend-assigned ids. */
export function openAIToolCallsToOllama(calls: OpenAIToolCall[]): OllamaResponseToolCall[] {
  return calls.map((call, index) => ({
    id: call.id,
    type: call.type,
    function: {
      index,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments),
    },
  }));
}
