import {
  ollamaErrorResponseSchema,
  openAIChatStreamEventSchema,
  openAICompletionSchema,
  type OllamaChatResponse,
  type OllamaGenerateResponse,
  type OllamaResponseMessage,
  type OllamaStreamFrame,
} from '@llamabridge/types';
import type { z } from 'zod';
import { logger } from '../../utils/logger';
import { mapFinishReason, mapRole, usageCounters } from './response-transformer';
import { ToolCallAccumulator } from './tool-call-accumulator';

export type StreamMode = 'chat' | 'generate';

export interface StreamTranslatorOptions {
  /** Display name written into every frame. */
  model: string;
  mode: StreamMode;
  now?: () => Date;
}

const DATA_PREFIX = 'data:';
const DONE_SENTINEL = '[DONE]';

class StreamDecodeError extends Error {}

function decodeEvent<T extends z.ZodTypeAny>(schema: T, payload: string): z.output<T> {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (e) {
    throw new StreamDecodeError(e instanceof Error ? e.message : String(e));
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new StreamDecodeError(result.error.message);
  }
  return result.data;
}

/**
 * Incremental translator from backend server-sent events to Ollama NDJSON
 * frames. One instance serves exactly one response stream.
 *
 * Bytes may split anywhere, including inside a UTF-8 sequence or an event
 * line, so the trailing partial line is carried over to the next push.
 */
export class OllamaStreamTranslator {
  private decoder = new TextDecoder();
  private buffer = '';
  private finished = false;
  private toolCalls = new ToolCallAccumulator();
  private readonly now: () => Date;

  constructor(private readonly options: StreamTranslatorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** Feeds one chunk and returns the frames it completed. */
  push(chunk: Uint8Array): OllamaStreamFrame[] {
    if (this.finished) return [];

    this.buffer += this.decoder.decode(chunk, { stream: true });
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return this.processLines(lines);
  }

  /** Processes whatever partial line is left once the backend is done. */
  finish(): OllamaStreamFrame[] {
    if (this.finished) return [];

    const rest = this.buffer + this.decoder.decode();
    this.buffer = '';
    return this.processLines([rest]);
  }

  private processLines(lines: string[]): OllamaStreamFrame[] {
    const frames: OllamaStreamFrame[] = [];

    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;

      if (!line.startsWith(DATA_PREFIX)) {
        const passthrough = this.forwardErrorLine(line);
        if (passthrough) frames.push(passthrough);
        continue;
      }

      const payload = line.slice(DATA_PREFIX.length).trim();
      if (payload === DONE_SENTINEL) {
        // Anything after the sentinel is ignored, including later chunks
        this.finished = true;
        this.buffer = '';
        break;
      }

      try {
        frames.push(...this.translateEvent(payload));
      } catch (e) {
        if (!(e instanceof StreamDecodeError)) throw e;
        logger.warn(`Dropping malformed stream event: ${e.message}`);
        frames.push({ error: `Error transforming stream: ${e.message}` });
      }
    }

    return frames;
  }

  /** Bare lines survive only when they already are an Ollama error envelope. */
  private forwardErrorLine(line: string): OllamaStreamFrame | null {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      return null;
    }
    const parsed = ollamaErrorResponseSchema.safeParse(json);
    return parsed.success && parsed.data.error ? parsed.data : null;
  }

  private translateEvent(payload: string): OllamaStreamFrame[] {
    return this.options.mode === 'chat' ? this.translateChatEvent(payload) : this.translateGenerateEvent(payload);
  }

  private translateChatEvent(payload: string): OllamaChatResponse[] {
    const event = decodeEvent(openAIChatStreamEventSchema, payload);
    const choice = event.choices?.[0];
    if (!choice) return [];

    const message: OllamaResponseMessage = {
      role: mapRole(choice.delta.role) || 'assistant',
      content: choice.delta.content ?? '',
    };
    if (choice.delta.reasoning_content) {
      message.thinking = choice.delta.reasoning_content;
    }

    for (const delta of choice.delta.tool_calls ?? []) {
      this.toolCalls.apply(delta);
    }

    const createdAt = this.now().toISOString();
    const doneReason = mapFinishReason(choice.finish_reason);

    if (!doneReason) {
      return [{ model: this.options.model, created_at: createdAt, message, done: false }];
    }

    const terminal: OllamaChatResponse = {
      model: this.options.model,
      created_at: createdAt,
      message,
      done: true,
      done_reason: doneReason,
      ...usageCounters(event.usage),
    };

    const toolCalls = this.toolCalls.size > 0 ? this.toolCalls.drain() : [];
    if (toolCalls.length === 0) {
      return [terminal];
    }

    // Clients detect completed tool calls by done_reason on a non-final frame
    return [
      {
        model: this.options.model,
        created_at: createdAt,
        message: { ...message, tool_calls: toolCalls },
        done: false,
        done_reason: 'tool_calls',
      },
      { ...terminal, message: { role: 'assistant', content: '' } },
    ];
  }

  private translateGenerateEvent(payload: string): OllamaGenerateResponse[] {
    const event = decodeEvent(openAICompletionSchema, payload);
    const choice = event.choices?.[0];
    if (!choice) return [];

    const frame: OllamaGenerateResponse = {
      model: this.options.model,
      created_at: this.now().toISOString(),
      response: choice.text,
      done: false,
    };
    const doneReason = mapFinishReason(choice.finish_reason);
    if (doneReason) {
      frame.done = true;
      frame.done_reason = doneReason;
      Object.assign(frame, usageCounters(event.usage));
    }
    return [frame];
  }
}

export function serializeFrames(frames: OllamaStreamFrame[]): string {
  return frames.map((frame) => `${JSON.stringify(frame)}\n`).join('');
}

/**
 * Wraps the translator in a web TransformStream so a backend body can be
 * piped straight through it. Each chunk's frames are written in one go.
 */
export function createOllamaStreamTransform(options: StreamTranslatorOptions): TransformStream<Uint8Array, Uint8Array> {
  const translator = new OllamaStreamTranslator(options);
  const encoder = new TextEncoder();

  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      const text = serializeFrames(translator.push(chunk));
      if (text) controller.enqueue(encoder.encode(text));
    },
    flush(controller) {
      const text = serializeFrames(translator.finish());
      if (text) controller.enqueue(encoder.encode(text));
    },
  });
}
