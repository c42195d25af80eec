import { describe, it, expect } from 'vitest';
import { ProxyError } from '../../../types/errors';
import { ChatTransformer, EmbedTransformer, GenerateTransformer, LegacyEmbeddingsTransformer } from '..';

describe('ChatTransformer.parseRequest', () => {
  const transformer = new ChatTransformer();

  it('normalizes keep_alive and the streaming flag', async () => {
    const parsed = await transformer.parseRequest({
      model: 'qwen',
      messages: [{ role: 'user', content: 'hi' }],
      stream: true,
      keep_alive: 300.5,
    });

    expect(parsed.model).toBe('qwen');
    expect(parsed.stream).toBe(true);
    expect(parsed.keepAlive).toBe('301s');
  });

  it('treats a missing stream flag as unary', async () => {
    const parsed = await transformer.parseRequest({ model: 'qwen', messages: [] });
    expect(parsed.stream).toBe(false);
    expect(parsed.keepAlive).toBe('');
  });

  it('requires a model name', async () => {
    await expect(transformer.parseRequest({ messages: [] })).rejects.toThrow('Model name is required.');
  });

  it('validates tools before the model name', async () => {
    await expect(transformer.parseRequest({ tools: [{ type: 'code', function: { name: 'run' } }] })).rejects.toThrow(
      "tool 0: only 'function' type is supported"
    );
  });

  it('rejects bodies that do not match the schema', async () => {
    const error = await transformer.parseRequest({ model: 5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProxyError);
    expect(error).toMatchObject({ status: 400, message: 'Invalid request: model: Expected string, received number' });
  });

  it('posts to the chat completions endpoint', () => {
    expect(transformer.defaultEndpoint).toBe('/v1/chat/completions');
    expect(transformer.streamMode).toBe('chat');
  });
});

describe('GenerateTransformer', () => {
  it('posts to the legacy completions endpoint', async () => {
    const transformer = new GenerateTransformer();
    const parsed = await transformer.parseRequest({ model: 'llama', prompt: 'Once upon', stream: true });

    expect(transformer.defaultEndpoint).toBe('/v1/completions');
    expect(await transformer.transformRequest(parsed.body, 'llama-up')).toEqual({
      model: 'llama-up',
      prompt: 'Once upon',
      stream: true,
    });
  });
});

describe('embedding transformers', () => {
  it('never stream', async () => {
    const parsed = await new EmbedTransformer().parseRequest({ model: 'e', input: 'x', stream: true });
    expect(parsed.stream).toBe(false);
  });

  it('require a prompt on the legacy endpoint', async () => {
    await expect(new LegacyEmbeddingsTransformer().parseRequest({ model: 'e' })).rejects.toThrow('Prompt is required.');
  });
});
