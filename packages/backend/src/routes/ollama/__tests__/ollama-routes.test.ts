import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { setConfigForTesting, validateConfig } from '../../../config';
import { buildServer } from '../../../server';
import { ConfigModelRouter } from '../../../services/model-router';

const config = validateConfig(`
version: 1.2.3
models:
  qwen2.5-7b-instruct:
    proxy: http://127.0.0.1:9001
    cmd: llama-server --jinja -m /models/Qwen2.5-7B-Instruct-Q4_K_M.gguf -c 32768
    aliases: [qwen]
    unloadAfter: 300
  nomic-embed-text:
    proxy: http://127.0.0.1:9002
    useModelName: nomic-embed-text-v1.5
  hidden-model:
    proxy: http://127.0.0.1:9003
    unlisted: true
`);

const NOW = new Date('2024-01-01T00:00:00.000Z');

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function sentBody(fetchImpl: Mock<typeof fetch>, call = 0): unknown {
  const init = fetchImpl.mock.calls[call][1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('Ollama routes', () => {
  let server: FastifyInstance;
  let fetchImpl: Mock<typeof fetch>;

  beforeEach(async () => {
    setConfigForTesting(config);
    fetchImpl = vi.fn<typeof fetch>();
    const router = new ConfigModelRouter({ configSource: () => config, fetch: fetchImpl, now: () => NOW });
    server = await buildServer(router, { now: () => NOW });
  });

  afterEach(async () => {
    await server.close();
  });

  describe('system', () => {
    it('answers the heartbeat', async () => {
      const response = await server.inject({ method: 'GET', url: '/' });
      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(response.body).toBe('Ollama is running');
    });

    it('answers the heartbeat on HEAD', async () => {
      const response = await server.inject({ method: 'HEAD', url: '/' });
      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('');
    });

    it('reports the configured version', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/version' });
      expect(response.json()).toEqual({ version: '1.2.3' });
    });

    it('echoes the request origin', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/version',
        headers: { origin: 'http://localhost:3000' },
      });
      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    });

    it('keeps an allowed origin that a handler already set', async () => {
      server.get('/preset-origin', async (_request, reply) => {
        reply.header('Access-Control-Allow-Origin', 'https://allowed.example');
        return reply.send({ ok: true });
      });

      const response = await server.inject({
        method: 'GET',
        url: '/preset-origin',
        headers: { origin: 'http://localhost:3000' },
      });

      expect(response.headers['access-control-allow-origin']).toBe('https://allowed.example');
      expect(response.rawHeaders.filter((name) => name.toLowerCase() === 'access-control-allow-origin')).toHaveLength(1);
    });

    it('refuses model management', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/pull', payload: { model: 'qwen' } });
      expect(response.statusCode).toBe(501);
      expect(response.json()).toEqual({ error: 'This Ollama API endpoint is not implemented in llamabridge.' });
    });

    it('returns an error envelope for unknown routes', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/nothing' });
      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Route GET /api/nothing not found' });
    });
  });

  describe('models', () => {
    it('lists listed models sorted by id', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/tags' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.models.map((m: { name: string }) => m.name)).toEqual(['nomic-embed-text', 'qwen2.5-7b-instruct']);
      expect(body.models[1]).toEqual({
        name: 'qwen2.5-7b-instruct',
        model: 'qwen2.5-7b-instruct',
        modified_at: '2024-01-01T00:00:00.000Z',
        size: 0,
        digest: Buffer.from('qwen2.5-7b-instruct').toString('hex'),
        details: {
          format: 'gguf',
          family: 'qwen2',
          families: ['qwen2'],
          parameter_size: '7B',
          quantization_level: 'Q4_K_M',
        },
      });
    });

    it('shows a model found by alias', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/show', payload: { model: 'qwen' } });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        details: {
          format: 'gguf',
          family: 'qwen2',
          families: ['qwen2'],
          parameter_size: '7B',
          quantization_level: 'Q4_K_M',
        },
        model_info: { 'general.architecture': 'qwen2', 'llama.context_length': 32768 },
        capabilities: ['completion', 'tools'],
      });
    });

    it('accepts the legacy name field on show', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/show', payload: { name: 'hidden-model' } });
      expect(response.statusCode).toBe(200);
    });

    it('rejects show without a model', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/show', payload: {} });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Model name is required.' });
    });

    it('returns 404 for an unknown model on show', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/show', payload: { model: 'nope' } });
      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "Model 'nope' not found." });
    });

    it('lists running models once they have served a request', async () => {
      fetchImpl.mockResolvedValueOnce(
        jsonResponse({ created: 1704067200, choices: [{ message: { role: 'assistant', content: 'ok' } }] })
      );

      const before = await server.inject({ method: 'GET', url: '/api/ps' });
      expect(before.json()).toEqual({ models: [] });

      await server.inject({ method: 'POST', url: '/api/chat', payload: { model: 'qwen', messages: [] } });

      const after = await server.inject({ method: 'GET', url: '/api/ps' });
      const body = after.json();
      expect(body.models).toHaveLength(1);
      expect(body.models[0]).toMatchObject({
        name: 'qwen2.5-7b-instruct',
        size: 0,
        expires_at: '2024-01-01T00:05:00.000Z',
        size_vram: 0,
      });
    });
  });

  describe('chat', () => {
    it('translates a unary chat round trip', async () => {
      fetchImpl.mockResolvedValueOnce(
        jsonResponse({
          id: 'chatcmpl-1',
          created: 1704067200,
          choices: [{ index: 0, message: { role: 'assistant', content: 'Hello!' }, finish_reason: 'stop' }],
          usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
        })
      );

      const response = await server.inject({
        method: 'POST',
        url: '/api/chat',
        payload: {
          model: 'qwen',
          messages: [{ role: 'user', content: 'Hi' }],
          options: { temperature: 0.2 },
          keep_alive: '10m',
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        model: 'qwen',
        created_at: '2024-01-01T00:00:00.000Z',
        message: { role: 'assistant', content: 'Hello!' },
        done: true,
        done_reason: 'stop',
        prompt_eval_count: 5,
        eval_count: 2,
      });

      expect(fetchImpl.mock.calls[0][0]).toBe('http://127.0.0.1:9001/v1/chat/completions');
      expect(sentBody(fetchImpl)).toEqual({
        model: 'qwen2.5-7b-instruct',
        messages: [{ role: 'user', content: 'Hi' }],
        stream: false,
        temperature: 0.2,
      });
    });

    it('streams NDJSON frames', async () => {
      const events = [
        'data: {"choices":[{"index":0,"delta":{"role":"assistant","content":"Hi"}}]}',
        '',
        'data: {"choices":[{"index":0,"delta":{"content":"!"},"finish_reason":"stop"}],"usage":{"prompt_tokens":4,"completion_tokens":2,"total_tokens":6}}',
        '',
        'data: [DONE]',
        '',
      ].join('\n');
      fetchImpl.mockResolvedValueOnce(
        new Response(events, { status: 200, headers: { 'Content-Type': 'text/event-stream' } })
      );

      const response = await server.inject({
        method: 'POST',
        url: '/api/chat',
        payload: { model: 'qwen', messages: [{ role: 'user', content: 'Hi' }], stream: true },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/x-ndjson');
      expect(sentBody(fetchImpl)).toMatchObject({ stream: true });

      const lines = response.body.trim().split('\n');
      const frames = lines.map((line) => JSON.parse(line));
      expect(frames).toHaveLength(2);
      expect(frames[0]).toMatchObject({ model: 'qwen', message: { role: 'assistant', content: 'Hi' }, done: false });
      expect(frames[1]).toMatchObject({
        model: 'qwen',
        message: { role: 'assistant', content: '!' },
        done: true,
        done_reason: 'stop',
        prompt_eval_count: 4,
        eval_count: 2,
      });
    });

    it('passes backend errors through with their status', async () => {
      fetchImpl.mockResolvedValueOnce(jsonResponse({ error: { message: 'Loading model', type: 'unavailable' } }, 503));

      const response = await server.inject({
        method: 'POST',
        url: '/api/chat',
        payload: { model: 'qwen', messages: [] },
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ error: 'Loading model' });
    });

    it('rejects malformed JSON', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/chat',
        headers: { 'content-type': 'application/json' },
        payload: '{"model":',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatch(/^Invalid request: /);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('parses JSON sent with another content type', async () => {
      fetchImpl.mockResolvedValueOnce(
        jsonResponse({ created: 1704067200, choices: [{ message: { role: 'assistant', content: 'ok' } }] })
      );

      const response = await server.inject({
        method: 'POST',
        url: '/api/chat',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        payload: '{"model":"qwen","messages":[]}',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().message).toEqual({ role: 'assistant', content: 'ok' });
    });

    it('requires a model name', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/chat', payload: { messages: [] } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Model name is required.' });
    });

    it('fails for a model that is not configured', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/chat', payload: { model: 'nope' } });
      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: 'Error selecting model process: could not find real modelID for nope',
      });
    });

    it('reports an unreachable backend', async () => {
      fetchImpl.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      const response = await server.inject({ method: 'POST', url: '/api/chat', payload: { model: 'qwen' } });
      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({ error: 'Error forwarding request: connect ECONNREFUSED' });
    });
  });

  describe('generate', () => {
    it('translates a completion', async () => {
      fetchImpl.mockResolvedValueOnce(
        jsonResponse({ created: 1704067200, choices: [{ text: '4', index: 0, finish_reason: 'length' }] })
      );

      const response = await server.inject({
        method: 'POST',
        url: '/api/generate',
        payload: { model: 'qwen', prompt: '2+2=', system: 'Be brief.' },
      });

      expect(response.json()).toEqual({
        model: 'qwen',
        created_at: '2024-01-01T00:00:00.000Z',
        response: '4',
        done: true,
        done_reason: 'length',
      });
      expect(fetchImpl.mock.calls[0][0]).toBe('http://127.0.0.1:9001/v1/completions');
      expect(sentBody(fetchImpl)).toEqual({
        model: 'qwen2.5-7b-instruct',
        prompt: 'Be brief.\n\n2+2=',
        stream: false,
      });
    });

    it('refuses raw prompts', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate',
        payload: { model: 'qwen', prompt: 'x', raw: true },
      });
      expect(response.statusCode).toBe(501);
      expect(response.json()).toEqual({ error: 'Raw mode for /api/generate is not implemented.' });
      expect(fetchImpl).not.toHaveBeenCalled();
    });
  });

  describe('embeddings', () => {
    const embeddingResponse = {
      object: 'list',
      data: [{ object: 'embedding', index: 0, embedding: [0.1, 0.2] }],
      usage: { prompt_tokens: 3, total_tokens: 3 },
    };

    it('embeds through the upstream model name', async () => {
      fetchImpl.mockResolvedValueOnce(jsonResponse(embeddingResponse));

      const response = await server.inject({
        method: 'POST',
        url: '/api/embed',
        payload: { model: 'nomic-embed-text', input: 'hello' },
      });

      expect(response.json()).toEqual({ model: 'nomic-embed-text', embeddings: [[0.1, 0.2]], prompt_eval_count: 3 });
      expect(fetchImpl.mock.calls[0][0]).toBe('http://127.0.0.1:9002/v1/embeddings');
      expect(sentBody(fetchImpl)).toEqual({ model: 'nomic-embed-text-v1.5', input: 'hello' });
    });

    it('serves the legacy embeddings endpoint', async () => {
      fetchImpl.mockResolvedValueOnce(jsonResponse(embeddingResponse));

      const response = await server.inject({
        method: 'POST',
        url: '/api/embeddings',
        payload: { model: 'nomic-embed-text', prompt: 'hello' },
      });

      expect(response.json()).toEqual({ embedding: [0.1, 0.2] });
    });

    it('requires a prompt on the legacy endpoint', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/embeddings',
        payload: { model: 'nomic-embed-text' },
      });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Prompt is required.' });
    });
  });
});
