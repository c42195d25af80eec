import { describe, it, expect } from 'vitest';
import { LaunchArgsParser } from '../launch-args-parser';

describe('LaunchArgsParser.tokenize', () => {
  it('honors quotes', () => {
    expect(LaunchArgsParser.tokenize(`llama-server -m "/models/My Model.gguf" --alias 'a b'  -c 4096`)).toEqual([
      'llama-server',
      '-m',
      '/models/My Model.gguf',
      '--alias',
      'a b',
      '-c',
      '4096',
    ]);
  });

  it('keeps empty quoted arguments', () => {
    expect(LaunchArgsParser.tokenize(`cmd --chat-template ""`)).toEqual(['cmd', '--chat-template', '']);
  });
});

describe('LaunchArgsParser.parse', () => {
  it('infers from the model file and launch flags', () => {
    const info = LaunchArgsParser.parse(
      'llama-server --port 8081 --jinja -m /models/Qwen2.5-7B-Instruct-Q4_K_M.gguf -c 32768',
      'qwen'
    );

    expect(info).toEqual({
      source: 'Qwen2.5-7B-Instruct-Q4_K_M',
      architecture: 'qwen2',
      family: 'qwen2',
      parameterSize: '7B',
      quantizationLevel: 'Q4_K_M',
      contextLength: 32768,
      capabilities: ['completion', 'tools'],
    });
  });

  it('detects embedding and vision servers', () => {
    const info = LaunchArgsParser.parse(
      'llama-server --embedding --mmproj /models/proj.gguf --model=/models/nomic-embed-text-v1.5.Q8_0.gguf',
      'embedder'
    );

    expect(info.source).toBe('nomic-embed-text-v1.5.Q8_0');
    expect(info.architecture).toBe('nomic-bert');
    expect(info.quantizationLevel).toBe('Q8_0');
    expect(info.capabilities).toEqual(['embedding', 'vision']);
    expect(info.contextLength).toBe(0);
  });

  it('falls back to the model id without a command', () => {
    expect(LaunchArgsParser.parse('', 'gemma-3-4b-it')).toEqual({
      source: 'gemma-3-4b-it',
      architecture: 'gemma3',
      family: 'gemma3',
      parameterSize: '4B',
      quantizationLevel: 'unknown',
      contextLength: 0,
      capabilities: ['completion'],
    });
  });

  it('reads --ctx-size in both spellings', () => {
    expect(LaunchArgsParser.parse('server --ctx-size 8192', 'x').contextLength).toBe(8192);
    expect(LaunchArgsParser.parse('server --ctx-size=16384', 'x').contextLength).toBe(16384);
  });
});
