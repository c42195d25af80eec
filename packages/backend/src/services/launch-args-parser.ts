import path from 'path';
import { inferArchitecture, inferFamily, inferParameterSize, inferQuantizationLevel } from './model-metadata';

export interface LaunchArgsInfo {
  /** Name the inference ran on: the model file name, else the id. */
  source: string;
  architecture: string;
  family: string;
  parameterSize: string;
  quantizationLevel: string;
  /** 0 when the command does not set one. */
  contextLength: number;
  capabilities: string[];
}

/**
 * Reads model metadata out of a llama-server style launch command.
 */
export class LaunchArgsParser {
  /** Splits a command line on whitespace, honoring single and double quotes. */
  static tokenize(cmd: string): string[] {
    const tokens: string[] = [];
    let current = '';
    let inToken = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < cmd.length; i++) {
      const ch = cmd[i];

      if (quote) {
        if (ch === quote) {
          quote = null;
        } else if (ch === '\\' && quote === '"' && i + 1 < cmd.length) {
          current += cmd[++i];
        } else {
          current += ch;
        }
        continue;
      }

      if (ch === '"' || ch === "'") {
        quote = ch;
        inToken = true;
      } else if (ch === '\\' && i + 1 < cmd.length) {
        current += cmd[++i];
        inToken = true;
      } else if (/\s/.test(ch)) {
        if (inToken) tokens.push(current);
        current = '';
        inToken = false;
      } else {
        current += ch;
        inToken = true;
      }
    }
    if (inToken) tokens.push(current);

    return tokens;
  }

  static parse(cmd: string, id: string): LaunchArgsInfo {
    const tokens = LaunchArgsParser.tokenize(cmd);
    const flags = new Set<string>();
    const values = new Map<string, string>();

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (!token.startsWith('-')) continue;

      const eq = token.indexOf('=');
      if (eq > 0) {
        values.set(token.slice(0, eq), token.slice(eq + 1));
        continue;
      }
      flags.add(token);
      const next = tokens[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        values.set(token, next);
      }
    }

    const modelPath = values.get('-m') ?? values.get('--model');
    const source = modelPath ? path.basename(modelPath).replace(/\.gguf$/i, '') : id;

    const ctx = Number.parseInt(values.get('-c') ?? values.get('--ctx-size') ?? '', 10);

    const embedding = flags.has('--embedding') || flags.has('--embeddings');
    const capabilities = [embedding ? 'embedding' : 'completion'];
    if (flags.has('--jinja')) capabilities.push('tools');
    if (flags.has('--mmproj') || values.has('--mmproj')) capabilities.push('vision');

    const architecture = inferArchitecture(source);
    return {
      source,
      architecture,
      family: inferFamily(source, architecture),
      parameterSize: inferParameterSize(source),
      quantizationLevel: inferQuantizationLevel(source),
      contextLength: Number.isFinite(ctx) && ctx > 0 ? ctx : 0,
      capabilities,
    };
  }
}
