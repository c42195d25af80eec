import fs from 'fs';
import { z } from 'zod';

const PatternTableSchema = z.array(z.tuple([z.string(), z.string()]));

const PatternFileSchema = z.object({
  architectures: PatternTableSchema,
  families: PatternTableSchema,
});

const patterns = PatternFileSchema.parse(
  JSON.parse(fs.readFileSync(new URL('../data/model-patterns.json', import.meta.url), 'utf8'))
);

// Ordered: the first matching substring wins, so specific names come first
const ARCHITECTURE_PATTERNS = patterns.architectures;
const FAMILY_PATTERNS = patterns.families;

export const UNKNOWN = 'unknown';
export const DEFAULT_CONTEXT_LENGTH = 2048;

const PARAMETER_SIZE_REGEX = /(?:^|[^a-z0-9.])(?:(\d+)x)?(\d+(?:\.\d+)?)([bm])(?=$|[^a-z0-9])/i;
const QUANTIZATION_REGEX = /(?:^|[^a-z0-9])(i?q\d(?:_[a-z0-9]+)*|bf16|fp16|f16|f32)(?=$|[^a-z0-9])/i;

function matchPattern(id: string, table: Array<[string, string]>): string | undefined {
  const lower = id.toLowerCase();
  return table.find(([pattern]) => lower.includes(pattern))?.[1];
}

export function inferArchitecture(id: string): string {
  return matchPattern(id, ARCHITECTURE_PATTERNS) ?? UNKNOWN;
}

export function inferFamily(id: string, architecture: string): string {
  return matchPattern(id, FAMILY_PATTERNS) ?? architecture;
}

/** "llama-3.1-8b" -> "8B", "mixtral-8x7b" -> "8x7B", "smollm-135m" -> "135M". */
export function inferParameterSize(id: string): string {
  const match = PARAMETER_SIZE_REGEX.exec(id);
  if (!match) return UNKNOWN;

  const [, experts, size, unit] = match;
  const value = `${size}${unit.toUpperCase()}`;
  return experts ? `${experts}x${value}` : value;
}

export function inferQuantizationLevel(id: string): string {
  const match = QUANTIZATION_REGEX.exec(id);
  return match ? match[1].toUpperCase() : UNKNOWN;
}
