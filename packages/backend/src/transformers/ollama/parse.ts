import type { z } from 'zod';
import { ProxyError } from '../../types/errors';
import type { ParsedRequest } from '../../types/transformer';
import { normalizeKeepAlive } from './keep-alive';

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Decodes an Ollama request body, rejecting anything the schema refuses. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ProxyError.badRequest(`Invalid request: ${describeIssues(result.error)}`);
  }
  return result.data;
}

interface RoutableBody {
  model: string;
  stream?: boolean;
  keep_alive?: unknown;
}

export function toParsedRequest<T extends RoutableBody>(body: T): ParsedRequest<T> {
  if (!body.model) {
    throw ProxyError.badRequest('Model name is required.');
  }
  return {
    body,
    model: body.model,
    stream: body.stream === true,
    keepAlive: normalizeKeepAlive(body.keep_alive),
  };
}
