import type { OllamaErrorResponse } from '@llamabridge/types';

export type ProxyErrorKind =
  | 'bad_request'
  | 'not_found'
  | 'not_implemented'
  | 'internal'
  | 'upstream';

/**
 * Structured error for the Ollama-facing API. Serializes to the Ollama
 * error envelope, `{ "error": "<message>" }`.
 */
export class ProxyError extends Error {
  constructor(
    public readonly kind: ProxyErrorKind,
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'ProxyError';
  }

  static badRequest(message: string): ProxyError {
    return new ProxyError('bad_request', message, 400);
  }

  static notFound(message: string): ProxyError {
    return new ProxyError('not_found', message, 404);
  }

  static notImplemented(message: string): ProxyError {
    return new ProxyError('not_implemented', message, 501);
  }

  static internal(message: string): ProxyError {
    return new ProxyError('internal', message, 500);
  }

  /** Carries the backend's own status code through to the client. */
  static upstream(status: number, message: string): ProxyError {
    return new ProxyError('upstream', message, status);
  }

  toJSON(): OllamaErrorResponse {
    return { error: this.message };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
