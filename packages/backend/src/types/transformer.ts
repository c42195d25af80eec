import type { StreamMode } from '../transformers/ollama/stream-transformer';

/** What the route layer needs to know about a parsed Ollama request. */
export interface ParsedRequest<TRequest> {
  body: TRequest;
  model: string;
  stream: boolean;
  /** Normalized keep-alive duration; empty means "not set". */
  keepAlive: string;
}

export interface Transformer<TRequest, TResponse> {
  readonly name: string;

  // Backend path the translated request is posted to (e.g. '/v1/chat/completions')
  readonly defaultEndpoint: string;

  // Validate and normalize the raw Ollama request body
  parseRequest(input: unknown): Promise<ParsedRequest<TRequest>>;

  // Ollama request -> backend request body
  transformRequest(request: TRequest, upstreamModel: string): Promise<Record<string, unknown>>;

  // Backend response body -> Ollama response
  transformResponse(response: unknown, model: string): Promise<TResponse>;

  // Streaming framing, for endpoints that stream
  readonly streamMode?: StreamMode;
}
