import type { ModelConfig } from '../config';

export type InstanceState = 'stopped' | 'starting' | 'ready' | 'stopping' | 'failed';

/** A client-supplied model name resolved against configuration. */
export interface ResolvedModel {
  /** Configured model id (aliases resolve to it). */
  id: string;
  /** Name sent to the backend in the request body. */
  upstreamName: string;
  config: ModelConfig;
}

export interface InstanceStatus {
  id: string;
  state: InstanceState;
  lastActivity: Date | null;
  /** Idle time before the instance unloads; null means it never does. */
  ttlMs: number | null;
}

export interface ForwardOptions {
  signal?: AbortSignal;
  /** Normalized keep-alive from the client request, empty when unset. */
  keepAlive?: string;
}

/**
 * The surrounding process manager, as seen by the Ollama API: pick the
 * instance serving a model and forward a backend request to it.
 */
export interface ModelRouter {
  resolveModel(name: string): ResolvedModel;
  findModel(name: string): ResolvedModel | undefined;
  listModels(): ResolvedModel[];
  forward(model: ResolvedModel, path: string, body: Record<string, unknown>, options?: ForwardOptions): Promise<Response>;
  instances(): InstanceStatus[];
}
