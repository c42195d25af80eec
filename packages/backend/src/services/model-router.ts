import parseDuration from 'parse-duration';
import { getConfig, type BridgeConfig } from '../config';
import { ProxyError, errorMessage } from '../types/errors';
import type { ForwardOptions, InstanceState, InstanceStatus, ModelRouter, ResolvedModel } from '../types/router';
import { logger } from '../utils/logger';

interface InstanceRecord {
  state: InstanceState;
  lastActivity: Date | null;
  keepAliveMs: number | null | undefined;
  inFlight: Set<AbortController>;
}

export interface ConfigModelRouterOptions {
  configSource?: () => BridgeConfig;
  fetch?: typeof fetch;
  now?: () => Date;
}

/**
 * Converts a normalized keep-alive into a TTL override.
 * undefined: no override. null: never unload.
 */
export function keepAliveToTtl(keepAlive: string | undefined): number | null | undefined {
  if (!keepAlive) return undefined;

  const ms = parseDuration(keepAlive);
  if (typeof ms !== 'number' || Number.isNaN(ms)) {
    logger.debug(`Ignoring unparseable keep_alive '${keepAlive}'`);
    return undefined;
  }
  // Negative durations keep the model loaded indefinitely
  return ms < 0 ? null : ms;
}

/**
 * Routes requests to backend instances that are already running at their
 * configured proxy URL. Instance state is tracked from request activity.
 */
export class ConfigModelRouter implements ModelRouter {
  private records = new Map<string, InstanceRecord>();
  private readonly configSource: () => BridgeConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(options: ConfigModelRouterOptions = {}) {
    this.configSource = options.configSource ?? getConfig;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  findModel(name: string): ResolvedModel | undefined {
    const models = this.configSource().models;

    const direct = models[name];
    if (direct) {
      return { id: name, upstreamName: direct.useModelName || name, config: direct };
    }

    for (const [id, config] of Object.entries(models)) {
      if (config.aliases.includes(name)) {
        return { id, upstreamName: config.useModelName || id, config };
      }
    }
    return undefined;
  }

  resolveModel(name: string): ResolvedModel {
    const model = this.findModel(name);
    if (!model) {
      throw ProxyError.internal(`Error selecting model process: could not find real modelID for ${name}`);
    }
    return model;
  }

  listModels(): ResolvedModel[] {
    return Object.entries(this.configSource().models)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([id, config]) => ({ id, upstreamName: config.useModelName || id, config }));
  }

  async forward(
    model: ResolvedModel,
    path: string,
    body: Record<string, unknown>,
    options: ForwardOptions = {}
  ): Promise<Response> {
    const record = this.record(model.id);
    const override = keepAliveToTtl(options.keepAlive);
    if (override !== undefined) {
      record.keepAliveMs = override;
    }

    const url = `${model.config.proxy.replace(/\/+$/, '')}${path}`;
    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onAbort, { once: true });
    record.inFlight.add(controller);

    if (record.state !== 'ready') {
      record.state = 'starting';
    }
    record.lastActivity = this.now();

    let settled = false;
    const settle = () => {
      if (settled) return;
      settled = true;
      record.inFlight.delete(controller);
      options.signal?.removeEventListener('abort', onAbort);
      record.lastActivity = this.now();
      if (record.state === 'stopping' && record.inFlight.size === 0) {
        record.state = 'stopped';
      }
    };

    logger.debug(`Forwarding ${model.id} -> ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json, text/event-stream',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (e) {
      if (!controller.signal.aborted) {
        record.state = 'failed';
      } else if (record.state === 'starting') {
        record.state = 'stopped';
      }
      settle();
      logger.error(`Request to ${model.id} failed: ${errorMessage(e)}`);
      throw ProxyError.internal(`Error forwarding request: ${errorMessage(e)}`);
    }

    if (record.state !== 'stopping') {
      record.state = 'ready';
    }

    if (!response.body) {
      settle();
      return response;
    }
    return new Response(this.trackBody(response.body, record, settle), {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  }

  /**
   * Headers arrive long before a streamed body ends. The request stays in
   * flight, and abortable by close(), until the body is drained or cancelled.
   */
  private trackBody(
    body: ReadableStream<Uint8Array>,
    record: InstanceRecord,
    settle: () => void
  ): ReadableStream<Uint8Array> {
    const reader = body.getReader();
    const now = this.now;

    return new ReadableStream<Uint8Array>({
      async pull(controller) {
        try {
          const { done, value } = await reader.read();
          if (done) {
            settle();
            controller.close();
            return;
          }
          record.lastActivity = now();
          controller.enqueue(value);
        } catch (e) {
          settle();
          controller.error(e);
        }
      },
      async cancel(reason) {
        settle();
        await reader.cancel(reason);
      },
    });
  }

  instances(): InstanceStatus[] {
    const now = this.now().getTime();

    return this.listModels().map(({ id, config }) => {
      const record = this.records.get(id);
      const configuredTtl = config.unloadAfter > 0 ? config.unloadAfter * 1000 : null;
      const ttlMs = record?.keepAliveMs !== undefined ? record.keepAliveMs : configuredTtl;
      const lastActivity = record?.lastActivity ?? null;

      const busy = (record?.inFlight.size ?? 0) > 0;

      let state: InstanceState = record?.state ?? 'stopped';
      // A model never expires while a request is still being served
      if (state === 'ready' && !busy && ttlMs !== null && lastActivity && now - lastActivity.getTime() >= ttlMs) {
        state = 'stopped';
      }
      return { id, state, lastActivity, ttlMs };
    });
  }

  /**
   * Aborts in-flight requests. Instances with requests still unwinding read
   * as stopping until the last one settles.
   */
  close(): void {
    for (const [id, record] of this.records) {
      if (record.inFlight.size === 0) {
        record.state = 'stopped';
        continue;
      }
      record.state = 'stopping';
      logger.info(`Aborting ${record.inFlight.size} in-flight request(s) to ${id}`);
      for (const controller of record.inFlight) controller.abort();
    }
  }

  private record(id: string): InstanceRecord {
    let record = this.records.get(id);
    if (!record) {
      record = { state: 'stopped', lastActivity: null, keepAliveMs: undefined, inFlight: new Set() };
      this.records.set(id, record);
    }
    return record;
  }
}
