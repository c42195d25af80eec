import type {
  OllamaModelDetails,
  OllamaModelResponse,
  OllamaProcessModelResponse,
  OllamaShowResponse,
} from '@llamabridge/types';
import type { ModelConfig } from '../config';
import type { InstanceStatus, ResolvedModel } from '../types/router';
import { LaunchArgsParser } from './launch-args-parser';
import { DEFAULT_CONTEXT_LENGTH, UNKNOWN, inferFamily } from './model-metadata';

export const ZERO_TIME = '0001-01-01T00:00:00Z';

export interface ModelDescription {
  architecture: string;
  details: OllamaModelDetails;
  contextLength: number;
  capabilities: string[];
}

/** Lower-case hex of the UTF-8 bytes of the id. */
export function modelDigest(id: string): string {
  return Buffer.from(id, 'utf8').toString('hex');
}

/**
 * Display metadata for a configured model. Explicit metadata in the config
 * wins; everything else is inferred from the launch command, then the id.
 */
export function describeModel(id: string, config: ModelConfig): ModelDescription {
  const inferred = LaunchArgsParser.parse(config.cmd, id);
  const metadata = config.metadata;

  const architecture = metadata.architecture || inferred.architecture;
  const family = metadata.family || inferFamily(inferred.source, architecture);

  const details: OllamaModelDetails = {
    format: 'gguf',
    family,
    parameter_size: metadata.parameterSize || inferred.parameterSize,
    quantization_level: metadata.quantizationLevel || inferred.quantizationLevel,
  };
  if (family && family !== UNKNOWN) {
    details.families = [family];
  }

  const capabilities =
    metadata.capabilities && metadata.capabilities.length > 0 ? metadata.capabilities : inferred.capabilities;

  return {
    architecture,
    details,
    contextLength: metadata.contextLength || inferred.contextLength || DEFAULT_CONTEXT_LENGTH,
    capabilities: capabilities.length > 0 ? capabilities : ['completion'],
  };
}

export function toModelResponse(model: ResolvedModel, modifiedAt: string): OllamaModelResponse {
  return {
    name: model.id,
    model: model.id,
    modified_at: modifiedAt,
    size: 0,
    digest: modelDigest(model.id),
    details: describeModel(model.id, model.config).details,
  };
}

export function toShowResponse(model: ResolvedModel): OllamaShowResponse {
  const description = describeModel(model.id, model.config);
  return {
    details: description.details,
    model_info: {
      'general.architecture': description.architecture,
      'llama.context_length': description.contextLength,
    },
    capabilities: description.capabilities,
  };
}

/**
 * When the instance has no TTL the zero time is reported. A TTL without any
 * recorded activity counts from now.
 */
export function expiresAt(status: InstanceStatus, now: Date): string {
  if (status.ttlMs === null) return ZERO_TIME;
  const base = status.lastActivity ?? now;
  return new Date(base.getTime() + status.ttlMs).toISOString();
}

export function toProcessResponse(model: ResolvedModel, status: InstanceStatus, now: Date): OllamaProcessModelResponse {
  return {
    name: model.id,
    model: model.id,
    size: 0,
    digest: modelDigest(model.id),
    details: describeModel(model.id, model.config).details,
    expires_at: expiresAt(status, now),
    size_vram: 0,
  };
}
