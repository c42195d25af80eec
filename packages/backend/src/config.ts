import { z } from 'zod';
import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import { SUPPORTED_LOG_LEVELS, logger, setLogLevel } from './utils/logger';

// --- Zod Schemas ---

const ModelMetadataSchema = z.object({
  architecture: z.string().optional(),
  family: z.string().optional(),
  parameterSize: z.string().optional(),
  quantizationLevel: z.string().optional(),
  contextLength: z.number().int().positive().optional(),
  capabilities: z.array(z.string()).optional(),
});

const ModelConfigSchema = z.object({
  proxy: z.string().url(),
  cmd: z.string().default(''),
  useModelName: z.string().optional(),
  aliases: z.array(z.string()).default([]),
  unlisted: z.boolean().default(false),
  unloadAfter: z.number().int().nonnegative().default(0),
  metadata: ModelMetadataSchema.default({}),
});

const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(11434),
});

const BridgeConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  version: z.string().default('0.0.0'),
  // Overrides LOG_LEVEL when set
  logLevel: z.enum(SUPPORTED_LOG_LEVELS).optional(),
  models: z.record(z.string(), ModelConfigSchema).default({}),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ModelMetadata = z.infer<typeof ModelMetadataSchema>;

// --- Loader ---

let currentConfig: BridgeConfig | null = null;
let configWatcher: fs.FSWatcher | null = null;

function logConfigStats(config: BridgeConfig) {
  const modelCount = Object.keys(config.models).length;
  logger.info(`Loaded ${modelCount} Models:`);
  Object.entries(config.models).forEach(([name, model]) => {
    const aliases = model.aliases.length > 0 ? ` (aliases: ${model.aliases.join(', ')})` : '';
    logger.info(`  - ${name} -> ${model.proxy}${aliases}`);
  });
}

/**
 * Parses and validates a YAML configuration document.
 * Throws a ZodError when the document does not match the schema.
 */
export function validateConfig(yamlContent: string): BridgeConfig {
  const parsed: unknown = yaml.parse(yamlContent) ?? {};
  return BridgeConfigSchema.parse(parsed);
}

function parseConfigFile(filePath: string): BridgeConfig {
  const fileContents = fs.readFileSync(filePath, 'utf8');
  const config = validateConfig(fileContents);
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  logConfigStats(config);
  return config;
}

function setupWatcher(filePath: string) {
  if (configWatcher) return;

  logger.info(`Watching configuration file: ${filePath}`);
  let debounceTimer: NodeJS.Timeout | null = null;

  try {
    configWatcher = fs.watch(filePath, (eventType) => {
      if (eventType === 'change') {
        if (debounceTimer) clearTimeout(debounceTimer);

        debounceTimer = setTimeout(() => {
          logger.info('Configuration file changed, reloading...');
          try {
            currentConfig = parseConfigFile(filePath);
            logger.info('Configuration reloaded successfully');
          } catch (error) {
            logger.error('Failed to reload configuration, keeping previous', { error });
            if (error instanceof z.ZodError) {
              logger.error('Validation errors:', { errors: error.errors });
            }
          }
        }, 100);
      }
    });
  } catch (err) {
    logger.error('Failed to setup config watcher', { error: err });
  }
}

export function loadConfig(configPath?: string): BridgeConfig {
  if (currentConfig) return currentConfig;

  const defaultPath = path.resolve(process.cwd(), 'config/llamabridge.yaml');
  const finalPath = configPath || process.env.CONFIG_FILE || defaultPath;

  logger.info(`Loading configuration from ${finalPath}`);

  if (!fs.existsSync(finalPath)) {
    logger.error(`Configuration file not found at ${finalPath}`);
    throw new Error(`Configuration file not found at ${finalPath}`);
  }

  try {
    currentConfig = parseConfigFile(finalPath);
    logger.info('Configuration loaded successfully');

    setupWatcher(finalPath);

    return currentConfig;
  } catch (error) {
    if (error instanceof z.ZodError) {
      logger.error('Configuration validation failed', { errors: error.errors });
    }
    throw error;
  }
}

export function getConfig(): BridgeConfig {
  if (!currentConfig) {
    return loadConfig();
  }
  return currentConfig;
}

export function setConfigForTesting(config: BridgeConfig): void {
  currentConfig = config;
}

export function stopConfigWatcher(): void {
  configWatcher?.close();
  configWatcher = null;
}
