import { loadConfig, stopConfigWatcher, type BridgeConfig } from './config';
import { buildServer } from './server';
import { ConfigModelRouter } from './services/model-router';
import { logger } from './utils/logger';

async function main() {
  // Load config on startup
  let config: BridgeConfig;
  try {
    config = loadConfig(process.argv[2]);
  } catch (e) {
    logger.error('Failed to load config', e);
    process.exit(1);
  }

  const router = new ConfigModelRouter();
  const server = await buildServer(router);

  server.addHook('onClose', async () => {
    router.close();
    stopConfigWatcher();
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error('Error during shutdown', e);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const { host, port } = config.server;
  await server.listen({ host, port });
  logger.info(`Ollama API listening on http://${host}:${port}`);
}

main().catch((e: unknown) => {
  logger.error('Fatal error during startup', e);
  process.exit(1);
});
