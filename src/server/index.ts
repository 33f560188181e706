import { createServer } from './api.js';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { initializeStorage, shutdownStorage } from './storage/index.js';
import { GAME_CONSTANTS } from '../shared/game/types.js';

async function start() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
  const logger = createLogger(config.logLevel);

  try {
    // Initialize storage first
    logger.info('Initializing storage...');
    const storage = await initializeStorage({
      type: config.storage.type,
      url: config.storage.url,
      ttl: config.storage.ttl,
      turnGuardTtlMs: config.turnGuardTtlMs,
    });
    logger.info({ storage: config.storage.type }, 'Storage connected');

    const server = createServer(storage, {
      logger,
      rules: {
        cityRegenNormal: config.cityRegenNormal,
        cityRegenUnderSiege: config.cityRegenUnderSiege,
        cityDefence: GAME_CONSTANTS.CITY_DEFENCE,
        resourceStorageCap: config.resourceStorageCap,
      },
      idempotencyTtlSeconds: config.idempotencyTtl,
      corsOrigin: config.clientOrigin,
    });

    // Graceful shutdown handling
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received. Shutting down gracefully...`);
      try {
        await server.close();
        logger.info('Server closed');
        await shutdownStorage();
        logger.info('Storage disconnected');
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
