import { createServer } from 'http';
import { createApp } from './app';
import { loadConfig, overriddenOptions } from './config';
import { initSyncStore } from './config/database';
import { SyncAdmission } from './services/syncAdmission';
import logger from './utils/logger';

// dotenv is preloaded via -r dotenv/config in package.json

const startServer = () => {
  const config = loadConfig();
  logger.level = config.log.level;

  for (const option of overriddenOptions()) {
    logger.debug(`Config override: ${option}`);
  }
  logger.info(`Build ${config.server.buildStamp}, Node ${process.version}`);

  const store = initSyncStore(config.storage);
  const admission = new SyncAdmission(config.security.acceptNewSyncs);
  const app = createApp({ config, store, admission });
  const server = createServer(app);

  server.on('error', (error) => {
    logger.error('❌ HTTP server error:', error);
    store.close();
    process.exit(1);
  });

  server.listen(config.server.port, () => {
    logger.info(`🚀 Server running on port ${config.server.port}`);
    logger.info(`📝 Environment: ${process.env.NODE_ENV || 'development'}`);
    logger.info(`New syncs ${admission.isAccepting() ? 'accepted' : 'refused'}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close((error) => {
      store.close();
      if (error) {
        logger.error('HTTP server closed with error:', error);
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

try {
  startServer();
} catch (error) {
  logger.error('❌ Failed to start server:', error);
  process.exit(1);
}
