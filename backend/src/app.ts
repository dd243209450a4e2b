import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import type { AppConfig } from './config';
import { createBookmarksController } from './controllers/bookmarks.controller';
import { createServiceController } from './controllers/service.controller';
import { errorHandler } from './middleware/errorHandler';
import { notFound } from './middleware/notFound';
import { createBookmarksRoutes } from './routes/bookmarks.routes';
import { createHealthRoutes } from './routes/health.routes';
import { createServiceRoutes } from './routes/service.routes';
import type { SyncAdmission } from './services/syncAdmission';
import type { SyncStore } from './store/syncStore';
import logger from './utils/logger';

export interface AppDeps {
  config: AppConfig;
  store: SyncStore;
  admission: SyncAdmission;
  bootTime?: Date;
}

export const createApp = ({ config, store, admission, bootTime = new Date() }: AppDeps): Express => {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: config.server.corsOrigin }));
  app.use(compression());
  app.use(morgan('combined', { stream: { write: (message) => logger.info(message.trim()) } }));
  app.use(express.json({ limit: `${config.server.maxSyncSizeKb}kb` }));

  const bookmarks = createBookmarksController({ store, admission });
  const service = createServiceController({ store, admission, server: config.server, bootTime });

  app.use('/health', createHealthRoutes(store));
  app.use('/bookmarks', createBookmarksRoutes(bookmarks));
  app.use(createServiceRoutes(service, config.server, config.security));

  // Error handling
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
