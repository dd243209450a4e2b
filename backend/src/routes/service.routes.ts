import { Router } from 'express';
import type { ServerConfig, SecurityConfig } from '../config';
import type { ServiceController } from '../controllers/service.controller';
import logger from '../utils/logger';

export const createServiceRoutes = (
  controller: ServiceController,
  server: ServerConfig,
  security: SecurityConfig
): Router => {
  const router = Router();

  router.get('/info', controller.getInfo);
  router.get(server.statusRoute, controller.getStatus);

  // Hidden switch for new registrations; only mounted when configured
  if (security.syncToggleRoute) {
    logger.info('Enabling sync toggling route');
    router.get(security.syncToggleRoute, controller.toggleNewSyncs);
  }

  return router;
};
