import type { Request, Response, NextFunction } from 'express';
import type { ServerConfig } from '../config';
import { ServiceStatus, type ServiceInfoResponse } from '../models/types';
import type { SyncAdmission } from '../services/syncAdmission';
import type { SyncStore } from '../store/syncStore';
import { SyncError } from '../utils/errors';

/** API version reported to sync clients. */
export const API_VERSION = '1.1.5';

export interface ServiceControllerDeps {
  store: SyncStore;
  admission: SyncAdmission;
  server: ServerConfig;
  bootTime: Date;
}

export const createServiceController = ({ store, admission, server, bootTime }: ServiceControllerDeps) => {
  const maxSyncSize = server.maxSyncSizeKb * 1024;

  /**
   * GET /info
   */
  const getInfo = (req: Request, res: Response<ServiceInfoResponse>) => {
    res.status(200).json({
      status: admission.isAccepting() ? ServiceStatus.Online : ServiceStatus.NoNewSyncs,
      message: server.serviceMessage,
      version: API_VERSION,
      buildstamp: server.buildStamp,
      maxSyncSize,
    });
  };

  /**
   * GET <statusRoute>
   * Diagnostics only. Failures answer 500.
   */
  const getStatus = (req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = store.getStats();
      res.status(200).json({
        state: {
          keyCount: stats.recordCount,
          dbSizeBytes: stats.storageSizeBytes,
          buildStamp: server.buildStamp,
          bootTime: bootTime.toISOString(),
          acceptingNewSyncs: admission.isAccepting(),
        },
        engine: stats.engineStats,
      });
    } catch (error) {
      next(new SyncError('Statistics unavailable', 'InternalError', 500, error));
    }
  };

  /**
   * GET <syncToggleRoute>
   */
  const toggleNewSyncs = (req: Request, res: Response) => {
    const accepting = admission.toggle();
    res.status(200).type('text/plain').send(`Toggled accept_new_syncs to [${accepting}]`);
  };

  return {
    getInfo,
    getStatus,
    toggleNewSyncs,
  };
};

export type ServiceController = ReturnType<typeof createServiceController>;
