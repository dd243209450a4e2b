import { SyncStore } from '../store/syncStore';
import logger from '../utils/logger';
import type { StorageConfig } from './index';

/**
 * Open the sync store described by the storage configuration.
 * The server cannot run without it, so failures propagate to the caller.
 */
export const initSyncStore = (config: StorageConfig): SyncStore => {
  logger.info(`Opening sync store ${config.file} (timeout ${config.initTimeoutSeconds}s)`);
  try {
    const store = SyncStore.open({
      file: config.file,
      initTimeoutSeconds: config.initTimeoutSeconds,
    });
    const { recordCount, storageSizeBytes } = store.getStats();
    logger.info(`✅ Sync store holds ${recordCount} sync IDs (${storageSizeBytes} bytes)`);
    return store;
  } catch (error) {
    logger.error('❌ Sync store initialization error:', error);
    throw error;
  }
};
