import type { Request, Response, NextFunction } from 'express';
import type { CreateSyncResponse, GetSyncResponse, PutSyncResult } from '../models/types';
import type { SyncAdmission } from '../services/syncAdmission';
import type { SyncStore } from '../store/syncStore';
import { NotAcceptingError, ValidationError } from '../utils/errors';
import logger from '../utils/logger';

export interface BookmarksControllerDeps {
  store: SyncStore;
  admission: SyncAdmission;
}

type SyncIdRequest = Request<{ id: string }>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Client version from a create request. Absent means empty.
 */
export const readClientVersion = (body: unknown): string => {
  if (body === undefined) return '';
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const { version } = body;
  if (version === undefined || version === null) return '';
  if (typeof version !== 'string') {
    throw new ValidationError('Client version must be a string');
  }
  return version;
};

/**
 * Encrypted bookmarks from an update request. The content is never inspected.
 */
export const readBookmarks = (body: unknown): string => {
  const bookmarks = isRecord(body) ? body.bookmarks : undefined;
  if (typeof bookmarks !== 'string') {
    throw new ValidationError('No bookmarks provided');
  }
  return bookmarks;
};

export const createBookmarksController = ({ store, admission }: BookmarksControllerDeps) => {
  /**
   * POST /bookmarks
   */
  const createBookmarks = (req: Request, res: Response<CreateSyncResponse>, next: NextFunction) => {
    try {
      if (!admission.isAccepting()) {
        throw new NotAcceptingError();
      }

      const clientVersion = readClientVersion(req.body);
      logger.debug('New sync ID requested', { clientVersion });

      const created = store.createSync(clientVersion);

      res.status(200).json({
        id: created.id,
        lastUpdated: created.lastUpdated,
        version: created.clientVersion,
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /bookmarks/:id
   */
  const getBookmarks = (req: SyncIdRequest, res: Response<GetSyncResponse>, next: NextFunction) => {
    try {
      const record = store.getSync(req.params.id);

      res.status(200).json({
        bookmarks: record.payload,
        lastUpdated: record.lastUpdated,
        version: record.clientVersion,
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /bookmarks/:id
   */
  const updateBookmarks = (req: SyncIdRequest, res: Response<PutSyncResult>, next: NextFunction) => {
    try {
      const { id } = req.params;
      const bookmarks = readBookmarks(req.body);

      const { lastUpdated } = store.putSync(id, bookmarks);
      logger.debug(`Sync updated: ${id}`, { bytes: Buffer.byteLength(bookmarks) });

      res.status(200).json({ lastUpdated });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /bookmarks/:id/lastUpdated
   * Unknown IDs answer an empty object, not an error.
   */
  const getLastUpdated = (req: SyncIdRequest, res: Response, next: NextFunction) => {
    try {
      const lastUpdated = store.getLastUpdated(req.params.id);
      res.status(200).json(lastUpdated ? { lastUpdated } : {});
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /bookmarks/:id/version
   * An empty recorded version reads the same as an unknown ID.
   */
  const getVersion = (req: SyncIdRequest, res: Response, next: NextFunction) => {
    try {
      const version = store.getClientVersion(req.params.id);
      res.status(200).json(version ? { version } : {});
    } catch (error) {
      next(error);
    }
  };

  return {
    createBookmarks,
    getBookmarks,
    updateBookmarks,
    getLastUpdated,
    getVersion,
  };
};

export type BookmarksController = ReturnType<typeof createBookmarksController>;
