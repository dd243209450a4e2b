import { Router } from 'express';
import type { BookmarksController } from '../controllers/bookmarks.controller';

export const createBookmarksRoutes = (controller: BookmarksController): Router => {
  const router = Router();

  /**
   * @route   POST /bookmarks
   * @desc    Create a new sync ID
   * @body    { version?: string }
   * @returns { id, lastUpdated, version }
   */
  router.post('/', controller.createBookmarks);

  /**
   * @route   GET /bookmarks/:id
   * @returns { bookmarks, lastUpdated, version }
   */
  router.get('/:id', controller.getBookmarks);

  /**
   * @route   PUT /bookmarks/:id
   * @desc    Replace the encrypted bookmarks of a sync ID
   * @body    { bookmarks: string }
   * @returns { lastUpdated }
   */
  router.put('/:id', controller.updateBookmarks);

  /**
   * @route   GET /bookmarks/:id/lastUpdated
   * @returns { lastUpdated } or {} for unknown IDs
   */
  router.get('/:id/lastUpdated', controller.getLastUpdated);

  /**
   * @route   GET /bookmarks/:id/version
   * @returns { version } or {} for unknown IDs
   */
  router.get('/:id/version', controller.getVersion);

  return router;
};
