import type { Request, Response, NextFunction } from 'express';
import { SyncError } from '../utils/errors';

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new SyncError(`Route ${req.method} ${req.originalUrl} not found`, 'NotFound', 404));
};
