import type { Request, Response, NextFunction } from 'express';
import { SyncError, type SyncErrorCode } from '../utils/errors';
import logger from '../utils/logger';

interface BodyParserError extends Error {
  type: string;
  status?: number;
}

const isBodyParserError = (err: unknown): err is BodyParserError =>
  err instanceof Error && 'type' in err && typeof err.type === 'string';

interface ErrorResponse {
  statusCode: number;
  code: SyncErrorCode;
  message: string;
}

const toErrorResponse = (err: unknown): ErrorResponse => {
  if (err instanceof SyncError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message };
  }

  if (isBodyParserError(err)) {
    if (err.type === 'entity.too.large') {
      return { statusCode: 413, code: 'RequestEntityTooLarge', message: 'Sync data exceeds the size limit' };
    }
    if (err.type === 'entity.parse.failed') {
      return { statusCode: 409, code: 'MissingParameter', message: 'Request body is not valid JSON' };
    }
    // unsupported charset or encoding, aborted or truncated bodies
    if (err.status === undefined || err.status < 500) {
      return { statusCode: 409, code: 'MissingParameter', message: 'Request body could not be read' };
    }
  }

  return { statusCode: 500, code: 'InternalError', message: 'Internal Server Error' };
};

/**
 * Final Express error handler. Sync clients read `{ code, message }` from
 * every failed request.
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // four arguments mark this as an error handler for Express
  next: NextFunction
) => {
  const { statusCode, code, message } = toErrorResponse(err);
  const detail = err instanceof Error ? err.message : String(err);

  const meta = {
    statusCode,
    code,
    path: req.path,
    method: req.method,
    ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack }),
  };

  if (code === 'InternalError' || statusCode >= 500) {
    logger.error(`Error: ${detail}`, meta);
  } else {
    logger.warn(`${code}: ${detail}`, meta);
  }

  res.status(statusCode).json({ code, message });
};
