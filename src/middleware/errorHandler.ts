import { Request, Response, NextFunction } from 'express';
import logger from '../lib/logger';
import { HttpError, describeError } from '../lib/errors';

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  // body-parser and friends tag client errors with a status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export default function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  logger.error('Request failed', {
    path: req.originalUrl,
    status,
    message: describeError(err),
    stack: err instanceof Error ? err.stack : undefined
  });
  const message = status === 500 ? 'Internal Server Error' : describeError(err);
  res.status(status).json({ error: message });
}
