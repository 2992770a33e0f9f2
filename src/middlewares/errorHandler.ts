import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { AppError } from '../utils/errors';

const GENERIC_ERROR = 'Something went wrong. Please try again.';

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(err.message, { path: req.path });
    }
    return res.status(err.statusCode).json({ error: err.message, redirect: err.redirect });
  }

  if (isMalformedBody(err)) {
    return res.status(400).json({ error: 'Invalid request body.', redirect: '/' });
  }

  logger.error('Unhandled error', { path: req.path, error: err });
  res.status(500).json({ error: GENERIC_ERROR, redirect: '/' });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ error: 'Not found', redirect: '/' });
}
