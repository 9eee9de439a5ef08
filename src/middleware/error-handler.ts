import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../services/logger/index.js';
import { AppError } from '../utils/errors.js';

const logger = createLogger('http');

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ success: false, code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` });
}

/**
 * Last middleware in the chain. AppErrors carry their own status and code;
 * anything else is a 500 with a generic message.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    const level = err.statusCode >= 500 ? 'error' : 'warn';
    logger[level]({ code: err.code, method: req.method, url: req.url, ...err.context }, err.message);

    const details = err.context?.details;
    res.status(err.statusCode).json({
      success: false,
      code: err.code,
      message: err.message,
      ...(details !== undefined ? { details } : {}),
    });
    return;
  }

  logger.error({ err, method: req.method, url: req.url }, 'Unhandled error');
  res.status(500).json({ success: false, code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
