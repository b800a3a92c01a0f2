import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger/index.js';
import { HttpError, MethodNotAllowedError } from '../../shared/errors.js';

// Errors raised by body-parser carry `status` and `type` (e.g. 'entity.parse.failed').
const readStatus = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return undefined;
  }
  return typeof err.status === 'number' ? err.status : undefined;
};

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ZodError) {
    logger.warn({ path: req.path, method: req.method, issues: err.issues }, 'Request validation failed');
    return res.status(400).json({
      message: 'Validation failed',
      requestId: req.id,
      issues: err.issues,
    });
  }

  if (err instanceof MethodNotAllowedError) {
    res.setHeader('Allow', err.allowed.join(', '));
  }

  if (err instanceof HttpError) {
    const payload = {
      message: err.message,
      requestId: req.id,
      details: err.details,
    };

    if (err.status < 500) {
      logger.warn({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (user-actionable)');
    } else {
      logger.error({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (server error)');
    }
    return res.status(err.status).json(payload);
  }

  const status = readStatus(err) ?? 500;
  const message = err instanceof Error ? err.message : String(err);

  if (status < 500) {
    // Malformed JSON bodies and similar parser rejections
    logger.warn({ err, status, path: req.path, method: req.method }, 'Request rejected');
    return res.status(status).json({
      message: status === 400 ? 'Invalid request body' : message,
      requestId: req.id,
    });
  }

  logger.error(
    {
      err,
      status,
      path: req.path,
      method: req.method,
    },
    'Unhandled error',
  );

  res.status(status).json({
    message: 'Internal server error',
    requestId: req.id,
  });
};
