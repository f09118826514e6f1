import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isTTSError, type TTSErrorKind } from '../providers/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ErrorHandler' });

const STATUS_BY_KIND: Record<TTSErrorKind, number> = {
  UnsupportedFormat: 400,
  ProviderNotFound: 400,
  TextTooLong: 400,
  AssetNotFound: 503,
  NoVoicesAvailable: 503,
  EngineInitFailure: 500
};

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(422).json({
      error: 'Validation failed',
      detail: err.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
    return;
  }

  if (isTTSError(err)) {
    const status = STATUS_BY_KIND[err.kind];
    const context = { kind: err.kind, error: err.message, path: req.path, method: req.method };
    if (status >= 500) {
      logger.error(context, 'Synthesis request failed');
    } else {
      logger.warn(context, 'Synthesis request rejected');
    }

    res.status(status).json({
      error: err.kind,
      detail: err.message
    });
    return;
  }

  // body-parser failures (malformed JSON, oversized body) carry their own 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({
      error: 'Bad request',
      detail: err.message
    });
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method
    },
    'Unhandled error'
  );

  res.status(500).json({
    error: 'Internal server error',
    detail: 'Internal server error'
  });
}
