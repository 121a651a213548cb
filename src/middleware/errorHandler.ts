import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ErrorHandler' });

function statusOf(err: Error): number {
  if (err instanceof HttpError) return err.statusCode;
  if (err instanceof ZodError) return 400;
  // body-parser errors (payload too large, malformed JSON) carry their own status
  if ('status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusOf(err);
  const context = { error: err.message, path: req.path, method: req.method, status };

  if (status >= 500) {
    logger.error({ ...context, stack: err.stack }, 'Unhandled error');
  } else {
    logger.warn(context, 'Request failed');
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Bad Request',
      message: err.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ')
    });
    return;
  }

  res.status(status).json({
    error: status >= 500 ? 'Internal server error' : err.name,
    message: err.message
  });
}
