import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  AppError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
  getCurrentTraceId,
  logger
} from '@agenda/shared';

interface ErrorResponseBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/** Errors raised by the `express.json()` / `express.urlencoded()` body parsers. */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

function mapStatusCode(error: unknown): number {
  if (error instanceof ZodError) return 422;
  if (isBodyParserError(error)) return 422;
  if (error instanceof ValidationError) return 422;
  if (error instanceof ConflictError) return 409;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ForbiddenError) return 403;
  if (error instanceof AppError) return error.status;
  return 500;
}

export function errorMapper(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = mapStatusCode(err);
  const requestLogger = res.locals.logger ?? logger.withContext({ traceId: getCurrentTraceId() });

  if (status >= 500) {
    requestLogger.error({ err, status, path: req.path, method: req.method }, 'Request failed');
  } else {
    requestLogger.warn({ err, status, path: req.path, method: req.method }, 'Request rejected');
  }

  if (res.headersSent) {
    return;
  }

  const body: ErrorResponseBody = {
    error:
      err instanceof AppError
        ? err.name
        : err instanceof ZodError || isBodyParserError(err)
          ? 'ValidationError'
          : 'InternalServerError',
    message:
      err instanceof ZodError
        ? 'Request validation failed'
        : isBodyParserError(err) && err.type === 'entity.parse.failed'
          ? 'Request body is not valid JSON'
          : status < 500 && err instanceof Error
            ? err.message
            : 'Unexpected error while processing request'
  };

  if (err instanceof AppError && err.details) {
    body.details = err.details;
  }

  if (err instanceof ZodError) {
    body.details = { issues: err.issues };
  }

  res.status(status).json(body);
}
