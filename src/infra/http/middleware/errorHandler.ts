import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  NoConnectivityFailure,
  ServerFailure,
} from '../../../domain/auth/failures.js';
import {
  EmailTakenError,
  InvalidCredentialsError,
  UserNotFoundError,
} from '../../data/exceptions.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface Mapped {
  status: number;
  body: ErrorResponse;
}

function mapServerFailure(failure: ServerFailure): Mapped {
  const cause = failure.cause;

  if (cause instanceof InvalidCredentialsError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: failure.message } };
  }
  if (cause instanceof EmailTakenError) {
    return { status: 409, body: { code: 'CONFLICT', message: failure.message } };
  }
  if (cause instanceof UserNotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: failure.message } };
  }
  return { status: 502, body: { code: 'SERVER_ERROR', message: failure.message } };
}

/**
 * Turns whatever reached `next(err)` into the response the client sees.
 * Failures from the use cases are expected outcomes; anything else is
 * logged as an internal error.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  // body-parser rejects malformed JSON before any route runs
  if ('type' in err && err.type === 'entity.parse.failed') {
    const response: ErrorResponse = {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof NoConnectivityFailure) {
    const response: ErrorResponse = {
      code: 'NO_CONNECTIVITY',
      message: err.message,
    };
    res.status(503).json(response);
    return;
  }

  if (err instanceof ServerFailure) {
    const { status, body } = mapServerFailure(err);
    if (status === 502) {
      logger.warn({ err }, 'Server failure');
    }
    res.status(status).json(body);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
