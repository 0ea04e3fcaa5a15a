import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ConsistencyError,
  CreditLimitExceededError,
  ProjectionIntegrityError,
  ValidationError,
} from '../../../domain/ledger/errors.js';
import {
  ConcurrencyConflictError,
  ConflictError,
  NotFoundError,
  PersistenceError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { getLogger } from '../../logger.js';

const logger = getLogger('http');

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function mapError(err: Error): MappedError {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (err instanceof ValidationError || isBodyParseError(err)) {
    return { status: 400, body: { code: 'VALIDATION_ERROR', message: err.message } };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof CreditLimitExceededError) {
    return {
      status: 409,
      body: {
        code: 'CREDIT_LIMIT_EXCEEDED',
        message: err.message,
        details: {
          accountId: err.accountId,
          creditLimitCents: err.creditLimitCents,
          attemptedBalanceCents: err.attemptedBalanceCents,
        },
      },
    };
  }

  if (err instanceof ConsistencyError) {
    return {
      status: 409,
      body: {
        code: 'CONSISTENCY_ERROR',
        message: err.message,
        details: {
          accountId: err.accountId,
          expectedBalanceBeforeCents: err.expectedBalanceBeforeCents,
          actualBalanceBeforeCents: err.actualBalanceBeforeCents,
        },
      },
    };
  }

  if (err instanceof ConcurrencyConflictError) {
    return {
      status: 409,
      body: {
        code: 'CONCURRENCY_CONFLICT',
        message: err.message,
        details: {
          expectedVersion: err.expectedVersion,
          actualVersion: err.actualVersion,
        },
      },
    };
  }

  if (err instanceof ConflictError) {
    return { status: 409, body: { code: 'CONFLICT', message: err.message } };
  }

  if (err instanceof PersistenceError) {
    return { status: 503, body: { code: 'PERSISTENCE_UNAVAILABLE', message: 'Storage is unavailable' } };
  }

  if (err instanceof ProjectionIntegrityError) {
    return { status: 500, body: { code: 'PROJECTION_INTEGRITY', message: 'Ledger integrity check failed' } };
  }

  return { status: 500, body: { code: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { status, body } = mapError(err);

  if (status >= 500) {
    logger.error({ err, method: req.method, path: req.path }, 'Request failed');
  } else {
    logger.debug({ code: body.code, method: req.method, path: req.path }, 'Request rejected');
  }

  res.status(status).json(body);
}
