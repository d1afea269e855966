import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { TRPCError } from '@trpc/server';
import { logger } from '../../logger';
import { reportError } from '../../sentry';
import {
  AppError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  AlreadyAwardedError,
  PersistenceError,
  CacheUnavailableError,
  PartialRewardError,
} from './index';

const HTTP_STATUS: Record<number, ContentfulStatusCode> = {
  400: 400,
  401: 401,
  404: 404,
  409: 409,
  500: 500,
  503: 503,
};

function httpStatus(statusCode: number): ContentfulStatusCode {
  return HTTP_STATUS[statusCode] ?? 500;
}

function trpcCodeForStatus(statusCode: number): TRPCError['code'] {
  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

function trpcCodeFor(error: AppError): TRPCError['code'] {
  if (error instanceof ValidationError) return 'BAD_REQUEST';
  if (error instanceof AuthenticationError) return 'UNAUTHORIZED';
  if (error instanceof NotFoundError) return 'NOT_FOUND';
  if (error instanceof AlreadyAwardedError) return 'CONFLICT';
  if (error instanceof PersistenceError) return 'SERVICE_UNAVAILABLE';
  if (error instanceof CacheUnavailableError) return 'SERVICE_UNAVAILABLE';
  if (error instanceof PartialRewardError) return trpcCodeForStatus(error.statusCode);
  return 'INTERNAL_SERVER_ERROR';
}

function logAppError(error: AppError, where: string): void {
  const logMethod = error.statusCode >= 500 ? 'error' : 'warn';
  logger[logMethod]({ err: error, statusCode: error.statusCode }, `AppError${where}: ${error.code}`);
  if (error.statusCode >= 500) {
    reportError(error);
  }
}

export function createHonoErrorHandler(): ErrorHandler {
  return (err, c) => {
    if (err instanceof AppError) {
      const { code, message, statusCode } = err;
      logAppError(err, '');
      return c.json({ error: { code, message, statusCode } }, httpStatus(statusCode));
    }

    logger.error({ err }, 'Unhandled error');
    reportError(err);

    return c.json(
      { error: { code: 'INTERNAL_SERVER_ERROR', message: 'Internal Server Error', statusCode: 500 } },
      500
    );
  };
}

/**
 * Convert anything a procedure threw into the TRPCError the client sees.
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }

  if (error instanceof AppError) {
    logAppError(error, ' in tRPC');
    return new TRPCError({ code: trpcCodeFor(error), message: error.message, cause: error });
  }

  logger.error({ err: error }, 'Unhandled error in tRPC');
  reportError(error);

  return new TRPCError({
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Internal Server Error',
    cause: error,
  });
}
