export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static validation(message: string): ValidationError {
    return new ValidationError(message);
  }

  static unauthorized(message: string): AuthenticationError {
    return new AuthenticationError(message);
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`);
  }

  static alreadyAwarded(userId: string, badgeType: string): AlreadyAwardedError {
    return new AlreadyAwardedError(`User '${userId}' already holds badge '${badgeType}'`);
  }

  static persistence(message: string, cause?: unknown): PersistenceError {
    return new PersistenceError(message, cause);
  }

  static cacheUnavailable(message: string, cause?: unknown): CacheUnavailableError {
    return new CacheUnavailableError(message, cause);
  }

  static cacheCold(message: string): CacheUnavailableError {
    return new CacheUnavailableError(message, undefined, true);
  }

  static internal(message: string = 'Internal server error'): InternalError {
    return new InternalError(message);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    statusCode: number = 400
  ) {
    super(message, code, statusCode, true);
  }
}

export class AuthenticationError extends AppError {
  constructor(
    message: string,
    code: string = 'AUTHENTICATION_ERROR',
    statusCode: number = 401
  ) {
    super(message, code, statusCode, true);
  }
}

export class NotFoundError extends AppError {
  constructor(
    message: string,
    code: string = 'NOT_FOUND',
    statusCode: number = 404
  ) {
    super(message, code, statusCode, true);
  }
}

/**
 * A badge award collided with an existing award. Callers treat this as
 * "no new badge", never as a failure.
 */
export class AlreadyAwardedError extends AppError {
  constructor(
    message: string,
    code: string = 'ALREADY_AWARDED',
    statusCode: number = 409
  ) {
    super(message, code, statusCode, true);
  }
}

/**
 * The system of record could not durably store or read a value.
 */
export class PersistenceError extends AppError {
  constructor(
    message: string,
    cause?: unknown,
    code: string = 'PERSISTENCE_ERROR',
    statusCode: number = 503
  ) {
    super(message, code, statusCode, true, { cause });
  }
}

/**
 * The leaderboard cache is unreachable or cold. Triggers the database
 * fallback and is never shown to users. `cold` marks a reachable cache
 * that a rebuild would fill.
 */
export class CacheUnavailableError extends AppError {
  constructor(
    message: string,
    cause?: unknown,
    public readonly cold: boolean = false,
    code: string = 'CACHE_UNAVAILABLE',
    statusCode: number = 503
  ) {
    super(message, code, statusCode, true, { cause });
  }
}

export interface RecipientFailure {
  userId: string;
  role: 'buyer' | 'seller';
  code: string;
  statusCode: number;
  message: string;
}

/**
 * Some recipients of a multi-party reward failed; the others were rewarded.
 * The status is the most severe of the failures.
 */
export class PartialRewardError extends AppError {
  constructor(
    message: string,
    public readonly failures: RecipientFailure[],
    code: string = 'PARTIAL_REWARD',
    statusCode: number = failures.reduce((worst, f) => Math.max(worst, f.statusCode), 400)
  ) {
    super(message, code, statusCode, true);
  }
}

export class InternalError extends AppError {
  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    isOperational: boolean = false
  ) {
    super(message, code, statusCode, isOperational);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Run a store operation, re-raising driver failures as PersistenceError.
 * AppErrors pass through unchanged.
 */
export async function withPersistence<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new PersistenceError(`${operation} failed`, error);
  }
}
