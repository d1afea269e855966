/**
 * Error Hierarchy Unit Tests
 */
import { describe, it, expect } from 'vitest';
import { TRPCError } from '@trpc/server';
import {
  AppError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  AlreadyAwardedError,
  PersistenceError,
  CacheUnavailableError,
  InternalError,
  PartialRewardError,
  isAppError,
  withPersistence,
} from '../../src/lib/errors';
import { toTRPCError } from '../../src/lib/errors/error-handler';

describe('Error subclasses', () => {
  const errorTypes = [
    { Class: ValidationError, status: 400, code: 'VALIDATION_ERROR', operational: true },
    { Class: AuthenticationError, status: 401, code: 'AUTHENTICATION_ERROR', operational: true },
    { Class: NotFoundError, status: 404, code: 'NOT_FOUND', operational: true },
    { Class: AlreadyAwardedError, status: 409, code: 'ALREADY_AWARDED', operational: true },
    { Class: PersistenceError, status: 503, code: 'PERSISTENCE_ERROR', operational: true },
    { Class: CacheUnavailableError, status: 503, code: 'CACHE_UNAVAILABLE', operational: true },
    { Class: InternalError, status: 500, code: 'INTERNAL_ERROR', operational: false },
  ] as const;

  for (const { Class, status, code, operational } of errorTypes) {
    describe(Class.name, () => {
      it(`should carry statusCode ${status} and code "${code}"`, () => {
        const error = new Class('test message');
        expect(error.statusCode).toBe(status);
        expect(error.code).toBe(code);
        expect(error.isOperational).toBe(operational);
        expect(error.message).toBe('test message');
        expect(error.name).toBe(Class.name);
      });

      it('should extend Error and AppError', () => {
        const error = new Class('test');
        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(AppError);
        expect(isAppError(error)).toBe(true);
      });
    });
  }
});

describe('Factory methods', () => {
  it('AppError.notFound() names the resource and id', () => {
    const error = AppError.notFound('User', 'u-1');
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe("User with id 'u-1' not found");
  });

  it('AppError.alreadyAwarded() names the user and badge', () => {
    const error = AppError.alreadyAwarded('u-1', 'early_bird');
    expect(error).toBeInstanceOf(AlreadyAwardedError);
    expect(error.message).toBe("User 'u-1' already holds badge 'early_bird'");
  });

  it('AppError.persistence() keeps the driver error as cause', () => {
    const cause = new Error('ECONNRESET');
    const error = AppError.persistence('XP ledger append failed', cause);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error.cause).toBe(cause);
  });
});

describe('withPersistence', () => {
  it('should return the operation result', async () => {
    await expect(withPersistence('Read', async () => 42)).resolves.toBe(42);
  });

  it('should wrap driver failures in PersistenceError', async () => {
    const cause = new Error('connection terminated');
    const error = await withPersistence('XP ledger append', async () => {
      throw cause;
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({ message: 'XP ledger append failed', cause });
  });

  it('should pass AppErrors through unchanged', async () => {
    const notFound = AppError.notFound('User', 'u-2');
    await expect(
      withPersistence('User read', async () => {
        throw notFound;
      })
    ).rejects.toBe(notFound);
  });
});

describe('toTRPCError', () => {
  const mappings = [
    { error: new ValidationError('bad'), code: 'BAD_REQUEST' },
    { error: new AuthenticationError('who'), code: 'UNAUTHORIZED' },
    { error: new NotFoundError('gone'), code: 'NOT_FOUND' },
    { error: new AlreadyAwardedError('dup'), code: 'CONFLICT' },
    { error: new PersistenceError('down'), code: 'SERVICE_UNAVAILABLE' },
    { error: new CacheUnavailableError('cold'), code: 'SERVICE_UNAVAILABLE' },
    { error: new InternalError('boom'), code: 'INTERNAL_SERVER_ERROR' },
  ] as const;

  for (const { error, code } of mappings) {
    it(`should map ${error.name} to ${code}`, () => {
      const mapped = toTRPCError(error);
      expect(mapped.code).toBe(code);
      expect(mapped.message).toBe(error.message);
      expect(mapped.cause).toBe(error);
    });
  }

  it('should map a partial reward by its most severe failure', () => {
    const notFound = { role: 'seller', code: 'NOT_FOUND', statusCode: 404, message: 'gone' } as const;
    const onlyMissing = new PartialRewardError('partial', [{ ...notFound, userId: 'u-1' }]);
    const withOutage = new PartialRewardError('partial', [
      { ...notFound, userId: 'u-1' },
      { userId: 'u-2', role: 'buyer', code: 'PERSISTENCE_ERROR', statusCode: 503, message: 'down' },
    ]);

    expect(onlyMissing.statusCode).toBe(404);
    expect(toTRPCError(onlyMissing).code).toBe('NOT_FOUND');
    expect(withOutage.statusCode).toBe(503);
    expect(toTRPCError(withOutage).code).toBe('SERVICE_UNAVAILABLE');
  });

  it('should hide the message of unknown errors', () => {
    const mapped = toTRPCError(new Error('relation "users" does not exist'));
    expect(mapped.code).toBe('INTERNAL_SERVER_ERROR');
    expect(mapped.message).toBe('Internal Server Error');
  });

  it('should return TRPCErrors as they are', () => {
    const original = new TRPCError({ code: 'UNAUTHORIZED', message: 'Service token required' });
    expect(toTRPCError(original)).toBe(original);
  });
});
