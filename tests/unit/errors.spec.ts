import { describe, it, expect } from 'vitest';
import { AppError, ErrorCodes, guardStore, isAppError } from '../../src/utils/errors';

describe('AppError', () => {
  it('carries a status hint per code', () => {
    expect(new AppError(ErrorCodes.DUPLICATE_CERTIFICATE, 'dup').statusCode).toBe(409);
    expect(new AppError(ErrorCodes.DEGREE_NOT_FOUND, 'missing').statusCode).toBe(404);
    expect(new AppError(ErrorCodes.INTERNAL_ERROR, 'boom').internal).toBe(true);
    expect(new AppError(ErrorCodes.UNAUTHORIZED, 'no').internal).toBe(false);
  });

  it('narrows by code', () => {
    const error: unknown = new AppError(ErrorCodes.ALREADY_REVOKED, 'again');
    expect(isAppError(error)).toBe(true);
    expect(isAppError(error, 'ALREADY_REVOKED')).toBe(true);
    expect(isAppError(error, 'UNAUTHORIZED')).toBe(false);
    expect(isAppError(new Error('plain'))).toBe(false);
  });
});

describe('guardStore', () => {
  it('wraps store faults as INTERNAL_ERROR with the cause', async () => {
    const fault = new Error('connection reset');
    const guarded = guardStore('degrees.get', async () => {
      throw fault;
    });
    await expect(guarded).rejects.toMatchObject({
      code: 'INTERNAL_ERROR',
      message: 'Store operation degrees.get failed: connection reset',
      details: { operation: 'degrees.get' },
      cause: fault
    });
  });

  it('lets business errors through unchanged', async () => {
    const rejection = new AppError(ErrorCodes.DEGREE_NOT_FOUND, 'missing');
    await expect(
      guardStore('degrees.get', async () => {
        throw rejection;
      })
    ).rejects.toBe(rejection);
    await expect(guardStore('degrees.get', async () => 7)).resolves.toBe(7);
  });
});
