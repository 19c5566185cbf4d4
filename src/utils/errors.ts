export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_HASH: 'INVALID_HASH',
  DUPLICATE_CERTIFICATE: 'DUPLICATE_CERTIFICATE',
  ISSUER_NOT_ELIGIBLE: 'ISSUER_NOT_ELIGIBLE',
  DEGREE_NOT_FOUND: 'DEGREE_NOT_FOUND',
  ALREADY_REVOKED: 'ALREADY_REVOKED',
  UNAUTHORIZED: 'UNAUTHORIZED',
  INSUFFICIENT_STAKE: 'INSUFFICIENT_STAKE',
  DUPLICATE_ORGANIZATION: 'DUPLICATE_ORGANIZATION',
  ORGANIZATION_NOT_FOUND: 'ORGANIZATION_NOT_FOUND',
  INVALID_STATUS: 'INVALID_STATUS',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export type ErrorDetails = Record<string, string | number | boolean | null>;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  INVALID_HASH: 400,
  DUPLICATE_CERTIFICATE: 409,
  ISSUER_NOT_ELIGIBLE: 403,
  DEGREE_NOT_FOUND: 404,
  ALREADY_REVOKED: 409,
  UNAUTHORIZED: 403,
  INSUFFICIENT_STAKE: 400,
  DUPLICATE_ORGANIZATION: 409,
  ORGANIZATION_NOT_FOUND: 404,
  INVALID_STATUS: 409,
  INTERNAL_ERROR: 500
};

/**
 * Error raised by the core. `statusCode` is a hint for whichever application
 * layer maps these onto a transport; the core itself never inspects it.
 */
export class AppError extends Error {
  code: ErrorCode;
  statusCode: number;
  details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
    this.details = details;
  }

  get internal(): boolean {
    return this.code === ErrorCodes.INTERNAL_ERROR;
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

/**
 * Runs a backing-store operation. Anything thrown that is not an AppError is
 * re-raised as INTERNAL_ERROR with the original error as `cause`.
 */
export async function guardStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError(ErrorCodes.INTERNAL_ERROR, `Store operation ${operation} failed: ${reason}`, { operation }, { cause: error });
  }
}
