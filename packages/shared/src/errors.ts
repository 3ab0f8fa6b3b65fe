export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  LOCKED = 'LOCKED',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.LOCKED]: 423,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
};

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.safeMeta = safeMeta;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}

/** Shape shared by every service error in `@murmur/domain`. */
export interface DomainErrorLike {
  kind: string;
  message: string;
  details?: Record<string, unknown>;
}

function isDomainError(err: unknown): err is Error & DomainErrorLike {
  return err instanceof Error && 'kind' in err && typeof err.kind === 'string';
}

function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(HTTP_STATUS_MAP, value);
}

/**
 * Maps a domain service error onto the transport-level error model.
 * Anything unrecognised becomes an opaque INTERNAL error.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (isDomainError(err)) {
    const code = isErrorCode(err.kind) ? err.kind : ErrorCode.INTERNAL;
    return new AppError(code, err.message, err.details ?? {});
  }
  return new AppError(ErrorCode.INTERNAL, 'Internal server error');
}
