import { ErrorCode, RemovalErrorKind, type ApiError } from '@follower-relay/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

function credentialProblems(missing: readonly string[], malformed: readonly string[]): string {
  const problems: string[] = [];
  if (missing.length > 0) problems.push(`Missing or empty credentials: ${missing.join(', ')}`);
  if (malformed.length > 0) problems.push(`Malformed credentials: ${malformed.join(', ')}`);
  return problems.join('; ');
}

export class InvalidCredentialsError extends AppError {
  constructor(missing: readonly string[], malformed: readonly string[] = []) {
    super(ErrorCode.INVALID_CREDENTIALS, credentialProblems(missing, malformed), 400, {
      ...(missing.length > 0 && { missing: [...missing] }),
      ...(malformed.length > 0 && { malformed: [...malformed] }),
    });
    this.name = 'InvalidCredentialsError';
  }
}

export class BatchTooLargeError extends AppError {
  constructor(size: number, maxBatchSize: number) {
    super(
      ErrorCode.BATCH_TOO_LARGE,
      `Batch of ${size} exceeds maximum of ${maxBatchSize}`,
      400,
      { size, maxBatchSize }
    );
    this.name = 'BatchTooLargeError';
  }
}

// Upstream failure kinds a whole call can end in (removals add AlreadyRemoved)
export type UpstreamErrorKind = Exclude<RemovalErrorKind, 'Cancelled'>;

const UPSTREAM_ERROR_STATUS: Record<UpstreamErrorKind, { code: ErrorCode; statusCode: number }> = {
  [RemovalErrorKind.UPSTREAM_UNAUTHORIZED]: { code: ErrorCode.UPSTREAM_UNAUTHORIZED, statusCode: 401 },
  [RemovalErrorKind.UPSTREAM_RATE_LIMITED]: { code: ErrorCode.UPSTREAM_RATE_LIMITED, statusCode: 429 },
  [RemovalErrorKind.UPSTREAM_UNAVAILABLE]: { code: ErrorCode.UPSTREAM_UNAVAILABLE, statusCode: 502 },
  [RemovalErrorKind.ALREADY_REMOVED]: { code: ErrorCode.NOT_FOUND, statusCode: 404 },
  [RemovalErrorKind.UNKNOWN]: { code: ErrorCode.UPSTREAM_BAD_RESPONSE, statusCode: 502 },
};

function upstreamDetails(
  upstreamStatus?: number,
  retryAfterSeconds?: number
): Record<string, unknown> | undefined {
  if (upstreamStatus === undefined && retryAfterSeconds === undefined) return undefined;
  return {
    ...(upstreamStatus !== undefined && { upstreamStatus }),
    ...(retryAfterSeconds !== undefined && { retryAfterSeconds }),
  };
}

export class UpstreamError extends AppError {
  constructor(
    public readonly kind: UpstreamErrorKind,
    message: string,
    public readonly upstreamStatus?: number,
    public readonly retryAfterSeconds?: number
  ) {
    super(
      UPSTREAM_ERROR_STATUS[kind].code,
      message,
      UPSTREAM_ERROR_STATUS[kind].statusCode,
      upstreamDetails(upstreamStatus, retryAfterSeconds)
    );
    this.name = 'UpstreamError';
  }
}

export class UpstreamBadResponseError extends UpstreamError {
  constructor(message: string) {
    super(RemovalErrorKind.UNKNOWN, message);
    this.name = 'UpstreamBadResponseError';
  }
}
