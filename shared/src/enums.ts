// Why a single removal did not succeed
export const RemovalErrorKind = {
  ALREADY_REMOVED: 'AlreadyRemoved',
  UPSTREAM_UNAUTHORIZED: 'UpstreamUnauthorized',
  UPSTREAM_RATE_LIMITED: 'UpstreamRateLimited',
  UPSTREAM_UNAVAILABLE: 'UpstreamUnavailable',
  UNKNOWN: 'Unknown',
  // Caller went away before the item was started; nothing was sent upstream
  CANCELLED: 'Cancelled',
} as const;
export type RemovalErrorKind = (typeof RemovalErrorKind)[keyof typeof RemovalErrorKind];

// Audit sink backends
export const AuditSinkType = {
  FILE: 'file',
  DYNAMODB: 'dynamodb',
} as const;
export type AuditSinkType = (typeof AuditSinkType)[keyof typeof AuditSinkType];
