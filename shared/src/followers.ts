import type { RemovalErrorKind } from './enums.js';

// Follower as seen by the relay, normalized from the platform's user object
export interface FollowerRecord {
  id: string;
  displayName: string;
  handle: string;
  avatarUrl: string;
  isVerified: boolean;
}

// One page of a follower listing. A null cursor means the listing is complete.
export interface FollowerPage {
  followers: FollowerRecord[];
  nextCursor: string | null;
}

export interface RemovalRequest {
  actingUserId: string;
  targetFollowerId: string;
}

export interface RemovalOutcome {
  targetFollowerId: string;
  succeeded: boolean;
  errorKind?: RemovalErrorKind;
  retryAfterSeconds?: number;
}

// Credential fields a caller may send in a request body
export interface CredentialFields {
  bearerToken?: string;
  csrfToken?: string;
  cookies?: string | Record<string, string>;
}

// POST /api/followers/list
export interface ListFollowersRequest {
  userId?: string;
  cursor?: string;
  count?: number;
  credentials?: CredentialFields;
}

export type ListFollowersResponse = FollowerPage;

// POST /api/followers/remove
export interface RemoveFollowersRequest {
  userId?: string;
  targets: string[];
  credentials?: CredentialFields;
}

export interface RemoveFollowersResponse {
  outcomes: RemovalOutcome[];
}
