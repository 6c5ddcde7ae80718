import {
  RemovalErrorKind,
  type RemovalOutcome,
  type RemovalRequest,
} from '@follower-relay/shared';
import type { CredentialBundle } from '../credentials.js';
import { BatchTooLargeError, UpstreamError, ValidationError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { UpstreamApi } from '../upstream/client.js';
import { toRemovalOutcome } from '../upstream/mapping.js';
import { buildAuditEntry, type AuditLog } from './audit.js';

export interface RemovalDeps {
  upstream: UpstreamApi;
  auditLog: AuditLog;
  logger?: Logger;
  requestId?: string;
}

export interface RemoveFollowersOptions {
  // Aborted when the caller disconnects
  signal?: AbortSignal;
}

export function buildRemovalBatch(
  actingUserId: string,
  targets: readonly string[],
  maxBatchSize: number
): RemovalRequest[] {
  if (targets.length === 0) {
    throw new ValidationError('At least one target is required');
  }
  if (targets.length > maxBatchSize) {
    throw new BatchTooLargeError(targets.length, maxBatchSize);
  }
  return targets.map((targetFollowerId) => ({ actingUserId, targetFollowerId }));
}

export function failedOutcome(targetFollowerId: string, error: unknown): RemovalOutcome {
  if (error instanceof UpstreamError) {
    return {
      targetFollowerId,
      succeeded: false,
      errorKind: error.kind,
      ...(error.retryAfterSeconds !== undefined && { retryAfterSeconds: error.retryAfterSeconds }),
    };
  }
  return { targetFollowerId, succeeded: false, errorKind: RemovalErrorKind.UNKNOWN };
}

// Exactly one upstream call, no retry: the platform primitive is not idempotent
async function forwardRemoval(
  upstream: UpstreamApi,
  request: RemovalRequest,
  credentials: CredentialBundle
): Promise<RemovalOutcome> {
  try {
    const raw = await upstream.removeFollower(request.targetFollowerId, credentials);
    return toRemovalOutcome(request.targetFollowerId, raw);
  } catch (error) {
    return failedOutcome(request.targetFollowerId, error);
  }
}

async function record(
  deps: RemovalDeps,
  request: RemovalRequest,
  outcome: RemovalOutcome
): Promise<RemovalOutcome> {
  await deps.auditLog.append(buildAuditEntry(request, outcome, deps.requestId));

  const log = deps.logger ?? rootLogger;
  const context = {
    actingUserId: request.actingUserId,
    targetFollowerId: request.targetFollowerId,
    ...(outcome.errorKind && { errorKind: outcome.errorKind }),
  };
  if (outcome.succeeded) {
    log.info(context, 'Follower removed');
  } else {
    log.warn(context, 'Follower removal failed');
  }
  return outcome;
}

export async function removeFollower(
  deps: RemovalDeps,
  request: RemovalRequest,
  credentials: CredentialBundle
): Promise<RemovalOutcome> {
  const outcome = await forwardRemoval(deps.upstream, request, credentials);
  return record(deps, request, outcome);
}

/**
 * Remove a batch one item at a time, in order.
 *
 * Sequential dispatch bounds the account's exposure to upstream rate limits
 * and keeps the audit trail in request order. A failed item never stops its
 * siblings. Once the signal is aborted no further item is sent upstream;
 * the remaining ones are recorded as cancelled.
 */
export async function removeFollowers(
  deps: RemovalDeps,
  batch: readonly RemovalRequest[],
  credentials: CredentialBundle,
  options: RemoveFollowersOptions = {}
): Promise<RemovalOutcome[]> {
  const outcomes: RemovalOutcome[] = [];

  for (const request of batch) {
    if (options.signal?.aborted) {
      outcomes.push(
        await record(deps, request, {
          targetFollowerId: request.targetFollowerId,
          succeeded: false,
          errorKind: RemovalErrorKind.CANCELLED,
        })
      );
      continue;
    }
    outcomes.push(await removeFollower(deps, request, credentials));
  }

  return outcomes;
}
