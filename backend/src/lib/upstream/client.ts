import { RemovalErrorKind } from '@follower-relay/shared';
import { serializeCookies, type CredentialBundle } from '../credentials.js';
import {
  UpstreamBadResponseError,
  UpstreamError,
  type UpstreamErrorKind,
} from '../errors.js';
import { FOLLOWERS_FEATURES } from './features.js';
import { graphqlErrorsIn, kindForGraphqlErrors } from './mapping.js';
import type { QueryIdSource, UpstreamOperation } from './operations.js';

export type { UpstreamOperation } from './operations.js';

export type FetchFn = typeof fetch;

export interface UpstreamClientOptions {
  baseUrl: string;
  timeoutMs: number;
  defaultUserAgent: string;
  queryIds: QueryIdSource;
  fetchFn?: FetchFn;
}

export interface FollowersQuery {
  userId: string;
  cursor?: string;
  count: number;
}

/**
 * The two platform calls the relay replays. Implementations return the raw
 * JSON body of a 2xx response and throw {@link UpstreamError} otherwise;
 * translating the body is left to `mapping.ts`.
 */
export interface UpstreamApi {
  fetchFollowers(query: FollowersQuery, credentials: CredentialBundle): Promise<unknown>;
  removeFollower(targetFollowerId: string, credentials: CredentialBundle): Promise<unknown>;
}

// A 404 is not classified by status alone; see `UpstreamClient.notFound`
export function classifyStatus(status: number): UpstreamErrorKind {
  if (status === 401 || status === 403) return RemovalErrorKind.UPSTREAM_UNAUTHORIZED;
  if (status === 429) return RemovalErrorKind.UPSTREAM_RATE_LIMITED;
  if (status >= 500) return RemovalErrorKind.UPSTREAM_UNAVAILABLE;
  return RemovalErrorKind.UNKNOWN;
}

// Seconds until the caller may retry, from Retry-After or the platform's reset epoch
export function retryAfterFromHeaders(headers: Headers, nowMs: number = Date.now()): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(0, Math.ceil(seconds));
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, Math.ceil((date - nowMs) / 1000));
  }

  const reset = Number(headers.get('x-rate-limit-reset'));
  if (reset > 0) return Math.max(0, Math.ceil(reset - nowMs / 1000));

  return undefined;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class UpstreamClient implements UpstreamApi {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: UpstreamClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fetchFollowers(query: FollowersQuery, credentials: CredentialBundle): Promise<unknown> {
    const variables = {
      userId: query.userId,
      count: query.count,
      includePromotedContent: false,
      ...(query.cursor && { cursor: query.cursor }),
    };
    const params = new URLSearchParams({
      variables: JSON.stringify(variables),
      features: JSON.stringify(FOLLOWERS_FEATURES),
    });
    const queryId = await this.options.queryIds.resolve('Followers');
    const url = `${this.operationUrl(queryId, 'Followers')}?${params.toString()}`;

    return this.send('Followers', url, {
      method: 'GET',
      headers: this.buildHeaders(credentials),
    });
  }

  async removeFollower(targetFollowerId: string, credentials: CredentialBundle): Promise<unknown> {
    const queryId = await this.options.queryIds.resolve('RemoveFollower');
    return this.send('RemoveFollower', this.operationUrl(queryId, 'RemoveFollower'), {
      method: 'POST',
      headers: {
        ...this.buildHeaders(credentials),
        'content-type': 'application/json',
      },
      body: JSON.stringify({
        variables: { target_user_id: targetFollowerId },
        queryId,
      }),
    });
  }

  buildHeaders(credentials: CredentialBundle): Record<string, string> {
    const cookie = serializeCookies(credentials.cookieJar);
    return {
      authorization: `Bearer ${credentials.bearerToken}`,
      'x-csrf-token': credentials.csrfToken,
      'x-twitter-active-user': 'yes',
      'x-twitter-auth-type': 'OAuth2Session',
      'user-agent': credentials.userAgent || this.options.defaultUserAgent,
      ...(cookie && { cookie }),
    };
  }

  private operationUrl(queryId: string, operation: UpstreamOperation): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${queryId}/${operation}`;
  }

  /**
   * A 404 carrying GraphQL errors is about the target (gone, suspended, not a
   * follower). A bare 404 means the operation id went stale: the ids are
   * rediscovered before the error is returned, so the next call uses the new one.
   */
  private async notFound(operation: UpstreamOperation, response: Response): Promise<UpstreamError> {
    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch {
      body = undefined;
    }

    const errors = graphqlErrorsIn(body);
    if (errors.length > 0) {
      return new UpstreamError(
        kindForGraphqlErrors(errors),
        `${operation} failed with upstream status 404: ${errors[0]?.message ?? 'unknown error'}`,
        404
      );
    }

    await this.options.queryIds.refresh('not-found');
    return new UpstreamError(
      RemovalErrorKind.UPSTREAM_UNAVAILABLE,
      `${operation} operation was not found upstream; query ids refreshed`,
      404
    );
  }

  private async send(operation: UpstreamOperation, url: string, init: RequestInit): Promise<unknown> {
    const timeoutMs = this.options.timeoutMs;
    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      throw new UpstreamError(
        RemovalErrorKind.UPSTREAM_UNAVAILABLE,
        isTimeout(error)
          ? `${operation} timed out after ${timeoutMs}ms`
          : `${operation} request failed: ${describe(error)}`
      );
    }

    if (response.status === 404) {
      throw await this.notFound(operation, response);
    }

    if (!response.ok) {
      // Release the connection; the body of a failed call is not used
      await response.body?.cancel();
      const kind = classifyStatus(response.status);
      const retryAfterSeconds =
        kind === RemovalErrorKind.UPSTREAM_RATE_LIMITED
          ? retryAfterFromHeaders(response.headers)
          : undefined;
      throw new UpstreamError(
        kind,
        `${operation} failed with upstream status ${response.status}`,
        response.status,
        retryAfterSeconds
      );
    }

    try {
      return await response.json();
    } catch (error) {
      if (isTimeout(error)) {
        throw new UpstreamError(
          RemovalErrorKind.UPSTREAM_UNAVAILABLE,
          `${operation} timed out after ${timeoutMs}ms`
        );
      }
      throw new UpstreamBadResponseError(`${operation} returned a body that is not JSON`);
    }
  }
}
