import type { FollowerPage } from '@follower-relay/shared';
import type { CredentialBundle } from '../credentials.js';
import type { UpstreamApi } from '../upstream/client.js';
import { toFollowerPage } from '../upstream/mapping.js';

export interface ListFollowersQuery {
  userId: string;
  cursor?: string | null;
  count: number;
}

/**
 * Fetch one page of the user's followers.
 *
 * Stateless between pages: the caller resumes by sending back `nextCursor`,
 * which is forwarded to the platform exactly as it was received. Any upstream
 * failure aborts the call, since a partial page without its cursor cannot be
 * resumed.
 */
export async function listFollowers(
  upstream: UpstreamApi,
  query: ListFollowersQuery,
  credentials: CredentialBundle
): Promise<FollowerPage> {
  const raw = await upstream.fetchFollowers(
    {
      userId: query.userId,
      count: query.count,
      ...(query.cursor && { cursor: query.cursor }),
    },
    credentials
  );
  return toFollowerPage(raw);
}
