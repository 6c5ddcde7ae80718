import { vi } from 'vitest';
import type { AuditEntry } from '@follower-relay/shared';
import type { CredentialBundle } from '../lib/credentials.js';
import type { AuditSink } from '../lib/services/audit.js';
import type { FollowersQuery, UpstreamApi } from '../lib/upstream/client.js';

export const testCredentials: CredentialBundle = {
  bearerToken: 'test-bearer',
  csrfToken: 'test-csrf',
  cookieJar: { auth_token: 'test-session', ct0: 'test-csrf', twid: 'u%3D1000' },
};

export interface TestUser {
  id: string;
  name?: string;
  handle?: string;
  verified?: boolean;
}

export function userEntry(user: TestUser, index = 0) {
  return {
    entryId: `user-${user.id}`,
    sortIndex: String(1000 - index),
    content: {
      entryType: 'TimelineTimelineItem',
      itemContent: {
        itemType: 'TimelineUser',
        user_results: {
          result: {
            __typename: 'User',
            rest_id: user.id,
            is_blue_verified: user.verified ?? false,
            legacy: {
              name: user.name ?? `User ${user.id}`,
              screen_name: user.handle ?? `user_${user.id}`,
              profile_image_url_https: `https://img.example.test/${user.id}.jpg`,
            },
          },
        },
      },
    },
  };
}

export function cursorEntry(cursorType: 'Top' | 'Bottom', value: string) {
  return {
    entryId: `cursor-${cursorType.toLowerCase()}-${value}`,
    content: {
      entryType: 'TimelineTimelineCursor',
      value,
      cursorType,
    },
  };
}

// Followers response in the shape the platform returns it, around raw timeline entries
export function timelineResponse(entries: unknown[]) {
  return {
    data: {
      user: {
        result: {
          __typename: 'User',
          timeline: {
            timeline: {
              instructions: [
                { type: 'TimelineClearCache' },
                { type: 'TimelineAddEntries', entries },
              ],
            },
          },
        },
      },
    },
  };
}

export function followersTimeline(users: TestUser[], bottomCursor: string) {
  return timelineResponse([
    ...users.map((user, index) => userEntry(user, index)),
    cursorEntry('Bottom', bottomCursor),
    cursorEntry('Top', '-1|1'),
  ]);
}

export function testUsers(from: number, count: number): TestUser[] {
  return Array.from({ length: count }, (_, i) => ({ id: String(from + i) }));
}

/**
 * In-memory platform. Followers are served from `pages` keyed by cursor
 * ('' for the first page); removals answer per target id.
 */
export class FakeUpstream implements UpstreamApi {
  readonly followerCalls: Array<{ query: FollowersQuery; credentials: CredentialBundle }> = [];
  readonly removeCalls: string[] = [];

  constructor(
    private readonly pages: Record<string, unknown> = {},
    private readonly removals: Record<string, () => unknown> = {}
  ) {}

  fetchFollowers = vi.fn(async (query: FollowersQuery, credentials: CredentialBundle) => {
    this.followerCalls.push({ query, credentials });
    const page = this.pages[query.cursor ?? ''];
    if (page instanceof Error) throw page;
    return page;
  });

  removeFollower = vi.fn(async (targetFollowerId: string, _credentials: CredentialBundle) => {
    this.removeCalls.push(targetFollowerId);
    const answer = this.removals[targetFollowerId];
    return answer ? answer() : { data: { remove_follower: { unfollow_success_reason: 'Unfollowed' } } };
  });
}

export class MemoryAuditSink implements AuditSink {
  readonly name = 'file';
  readonly entries: AuditEntry[] = [];

  async write(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export class FailingAuditSink implements AuditSink {
  readonly name = 'dynamodb';
  attempts = 0;

  async write(_entry: AuditEntry): Promise<void> {
    this.attempts += 1;
    throw new Error('audit store unreachable');
  }
}
