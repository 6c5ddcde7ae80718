import { describe, it, expect } from 'vitest';
import { RemovalErrorKind } from '@follower-relay/shared';
import {
  toFollowerPage,
  toFollowerRecord,
  toRemovalOutcome,
  kindForGraphqlErrors,
  isTerminalCursor,
  graphqlErrorsIn,
} from './mapping.js';
import { UpstreamBadResponseError, UpstreamError } from '../errors.js';
import {
  cursorEntry,
  followersTimeline,
  testUsers,
  timelineResponse,
  userEntry,
} from '../../test/fixtures.js';

describe('upstream mapping', () => {
  describe('toFollowerPage', () => {
    it('normalizes users and returns the bottom cursor', () => {
      const raw = followersTimeline(
        [
          { id: '11', name: 'Alice', handle: 'alice', verified: true },
          { id: '12', name: 'Bot 12', handle: 'bot12' },
        ],
        '1700|1699'
      );

      expect(toFollowerPage(raw)).toEqual({
        followers: [
          {
            id: '11',
            displayName: 'Alice',
            handle: 'alice',
            avatarUrl: 'https://img.example.test/11.jpg',
            isVerified: true,
          },
          {
            id: '12',
            displayName: 'Bot 12',
            handle: 'bot12',
            avatarUrl: 'https://img.example.test/12.jpg',
            isVerified: false,
          },
        ],
        nextCursor: '1700|1699',
      });
    });

    it('drops duplicate ids within a page', () => {
      const raw = followersTimeline([{ id: '1' }, { id: '2' }, { id: '1' }], '5|4');
      expect(toFollowerPage(raw).followers.map((f) => f.id)).toEqual(['1', '2']);
    });

    it('ends the listing on the terminal cursor', () => {
      const raw = followersTimeline(testUsers(1, 3), '0|1700000000000000000');
      expect(toFollowerPage(raw).nextCursor).toBeNull();
    });

    it('ends the listing on an empty page', () => {
      const raw = followersTimeline([], '1700|1699');
      expect(toFollowerPage(raw)).toEqual({ followers: [], nextCursor: null });
    });

    it('reads timeline_v2 responses', () => {
      const raw = followersTimeline(testUsers(7, 1), '9|8');
      const v2 = {
        data: { user: { result: { timeline_v2: raw.data.user.result.timeline } } },
      };
      expect(toFollowerPage(v2).followers[0]?.id).toBe('7');
    });

    it('skips unavailable users without an id', () => {
      const raw = timelineResponse([
        {
          entryId: 'user-gone',
          content: {
            itemContent: {
              itemType: 'TimelineUser',
              user_results: { result: { __typename: 'UserUnavailable', rest_id: '' } },
            },
          },
        },
        userEntry({ id: '1' }),
        cursorEntry('Bottom', '9|8'),
      ]);
      expect(toFollowerPage(raw).followers.map((f) => f.id)).toEqual(['1']);
    });

    it('keeps a follower whose name is null', () => {
      const raw = timelineResponse([
        userEntry({ id: '1' }),
        {
          entryId: 'user-2',
          content: {
            itemContent: {
              user_results: { result: { rest_id: '2', legacy: { name: null, screen_name: 'user_2' } } },
            },
          },
        },
        userEntry({ id: '3' }),
        cursorEntry('Bottom', 'next-1'),
      ]);

      const page = toFollowerPage(raw);

      expect(page.followers.map((f) => f.id)).toEqual(['1', '2', '3']);
      expect(page.followers[1]?.displayName).toBe('user_2');
      expect(page.nextCursor).toBe('next-1');
    });

    it('skips a malformed entry and keeps the rest of the page', () => {
      const raw = timelineResponse([
        userEntry({ id: '1' }),
        { entryId: 'user-2', content: { itemContent: { user_results: { result: { rest_id: 2, legacy: 'oops' } } } } },
        userEntry({ id: '3' }),
        cursorEntry('Bottom', 'next-1'),
      ]);

      expect(toFollowerPage(raw)).toEqual({
        followers: [
          {
            id: '1',
            displayName: 'User 1',
            handle: 'user_1',
            avatarUrl: 'https://img.example.test/1.jpg',
            isVerified: false,
          },
          {
            id: '3',
            displayName: 'User 3',
            handle: 'user_3',
            avatarUrl: 'https://img.example.test/3.jpg',
            isVerified: false,
          },
        ],
        nextCursor: 'next-1',
      });
    });

    it('keeps paging when every entry on a page is malformed', () => {
      const raw = timelineResponse([
        { entryId: 'user-1', content: { itemContent: { user_results: { result: 'bad' } } } },
        cursorEntry('Bottom', '77|76'),
      ]);

      expect(toFollowerPage(raw)).toEqual({ followers: [], nextCursor: '77|76' });
    });

    it('reports an unexpected shape as a bad response', () => {
      expect(() => toFollowerPage({ data: {} })).toThrow(UpstreamBadResponseError);
      expect(() => toFollowerPage('nope')).toThrow(UpstreamBadResponseError);
    });

    it('reports a missing timeline as a bad response', () => {
      expect(() => toFollowerPage({ data: { user: { result: {} } } })).toThrow(
        'Followers response did not include a timeline'
      );
    });

    it('surfaces GraphQL auth errors as unauthorized', () => {
      try {
        toFollowerPage({ errors: [{ code: 89, message: 'Invalid or expired token.' }] });
        expect.fail('expected an upstream error');
      } catch (error) {
        expect(error).toBeInstanceOf(UpstreamError);
        expect(error).toMatchObject({
          kind: RemovalErrorKind.UPSTREAM_UNAUTHORIZED,
          statusCode: 401,
        });
      }
    });
  });

  describe('toFollowerRecord', () => {
    it('prefers the newer core and avatar fields', () => {
      expect(
        toFollowerRecord({
          rest_id: '5',
          core: { name: 'Core Name', screen_name: 'core_handle' },
          avatar: { image_url: 'https://img.example.test/core.jpg' },
          verification: { verified: true },
          legacy: { name: 'Old', screen_name: 'old', profile_image_url_https: 'old.jpg' },
        })
      ).toEqual({
        id: '5',
        displayName: 'Core Name',
        handle: 'core_handle',
        avatarUrl: 'https://img.example.test/core.jpg',
        isVerified: true,
      });
    });

    it('falls back to the handle for the display name', () => {
      expect(toFollowerRecord({ rest_id: '6', legacy: { screen_name: 'h6' } })).toEqual({
        id: '6',
        displayName: 'h6',
        handle: 'h6',
        avatarUrl: '',
        isVerified: false,
      });
    });

    it('returns null without an id', () => {
      expect(toFollowerRecord({ legacy: { screen_name: 'x' } })).toBeNull();
    });
  });

  describe('toRemovalOutcome', () => {
    it('treats a body without errors as success', () => {
      expect(
        toRemovalOutcome('42', { data: { remove_follower: { unfollow_success_reason: 'Unfollowed' } } })
      ).toEqual({ targetFollowerId: '42', succeeded: true });
    });

    it('classifies a not-found error as already removed', () => {
      expect(
        toRemovalOutcome('42', { errors: [{ code: 50, message: 'User not found.' }] })
      ).toEqual({
        targetFollowerId: '42',
        succeeded: false,
        errorKind: RemovalErrorKind.ALREADY_REMOVED,
      });
    });

    it('classifies unrecognized errors as unknown', () => {
      expect(toRemovalOutcome('42', { errors: [{ message: 'Something odd' }] })).toEqual({
        targetFollowerId: '42',
        succeeded: false,
        errorKind: RemovalErrorKind.UNKNOWN,
      });
    });

    it('classifies a non-object body as unknown', () => {
      expect(toRemovalOutcome('42', 'ok')).toEqual({
        targetFollowerId: '42',
        succeeded: false,
        errorKind: RemovalErrorKind.UNKNOWN,
      });
    });
  });

  describe('kindForGraphqlErrors', () => {
    it('maps rate limit codes', () => {
      expect(kindForGraphqlErrors([{ code: 88 }])).toBe(RemovalErrorKind.UPSTREAM_RATE_LIMITED);
    });

    it('maps auth codes', () => {
      expect(kindForGraphqlErrors([{ code: 353 }])).toBe(RemovalErrorKind.UPSTREAM_UNAUTHORIZED);
    });

    it('matches "no longer follows" messages', () => {
      expect(kindForGraphqlErrors([{ message: 'This user is not following you' }])).toBe(
        RemovalErrorKind.ALREADY_REMOVED
      );
    });
  });

  describe('graphqlErrorsIn', () => {
    it('returns the errors of a GraphQL body', () => {
      expect(graphqlErrorsIn({ errors: [{ code: 34, message: 'Sorry, that page does not exist' }] })).toEqual([
        { code: 34, message: 'Sorry, that page does not exist' },
      ]);
    });

    it('returns nothing for other bodies', () => {
      expect(graphqlErrorsIn({ data: {} })).toEqual([]);
      expect(graphqlErrorsIn('<html>')).toEqual([]);
      expect(graphqlErrorsIn(undefined)).toEqual([]);
    });
  });

  describe('isTerminalCursor', () => {
    it('recognizes the end marker', () => {
      expect(isTerminalCursor('0|1790000000000000000')).toBe(true);
      expect(isTerminalCursor('1790000000000000001|1790000000000000000')).toBe(false);
    });
  });
});
