import { z } from 'zod';
import {
  RemovalErrorKind,
  type FollowerPage,
  type FollowerRecord,
  type RemovalOutcome,
} from '@follower-relay/shared';
import { UpstreamBadResponseError, UpstreamError, type UpstreamErrorKind } from '../errors.js';

// The only place that knows the platform's response shapes. Everything past
// this module works with FollowerPage and RemovalOutcome.

const graphqlErrorSchema = z.object({
  message: z.string().optional(),
  code: z.number().optional(),
});

export type GraphqlError = z.infer<typeof graphqlErrorSchema>;

// Users are described by `legacy` on older responses and `core`/`avatar` on newer ones.
// Descriptive fields come back as null often enough that null is treated as absent.
const userResultSchema = z.object({
  __typename: z.string().nullish(),
  rest_id: z.string().nullish(),
  is_blue_verified: z.boolean().nullish(),
  core: z
    .object({
      name: z.string().nullish(),
      screen_name: z.string().nullish(),
    })
    .nullish(),
  avatar: z.object({ image_url: z.string().nullish() }).nullish(),
  verification: z.object({ verified: z.boolean().nullish() }).nullish(),
  legacy: z
    .object({
      name: z.string().nullish(),
      screen_name: z.string().nullish(),
      profile_image_url_https: z.string().nullish(),
      verified: z.boolean().nullish(),
    })
    .nullish(),
});

type UserResult = z.infer<typeof userResultSchema>;

const cursorEntrySchema = z.object({
  content: z.object({
    cursorType: z.string(),
    value: z.string(),
  }),
});

const userEntrySchema = z.object({
  content: z.object({
    itemContent: z.object({
      user_results: z.object({ result: userResultSchema }),
    }),
  }),
});

// Entries stay unparsed here so that one malformed entry cannot sink the page
const timelineSchema = z.object({
  instructions: z.array(
    z.object({
      entries: z.array(z.unknown()).nullish(),
    })
  ),
});

const followersResponseSchema = z.object({
  data: z.object({
    user: z.object({
      result: z.object({
        timeline: z.object({ timeline: timelineSchema }).nullish(),
        timeline_v2: z.object({ timeline: timelineSchema }).nullish(),
      }),
    }),
  }),
});

const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphqlErrorSchema).optional(),
});

// Platform error codes seen on GraphQL error bodies
const RATE_LIMIT_CODES = new Set([88]);
const UNAUTHORIZED_CODES = new Set([32, 89, 239, 353]);
const GONE_CODES = new Set([34, 50, 63, 108]);
const GONE_MESSAGE = /not found|does not exist|not following|no longer follow/i;

export function kindForGraphqlErrors(errors: readonly GraphqlError[]): UpstreamErrorKind {
  const codes = errors.map((error) => error.code).filter((code): code is number => code !== undefined);

  if (codes.some((code) => RATE_LIMIT_CODES.has(code))) return RemovalErrorKind.UPSTREAM_RATE_LIMITED;
  if (codes.some((code) => UNAUTHORIZED_CODES.has(code))) return RemovalErrorKind.UPSTREAM_UNAUTHORIZED;
  if (
    codes.some((code) => GONE_CODES.has(code)) ||
    errors.some((error) => error.message !== undefined && GONE_MESSAGE.test(error.message))
  ) {
    return RemovalErrorKind.ALREADY_REMOVED;
  }
  return RemovalErrorKind.UNKNOWN;
}

// GraphQL errors carried by a body, if it has any
export function graphqlErrorsIn(raw: unknown): GraphqlError[] {
  const envelope = graphqlEnvelopeSchema.safeParse(raw);
  return envelope.success ? envelope.data.errors ?? [] : [];
}

// A cursor the platform hands out once the listing is exhausted
export function isTerminalCursor(cursor: string): boolean {
  return cursor.startsWith('0|');
}

export function toFollowerRecord(user: UserResult): FollowerRecord | null {
  if (!user.rest_id) return null;

  const handle = user.core?.screen_name ?? user.legacy?.screen_name ?? '';
  return {
    id: user.rest_id,
    displayName: user.core?.name ?? user.legacy?.name ?? handle,
    handle,
    avatarUrl: user.avatar?.image_url ?? user.legacy?.profile_image_url_https ?? '',
    isVerified: Boolean(user.is_blue_verified || user.legacy?.verified || user.verification?.verified),
  };
}

function failureFromEnvelope(raw: unknown, operation: string): UpstreamError {
  const errors = graphqlErrorsIn(raw);
  if (errors.length === 0) {
    return new UpstreamBadResponseError(`${operation} response did not have the expected shape`);
  }

  const kind = kindForGraphqlErrors(errors);
  const message = errors[0]?.message ?? 'unknown error';
  return kind === RemovalErrorKind.UNKNOWN || kind === RemovalErrorKind.ALREADY_REMOVED
    ? new UpstreamBadResponseError(`${operation} returned errors: ${message}`)
    : new UpstreamError(kind, `${operation} returned errors: ${message}`);
}

/**
 * Translate a Followers timeline into one page of followers.
 *
 * Entries are read one at a time: an entry that does not have the expected
 * shape is skipped and the rest of the page is kept. Ids are de-duplicated
 * within the page. The bottom cursor is passed through untouched; it becomes
 * `null` when the page carries no item entries or the cursor is the
 * platform's end marker.
 */
export function toFollowerPage(raw: unknown): FollowerPage {
  const parsed = followersResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw failureFromEnvelope(raw, 'Followers');
  }

  const result = parsed.data.data.user.result;
  const timeline = result.timeline?.timeline ?? result.timeline_v2?.timeline;
  if (!timeline) {
    throw new UpstreamBadResponseError('Followers response did not include a timeline');
  }

  const followers: FollowerRecord[] = [];
  const seen = new Set<string>();
  let itemEntries = 0;
  let bottomCursor: string | undefined;

  for (const instruction of timeline.instructions) {
    for (const entry of instruction.entries ?? []) {
      const cursor = cursorEntrySchema.safeParse(entry);
      if (cursor.success) {
        if (cursor.data.content.cursorType === 'Bottom') {
          bottomCursor = cursor.data.content.value;
        }
        continue;
      }

      itemEntries += 1;
      const item = userEntrySchema.safeParse(entry);
      const record = item.success
        ? toFollowerRecord(item.data.content.itemContent.user_results.result)
        : null;
      if (!record || seen.has(record.id)) continue;

      seen.add(record.id);
      followers.push(record);
    }
  }

  const nextCursor =
    itemEntries > 0 && bottomCursor && !isTerminalCursor(bottomCursor) ? bottomCursor : null;

  return { followers, nextCursor };
}

// A 2xx RemoveFollower body: success unless it carries GraphQL errors
export function toRemovalOutcome(targetFollowerId: string, raw: unknown): RemovalOutcome {
  const parsed = graphqlEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return { targetFollowerId, succeeded: false, errorKind: RemovalErrorKind.UNKNOWN };
  }

  const errors = parsed.data.errors ?? [];
  if (errors.length === 0) {
    return { targetFollowerId, succeeded: true };
  }
  return { targetFollowerId, succeeded: false, errorKind: kindForGraphqlErrors(errors) };
}
