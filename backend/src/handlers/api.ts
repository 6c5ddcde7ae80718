import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import { ulid } from 'ulid';
import { ZodError } from 'zod';
import {
  ErrorCode,
  type ApiError,
  type HealthResponse,
  type ListFollowersResponse,
  type RemoveFollowersResponse,
} from '@follower-relay/shared';
import {
  CREDENTIAL_HEADERS,
  assertWellFormed,
  buildCredentialBundle,
  userIdFromCookies,
  type CredentialBundle,
} from '../lib/credentials.js';
import { AppError, UpstreamError, ValidationError } from '../lib/errors.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';
import { listFollowersSchema, removeFollowersSchema } from '../lib/validation.js';
import type { UpstreamApi } from '../lib/upstream/client.js';
import type { AuditLog } from '../lib/services/audit.js';

// Services
import * as followerService from '../lib/services/followers.js';
import * as removalService from '../lib/services/removals.js';

export interface AppDeps {
  upstream: UpstreamApi;
  auditLog: AuditLog;
  maxBatchSize: number;
  allowedOrigins: readonly string[];
  version: string;
  // Parent of the per-request loggers
  logger?: Logger;
}

type AppEnv = {
  Variables: {
    requestId: string;
    logger: Logger;
  };
};

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): Response {
  return new Response(JSON.stringify(body), {
    status: statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  });
}

// Parse JSON body
async function parseBody(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();
  if (!text) {
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

function credentialsFrom(
  c: Context<AppEnv>,
  fields: Parameters<typeof buildCredentialBundle>[0]
): CredentialBundle {
  const credentials = buildCredentialBundle(fields, (name) => c.req.header(name));
  assertWellFormed(credentials);
  return credentials;
}

// The session cookie names the signed-in user; a body userId must agree with it
function resolveActingUserId(bodyUserId: string | undefined, credentials: CredentialBundle): string {
  const sessionUserId = userIdFromCookies(credentials.cookieJar);
  if (bodyUserId && sessionUserId && bodyUserId !== sessionUserId) {
    throw new ValidationError('userId does not match the session user');
  }
  const userId = bodyUserId ?? sessionUserId;
  if (!userId) {
    throw new ValidationError('userId is required when the session cookies do not identify the user');
  }
  return userId;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use('*', secureHeaders());

  if (deps.allowedOrigins.length > 0) {
    app.use(
      '/api/*',
      cors({
        origin: [...deps.allowedOrigins],
        allowMethods: ['POST', 'OPTIONS'],
        allowHeaders: [
          'Content-Type',
          'X-Request-Id',
          CREDENTIAL_HEADERS.authorization,
          CREDENTIAL_HEADERS.csrfToken,
          CREDENTIAL_HEADERS.cookies,
        ],
        exposeHeaders: ['X-Request-Id', 'Retry-After'],
      })
    );
  }

  // Request context
  app.use('*', async (c, next) => {
    const requestId = c.req.header('x-request-id') || ulid();
    const logger = createRequestLogger(requestId, undefined, deps.logger);
    c.set('requestId', requestId);
    c.set('logger', logger);

    logger.info({ method: c.req.method, path: c.req.path }, 'Request received');
    await next();
    c.res.headers.set('X-Request-Id', requestId);
    logger.info({ statusCode: c.res.status }, 'Request completed');
  });

  app.get('/health', () => {
    const response: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: deps.version,
    };
    return jsonResponse(200, response);
  });

  app.post('/api/followers/list', async (c) => {
    const input = listFollowersSchema.parse(await parseBody(c));
    const credentials = credentialsFrom(c, input.credentials);
    const userId = resolveActingUserId(input.userId, credentials);

    const page: ListFollowersResponse = await followerService.listFollowers(
      deps.upstream,
      { userId, cursor: input.cursor, count: input.count },
      credentials
    );

    c.get('logger').info(
      { userId, returned: page.followers.length, complete: page.nextCursor === null },
      'Followers listed'
    );
    return jsonResponse(200, page);
  });

  app.post('/api/followers/remove', async (c) => {
    const input = removeFollowersSchema.parse(await parseBody(c));
    const credentials = credentialsFrom(c, input.credentials);
    const actingUserId = resolveActingUserId(input.userId, credentials);
    // Rejected batches never reach the platform
    const batch = removalService.buildRemovalBatch(actingUserId, input.targets, deps.maxBatchSize);

    const logger = c.get('logger');
    const outcomes = await removalService.removeFollowers(
      {
        upstream: deps.upstream,
        auditLog: deps.auditLog,
        logger,
        requestId: c.get('requestId'),
      },
      batch,
      credentials,
      { signal: c.req.raw.signal }
    );

    const failed = outcomes.filter((outcome) => !outcome.succeeded).length;
    logger.info({ actingUserId, attempted: outcomes.length, failed }, 'Removal batch completed');

    const response: RemoveFollowersResponse = { outcomes };
    return jsonResponse(failed > 0 ? 207 : 200, response);
  });

  app.notFound((c) => {
    const response: ApiError = {
      error: {
        code: ErrorCode.NOT_FOUND,
        message: `Route not found: ${c.req.method} ${c.req.path}`,
        requestId: c.get('requestId'),
      },
    };
    return jsonResponse(404, response);
  });

  app.onError((error, c) => {
    const requestId = c.get('requestId');
    const logger = c.get('logger');

    if (error instanceof UpstreamError) {
      logger.warn(
        { error: error.message, kind: error.kind, upstreamStatus: error.upstreamStatus },
        'Upstream error'
      );
      const headers: Record<string, string> =
        error.retryAfterSeconds !== undefined
          ? { 'Retry-After': String(error.retryAfterSeconds) }
          : {};
      return jsonResponse(error.statusCode, error.toApiError(requestId), headers);
    }

    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      return jsonResponse(error.statusCode, error.toApiError(requestId));
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ issues: error.issues }, 'Validation error');
      const response: ApiError = {
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Validation failed',
          requestId,
          details: { issues: error.issues },
        },
      };
      return jsonResponse(400, response);
    }

    // Unknown errors
    logger.error({ err: error }, 'Unexpected error');
    const response: ApiError = {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        requestId,
      },
    };
    return jsonResponse(500, response);
  });

  return app;
}
