import { AuditSinkType } from '@follower-relay/shared';

function intFromEnv(name: string, fallback: number, min = 1): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function listFromEnv(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function auditSinkFromEnv(): AuditSinkType {
  return process.env.AUDIT_SINK === AuditSinkType.DYNAMODB
    ? AuditSinkType.DYNAMODB
    : AuditSinkType.FILE;
}

// Environment configuration
export const config = {
  // AWS Region (dynamodb audit sink)
  region: process.env.AWS_REGION || 'us-east-1',

  server: {
    host: process.env.HOST || '0.0.0.0',
    port: intFromEnv('PORT', 5000),
  },

  // PEM files; the relay never listens without them
  tls: {
    keyPath: process.env.TLS_KEY_PATH || '',
    certPath: process.env.TLS_CERT_PATH || '',
  },

  cors: {
    allowedOrigins: listFromEnv('ALLOWED_ORIGINS'),
  },

  relay: {
    maxBatchSize: intFromEnv('MAX_BATCH_SIZE', 50),
    defaultPageSize: 20,
    maxPageSize: 100,
  },

  upstream: {
    baseUrl: process.env.UPSTREAM_BASE_URL || 'https://x.com/i/api/graphql',
    // Page whose main script declares the GraphQL operation ids
    webUrl: process.env.UPSTREAM_WEB_URL || 'https://x.com/?mx=1',
    // Seeds only; the ids are rediscovered while the relay runs
    queryIds: {
      Followers: process.env.UPSTREAM_FOLLOWERS_QUERY_ID || '',
      RemoveFollower: process.env.UPSTREAM_REMOVE_FOLLOWER_QUERY_ID || '',
    },
    // 0 turns the schedule off; refreshes on demand still happen
    queryIdRefreshIntervalMs: intFromEnv('QUERY_ID_REFRESH_INTERVAL_MS', 6 * 60 * 60 * 1000, 0),
    queryIdRefreshCooldownMs: 60_000,
    timeoutMs: intFromEnv('UPSTREAM_TIMEOUT_MS', 15_000),
    defaultUserAgent:
      process.env.UPSTREAM_USER_AGENT ||
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  },

  audit: {
    sink: auditSinkFromEnv(),
    filePath: process.env.AUDIT_LOG_PATH || './data/audit/removals.jsonl',
    table: process.env.AUDIT_TABLE || 'FollowerRelayAudit',
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
