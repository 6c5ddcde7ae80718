import { readFileSync } from 'node:fs';
import { createServer } from 'node:https';
import { serve } from '@hono/node-server';
import { createApp } from './handlers/api.js';
import { config } from './lib/config.js';
import { logger } from './lib/logger.js';
import { AuditLog, createAuditSink } from './lib/services/audit.js';
import { UpstreamClient } from './lib/upstream/client.js';
import { QueryIdRegistry } from './lib/upstream/operations.js';

// Settings the relay cannot run without
export function missingSettings(): string[] {
  const required: Array<[string, string]> = [
    ['TLS_KEY_PATH', config.tls.keyPath],
    ['TLS_CERT_PATH', config.tls.certPath],
  ];
  return required.filter(([, value]) => !value).map(([name]) => name);
}

export function start() {
  const missing = missingSettings();
  if (missing.length > 0) {
    // There is no plaintext fallback: bearer tokens only ever travel over TLS
    throw new Error(`Missing required settings: ${missing.join(', ')}`);
  }

  const queryIds = new QueryIdRegistry(config.upstream.queryIds, {
    webUrl: config.upstream.webUrl,
    userAgent: config.upstream.defaultUserAgent,
    timeoutMs: config.upstream.timeoutMs,
    cooldownMs: config.upstream.queryIdRefreshCooldownMs,
  });
  // Seeded ids may already be stale; refresh never rejects
  void queryIds.refresh('startup');
  if (config.upstream.queryIdRefreshIntervalMs > 0) {
    queryIds.startSchedule(config.upstream.queryIdRefreshIntervalMs);
  }

  const app = createApp({
    upstream: new UpstreamClient({
      baseUrl: config.upstream.baseUrl,
      timeoutMs: config.upstream.timeoutMs,
      defaultUserAgent: config.upstream.defaultUserAgent,
      queryIds,
    }),
    auditLog: new AuditLog(createAuditSink(config.audit)),
    maxBatchSize: config.relay.maxBatchSize,
    allowedOrigins: config.cors.allowedOrigins,
    version: config.version,
  });

  const server = serve(
    {
      fetch: app.fetch,
      hostname: config.server.host,
      port: config.server.port,
      createServer,
      serverOptions: {
        key: readFileSync(config.tls.keyPath),
        cert: readFileSync(config.tls.certPath),
      },
    },
    (info) => {
      logger.info(
        {
          address: info.address,
          port: info.port,
          auditSink: config.audit.sink,
          maxBatchSize: config.relay.maxBatchSize,
          queryIdRefreshIntervalMs: config.upstream.queryIdRefreshIntervalMs,
        },
        'Follower relay listening over TLS'
      );
    }
  );

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    queryIds.stop();
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, 'Server did not close cleanly');
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return server;
}

try {
  start();
} catch (error) {
  logger.fatal({ err: error }, 'Follower relay failed to start');
  process.exit(1);
}
