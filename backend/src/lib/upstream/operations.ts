import { RemovalErrorKind } from '@follower-relay/shared';
import { UpstreamError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';

export const UPSTREAM_OPERATIONS = ['Followers', 'RemoveFollower'] as const;
export type UpstreamOperation = (typeof UPSTREAM_OPERATIONS)[number];

export type QueryIds = Record<UpstreamOperation, string>;

export type RefreshReason = 'startup' | 'scheduled' | 'missing' | 'not-found';

/**
 * Where the upstream client gets GraphQL operation ids from. The platform
 * rotates them with every web app release.
 */
export interface QueryIdSource {
  resolve(operation: UpstreamOperation): Promise<string>;
  // Resolves to whether every operation id is now known; never rejects
  refresh(reason: RefreshReason): Promise<boolean>;
}

type FetchFn = typeof fetch;

export interface QueryIdRegistryOptions {
  // Web app page that links the main script bundle
  webUrl: string;
  userAgent: string;
  timeoutMs: number;
  // Minimum gap between on-demand refreshes
  cooldownMs: number;
  fetchFn?: FetchFn;
  logger?: Logger;
  now?: () => number;
}

const QUERY_ID = '[A-Za-z0-9_-]{10,}';
const MAIN_SCRIPT = /(?:src|href)=["']([^"']*\/main\.[^"'/]+\.js)["']/g;

// Absolute URLs of the main script bundle linked from the web app page
export function extractMainScriptUrls(html: string, pageUrl: string): string[] {
  const urls = new Set<string>();
  for (const match of html.matchAll(MAIN_SCRIPT)) {
    const src = match[1];
    if (src && URL.canParse(src, pageUrl)) {
      urls.add(new URL(src, pageUrl).toString());
    }
  }
  return [...urls];
}

function queryIdFor(script: string, operation: UpstreamOperation): string | undefined {
  const queryIdKey = `"?queryId"?\\s*:\\s*"(${QUERY_ID})"`;
  const nameKey = `"?operationName"?\\s*:\\s*"${operation}"`;
  const patterns = [
    new RegExp(`${queryIdKey}\\s*,\\s*${nameKey}`),
    new RegExp(`${nameKey}\\s*,\\s*${queryIdKey}`),
  ];
  for (const pattern of patterns) {
    const match = pattern.exec(script);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

/**
 * Operation ids found in a script bundle. The bundle declares each
 * operation as an object literal such as
 * `{queryId:"abc123...",operationName:"Followers",operationType:"query"}`.
 */
export function extractQueryIds(script: string): Partial<QueryIds> {
  const found: Partial<QueryIds> = {};
  for (const operation of UPSTREAM_OPERATIONS) {
    const queryId = queryIdFor(script, operation);
    if (queryId) found[operation] = queryId;
  }
  return found;
}

/**
 * Current operation ids, seeded from configuration and rediscovered from the
 * platform's web app: on a schedule, when an id is unknown, and when the
 * platform answers 404 for an operation.
 *
 * Concurrent refreshes share one discovery. On-demand refreshes inside the
 * cooldown are skipped so a burst of 404s costs one round of page fetches.
 */
export class QueryIdRegistry implements QueryIdSource {
  private readonly ids: Partial<QueryIds> = {};
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly now: () => number;
  private inFlight: Promise<boolean> | null = null;
  private lastAttemptAt = Number.NEGATIVE_INFINITY;
  private timer: NodeJS.Timeout | undefined;

  constructor(
    seed: Partial<QueryIds>,
    private readonly options: QueryIdRegistryOptions
  ) {
    for (const operation of UPSTREAM_OPERATIONS) {
      const queryId = seed[operation];
      if (queryId) this.ids[operation] = queryId;
    }
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? rootLogger;
    this.now = options.now ?? Date.now;
  }

  current(operation: UpstreamOperation): string | undefined {
    return this.ids[operation];
  }

  async resolve(operation: UpstreamOperation): Promise<string> {
    if (!this.ids[operation]) {
      await this.refresh('missing');
    }
    const queryId = this.ids[operation];
    if (!queryId) {
      throw new UpstreamError(
        RemovalErrorKind.UPSTREAM_UNAVAILABLE,
        `No query id is known for ${operation}`
      );
    }
    return queryId;
  }

  refresh(reason: RefreshReason): Promise<boolean> {
    if (this.inFlight) return this.inFlight;

    const now = this.now();
    const onDemand = reason === 'missing' || reason === 'not-found';
    if (onDemand && now - this.lastAttemptAt < this.options.cooldownMs) {
      return Promise.resolve(false);
    }
    this.lastAttemptAt = now;

    this.inFlight = this.discoverAndApply(reason).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  startSchedule(intervalMs: number): void {
    this.stop();
    this.timer = setInterval(() => {
      void this.refresh('scheduled');
    }, intervalMs);
    // The schedule alone never keeps the process alive
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  private async discoverAndApply(reason: RefreshReason): Promise<boolean> {
    let discovered: Partial<QueryIds>;
    try {
      discovered = await this.discover();
    } catch (error) {
      this.logger.error({ err: error, reason }, 'Query id refresh failed');
      return false;
    }

    const changed: UpstreamOperation[] = [];
    for (const operation of UPSTREAM_OPERATIONS) {
      const queryId = discovered[operation];
      if (queryId && queryId !== this.ids[operation]) {
        this.ids[operation] = queryId;
        changed.push(operation);
      }
    }

    const missing = UPSTREAM_OPERATIONS.filter((operation) => !discovered[operation]);
    if (missing.length > 0) {
      this.logger.warn({ reason, missing }, 'Query id refresh did not find every operation');
    }
    this.logger.info({ reason, queryIds: { ...this.ids }, changed }, 'Query ids refreshed');
    return UPSTREAM_OPERATIONS.every((operation) => this.ids[operation]);
  }

  private async discover(): Promise<Partial<QueryIds>> {
    const html = await this.fetchText(this.options.webUrl);
    const scripts = extractMainScriptUrls(html, this.options.webUrl);
    if (scripts.length === 0) {
      throw new Error('Web app page did not link a main script');
    }

    const found: Partial<QueryIds> = {};
    for (const scriptUrl of scripts) {
      Object.assign(found, extractQueryIds(await this.fetchText(scriptUrl)));
      if (UPSTREAM_OPERATIONS.every((operation) => found[operation])) break;
    }
    return found;
  }

  private async fetchText(url: string): Promise<string> {
    const response = await this.fetchFn(url, {
      headers: { 'user-agent': this.options.userAgent, accept: '*/*' },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw new Error(`GET ${url} answered ${response.status}`);
    }
    return response.text();
  }
}
