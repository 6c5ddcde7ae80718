import type { CredentialFields } from '@follower-relay/shared';
import { InvalidCredentialsError } from './errors.js';

/**
 * Authorization material copied by the user from their own browser session.
 *
 * A bundle is built for one incoming request and handed down the call chain
 * explicitly. It is never stored on a module, a client instance or a log line.
 */
export interface CredentialBundle {
  bearerToken: string;
  csrfToken: string;
  cookieJar: Record<string, string>;
  userAgent?: string;
}

// Header names the browser client may use instead of body fields
export const CREDENTIAL_HEADERS = {
  authorization: 'authorization',
  csrfToken: 'x-csrf-token',
  cookies: 'x-upstream-cookie',
} as const;

// Session cookie that mirrors the CSRF token
const CSRF_COOKIE = 'ct0';
// Session cookie carrying the signed-in user id as `u=<id>`
const USER_ID_COOKIE = 'twid';

type HeaderLookup = (name: string) => string | undefined;

export function parseCookieString(cookieString: string | undefined): Record<string, string> {
  const jar: Record<string, string> = {};
  if (!cookieString) return jar;

  for (const part of cookieString.split(';')) {
    const separator = part.indexOf('=');
    if (separator <= 0) continue;
    const name = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (name) jar[name] = value;
  }
  return jar;
}

export function serializeCookies(cookieJar: Record<string, string>): string {
  return Object.entries(cookieJar)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

function stripBearerPrefix(value: string | undefined): string {
  if (!value) return '';
  return value.replace(/^Bearer\s+/i, '').trim();
}

/**
 * Assemble a bundle from body fields, falling back to headers.
 * Body fields win; the CSRF token falls back to the `ct0` cookie.
 */
export function buildCredentialBundle(
  fields: CredentialFields | undefined,
  header: HeaderLookup
): CredentialBundle {
  const cookies = fields?.cookies;
  const cookieJar =
    typeof cookies === 'object'
      ? { ...cookies }
      : parseCookieString(cookies ?? header(CREDENTIAL_HEADERS.cookies));

  const bearerToken = stripBearerPrefix(
    fields?.bearerToken ?? header(CREDENTIAL_HEADERS.authorization)
  );
  const csrfToken = (
    fields?.csrfToken ??
    header(CREDENTIAL_HEADERS.csrfToken) ??
    cookieJar[CSRF_COOKIE] ??
    ''
  ).trim();
  const userAgent = header('user-agent');

  return {
    bearerToken,
    csrfToken,
    cookieJar,
    ...(userAgent && { userAgent }),
  };
}

// Header-safe shapes: tokens are visible ASCII, cookies must not split or break the Cookie header
const TOKEN_PATTERN = /^[\x21-\x7e]+$/;
const COOKIE_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const COOKIE_VALUE_PATTERN = /^[\x20-\x3a\x3c-\x7e]*$/;
const HEADER_VALUE_PATTERN = /^[\x20-\x7e]+$/;

function cookiesWellFormed(cookieJar: Record<string, string>): boolean {
  return Object.entries(cookieJar).every(
    ([name, value]) => COOKIE_NAME_PATTERN.test(name) && COOKIE_VALUE_PATTERN.test(value)
  );
}

/**
 * Fail fast before any upstream call is made. Values that could not be sent
 * as HTTP header values are rejected here rather than by the upstream fetch.
 * Offending values are named, never echoed.
 */
export function assertWellFormed(credentials: CredentialBundle): void {
  const missing: string[] = [];
  const malformed: string[] = [];

  for (const field of ['bearerToken', 'csrfToken'] as const) {
    const value = credentials[field];
    if (!value) missing.push(field);
    else if (!TOKEN_PATTERN.test(value)) malformed.push(field);
  }
  if (!cookiesWellFormed(credentials.cookieJar)) malformed.push('cookies');
  if (credentials.userAgent !== undefined && !HEADER_VALUE_PATTERN.test(credentials.userAgent)) {
    malformed.push('userAgent');
  }

  if (missing.length > 0 || malformed.length > 0) {
    throw new InvalidCredentialsError(missing, malformed);
  }
}

// The platform stores the signed-in user as `twid=u%3D<id>`
export function userIdFromCookies(cookieJar: Record<string, string>): string | undefined {
  const raw = cookieJar[USER_ID_COOKIE];
  if (!raw) return undefined;

  let decoded: string;
  try {
    decoded = decodeURIComponent(raw);
  } catch {
    decoded = raw;
  }
  const match = /^"?u=(\d+)"?$/.exec(decoded);
  return match?.[1];
}
