import { openDatabase, type DatabaseHandle } from '../src/store/db.js';
import { SqliteCredentialStore, type CredentialFields } from '../src/store/credentialStore.js';
import { OAuthClient, OAuthSession, googleOAuthConfig, o365OAuthConfig } from '../src/providers/oauth.js';
import type { AccountIdentity } from '../src/model.js';

export function jsonResponse(obj: unknown, status = 200): Response {
  return new Response(JSON.stringify(obj), { status, headers: { 'content-type': 'application/json' } });
}

export interface RecordedCall {
  method: string;
  url: string;
  body?: string;
  headers: Headers;
}

/**
 * Fetch stub that records every call and answers from `handler`.
 * An unmatched call gets a 418 so tests fail loudly.
 */
export function stubFetch(handler: (call: RecordedCall) => Response | undefined) {
  const calls: RecordedCall[] = [];
  const fetcher: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const call: RecordedCall = {
      method: init?.method ?? 'GET',
      url,
      body: typeof init?.body === 'string' ? init.body : undefined,
      headers: new Headers(init?.headers),
    };
    calls.push(call);
    return handler(call) ?? new Response(`no route for ${call.method} ${url}`, { status: 418 });
  };
  return { fetcher, calls };
}

/** Clock that only moves when told to. */
export function manualClock(startIso: string) {
  let t = new Date(startIso).getTime();
  return {
    now: () => new Date(t),
    advance(ms: number) {
      t += ms;
    },
  };
}

/** Clock that moves one second per reading, so creation order is stable. */
export function tickingClock(startIso: string) {
  let t = new Date(startIso).getTime();
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

export function memoryDb(): DatabaseHandle {
  return openDatabase(':memory:');
}

export const MINUTE = 60_000;

export const oauthFields = (overrides: CredentialFields = {}): CredentialFields => ({
  accessToken: 'access-1',
  refreshToken: 'refresh-1',
  tokenUri: 'https://oauth2.googleapis.com/token',
  clientId: 'client-id',
  clientSecret: 'test-secret',
  scopes: ['openid', 'email'],
  expiresAt: '2099-01-01T00:00:00.000Z',
  ...overrides,
});

export const TEST_NOW = new Date('2026-03-01T12:00:00.000Z');

/**
 * Credential store holding a valid OAuth credential for `identity` (stored
 * under its calendar vendor), and a session that talks to `handler`.
 */
export async function oauthAccount(
  vendor: 'google' | 'o365',
  identity: AccountIdentity,
  handler: (call: RecordedCall) => Response | undefined,
) {
  const handle = memoryDb();
  const store = new SqliteCredentialStore(handle.db, { now: () => TEST_NOW });
  const { fetcher, calls } = stubFetch(handler);
  const settings = {
    clientId: 'client-id',
    clientSecret: 'test-secret',
    redirectUri: 'http://localhost:8787/oauth/callback',
    scopes: ['openid', 'email'],
  };
  const config = vendor === 'google' ? googleOAuthConfig(settings) : o365OAuthConfig({ ...settings, tenantId: 'common' });
  const session = new OAuthSession({ client: new OAuthClient(config, { fetcher, now: () => TEST_NOW }), store, now: () => TEST_NOW });
  await store.put({ ...identity, provider: vendor }, oauthFields());
  return { handle, store, session, fetcher, calls };
}
