import { Buffer } from 'node:buffer';
import { requestJson, HttpError, type FetchLike } from '../http.js';
import type { OAuthClientSettings } from '../config.js';
import type { AccountIdentity, CalendarProviderName, ProviderName } from '../model.js';
import { identityKey, isCalendarProvider, isTaskProvider } from '../model.js';
import {
  FatalAuthFailure,
  classifyError,
  needsAuth,
  type NeedsInteractiveAuth,
} from '../errors.js';
import { credentialOf, hasRequiredFields, type CredentialRecord, type CredentialStore } from '../store/credentialStore.js';
import { KeyedMutex } from '../store/lock.js';
import { createLogger, type Logger } from '../log.js';

export interface OAuthEndpoints {
  authorizeUrl: string;
  tokenUrl: string;
  /** Returns the signed-in account's email. */
  userInfoUrl: string;
  /** Extra query params for the authorization URL. */
  authorizeParams?: Record<string, string>;
  /** Send `scope` with refresh requests (Microsoft identity platform wants it). */
  scopeOnRefresh?: boolean;
}

export interface OAuthClientConfig extends OAuthClientSettings, OAuthEndpoints {
  provider: CalendarProviderName;
}

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: string;
  scopes?: string[];
}

interface TokenResponse {
  access_token?: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
}

export interface AuthState {
  userId: string;
  provider: ProviderName;
  accountEmail?: string;
}

export function encodeState(state: AuthState): string {
  return Buffer.from(JSON.stringify(state), 'utf8').toString('base64url');
}

export function decodeState(raw: string): AuthState | undefined {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(raw, 'base64url').toString('utf8'));
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'userId' in parsed &&
      typeof parsed.userId === 'string' &&
      'provider' in parsed &&
      typeof parsed.provider === 'string' &&
      (isCalendarProvider(parsed.provider) || isTaskProvider(parsed.provider))
    ) {
      const accountEmail = 'accountEmail' in parsed && typeof parsed.accountEmail === 'string' ? parsed.accountEmail : undefined;
      return { userId: parsed.userId, provider: parsed.provider, accountEmail };
    }
  } catch {
    return undefined;
  }
  return undefined;
}

export function googleOAuthConfig(settings: OAuthClientSettings): OAuthClientConfig {
  return {
    ...settings,
    provider: 'google',
    authorizeUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    userInfoUrl: 'https://openidconnect.googleapis.com/v1/userinfo',
    authorizeParams: { access_type: 'offline', include_granted_scopes: 'true' },
  };
}

export function o365OAuthConfig(settings: OAuthClientSettings & { tenantId: string }): OAuthClientConfig {
  const base = `https://login.microsoftonline.com/${encodeURIComponent(settings.tenantId)}/oauth2/v2.0`;
  return {
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    redirectUri: settings.redirectUri,
    scopes: settings.scopes,
    provider: 'o365',
    authorizeUrl: `${base}/authorize`,
    tokenUrl: `${base}/token`,
    userInfoUrl: 'https://graph.microsoft.com/v1.0/me',
    authorizeParams: { response_mode: 'query' },
    scopeOnRefresh: true,
  };
}

function emailFromUserInfo(json: unknown): string | undefined {
  if (typeof json !== 'object' || json === null) return undefined;
  for (const key of ['email', 'mail', 'userPrincipalName']) {
    const v: unknown = Reflect.get(json, key);
    if (typeof v === 'string' && v) return v;
  }
  return undefined;
}

/**
 * Token endpoint client for one OAuth application. Stateless: callers
 * persist what it returns.
 */
export class OAuthClient {
  private fetcher: FetchLike;
  private now: () => Date;

  constructor(
    readonly config: OAuthClientConfig,
    opts: { fetcher?: FetchLike; now?: () => Date } = {},
  ) {
    this.fetcher = opts.fetcher ?? fetch;
    this.now = opts.now ?? (() => new Date());
  }

  authorizationUrl(opts: { state: string; loginHint?: string; forceConsent?: boolean }): string {
    const u = new URL(this.config.authorizeUrl);
    const params: Record<string, string | undefined> = {
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      response_type: 'code',
      scope: this.config.scopes.join(' '),
      state: opts.state,
      login_hint: opts.loginHint,
      prompt: opts.forceConsent ? 'consent' : 'select_account',
      ...this.config.authorizeParams,
    };
    for (const [k, v] of Object.entries(params)) if (v) u.searchParams.set(k, v);
    return u.toString();
  }

  async exchangeCode(code: string, signal?: AbortSignal): Promise<TokenSet> {
    const res = await this.tokenRequest(
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.config.redirectUri,
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
      },
      signal,
    );
    return res;
  }

  /**
   * Refresh grant. Rejections (400/401/403, e.g. `invalid_grant`) become
   * FatalAuthFailure; 429, 5xx and network trouble TransientFailure.
   */
  async refresh(
    cred: { refreshToken: string; clientId: string; clientSecret: string; tokenUri: string; scopes: string[] },
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    return this.tokenRequest(
      {
        grant_type: 'refresh_token',
        refresh_token: cred.refreshToken,
        client_id: cred.clientId,
        client_secret: cred.clientSecret,
        scope: this.config.scopeOnRefresh ? cred.scopes.join(' ') : undefined,
      },
      signal,
      cred.tokenUri,
    );
  }

  async fetchAccountEmail(accessToken: string, signal?: AbortSignal): Promise<string> {
    const json = await requestJson<unknown>(
      this.config.userInfoUrl,
      { headers: { authorization: `Bearer ${accessToken}` }, signal },
      this.fetcher,
    );
    const email = emailFromUserInfo(json);
    if (!email) throw new FatalAuthFailure('Account email missing from user info response', this.config.provider);
    return email;
  }

  private async tokenRequest(
    body: Record<string, string | undefined>,
    signal?: AbortSignal,
    url = this.config.tokenUrl,
  ): Promise<TokenSet> {
    let json: TokenResponse;
    try {
      json = await requestJson<TokenResponse>(url, { method: 'POST', body, form: true, retries: 1, signal }, this.fetcher);
    } catch (err) {
      if (err instanceof HttpError && (err.status === 400 || err.status === 401 || err.status === 403)) {
        const code = err.errorCode() ?? `HTTP ${err.status}`;
        throw new FatalAuthFailure(`${this.config.provider} token request rejected: ${code}`, this.config.provider, {
          cause: err,
        });
      }
      throw classifyError(err, this.config.provider);
    }

    if (!json?.access_token) {
      throw new FatalAuthFailure(`${this.config.provider} token response has no access_token`, this.config.provider);
    }
    return {
      accessToken: json.access_token,
      refreshToken: json.refresh_token,
      expiresAt:
        typeof json.expires_in === 'number'
          ? new Date(this.now().getTime() + json.expires_in * 1000).toISOString()
          : undefined,
      scopes: json.scope ? json.scope.split(' ').filter(Boolean) : undefined,
    };
  }
}

export interface OAuthSessionOptions {
  client: OAuthClient;
  store: CredentialStore;
  logger?: Logger;
  now?: () => Date;
  /** Shared between sessions so the scheduler and request path never refresh one account twice at once. */
  locks?: KeyedMutex;
  /** Refresh when the access token expires within this window (default 60 s). */
  expirySkewMs?: number;
}

/** Credentials of a calendar account, shared by the task provider of the same vendor. */
export class OAuthSession {
  readonly credentialProvider: CalendarProviderName;
  private client: OAuthClient;
  private store: CredentialStore;
  private logger: Logger;
  private now: () => Date;
  private locks: KeyedMutex;
  private skewMs: number;

  constructor(opts: OAuthSessionOptions) {
    this.client = opts.client;
    this.credentialProvider = opts.client.config.provider;
    this.store = opts.store;
    this.logger = opts.logger ?? createLogger('silent');
    this.now = opts.now ?? (() => new Date());
    this.locks = opts.locks ?? new KeyedMutex();
    this.skewMs = opts.expirySkewMs ?? 60_000;
  }

  /** Identity the credentials are stored under. */
  credentialIdentity(identity: AccountIdentity): AccountIdentity {
    return { userId: identity.userId, provider: this.credentialProvider, accountEmail: identity.accountEmail };
  }

  authorizationUrl(identity: AccountIdentity, forceConsent = false): string {
    return this.client.authorizationUrl({
      state: encodeState({ userId: identity.userId, provider: this.credentialProvider, accountEmail: identity.accountEmail }),
      loginHint: identity.accountEmail || undefined,
      forceConsent,
    });
  }

  /**
   * `null` when the stored credential is usable, refreshing it first when it
   * is about to expire. Fatal refresh failures flag the account and return a
   * needs-auth value; transient ones propagate.
   */
  async authenticate(identity: AccountIdentity): Promise<NeedsInteractiveAuth | null> {
    const credId = this.credentialIdentity(identity);
    const record = await this.store.get(credId);

    if (!record) {
      return needsAuth(identity.provider, this.authorizationUrl(identity), 'no_credentials');
    }
    if (record.needsReauth) {
      return needsAuth(identity.provider, this.authorizationUrl(identity, true), 'needs_reauth');
    }
    if (!hasRequiredFields(record)) {
      await this.store.markNeedsReauth(credId);
      return needsAuth(identity.provider, this.authorizationUrl(identity, true), 'incomplete_credentials');
    }

    if (this.isExpiring(record)) {
      try {
        await this.refresh(identity);
      } catch (err) {
        if (err instanceof FatalAuthFailure) {
          return needsAuth(identity.provider, this.authorizationUrl(identity, true), 'refresh_rejected');
        }
        throw err;
      }
    }
    return null;
  }

  /**
   * Exchange the token endpoint's refresh grant and persist the result.
   * Fatal failures flag the account before rethrowing.
   */
  async refresh(identity: AccountIdentity, signal?: AbortSignal): Promise<void> {
    const credId = this.credentialIdentity(identity);

    await this.locks.run(identityKey(credId), async () => {
      const record = await this.store.get(credId);
      if (!record) throw new FatalAuthFailure(`No ${this.credentialProvider} account ${credId.accountEmail}`, credId.provider);
      if (record.needsReauth) {
        throw new FatalAuthFailure(`${this.credentialProvider} account ${credId.accountEmail} needs reauthorization`, credId.provider);
      }

      try {
        const cred = credentialOf(record);
        if (cred.kind !== 'oauth') {
          throw new FatalAuthFailure(`${record.provider} account ${record.accountEmail} has no OAuth credential`, credId.provider);
        }

        const tokens = await this.client.refresh(cred, signal);
        await this.store.put(credId, {
          accessToken: tokens.accessToken,
          // rotated refresh tokens replace the old one
          ...(tokens.refreshToken ? { refreshToken: tokens.refreshToken } : {}),
          ...(tokens.scopes ? { scopes: tokens.scopes } : {}),
          expiresAt: tokens.expiresAt ?? null,
        });
        this.logger.debug('Token refreshed', { account: identityKey(credId) });
      } catch (err) {
        if (err instanceof FatalAuthFailure) {
          await this.store.markNeedsReauth(credId);
          this.logger.warn('Refresh rejected; account needs reauthorization', { account: identityKey(credId), error: err });
        }
        throw err;
      }
    });
  }

  /**
   * Run an API call with a valid access token. A 401 triggers one refresh
   * and retry. Auth-class failures flag the account; success records the sync.
   */
  async call<T>(identity: AccountIdentity, fn: (accessToken: string) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const credId = this.credentialIdentity(identity);
    try {
      let token = await this.accessToken(identity, signal);
      let result: T;
      try {
        result = await fn(token);
      } catch (err) {
        if (!(err instanceof HttpError) || err.status !== 401) throw err;
        await this.refresh(identity, signal);
        token = await this.accessToken(identity, signal);
        result = await fn(token);
      }
      await this.store.markSynced(credId);
      return result;
    } catch (err) {
      const classified = classifyError(err, identity.provider);
      if (classified instanceof FatalAuthFailure) {
        const record = await this.store.get(credId);
        if (record && !record.needsReauth) await this.store.markNeedsReauth(credId);
      }
      throw classified;
    }
  }

  /**
   * Finish an interactive authorization: exchange the code, look up the
   * account email and store the credential (clearing any reauth flag).
   */
  async completeAuthorization(userId: string, code: string, signal?: AbortSignal): Promise<CredentialRecord> {
    const tokens = await this.client.exchangeCode(code, signal);
    const accountEmail = await this.client.fetchAccountEmail(tokens.accessToken, signal);
    const { config } = this.client;

    const existing = await this.store.get({ userId, provider: this.credentialProvider, accountEmail });
    const refreshToken = tokens.refreshToken ?? existing?.refreshToken;
    if (!refreshToken) {
      throw new FatalAuthFailure(
        `${this.credentialProvider} did not return a refresh token; revoke access and authorize again with consent`,
        this.credentialProvider,
      );
    }

    return this.store.put(
      { userId, provider: this.credentialProvider, accountEmail },
      {
        accessToken: tokens.accessToken,
        refreshToken,
        tokenUri: config.tokenUrl,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        scopes: tokens.scopes ?? config.scopes,
        expiresAt: tokens.expiresAt ?? null,
        needsReauth: false,
      },
    );
  }

  private isExpiring(record: CredentialRecord): boolean {
    if (!record.expiresAt) return false;
    return Date.parse(record.expiresAt) - this.skewMs <= this.now().getTime();
  }

  private async accessToken(identity: AccountIdentity, signal?: AbortSignal): Promise<string> {
    const credId = this.credentialIdentity(identity);
    let record = await this.store.get(credId);
    if (!record) throw new FatalAuthFailure(`No ${this.credentialProvider} account ${credId.accountEmail}`, credId.provider);
    if (record.needsReauth) {
      throw new FatalAuthFailure(`${this.credentialProvider} account ${credId.accountEmail} needs reauthorization`, credId.provider);
    }

    if (this.isExpiring(record)) {
      await this.refresh(identity, signal);
      record = await this.store.get(credId);
    }
    if (!record?.accessToken) {
      throw new FatalAuthFailure(`${this.credentialProvider} account ${credId.accountEmail} has no access token`, credId.provider);
    }
    return record.accessToken;
  }
}
