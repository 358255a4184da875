import { AuthenticationError, RemoteProtocolError, type WikiError } from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';
import type { JsonRpcClient } from '../dokuwiki/jsonRpcClient.js';
import { logger } from '../util/logger.js';
import { retry, type RetryPolicyConfig } from '../util/retry.js';
import type { CookieStore } from './cookieStore.js';
import type { CredentialSource } from './credentials.js';

export type SessionPhase = 'unauthenticated' | 'authenticating' | 'authenticated';
export type SessionSource = 'password' | 'cookie' | 'credential-helper';

export interface SessionState {
  phase: SessionPhase;
  source: SessionSource | null;
  user: string | null;
  reauthCount: number;
}

export interface SessionManagerOptions {
  rpc: JsonRpcClient;
  cookies: CookieStore;
  user?: string;
  password?: string;
  credentialHelper?: CredentialSource;
  probeRetry?: RetryPolicyConfig;
}

const DEFAULT_PROBE_RETRY: RetryPolicyConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4000,
  jitterRatio: 0.2
};

type LoginOutcome = 'accepted' | 'rejected';

/**
 * Owns the wiki login. Credential sources are tried in order: an explicit
 * password, the persisted cookie (validated with a probe), then git's
 * credential helper.
 */
export class SessionManager {
  private readonly rpc: JsonRpcClient;
  private readonly cookies: CookieStore;
  private readonly credentialHelper?: CredentialSource;
  private readonly probeRetry: RetryPolicyConfig;
  private readonly password?: string;
  private cookieStale = false;
  private loginGeneration = 0;
  private pending: Promise<Result<void, WikiError>> | null = null;
  private discarding: Promise<void> | null = null;
  private current: SessionState = {
    phase: 'unauthenticated',
    source: null,
    user: null,
    reauthCount: 0
  };

  constructor(private readonly options: SessionManagerOptions) {
    this.rpc = options.rpc;
    this.cookies = options.cookies;
    this.credentialHelper = options.credentialHelper;
    this.probeRetry = options.probeRetry ?? DEFAULT_PROBE_RETRY;
    this.password = options.password;
  }

  get state(): Readonly<SessionState> {
    return this.current;
  }

  /**
   * Counts successful logins. A caller that saw a rejection passes the
   * generation it ran under to `invalidate`.
   */
  get generation(): number {
    return this.loginGeneration;
  }

  /**
   * Resolve once a session is established. Cheap when already authenticated;
   * concurrent callers share one authentication.
   */
  ensure(): Promise<Result<void, WikiError>> {
    if (this.current.phase === 'authenticated') return Promise.resolve(ok(undefined));
    if (!this.pending) {
      this.pending = this.establish().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async establish(): Promise<Result<void, WikiError>> {
    this.current = { ...this.current, phase: 'authenticating', source: null };
    const discarding = this.discarding;
    this.discarding = null;
    if (discarding) await discarding;
    const result = await this.authenticate();
    if (!result.ok) {
      this.current = { ...this.current, phase: 'unauthenticated', source: null, user: null };
      logger.debug('Authentication failed', { kind: result.error.kind });
      return result;
    }

    this.loginGeneration++;
    logger.info('Authenticated', { source: result.value.source, user: result.value.user });
    this.current = {
      ...this.current,
      phase: 'authenticated',
      source: result.value.source,
      user: result.value.user
    };
    return ok(undefined);
  }

  /**
   * Drop the current session after the wiki rejected it. The persisted cookie
   * is discarded and not offered again. With a generation, nothing happens
   * unless that session is still the current one.
   */
  async invalidate(generation?: number): Promise<boolean> {
    if (generation !== undefined && (generation !== this.loginGeneration || this.current.phase !== 'authenticated')) {
      logger.debug('Session already renewed', { generation, current: this.loginGeneration });
      return false;
    }
    this.current = {
      phase: 'unauthenticated',
      source: null,
      user: null,
      reauthCount: this.current.reauthCount + 1
    };
    this.cookieStale = true;
    this.discarding = this.cookies.discard();
    await this.discarding;
    logger.info('Session expired, re-authenticating', { reauthCount: this.current.reauthCount });
    return true;
  }

  private async authenticate(): Promise<Result<{ source: SessionSource; user: string }, WikiError>> {
    const user = this.options.user ?? '';

    if (this.password !== undefined) {
      const login = await this.login(user, this.password);
      if (!login.ok) return login;
      if (login.value === 'accepted') return ok({ source: 'password', user });
      logger.warn('Wiki rejected the configured password', { user });
    }

    if (!this.cookieStale && this.cookies.hasPersistedSession) {
      const probe = await this.probe();
      if (!probe.ok) return probe;
      if (probe.value !== null) return ok({ source: 'cookie', user: probe.value });
      this.cookieStale = true;
      await this.cookies.discard();
      logger.debug('Persisted session is no longer valid');
    }

    if (this.credentialHelper) {
      const credentials = await this.credentialHelper.fill();
      if (credentials) {
        const login = await this.login(credentials.username, credentials.password);
        if (!login.ok) return login;
        if (login.value === 'accepted') {
          await this.credentialHelper.approve(credentials);
          return ok({ source: 'credential-helper', user: credentials.username });
        }
        await this.credentialHelper.reject(credentials);
      }
    }

    return err(new AuthenticationError(
      'Could not log in to the wiki. Set DOKUWIKI_PASSWORD or configure git credentials for this host.'
    ));
  }

  private async login(user: string, password: string): Promise<Result<LoginOutcome, WikiError>> {
    await this.cookies.jar.removeAllCookies();
    const result = await this.rpc.call('core.login', { user, pass: password });
    if (!result.ok) {
      // The wiki answers a bad password with `false`, some setups with 401.
      return result.error.kind === 'Unauthenticated' ? ok('rejected') : result;
    }
    if (typeof result.value !== 'boolean') {
      return err(new RemoteProtocolError('core.login: expected a boolean result', { method: 'core.login' }));
    }
    if (!result.value) return ok('rejected');

    await this.cookies.save();
    return ok('accepted');
  }

  /**
   * Ask the wiki who the cookie belongs to. Null means the cookie no longer
   * identifies anyone.
   */
  private async probe(): Promise<Result<string | null, WikiError>> {
    const result = await retry(() => this.rpc.call('core.whoAmI'), {
      ...this.probeRetry,
      shouldRetry: (error) => error.kind === 'TransportError',
      onAttempt: (attempt, delayMs, error) => {
        logger.info('Retrying session probe', { attempt, delayMs, error: error.message });
      }
    });

    if (!result.ok) {
      return result.error.kind === 'Unauthenticated' ? ok(null) : result;
    }
    const value = result.value;
    if (typeof value === 'object' && value !== null && 'login' in value && typeof value.login === 'string') {
      return ok(value.login.length > 0 ? value.login : null);
    }
    return err(new RemoteProtocolError('core.whoAmI: unexpected response shape', { method: 'core.whoAmI' }));
  }
}
