import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonRpcClient } from '../../src/dokuwiki/jsonRpcClient';
import { CookieStore } from '../../src/session/cookieStore';
import type { CredentialSource, Credentials } from '../../src/session/credentials';
import { SessionManager, type SessionManagerOptions } from '../../src/session/sessionManager';
import { logger } from '../../src/util/logger';
import { FakeRpcServer } from '../fixtures/fakeRpcServer';

class StubCredentials implements CredentialSource {
  readonly approved: Credentials[] = [];
  readonly rejected: Credentials[] = [];

  constructor(private readonly credentials: Credentials | null) {}

  async fill(): Promise<Credentials | null> {
    return this.credentials;
  }

  async approve(credentials: Credentials): Promise<void> {
    this.approved.push(credentials);
  }

  async reject(credentials: Credentials): Promise<void> {
    this.rejected.push(credentials);
  }
}

describe('Session login contract', () => {
  let dir: string;
  let cookieFile: string;
  let server: FakeRpcServer;

  const probeRetry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterRatio: 0 };

  async function manager(options: Omit<SessionManagerOptions, 'rpc' | 'cookies'>): Promise<SessionManager> {
    const cookies = await CookieStore.open(cookieFile);
    const rpc = new JsonRpcClient({ wikiUrl: 'https://wiki.test', jar: cookies.jar, adapter: server.adapter });
    return new SessionManager({ rpc, cookies, probeRetry, ...options });
  }

  beforeAll(() => {
    logger.setSink(() => undefined);
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dokuwiki-session-'));
    cookieFile = path.join(dir, 'cookies.json');
    server = new FakeRpcServer();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('logs in with the configured password and persists the cookie', async () => {
    const session = await manager({ user: 'alice', password: 'test-secret' });

    const result = await session.ensure();

    expect(result.ok).toBe(true);
    expect(session.state).toEqual({ phase: 'authenticated', source: 'password', user: 'alice', reauthCount: 0 });
    expect(server.calls[0]).toEqual({ method: 'core.login', params: { user: 'alice', pass: 'test-secret' }, cookie: '' });
    const stat = await fs.stat(cookieFile);
    expect(stat.mode & 0o777).toBe(0o600);
  });

  it('does nothing once authenticated', async () => {
    const session = await manager({ user: 'alice', password: 'test-secret' });
    await session.ensure();
    await session.ensure();

    expect(server.methodsCalled()).toEqual(['core.login']);
  });

  it('reuses a persisted cookie after probing it', async () => {
    await (await manager({ user: 'alice', password: 'test-secret' })).ensure();
    server.calls.length = 0;

    const session = await manager({});
    const result = await session.ensure();

    expect(result.ok).toBe(true);
    expect(session.state.source).toBe('cookie');
    expect(session.state.user).toBe('alice');
    expect(server.methodsCalled()).toEqual(['core.whoAmI']);
  });

  it('retries the probe on transport errors', async () => {
    await (await manager({ user: 'alice', password: 'test-secret' })).ensure();
    server.calls.length = 0;
    server.inject({ type: 'network', code: 'ECONNRESET' });

    const session = await manager({});
    const result = await session.ensure();

    expect(result.ok).toBe(true);
    expect(server.methodsCalled()).toEqual(['core.whoAmI', 'core.whoAmI']);
  });

  it('falls back to the credential helper when the cookie is stale', async () => {
    await (await manager({ user: 'alice', password: 'test-secret' })).ensure();
    server.expireSessions();
    const helper = new StubCredentials({ username: 'alice', password: 'test-secret' });

    const session = await manager({ credentialHelper: helper });
    const result = await session.ensure();

    expect(result.ok).toBe(true);
    expect(session.state.source).toBe('credential-helper');
    expect(helper.approved).toEqual([{ username: 'alice', password: 'test-secret' }]);
  });

  it('rejects bad helper credentials and reports an authentication error', async () => {
    const helper = new StubCredentials({ username: 'alice', password: 'wrong' });
    const session = await manager({ user: 'alice', password: 'also-wrong', credentialHelper: helper });

    const result = await session.ensure();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('AuthenticationError');
      expect(result.error.fatal).toBe(true);
    }
    expect(helper.rejected).toEqual([{ username: 'alice', password: 'wrong' }]);
    expect(session.state.phase).toBe('unauthenticated');
  });

  it('forgets the cookie when the session is invalidated', async () => {
    const session = await manager({ user: 'alice', password: 'test-secret' });
    await session.ensure();

    await session.invalidate();

    expect(session.state).toEqual({ phase: 'unauthenticated', source: null, user: null, reauthCount: 1 });
    await expect(fs.stat(cookieFile)).rejects.toThrow();
  });

  it('shares one login between concurrent callers', async () => {
    const session = await manager({ user: 'alice', password: 'test-secret' });

    const results = await Promise.all([session.ensure(), session.ensure(), session.ensure()]);

    expect(results.map((result) => result.ok)).toEqual([true, true, true]);
    expect(server.methodsCalled()).toEqual(['core.login']);
    expect(session.generation).toBe(1);
  });

  it('ignores an invalidation from a session that was already renewed', async () => {
    const session = await manager({ user: 'alice', password: 'test-secret' });
    await session.ensure();
    const stale = session.generation;
    await session.invalidate(stale);
    await session.ensure();

    const dropped = await session.invalidate(stale);

    expect(dropped).toBe(false);
    expect(session.state).toEqual({ phase: 'authenticated', source: 'password', user: 'alice', reauthCount: 1 });
    expect(session.generation).toBe(2);
  });

  it('surfaces transport failures instead of treating them as bad credentials', async () => {
    server.inject({ type: 'status', status: 502 });
    const session = await manager({ user: 'alice', password: 'test-secret' });

    const result = await session.ensure();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('TransportError');
  });
});
