import { CookieJar } from 'tough-cookie';
import { JsonRpcClient } from '../../src/dokuwiki/jsonRpcClient';
import { logger } from '../../src/util/logger';
import { FakeRpcServer } from '../fixtures/fakeRpcServer';

describe('JSON-RPC transport contract', () => {
  let server: FakeRpcServer;
  let jar: CookieJar;
  let rpc: JsonRpcClient;

  beforeAll(() => {
    logger.setSink(() => undefined);
  });

  beforeEach(() => {
    server = new FakeRpcServer();
    jar = new CookieJar();
    rpc = new JsonRpcClient({ wikiUrl: 'https://wiki.test/', jar, adapter: server.adapter });
  });

  it('posts JSON-RPC 2.0 requests to the wiki endpoint', async () => {
    const result = await rpc.call('core.getAPIVersion');

    expect(rpc.rpcUrl).toBe('https://wiki.test/lib/exe/jsonrpc.php');
    expect(result).toEqual({ ok: true, value: 14 });
    expect(server.calls).toEqual([{ method: 'core.getAPIVersion', params: {}, cookie: '' }]);
  });

  it('stores the session cookie and sends it back', async () => {
    const login = await rpc.call('core.login', { user: 'alice', pass: 'test-secret' });
    const who = await rpc.call('core.whoAmI');

    expect(login).toEqual({ ok: true, value: true });
    expect(await jar.getCookieString(rpc.rpcUrl)).toBe('DokuWiki=sid-1');
    expect(server.calls[1]?.cookie).toBe('DokuWiki=sid-1');
    expect(who).toEqual({ ok: true, value: { login: 'alice' } });
  });

  it('classifies a missing session as unauthenticated', async () => {
    const result = await rpc.call('core.whoAmI');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Unauthenticated');
      expect(result.error.details.status).toBe(401);
      expect(result.error.details.code).toBe(-32604);
    }
  });

  it('classifies connection failures as transport errors', async () => {
    server.inject({ type: 'network', code: 'ECONNRESET' });

    const result = await rpc.call('core.getAPIVersion');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('TransportError');
      expect(result.error.message).toBe('core.getAPIVersion: socket hang up');
    }
  });

  it('classifies server errors as transport errors', async () => {
    server.inject({ type: 'status', status: 503 });

    const result = await rpc.call('core.getAPIVersion');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('TransportError');
      expect(result.error.details.status).toBe(503);
    }
  });

  it('classifies RPC error codes', async () => {
    server.inject({ type: 'rpc', code: 121, message: 'The requested page does not exist' });

    const result = await rpc.call('core.getPage', { page: 'missing' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('NotFound');
      expect(result.error.message).toBe('core.getPage: The requested page does not exist');
    }
  });

  it('rejects bodies that are not JSON-RPC responses', async () => {
    server.inject({ type: 'body', body: '<html>maintenance</html>' });
    server.inject({ type: 'body', body: '{"jsonrpc":"2.0","id":2}' });

    const malformed = await rpc.call('core.getAPIVersion');
    const empty = await rpc.call('core.getAPIVersion');

    expect(malformed.ok).toBe(false);
    if (!malformed.ok) {
      expect(malformed.error.kind).toBe('RemoteProtocolError');
      expect(malformed.error.message).toBe('core.getAPIVersion: malformed response: <html>maintenance</html>');
    }
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.message).toBe('core.getAPIVersion: response has no result');
  });
});
