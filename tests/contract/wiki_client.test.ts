import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonRpcClient } from '../../src/dokuwiki/jsonRpcClient';
import { WikiClient, decodePage, decodeRevision } from '../../src/dokuwiki/wikiClient';
import { CookieStore } from '../../src/session/cookieStore';
import { SessionManager } from '../../src/session/sessionManager';
import { logger } from '../../src/util/logger';
import { FakeRpcServer } from '../fixtures/fakeRpcServer';
import { FakeWiki, forbidden } from '../fixtures/fakeWiki';

describe('Wiki client contract', () => {
  let wiki: FakeWiki;
  let server: FakeRpcServer;
  let session: SessionManager;
  let client: WikiClient;
  let rpc: JsonRpcClient;
  let dir: string;

  beforeAll(() => {
    logger.setSink(() => undefined);
  });

  beforeEach(async () => {
    wiki = new FakeWiki()
      .addPage('start', [
        { revision: 100, author: 'alice', summary: 'init', content: 'one' },
        { revision: 200, author: 'bob', summary: 'update', content: 'two' }
      ])
      .addPage('other:page', [{ revision: 150, content: 'elsewhere' }])
      .addMedia('logo.png', [{ revision: 120, content: Buffer.from([0x89, 0x50, 0x4e, 0x47]) }]);
    server = new FakeRpcServer(wiki);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dokuwiki-client-'));
    const cookies = await CookieStore.open(path.join(dir, 'cookies.json'));
    rpc = new JsonRpcClient({ wikiUrl: 'https://wiki.test', jar: cookies.jar, adapter: server.adapter });
    session = new SessionManager({ rpc, cookies, user: 'alice', password: 'test-secret' });
    client = new WikiClient({ rpc, session, host: 'wiki.test' });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('checks the API version on connect', async () => {
    const result = await client.connect();

    expect(result).toEqual({ ok: true, value: 14 });
    expect(client.connected).toBe(true);
    expect(server.methodsCalled()).toEqual(['core.login', 'core.getAPIVersion']);
  });

  it('refuses wikis with an old API', async () => {
    server.apiVersion = 13;

    const result = await client.connect();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RemoteProtocolError');
      expect(result.error.message).toBe('DokuWiki API version 13 is too old, at least 14 is required');
    }
    expect(client.connected).toBe(false);
  });

  it('lists pages and media of a namespace', async () => {
    const pages = await client.listPages('');
    const media = await client.listMedia('');

    expect(pages).toEqual({
      ok: true,
      value: [
        { id: 'other:page', revision: 150, mtime: 150, author: 'alice', size: 9 },
        { id: 'start', revision: 200, mtime: 200, author: 'bob', size: 3 }
      ]
    });
    expect(media).toEqual({
      ok: true,
      value: [{ id: 'logo.png', revision: 120, author: 'alice', size: 4, isImage: true }]
    });
    expect(server.calls.find((call) => call.method === 'core.listMedia')?.params)
      .toEqual({ namespace: '', pattern: '', depth: 0 });
  });

  it('pages through long histories, newest first', async () => {
    wiki.addPage('long', [1, 2, 3, 4, 5].map((n) => ({ revision: n * 10, content: `v${n}` })));
    server.historyPageSize = 2;

    const result = await client.getPageHistory('long');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((r) => r.revision)).toEqual([50, 40, 30, 20, 10]);
      expect(result.value[4]).toMatchObject({ id: 'long', kind: 'page', type: 'C', deleted: false });
    }
    const firsts = server.calls
      .filter((call) => call.method === 'core.getPageHistory')
      .map((call) => call.params.first);
    expect(firsts).toEqual([0, 1, 2, 3, 4]);
  });

  it('refuses a history that does not end within the page limit', async () => {
    wiki.addPage('long', [1, 2, 3, 4, 5].map((n) => ({ revision: n * 10, content: `v${n}` })));
    server.historyPageSize = 2;
    const limited = new WikiClient({ rpc, session, host: 'wiki.test', maxHistoryPages: 3 });

    const result = await limited.getPageHistory('long');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RemoteProtocolError');
      expect(result.error.message).toBe('core.getPageHistory: history of long did not end within 3 pages');
    }
  });

  it('reads old revisions and media', async () => {
    expect(await client.getPage('start', 100)).toEqual({ ok: true, value: 'one' });
    expect(await client.getPage('start')).toEqual({ ok: true, value: 'two' });

    const logo = await client.getMedia('logo.png');
    expect(logo.ok).toBe(true);
    if (logo.ok) expect([...logo.value]).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it('writes pages and media', async () => {
    expect((await client.savePage('new', 'fresh text', 'Created from git')).ok).toBe(true);
    expect((await client.saveMedia('doc.pdf', Buffer.from('%PDF'))).ok).toBe(true);
    expect((await client.deletePage('start', 'Removed')).ok).toBe(true);
    expect((await client.deleteMedia('logo.png')).ok).toBe(true);

    expect(wiki.currentText('new')).toBe('fresh text');
    expect(wiki.currentMedia('doc.pdf')?.toString()).toBe('%PDF');
    expect(wiki.currentText('start')).toBeNull();
    expect(wiki.currentMedia('logo.png')).toBeNull();
    expect(server.calls.find((call) => call.method === 'core.saveMedia')?.params)
      .toEqual({ media: 'doc.pdf', base64: Buffer.from('%PDF').toString('base64'), overwrite: true });
  });

  it('logs in again once when the session expires', async () => {
    await client.connect();
    server.expireSessions();

    const result = await client.listPages('');

    expect(result.ok).toBe(true);
    expect(server.methodsCalled()).toEqual([
      'core.login', 'core.getAPIVersion', 'core.listPages', 'core.login', 'core.listPages'
    ]);
    expect(session.state.reauthCount).toBe(1);
  });

  it('renews an expired session once for parallel calls', async () => {
    await client.connect();
    server.expireSessions();

    const results = await Promise.all([
      client.getPage('start'),
      client.getPage('start', 100),
      client.getPage('other:page'),
      client.getMediaInfo('logo.png')
    ]);

    expect(results.map((result) => result.ok)).toEqual([true, true, true, true]);
    expect(results[0]).toEqual({ ok: true, value: 'two' });
    expect(results[1]).toEqual({ ok: true, value: 'one' });
    expect(results[2]).toEqual({ ok: true, value: 'elsewhere' });
    expect(server.methodsCalled().filter((method) => method === 'core.login')).toHaveLength(2);
    expect(session.state.reauthCount).toBe(1);
    expect(session.generation).toBe(2);
  });

  it('passes ACL denials through', async () => {
    wiki.failNext('getPage', forbidden());

    const result = await client.getPage('start');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('Forbidden');
  });

  it('treats a false mutation result as a failure', async () => {
    server.on('core.savePage', async () => false);

    const result = await client.savePage('start', 'text', '');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('core.savePage: the wiki refused the change');
  });

  it('validates media payloads', async () => {
    server.on('core.getMedia', async () => '***');

    const result = await client.getMedia('logo.png');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('core.getMedia: expected base64 data');
  });

  describe('decoders', () => {
    it('accept legacy field names', () => {
      expect(decodePage({ id: 'a', rev: '12', mtime: 12, user: 'carol', size: 3 }))
        .toEqual({ id: 'a', revision: 12, mtime: 12, author: 'carol', size: 3 });
      expect(decodeRevision('a', 'page')({ version: 5, user: 'carol', type: 'e', summary: 'typo' }))
        .toEqual({ id: 'a', kind: 'page', revision: 5, author: 'carol', summary: 'typo', type: 'e', isMinor: true, deleted: false });
    });

    it('reject items without an id or revision', () => {
      expect(decodePage({ id: 'a' })).toBeNull();
      expect(decodePage('a')).toBeNull();
    });
  });
});

