import { Logger, levelForVerbosity } from '../../src/util/logger';

describe('Unit: logger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
  });

  it('writes prefixed human-readable lines', () => {
    const log = new Logger('info', 'human', (line) => lines.push(line));

    log.info('Fetched', { commits: 3, ref: 'refs/heads/main', skipped: undefined });
    log.debug('hidden');

    expect(lines).toEqual(['dokuwiki: info: Fetched commits=3 ref=refs/heads/main\n']);
  });

  it('writes JSON records', () => {
    const log = new Logger('debug', 'json', (line) => lines.push(line));

    log.warn('Retrying', { attempt: 2 });

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({ level: 'warn', msg: 'Retrying', attempt: 2 });
  });

  it('changes level at runtime', () => {
    const log = new Logger('error', 'human', (line) => lines.push(line));
    log.warn('dropped');
    log.setLevel('warn');
    log.warn('kept');

    expect(log.getLevel()).toBe('warn');
    expect(lines).toEqual(['dokuwiki: warn: kept\n']);
  });

  it('follows git verbosity', () => {
    expect(levelForVerbosity(0)).toBe('warn');
    expect(levelForVerbosity(1)).toBe('warn');
    expect(levelForVerbosity(2)).toBe('info');
    expect(levelForVerbosity(5)).toBe('debug');
  });
});
