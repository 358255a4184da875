import { createHash } from 'crypto';
import { isAbsolute, join, resolve } from 'path';
import { ConfigurationError } from '../core/errors.js';
import { normalizeNamespace } from '../mapping/pathMapper.js';
import type { ConflictScope } from '../import/pushImporter.js';
import { isLogFormat, isLogLevel, levelForVerbosity, type LogFormat, type LogLevel } from './logger.js';
import type { RetryPolicyConfig } from './retry.js';

export interface RawEnv {
  DOKUWIKI_PASSWORD?: string;
  DOKUWIKI_USER?: string;
  DOKUWIKI_EXTENSION?: string;
  DOKUWIKI_DEPTH?: string;
  DOKUWIKI_CONCURRENCY?: string;
  DOKUWIKI_CONFLICT_SCOPE?: string;
  DOKUWIKI_COOKIE_FILE?: string;
  DOKUWIKI_VERBOSE?: string;
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
}

/** Settings read from the optional YAML config file. */
export interface FileSettings {
  extension?: string;
  depth?: number;
  concurrency?: number;
  conflictScope?: string;
}

export interface HelperArgs {
  remoteName: string;
  remoteUrl: string;
  gitDir: string;
}

export interface RemoteTarget {
  protocol: 'http' | 'https';
  /** Host with optional port. */
  host: string;
  wikiUrl: string;
  user?: string;
  namespace: string;
}

export interface HelperConfig {
  remoteName: string;
  /** Remote name made safe for ref and directory names. */
  stateName: string;
  remote: RemoteTarget;
  user?: string;
  password?: string;
  extension: string;
  depth?: number;
  concurrency: number;
  conflictScope: ConflictScope;
  gitDir: string;
  stateDir: string;
  marksPath: string;
  cookieFile: string;
  privateRefPrefix: string;
  verbosity: number;
  logLevel: LogLevel;
  /** LOG_LEVEL was set explicitly; git's verbosity options then leave it alone. */
  logLevelFixed: boolean;
  logFormat: LogFormat;
  probeRetry: RetryPolicyConfig;
}

export const DEFAULT_EXTENSION = 'md';
export const DEFAULT_CONCURRENCY = 4;
const MAX_CONCURRENCY = 32;
const URL_PREFIX = 'dokuwiki::';
// [http(s)://][user@]host[:port][/namespace/path]
const REMOTE_URL = /^(?:(https?):\/\/)?(?:([^@/]+)@)?([^/:@]+)(?::(\d+))?(\/.*)?$/;

const DEFAULT_PROBE_RETRY: RetryPolicyConfig = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  jitterRatio: 0.3
};

export function parseRemoteUrl(url: string): RemoteTarget {
  const bare = url.startsWith(URL_PREFIX) ? url.slice(URL_PREFIX.length) : url;
  const match = REMOTE_URL.exec(bare.trim());
  if (!match?.[3]) {
    throw new ConfigurationError(`Invalid wiki URL "${url}": expected [https://][user@]host[/namespace]`);
  }

  const protocol = match[1] === 'http' ? 'http' : 'https';
  const host = match[4] ? `${match[3]}:${match[4]}` : match[3];
  const user = match[2] ? decodeURIComponent(match[2]) : undefined;
  const namespace = normalizeNamespace(decodeURIComponent(match[5] ?? ''));

  return {
    protocol,
    host,
    wikiUrl: `${protocol}://${host}`,
    user,
    namespace
  };
}

/**
 * Git passes the remote name, or the URL itself when there is no configured
 * remote. Anything unsafe in a ref or directory name is replaced by a hash.
 */
export function stateNameFor(remoteName: string): string {
  if (/^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(remoteName) && !remoteName.endsWith('.lock') && !remoteName.includes('..')) {
    return remoteName;
  }
  return 'url-' + createHash('sha1').update(remoteName).digest('hex').slice(0, 12);
}

export function parsePositiveInt(name: string, value: string | number | undefined, max?: number): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || (max !== undefined && parsed > max)) {
    const range = max !== undefined ? `between 1 and ${max}` : 'a positive integer';
    throw new ConfigurationError(`${name} must be ${range}, got "${value}"`);
  }
  return parsed;
}

function validateExtension(value: string): string {
  const extension = value.replace(/^\./, '');
  if (!/^[A-Za-z0-9_-]+$/.test(extension)) {
    throw new ConfigurationError(`Invalid page extension "${value}"`);
  }
  return extension;
}

function validateConflictScope(value: string | undefined): ConflictScope {
  const scope = value || 'touched';
  if (scope !== 'touched' && scope !== 'namespace') {
    throw new ConfigurationError(`Conflict scope must be "touched" or "namespace", got "${scope}"`);
  }
  return scope;
}

/** `DOKUWIKI_VERBOSE=n` behaves like n extra `-v` flags on top of git's default. */
function parseVerbosity(value: string | undefined): number {
  if (value === undefined || value === '') return 1;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`DOKUWIKI_VERBOSE must be a non-negative integer, got "${value}"`);
  }
  return parsed + 1;
}

function parseLogLevel(value: string | undefined, verbosity: number): LogLevel {
  if (value === undefined || value === '') return levelForVerbosity(verbosity);
  if (!isLogLevel(value)) throw new ConfigurationError(`Invalid LOG_LEVEL: ${value}`);
  return value;
}

function parseLogFormat(value: string | undefined): LogFormat {
  if (value === undefined || value === '') return 'human';
  if (!isLogFormat(value)) throw new ConfigurationError(`Invalid LOG_FORMAT: ${value}`);
  return value;
}

export function buildConfig(args: HelperArgs, env: RawEnv, file: FileSettings = {}): HelperConfig {
  const remote = parseRemoteUrl(args.remoteUrl);
  const gitDir = isAbsolute(args.gitDir) ? args.gitDir : resolve(args.gitDir);
  const stateName = stateNameFor(args.remoteName);
  const stateDir = join(gitDir, 'dokuwiki', stateName);
  const verbosity = parseVerbosity(env.DOKUWIKI_VERBOSE);

  return {
    remoteName: args.remoteName,
    stateName,
    remote,
    user: remote.user ?? (env.DOKUWIKI_USER || undefined),
    password: env.DOKUWIKI_PASSWORD || undefined,
    extension: validateExtension(env.DOKUWIKI_EXTENSION || file.extension || DEFAULT_EXTENSION),
    depth: parsePositiveInt('DOKUWIKI_DEPTH', env.DOKUWIKI_DEPTH || file.depth),
    concurrency: parsePositiveInt('DOKUWIKI_CONCURRENCY', env.DOKUWIKI_CONCURRENCY || file.concurrency, MAX_CONCURRENCY)
      ?? DEFAULT_CONCURRENCY,
    conflictScope: validateConflictScope(env.DOKUWIKI_CONFLICT_SCOPE || file.conflictScope),
    gitDir,
    stateDir,
    marksPath: join(stateDir, 'git.marks'),
    cookieFile: env.DOKUWIKI_COOKIE_FILE
      ? resolve(env.DOKUWIKI_COOKIE_FILE)
      : join(gitDir, 'dokuwiki', 'cookies.json'),
    privateRefPrefix: `refs/dokuwiki/${stateName}/heads/`,
    verbosity,
    logLevel: parseLogLevel(env.LOG_LEVEL, verbosity),
    logLevelFixed: Boolean(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
    probeRetry: DEFAULT_PROBE_RETRY
  };
}
