/**
 * Resolves the helper's configuration once at startup: the remote URL git
 * passed in, environment variables (and `.env`), and an optional YAML file.
 */

import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import { parse } from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import { isMissingFileError } from '../fs/atomicWriter.js';
import { runGit, type GitRunner } from '../git/gitCommand.js';
import { logger } from '../util/logger.js';
import { buildConfig, type FileSettings, type HelperConfig, type RawEnv } from '../util/config.js';

export interface HelperInvocation {
  remote: string;
  url?: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  git?: GitRunner;
  loadEnvFile?: boolean;
}

function loadEnvironment(env: NodeJS.ProcessEnv): RawEnv {
  return {
    DOKUWIKI_PASSWORD: env.DOKUWIKI_PASSWORD,
    DOKUWIKI_USER: env.DOKUWIKI_USER,
    DOKUWIKI_EXTENSION: env.DOKUWIKI_EXTENSION,
    DOKUWIKI_DEPTH: env.DOKUWIKI_DEPTH,
    DOKUWIKI_CONCURRENCY: env.DOKUWIKI_CONCURRENCY,
    DOKUWIKI_CONFLICT_SCOPE: env.DOKUWIKI_CONFLICT_SCOPE,
    DOKUWIKI_COOKIE_FILE: env.DOKUWIKI_COOKIE_FILE,
    DOKUWIKI_VERBOSE: env.DOKUWIKI_VERBOSE,
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_FORMAT: env.LOG_FORMAT
  };
}

/**
 * git exports GIT_DIR to remote helpers; fall back to asking git.
 */
async function resolveGitDir(env: NodeJS.ProcessEnv, git: GitRunner): Promise<string> {
  if (env.GIT_DIR) return resolve(env.GIT_DIR);
  const result = await git(['rev-parse', '--git-dir']);
  if (result.code !== 0) {
    throw new ConfigurationError('Not inside a git repository');
  }
  return resolve(result.stdout.trim());
}

export function parseConfigFile(text: string, source: string): FileSettings {
  let data: unknown;
  try {
    data = parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (data === null || data === undefined) return {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigurationError(`${source} must contain a mapping`);
  }

  const settings: FileSettings = {};
  const entries: Array<[string, unknown]> = Object.entries(data);
  for (const [key, value] of entries) {
    switch (key) {
      case 'extension':
      case 'conflictScope':
        if (typeof value !== 'string') throw new ConfigurationError(`${source}: ${key} must be a string`);
        settings[key] = value;
        break;
      case 'depth':
      case 'concurrency':
        if (typeof value !== 'number') throw new ConfigurationError(`${source}: ${key} must be a number`);
        settings[key] = value;
        break;
      default:
        logger.warn('Ignoring unknown config file setting', { source, key });
    }
  }
  return settings;
}

async function loadConfigFile(path: string, explicit: boolean): Promise<FileSettings> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error) && !explicit) return {};
    if (isMissingFileError(error)) throw new ConfigurationError(`Config file not found: ${path}`);
    throw error;
  }
  return parseConfigFile(text, path);
}

/**
 * Loads and validates configuration from the helper arguments and environment.
 */
export async function loadConfig(invocation: HelperInvocation, options: LoadConfigOptions = {}): Promise<HelperConfig> {
  if (options.loadEnvFile ?? true) {
    loadDotenv();
  }
  const env = options.env ?? process.env;
  const git = options.git ?? runGit;

  const gitDir = await resolveGitDir(env, git);
  const explicitFile = env.DOKUWIKI_CONFIG;
  const file = await loadConfigFile(
    explicitFile ? resolve(explicitFile) : join(gitDir, 'dokuwiki', 'config.yaml'),
    Boolean(explicitFile)
  );

  const config = buildConfig(
    { remoteName: invocation.remote, remoteUrl: invocation.url ?? invocation.remote, gitDir },
    loadEnvironment(env),
    file
  );

  logger.debug('Configuration loaded', {
    wiki: config.remote.wikiUrl,
    namespace: config.remote.namespace || '(root)',
    extension: config.extension,
    depth: config.depth,
    concurrency: config.concurrency,
    conflictScope: config.conflictScope,
    stateDir: config.stateDir
  });

  return config;
}
