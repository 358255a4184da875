import { spawn } from 'child_process';
import { logger } from '../util/logger.js';

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface GitRunOptions {
  input?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs git with an argument vector (never through a shell). Injected wherever
 * git is needed so tests can replace it.
 */
export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<GitResult>;

export const runGit: GitRunner = (args, options = {}) =>
  new Promise<GitResult>((resolve, reject) => {
    const child = spawn('git', args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });
    child.on('error', reject);
    child.on('close', (code) => {
      logger.debug('git command finished', { args: args[0], code });
      resolve({ code: code ?? 1, stdout, stderr });
    });

    child.stdin.on('error', reject);
    child.stdin.end(options.input ?? '');
  });

/**
 * Resolve a ref to its object id, or null when it does not exist.
 */
export async function resolveRef(git: GitRunner, ref: string): Promise<string | null> {
  const result = await git(['rev-parse', '--verify', '-q', ref]);
  if (result.code !== 0) return null;
  const sha = result.stdout.trim();
  return sha.length > 0 ? sha : null;
}
