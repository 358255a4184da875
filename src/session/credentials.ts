import type { GitRunner } from '../git/gitCommand.js';
import { logger } from '../util/logger.js';

export interface Credentials {
  username: string;
  password: string;
}

/**
 * A source of username/password pairs that can be told whether the pair
 * worked.
 */
export interface CredentialSource {
  fill(): Promise<Credentials | null>;
  approve(credentials: Credentials): Promise<void>;
  reject(credentials: Credentials): Promise<void>;
}

export interface CredentialTarget {
  protocol: string;
  host: string;
  username?: string;
}

function encode(fields: Record<string, string | undefined>): string {
  const lines = Object.entries(fields)
    .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '')
    .map(([key, value]) => `${key}=${value}`);
  return lines.join('\n') + '\n\n';
}

export function parseCredentialOutput(output: string): Partial<Credentials> {
  const result: Partial<Credentials> = {};
  for (const line of output.split('\n')) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq);
    const value = line.slice(eq + 1).replace(/\r$/, '');
    if (key === 'username') result.username = value;
    if (key === 'password') result.password = value;
  }
  return result;
}

/**
 * `git credential fill|approve|reject` for the wiki host.
 */
export class GitCredentialHelper implements CredentialSource {
  constructor(
    private readonly git: GitRunner,
    private readonly target: CredentialTarget
  ) {}

  async fill(): Promise<Credentials | null> {
    const result = await this.git(['credential', 'fill'], {
      input: encode({
        protocol: this.target.protocol,
        host: this.target.host,
        username: this.target.username
      })
    });
    if (result.code !== 0) {
      logger.debug('git credential fill failed', { code: result.code, stderr: result.stderr.trim() });
      return null;
    }
    const { username, password } = parseCredentialOutput(result.stdout);
    if (!username || !password) return null;
    return { username, password };
  }

  approve(credentials: Credentials): Promise<void> {
    return this.report('approve', credentials);
  }

  reject(credentials: Credentials): Promise<void> {
    return this.report('reject', credentials);
  }

  private async report(action: 'approve' | 'reject', credentials: Credentials): Promise<void> {
    const result = await this.git(['credential', action], {
      input: encode({
        protocol: this.target.protocol,
        host: this.target.host,
        username: credentials.username,
        password: credentials.password
      })
    });
    if (result.code !== 0) {
      logger.warn(`git credential ${action} failed`, { code: result.code });
    }
  }
}
