import { readFile, unlink } from 'fs/promises';
import { CookieJar } from 'tough-cookie';
import { atomicWriteJson, isMissingFileError } from '../fs/atomicWriter.js';
import { logger } from '../util/logger.js';

/**
 * Cookie jar persisted as JSON between helper invocations, so a fetch does
 * not have to log in again while the wiki session is alive.
 */
export class CookieStore {
  private constructor(
    readonly jar: CookieJar,
    readonly filePath: string,
    private loaded: boolean
  ) {}

  static async open(filePath: string): Promise<CookieStore> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return new CookieStore(new CookieJar(), filePath, false);
      }
      throw error;
    }

    try {
      const jar = await CookieJar.deserialize(text);
      logger.debug('Cookies loaded', { path: filePath });
      return new CookieStore(jar, filePath, true);
    } catch (error) {
      logger.warn('Ignoring unreadable cookie file', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error)
      });
      return new CookieStore(new CookieJar(), filePath, false);
    }
  }

  /** True when cookies came from disk and have not been discarded since. */
  get hasPersistedSession(): boolean {
    return this.loaded;
  }

  async save(): Promise<void> {
    const serialized = await this.jar.serialize();
    await atomicWriteJson(this.filePath, serialized, { mode: 0o600 });
    logger.debug('Cookies saved', { path: this.filePath });
  }

  /** Forget every cookie, in memory and on disk. */
  async discard(): Promise<void> {
    await this.jar.removeAllCookies();
    this.loaded = false;
    try {
      await unlink(this.filePath);
    } catch (error) {
      if (!isMissingFileError(error)) throw error;
    }
    logger.debug('Cookies discarded', { path: this.filePath });
  }
}
