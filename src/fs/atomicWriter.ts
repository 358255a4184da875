import { writeFile, mkdir, rename, unlink, open } from 'fs/promises';
import { dirname, join, basename } from 'path';
import { randomBytes } from 'crypto';
import { logger } from '../util/logger.js';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  mode?: number;
  ensureDir?: boolean;
}

/**
 * Atomically write content to a file using a temporary file and rename
 */
export async function atomicWriteFile(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const {
    encoding = 'utf8',
    mode,
    ensureDir = true
  } = options;

  const tempPath = generateTempPath(filePath);

  try {
    if (ensureDir) {
      await mkdir(dirname(filePath), { recursive: true });
    }

    if (typeof content === 'string') {
      await writeFile(tempPath, content, { encoding, mode });
    } else {
      await writeFile(tempPath, content, { mode });
    }

    await rename(tempPath, filePath);

    logger.debug('Atomic write completed', {
      path: filePath,
      size: content.length
    });
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug('Temp file cleanup skipped', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
      });
    });

    logger.error('Atomic write failed', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error)
    });

    throw error;
  }
}

/**
 * Atomically write JSON data to a file
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: Omit<AtomicWriteOptions, 'encoding'> = {}
): Promise<void> {
  const content = JSON.stringify(data, null, 2) + '\n';
  await atomicWriteFile(filePath, content, {
    ...options,
    encoding: 'utf8'
  });
}

/**
 * Append a block of text with a single write and flush it to disk before
 * returning. A crash can leave at most a torn final line behind.
 */
export async function durableAppend(filePath: string, content: string): Promise<void> {
  if (content.length === 0) return;
  await mkdir(dirname(filePath), { recursive: true });
  const handle = await open(filePath, 'a');
  try {
    await handle.write(content);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function generateTempPath(filePath: string): string {
  const randomSuffix = randomBytes(8).toString('hex');
  return join(dirname(filePath), `.${basename(filePath)}.tmp-${randomSuffix}`);
}
