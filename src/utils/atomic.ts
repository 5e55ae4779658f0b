import { writeFile, rename, unlink, mkdir } from 'fs/promises';
import { randomBytes } from 'crypto';
import { dirname } from 'path';
import { existsSync } from 'fs';
import { logger } from './logger.js';

/**
 * Atomic JSON write: temp file, then rename over the target.
 * Readers see the old file or the new one, never a partial write.
 */
export async function atomicWriteJSON(filePath: string, data: unknown): Promise<void> {
  const tempSuffix = randomBytes(8).toString('hex');
  const tempPath = `${filePath}.tmp.${tempSuffix}`;

  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf8');
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug({ err: cleanupError, tempPath }, 'atomicWrite.cleanupFailed');
    });
    throw error;
  }
}
