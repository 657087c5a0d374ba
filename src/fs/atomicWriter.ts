import { writeFile, mkdir, rename, unlink } from 'fs/promises';
import { dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { logger } from '../logger.js';
import { errorMessage } from '../utils.js';

/**
 * Write content to a temporary sibling file, then rename it over the target.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tempPath = generateTempPath(filePath);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, content, { encoding: 'utf8' });
    await rename(tempPath, filePath);

    logger.debug('Atomic write completed', { path: filePath, size: content.length });
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      logger.warn('Failed to cleanup temp file', { tempPath, error: errorMessage(cleanupError) });
    }

    logger.error('Atomic write failed', { path: filePath, tempPath, error: errorMessage(error) });
    throw error;
  }
}

function generateTempPath(filePath: string): string {
  const randomSuffix = randomBytes(8).toString('hex');
  return join(dirname(filePath), `.tmp-${randomSuffix}`);
}
