/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a reader of the target path sees either the
 * previous file or the complete new one. Downloads of the same dataset from
 * concurrent processes land on the same path; the PID and timestamp in the
 * temp name keep their partial writes apart.
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const logger = createLogger({ module: 'core/atomic-write' });

/**
 * Atomically write binary data to a file
 *
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteBuffer('/data/meps/h171.ssp', entry.getData());
 * ```
 */
export async function atomicWriteBuffer(filePath: string, data: Uint8Array): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug('Temp file cleanup skipped', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}
