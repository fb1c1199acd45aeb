import { rm } from 'node:fs/promises';
import type { Logger } from './logger.js';

/**
 * Recursively delete a job directory. Failures are logged, never thrown:
 * cleanup must not change what the client sees.
 */
export async function removeDir(dir: string, log: Logger, reason: string): Promise<boolean> {
  try {
    await rm(dir, { recursive: true, force: true });
    log.info('job_dir_removed', { dir, reason });
    return true;
  } catch (err) {
    log.error('job_dir_remove_failed', { dir, reason, error: String(err) });
    return false;
  }
}
