import fs from 'node:fs';
import archiver from 'archiver';
import type { Logger } from './logger.js';

export type ArchiveEntry = {
  /** File on disk. */
  sourcePath: string;
  /** Name inside the archive. */
  name: string;
};

/**
 * Write a deflated zip at `target` holding the given entries
 */
export async function writeZipArchive(target: string, entries: ArchiveEntry[], log: Logger): Promise<void> {
  const output = fs.createWriteStream(target);
  const archive = archiver('zip', { zlib: { level: 6 } });

  const written = new Promise<void>((resolve, reject) => {
    output.on('close', resolve);
    output.on('error', reject);
    archive.on('error', reject);
  });
  archive.on('warning', (err) => {
    log.warn('zip_warning', { target, error: String(err) });
  });

  archive.pipe(output);
  for (const entry of entries) {
    archive.file(entry.sourcePath, { name: entry.name });
  }
  await Promise.all([archive.finalize(), written]);
}
