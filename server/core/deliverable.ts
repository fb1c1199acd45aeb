/**
 * Turn the engine's output directory into one downloadable file:
 * the converted track, or a zip of every playlist entry that could be found.
 */

import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger.js';
import type { MediaInfo } from './engine.js';
import { NotFoundError } from './httpError.js';
import { writeZipArchive, type ArchiveEntry } from './archive.js';

export const FALLBACK_NAME = 'untitled';
export const MAX_NAME_LENGTH = 200;

const UNSAFE_CHARS = /[\\/:*?"<>|]+/g;

export type Deliverable = {
  kind: 'single' | 'archive';
  outputPath: string;
  displayName: string;
  /** Archive members; empty for a single file. */
  entries: ArchiveEntry[];
};

/**
 * Replace filesystem-unsafe characters with spaces, collapse whitespace,
 * trim, and cap the length. Empty input yields the fallback name.
 */
export function sanitizeFilename(name: string | null | undefined, maxLength = MAX_NAME_LENGTH): string {
  if (!name) return FALLBACK_NAME;
  let out = name.replace(UNSAFE_CHARS, ' ').replace(/\s+/g, ' ').trim();
  if (out.length > maxLength) out = out.slice(0, maxLength).trimEnd();
  return out || FALLBACK_NAME;
}

async function fileExists(full: string): Promise<boolean> {
  try {
    return (await stat(full)).isFile();
  } catch {
    return false;
  }
}

/**
 * Files in `dir` carrying the extension (case-insensitive), sorted by name
 */
export async function listCandidates(dir: string, ext: string): Promise<string[]> {
  const wanted = ext.toLowerCase();
  const names = await readdir(dir);
  return names.filter((f) => f.toLowerCase().endsWith(wanted)).sort();
}

/**
 * Locate one playlist entry's output: `<title><ext>` if present, otherwise the
 * first unused candidate whose name contains the entry id or the title.
 * Substring matching is approximate when titles are near-identical.
 */
export async function findEntryFile(
  dir: string,
  ext: string,
  entry: { id?: string; title: string },
  used: ReadonlySet<string>,
): Promise<{ file: string; name: string } | undefined> {
  const exact = `${entry.title}${ext}`;
  if (!used.has(exact) && (await fileExists(path.join(dir, exact)))) {
    return { file: exact, name: exact };
  }
  for (const fname of await listCandidates(dir, ext)) {
    if (used.has(fname)) continue;
    if ((entry.id && fname.includes(entry.id)) || fname.includes(entry.title)) {
      return { file: fname, name: fname };
    }
  }
  return undefined;
}

/**
 * Locate a single item's output: exact name, sole candidate, first candidate
 * containing the title, first candidate.
 */
export async function findSingleFile(dir: string, ext: string, title: string): Promise<string> {
  const exact = `${title}${ext}`;
  if (await fileExists(path.join(dir, exact))) return exact;

  const candidates = await listCandidates(dir, ext);
  if (candidates.length === 0) {
    throw new NotFoundError('expected output file not found after download');
  }
  if (candidates.length === 1) return candidates[0];
  return candidates.find((f) => f.includes(title)) ?? candidates[0];
}

export async function assembleDeliverable(
  info: MediaInfo,
  dir: string,
  ext: string,
  log: Logger,
): Promise<Deliverable> {
  const dotExt = ext.startsWith('.') ? ext : `.${ext}`;

  if (info.entries && info.entries.length > 0) {
    const playlistTitle = sanitizeFilename(info.title || 'playlist');
    const displayName = `${playlistTitle}.zip`;
    const outputPath = path.join(dir, displayName);
    const used = new Set<string>();
    const entries: ArchiveEntry[] = [];

    for (const entry of info.entries) {
      if (!entry) continue;
      const title = sanitizeFilename(entry.title || entry.id || FALLBACK_NAME);
      const found = await findEntryFile(dir, dotExt, { id: entry.id, title }, used);
      if (!found) {
        log.warn('playlist_entry_missing', { id: entry.id, title });
        continue;
      }
      used.add(found.file);
      entries.push({ sourcePath: path.join(dir, found.file), name: found.name });
    }

    await writeZipArchive(outputPath, entries, log);
    log.info('playlist_archived', { displayName, entries: entries.length, expected: info.entries.length });
    return { kind: 'archive', outputPath, displayName, entries };
  }

  const title = sanitizeFilename(info.title || info.id || 'video');
  const file = await findSingleFile(dir, dotExt, title);
  return { kind: 'single', outputPath: path.join(dir, file), displayName: file, entries: [] };
}
