import type { Response } from 'express';
import fs from 'node:fs';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger.js';

/**
 * HTTP response utilities
 * Consistent header setting and response helpers
 */

/**
 * Set no-cache headers (HTTP/1.0 and HTTP/1.1 compatible)
 * Use for all download/streaming/SSE responses
 */
export const setNoStore = (res: Response): void => {
  res.setHeader('Cache-Control', 'no-store');
  res.setHeader('Pragma', 'no-cache');
};

/**
 * Set SSE headers
 */
export const setSseHeaders = (res: Response): void => {
  res.setHeader('Content-Type', 'text/event-stream');
  setNoStore(res);
  res.setHeader('X-Accel-Buffering', 'no');
  res.setHeader('Connection', 'keep-alive');
};

/**
 * Set download headers with RFC 5987 filename* encoding for Unicode support
 */
export const setDownloadHeaders = (res: Response, filename: string, size?: number): void => {
  // RFC 5987: filename* with UTF-8 encoding for better Unicode support
  const asciiSafe = filename.replace(/[^\x20-\x7E]/g, '_').replace(/["\\]/g, '_'); // ASCII fallback
  const utf8Encoded = encodeURIComponent(filename);
  res.setHeader('Content-Disposition', `attachment; filename="${asciiSafe}"; filename*=UTF-8''${utf8Encoded}`);
  if (size !== undefined) {
    res.setHeader('Content-Length', String(size));
  }
  setNoStore(res);
};

const CONTENT_TYPES: Record<string, string> = {
  '.zip': 'application/zip',
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.opus': 'audio/opus',
  '.ogg': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.flac': 'audio/flac',
  '.wav': 'audio/wav',
};

export const contentTypeFor = (filename: string): string =>
  CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';

/**
 * Append value to Vary header
 */
export const appendVary = (res: Response, value: string): void => {
  const existing = res.getHeader('Vary');
  if (!existing) {
    res.setHeader('Vary', value);
    return;
  }
  const parts = String(existing)
    .split(',')
    .map((s) => s.trim().toLowerCase());
  const lower = value.toLowerCase();
  if (!parts.includes(lower)) {
    parts.push(lower);
    res.setHeader('Vary', parts.join(', '));
  }
};

/**
 * Stream a file as an attachment. `onClose` runs exactly once when the
 * response closes, whether the transfer finished or the client went away,
 * or right away when the response is already gone.
 * Throws (before touching the response) when the file cannot be stat'ed.
 */
export async function streamAttachment(
  res: Response,
  filePath: string,
  displayName: string,
  log: Logger,
  onClose: () => void,
): Promise<void> {
  const { size } = await stat(filePath);
  if (res.destroyed) {
    onClose();
    return;
  }
  res.setHeader('Content-Type', contentTypeFor(displayName));
  setDownloadHeaders(res, displayName, size);

  let closed = false;
  const stream = fs.createReadStream(filePath);
  res.on('close', () => {
    if (closed) return;
    closed = true;
    stream.destroy();
    onClose();
  });
  stream.on('error', (err) => {
    log.error('attachment_read_failed', { filePath, error: String(err) });
    if (!res.headersSent) res.status(500).json({ error: 'file read failed' });
    else res.destroy(err);
  });
  stream.pipe(res);
}
