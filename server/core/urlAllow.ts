import { domainToASCII } from 'node:url';

const YOUTUBE_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'music.youtube.com']);
const SHORT_HOSTS = new Set(['youtu.be', 'www.youtu.be']);

const stripTrailingDots = (value: string) => value.replace(/\.+$/, '');

function normalizeHost(value: string) {
  return domainToASCII(stripTrailingDots(value)).toLowerCase();
}

/**
 * Recognized source shapes:
 *   youtube.com/watch?v=<id>, youtube.com/playlist?list=<id>, youtu.be/<id>
 * A missing scheme is read as https.
 */
export function isSupportedUrl(raw: string | undefined): boolean {
  const input = (raw ?? '').trim();
  if (!input) return false;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `https://${input}`;

  let u: URL;
  try {
    u = new URL(withScheme);
  } catch {
    return false;
  }
  if (u.protocol !== 'http:' && u.protocol !== 'https:') return false;

  const host = normalizeHost(u.hostname);
  const pathname = u.pathname.replace(/\/+$/, '');

  if (YOUTUBE_HOSTS.has(host)) {
    if (pathname === '/watch') return Boolean(u.searchParams.get('v'));
    if (pathname === '/playlist') return Boolean(u.searchParams.get('list'));
    return false;
  }
  if (SHORT_HOSTS.has(host)) {
    return /^\/[\w-]+$/.test(pathname);
  }
  return false;
}
