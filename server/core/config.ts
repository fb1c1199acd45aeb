import os from 'node:os';
import path from 'node:path';
import { getEnv, getEnvInt } from './env.js';

export type AppConfig = {
  port: number;
  corsOrigin: true | string | string[] | undefined;
  apiKey?: string; // shared secret for X-API-Key; unset = open
  retentionMs: number; // how long a finished job waits for its download
  tmpRoot: string; // parent of the per-job temp directories
  audioFormat: string; // --audio-format
  audioQuality: string; // --audio-quality
  ytDlpPath: string;
  ssePollMs: number;
  sseKeepAliveMs: number;
  rateLimitPerMin: number;
  publicDir: string;
};

export const DEFAULT_RETENTION_SEC = 10 * 60;

function parseCorsOrigin(input: string | undefined): AppConfig['corsOrigin'] {
  if (!input) return true; // allow any by default for dev
  const val = input.trim();
  if (val === 'disabled') return undefined;
  if (val === '*' || val === 'true') return true;
  // comma-separated list
  const parts = val.split(',').map(s => s.trim()).filter(Boolean);
  return parts.length > 1 ? parts : parts[0];
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const apiKey = getEnv(env, 'API_KEY');
  return {
    port: getEnvInt(env, 'PORT', 5000, 1),
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    apiKey: apiKey || undefined,
    retentionMs: getEnvInt(env, 'JOB_RETENTION_SEC', DEFAULT_RETENTION_SEC, 1) * 1000,
    tmpRoot: path.resolve(getEnv(env, 'TMP_DIR', os.tmpdir())),
    audioFormat: getEnv(env, 'AUDIO_FORMAT', 'mp3').toLowerCase(),
    audioQuality: getEnv(env, 'AUDIO_QUALITY', '192K'),
    ytDlpPath: getEnv(env, 'YTDLP_PATH', 'yt-dlp'),
    ssePollMs: getEnvInt(env, 'SSE_POLL_MS', 250, 1),
    sseKeepAliveMs: getEnvInt(env, 'SSE_KEEPALIVE_MS', 10_000, 1),
    rateLimitPerMin: getEnvInt(env, 'RATE_LIMIT_PER_MIN', 120, 1),
    publicDir: path.resolve(process.cwd(), getEnv(env, 'PUBLIC_DIR', 'server/public')),
  };
}
