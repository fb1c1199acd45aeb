import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../core/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({ TMP_DIR: '/tmp/relay' });
    expect(cfg).toMatchObject({
      port: 5000,
      corsOrigin: true,
      apiKey: undefined,
      retentionMs: 600_000,
      tmpRoot: '/tmp/relay',
      audioFormat: 'mp3',
      audioQuality: '192K',
      ytDlpPath: 'yt-dlp',
      ssePollMs: 250,
      sseKeepAliveMs: 10_000,
      rateLimitPerMin: 120,
      publicDir: path.resolve(process.cwd(), 'server/public'),
    });
  });

  it('reads overrides and ignores invalid numbers', () => {
    const cfg = loadConfig({
      PORT: '8080',
      API_KEY: ' test-secret ',
      JOB_RETENTION_SEC: '0',
      AUDIO_FORMAT: 'M4A',
      CORS_ORIGIN: 'https://a.test, https://b.test',
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.apiKey).toBe('test-secret');
    expect(cfg.retentionMs).toBe(600_000);
    expect(cfg.audioFormat).toBe('m4a');
    expect(cfg.corsOrigin).toEqual(['https://a.test', 'https://b.test']);
  });

  it('can disable CORS entirely', () => {
    expect(loadConfig({ CORS_ORIGIN: 'disabled' }).corsOrigin).toBeUndefined();
    expect(loadConfig({ CORS_ORIGIN: 'https://only.test' }).corsOrigin).toBe('https://only.test');
  });
});
