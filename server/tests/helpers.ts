import fs from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { ConversionRequest, EngineHooks, EngineProgress, MediaEngine, MediaInfo } from '../core/engine.js';

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export async function makeTmpRoot(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'audio-relay-test-'));
}

export async function removeTmpRoot(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Entries of `root` (job directories the orchestrator created). */
export function listJobDirs(root: string): string[] {
  return fs.readdirSync(root).filter((name) => name.startsWith('job-'));
}

export function testConfig(tmpRoot: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    corsOrigin: true,
    apiKey: undefined,
    retentionMs: 60_000,
    tmpRoot,
    audioFormat: 'mp3',
    audioQuality: '192K',
    ytDlpPath: 'yt-dlp',
    ssePollMs: 10,
    sseKeepAliveMs: 10_000,
    rateLimitPerMin: 1000,
    publicDir: path.resolve(process.cwd(), 'server/public'),
    ...overrides,
  };
}

export type FakeScript = {
  /** Files (name → contents) written into the request's temp dir. */
  files?: Record<string, string>;
  progress?: EngineProgress[];
  info?: MediaInfo;
  /** Reject with this message instead of returning info. */
  fail?: string;
  /** Extraction waits for this before finishing. */
  gate?: Promise<void>;
};

/**
 * In-process stand-in for the yt-dlp engine
 */
export class FakeEngine implements MediaEngine {
  readonly requests: ConversionRequest[] = [];
  script: FakeScript;

  constructor(script: FakeScript = {}) {
    this.script = script;
  }

  async extract(request: ConversionRequest, hooks: EngineHooks = {}): Promise<MediaInfo> {
    this.requests.push(request);
    const { files = {}, progress = [], info = {}, fail, gate } = this.script;
    for (const event of progress) hooks.onProgress?.(event);
    if (gate) await gate;
    for (const [name, contents] of Object.entries(files)) {
      await writeFile(path.join(request.tempDir, name), contents);
    }
    if (fail) throw new Error(fail);
    return info;
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!check()) {
    if (Date.now() - started > timeoutMs) throw new Error('condition not met in time');
    await new Promise((r) => setTimeout(r, 5));
  }
}
