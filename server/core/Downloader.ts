import { spawn, type ChildProcess } from 'node:child_process';
import path from 'node:path';
import readline from 'node:readline';
import type { Logger } from './logger.js';
import { EngineError } from './httpError.js';
import {
  MediaInfoSchema,
  RawProgressSchema,
  toEngineProgress,
  type ConversionRequest,
  type EngineHooks,
  type EngineProgress,
  type MediaEngine,
  type MediaInfo,
} from './engine.js';

const PROGRESS_PREFIX = '[progress] ';

export type DownloaderOptions = {
  ytDlpPath?: string;
  audioFormat?: string;
  audioQuality?: string;
  /** Child environment; defaults to process.env minus proxy variables. */
  env?: NodeJS.ProcessEnv;
};

/**
 * Downloader - yt-dlp wrapper implementing the media engine
 *
 * Runs one yt-dlp process per request: best audio, extracted and converted
 * by ffmpeg, written as `%(title)s.<ext>` into the request's temp directory.
 * Progress comes from a JSON progress template; the final info dict from
 * `--dump-single-json --no-simulate` on stdout.
 */
export class Downloader implements MediaEngine {
  private readonly log: Logger;
  private readonly ytDlpPath: string;
  private readonly audioFormat: string;
  private readonly audioQuality: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(log: Logger, options: DownloaderOptions = {}) {
    this.log = log;
    this.ytDlpPath = options.ytDlpPath ?? 'yt-dlp';
    this.audioFormat = options.audioFormat ?? 'mp3';
    this.audioQuality = options.audioQuality ?? '192K';
    this.env = options.env ?? cleanedChildEnv(process.env);
  }

  extract(request: ConversionRequest, hooks: EngineHooks = {}): Promise<MediaInfo> {
    const args = this.buildArgs(request);

    this.log.info('downloader_start', { url: request.url, tempDir: request.tempDir });

    return new Promise<MediaInfo>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(this.ytDlpPath, args, {
          stdio: ['ignore', 'pipe', 'pipe'],
          env: this.env,
          windowsHide: true,
        });
      } catch (err) {
        reject(new EngineError(`Failed to spawn yt-dlp: ${String(err)}`));
        return;
      }

      const stdoutLines: string[] = [];
      const stderrLines: string[] = [];
      let settled = false;

      const onLine = (sink: string[]) => (line: string) => {
        const progress = parseProgressLine(line);
        if (progress) {
          this.emit(hooks, progress);
          return;
        }
        if (line.trim()) sink.push(line);
      };

      let pendingStreams = 0;
      let exitCode: number | null | undefined;
      const finish = () => {
        if (settled || exitCode === undefined || pendingStreams > 0) return;
        settled = true;
        if (exitCode === 0) {
          try {
            resolve(parseInfo(stdoutLines));
            this.log.info('downloader_success', { url: request.url });
          } catch (err) {
            reject(new EngineError(`Unreadable yt-dlp output: ${String(err)}`));
          }
          return;
        }
        const message = extractErrorMessage(stderrLines, exitCode);
        this.log.error('downloader_failed', { url: request.url, exitCode, error: message });
        reject(new EngineError(message));
      };

      for (const [stream, sink] of [
        [child.stdout, stdoutLines],
        [child.stderr, stderrLines],
      ] as const) {
        if (!stream) continue;
        pendingStreams += 1;
        const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
        rl.on('line', onLine(sink));
        rl.on('close', () => {
          pendingStreams -= 1;
          finish();
        });
      }

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        this.log.error('downloader_spawn_error', { error: String(err) });
        reject(new EngineError(`Failed to spawn yt-dlp: ${err.message}`));
      });

      child.on('close', (code) => {
        exitCode = code;
        finish();
      });
    });
  }

  /**
   * Build yt-dlp command arguments for one request
   */
  buildArgs(request: ConversionRequest): string[] {
    return [
      '--no-warnings',
      '--no-colors',
      '--newline',
      '--progress',
      '--no-check-certificates',
      '--progress-template', `download:${PROGRESS_PREFIX}%(progress)j`,
      '-f', 'bestaudio/best',
      '-x',
      '--audio-format', this.audioFormat,
      '--audio-quality', this.audioQuality,
      '-o', path.join(request.tempDir, '%(title)s.%(ext)s'),
      '--dump-single-json',
      '--no-simulate',
      request.url,
    ];
  }

  private emit(hooks: EngineHooks, progress: EngineProgress) {
    try {
      hooks.onProgress?.(progress);
    } catch (err) {
      this.log.error('progress_hook_error', { error: String(err) });
    }
  }
}

/**
 * Parse one structured progress line, or null when the line is something else
 */
export function parseProgressLine(line: string): EngineProgress | null {
  const idx = line.indexOf(PROGRESS_PREFIX);
  if (idx < 0) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(line.slice(idx + PROGRESS_PREFIX.length));
  } catch {
    return null;
  }
  const parsed = RawProgressSchema.safeParse(raw);
  return parsed.success ? toEngineProgress(parsed.data) : null;
}

/**
 * The info dict is the last JSON object printed on stdout
 */
export function parseInfo(stdoutLines: string[]): MediaInfo {
  for (let i = stdoutLines.length - 1; i >= 0; i -= 1) {
    const line = stdoutLines[i].trim();
    if (!line.startsWith('{')) continue;
    return MediaInfoSchema.parse(JSON.parse(line));
  }
  throw new Error('no info JSON on stdout');
}

/**
 * yt-dlp reports fatal problems as `ERROR: ...` on stderr; keep the last one verbatim
 */
export function extractErrorMessage(stderrLines: string[], exitCode: number | null): string {
  const errors = stderrLines.filter((line) => line.startsWith('ERROR:'));
  const last = errors.length ? errors[errors.length - 1] : stderrLines[stderrLines.length - 1];
  return last?.trim() || `yt-dlp exited with code ${exitCode ?? 'null'}`;
}

// Remove proxy-related env vars from the child process
export function cleanedChildEnv(base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env = { ...base };
  if (base.ALLOW_UPSTREAM_PROXY === '1') return env;
  for (const k of ['HTTP_PROXY', 'http_proxy', 'HTTPS_PROXY', 'https_proxy', 'ALL_PROXY', 'all_proxy']) {
    delete env[k];
  }
  return env;
}
