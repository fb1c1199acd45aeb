import { randomUUID } from 'node:crypto';
import { mkdtemp } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger.js';
import type { EngineProgress, MediaEngine } from './engine.js';
import type { JobStore } from './JobStore.js';
import type { Reclaimer } from './Reclaimer.js';
import { ProgressChannel, type ProgressEvent, type TerminalEvent } from './ProgressChannel.js';
import { assembleDeliverable, type Deliverable } from './deliverable.js';
import { removeDir } from './cleanup.js';
import { errorMessage } from './httpError.js';
import { jobsFinished, jobsStarted } from './metrics.js';

export type JobPhase = 'created' | 'running' | 'succeeded' | 'failed';

export const CONVERTING_NOTE = 'download finished, converting...';

export type OrchestratorDeps = {
  engine: MediaEngine;
  store: JobStore;
  reclaimer: Reclaimer;
  log: Logger;
  tmpRoot: string;
  retentionMs: number;
  audioFormat: string;
  now?: () => number;
};

export type StartedJob = {
  token: string;
  channel: ProgressChannel;
  /** Settles after the terminal event is pushed; never rejects. */
  task: Promise<void>;
};

export type ConvertedFile = Deliverable & { tempDir: string };

/**
 * Map one engine callback to the event the client sees
 */
export function toProgressEvent(progress: EngineProgress): ProgressEvent {
  if (progress.status === 'finished') {
    return { type: 'status', text: CONVERTING_NOTE };
  }
  const total = progress.totalBytes || progress.totalBytesEstimate || 0;
  const downloaded = progress.downloadedBytes ?? 0;
  const percent = total > 0 ? Math.min(100, Math.max(0, (downloaded / total) * 100)) : null;
  return {
    type: 'downloading',
    percent,
    speedBps: progress.speed ?? null,
    etaSeconds: progress.eta ?? null,
    sourceFilename: progress.filename ?? null,
  };
}

/**
 * ConversionOrchestrator - drives each job from launch to terminal event
 *
 * Lifecycle per job: created → running → succeeded | failed.
 * The worker is an async task detached from the request that started it; its
 * handle stays in `tasks` until the terminal event has been pushed.
 */
export class ConversionOrchestrator {
  private tasks = new Set<Promise<void>>();
  private phases = new Map<string, JobPhase>();
  private readonly deps: OrchestratorDeps;
  private readonly now: () => number;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Launch a job and hand back its event channel
   */
  start(url: string): StartedJob {
    const token = randomUUID();
    const channel = new ProgressChannel();
    this.setPhase(token, 'created');

    const task = this.run(token, url, channel);
    this.tasks.add(task);
    void task.finally(() => {
      this.tasks.delete(task);
      this.phases.delete(token);
    });

    return { token, channel, task };
  }

  /**
   * Convert without registering a job; the caller owns `tempDir` afterwards.
   */
  async convert(url: string): Promise<ConvertedFile> {
    const { engine, log } = this.deps;
    const tempDir = await this.allocateTempDir();
    jobsStarted.inc();
    try {
      const info = await engine.extract({ url, tempDir });
      const deliverable = await assembleDeliverable(info, tempDir, this.deps.audioFormat, log);
      jobsFinished.inc({ outcome: 'succeeded' });
      return { ...deliverable, tempDir };
    } catch (err) {
      jobsFinished.inc({ outcome: 'failed' });
      log.error('convert_failed', { url, error: errorMessage(err) });
      await removeDir(tempDir, log, 'failed');
      throw err;
    }
  }

  /** Resolves once every running job has pushed its terminal event. */
  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(Array.from(this.tasks));
    }
  }

  get running(): number {
    return this.tasks.size;
  }

  phaseOf(token: string): JobPhase | undefined {
    return this.phases.get(token);
  }

  private async run(token: string, url: string, channel: ProgressChannel): Promise<void> {
    const { engine, store, reclaimer, log, retentionMs, audioFormat } = this.deps;
    let outcome: TerminalEvent | undefined;
    let tempDir: string | undefined;

    try {
      tempDir = await this.allocateTempDir();
      this.setPhase(token, 'running');
      jobsStarted.inc();

      const info = await engine.extract(
        { url, tempDir },
        {
          onProgress: (progress) => {
            try {
              channel.push(toProgressEvent(progress));
            } catch (err) {
              log.error('progress_hook_error', { token, error: String(err) });
            }
          },
        },
      );

      const deliverable = await assembleDeliverable(info, tempDir, audioFormat, log);
      store.put({
        token,
        outputPath: deliverable.outputPath,
        displayName: deliverable.displayName,
        expiresAt: this.now() + retentionMs,
      });
      reclaimer.schedule(token, retentionMs);

      this.setPhase(token, 'succeeded');
      jobsFinished.inc({ outcome: 'succeeded' });
      outcome = { type: 'done', token, displayName: deliverable.displayName };
    } catch (err) {
      const message = errorMessage(err);
      this.setPhase(token, 'failed');
      jobsFinished.inc({ outcome: 'failed' });
      log.error('job_failed', { token, url, error: message });
      outcome = { type: 'failed', message };
      if (tempDir) await removeDir(tempDir, log, 'failed');
    } finally {
      channel.push(outcome ?? { type: 'failed', message: 'unknown error' });
      channel.close();
    }
  }

  private allocateTempDir(): Promise<string> {
    return mkdtemp(path.join(this.deps.tmpRoot, 'job-'));
  }

  private setPhase(token: string, phase: JobPhase) {
    this.phases.set(token, phase);
    this.deps.log.debug('job_phase', { token, phase });
  }
}
