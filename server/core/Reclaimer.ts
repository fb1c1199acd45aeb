import path from 'node:path';
import type { Logger } from './logger.js';
import type { JobStore } from './JobStore.js';
import { removeDir } from './cleanup.js';
import { jobsReclaimed } from './metrics.js';

/**
 * Reclaimer - one-shot deferred deletion of finished jobs
 *
 * Each scheduled token gets its own timer. On fire the job is taken from the
 * store; if the download route got there first the take returns nothing and
 * the timer is a no-op. Timers are unref'd and owned here, so `dispose()` or
 * `shutdown()` is the whole teardown.
 */
export class Reclaimer {
  private timers = new Map<string, NodeJS.Timeout>();
  private pending = new Set<Promise<void>>();
  private readonly store: JobStore;
  private readonly log: Logger;

  constructor(store: JobStore, log: Logger) {
    this.store = store;
    this.log = log;
  }

  schedule(token: string, delayMs: number): void {
    const previous = this.timers.get(token);
    if (previous) clearTimeout(previous);

    const timer = setTimeout(() => {
      this.timers.delete(token);
      this.track(this.reclaim(token));
    }, Math.max(0, delayMs));
    timer.unref();
    this.timers.set(token, timer);
    this.log.debug('reclaim_scheduled', { token, delayMs });
  }

  /**
   * Take the job if still stored and delete its directory.
   * Resolves false when the token was already consumed.
   */
  async reclaim(token: string): Promise<boolean> {
    const job = this.store.take(token);
    if (!job) {
      this.log.debug('reclaim_skipped', { token });
      return false;
    }
    const removed = await removeDir(path.dirname(job.outputPath), this.log, 'expired');
    if (removed) jobsReclaimed.inc({ via: 'expired' });
    this.log.info('job_reclaimed', { token, removed });
    return true;
  }

  /** Number of armed timers. */
  get scheduled(): number {
    return this.timers.size;
  }

  /** Wait for reclamations already in flight. */
  async idle(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  dispose(): void {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  /** Clear every timer and delete every job still stored. */
  async shutdown(): Promise<number> {
    this.dispose();
    await this.idle();
    const jobs = this.store.drain();
    const results = await Promise.all(
      jobs.map((job) => removeDir(path.dirname(job.outputPath), this.log, 'shutdown')),
    );
    const removed = results.filter(Boolean).length;
    if (removed > 0) jobsReclaimed.inc({ via: 'shutdown' }, removed);
    this.log.info('reclaimer_shutdown', { jobs: jobs.length, removed });
    return jobs.length;
  }

  private track(task: Promise<boolean>) {
    const done = task.then(
      () => undefined,
      (err: unknown) => {
        this.log.error('reclaim_failed', { error: String(err) });
      },
    );
    this.pending.add(done);
    void done.finally(() => this.pending.delete(done));
  }
}
