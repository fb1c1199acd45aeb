import type { Logger } from './logger.js';

/**
 * A finished conversion waiting to be downloaded or reclaimed.
 */
export interface Job {
  token: string;
  /** Deliverable inside the job's private temp directory. */
  outputPath: string;
  /** Attachment name shown to the client. */
  displayName: string;
  /** Epoch ms after which the reclaimer deletes the job. */
  expiresAt: number;
}

/**
 * JobStore - registry of completed jobs keyed by opaque token
 *
 * Handlers and timers all run on the event loop thread, so each method body
 * executes without interleaving: `take` is an atomic remove-and-return and
 * whichever of download/reclaim calls it first owns the files.
 */
export class JobStore {
  private jobs = new Map<string, Job>();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  put(job: Job): void {
    if (this.jobs.has(job.token)) {
      throw new Error(`token already registered: ${job.token}`);
    }
    this.jobs.set(job.token, job);
    this.log.info('job_registered', { token: job.token, displayName: job.displayName, expiresAt: job.expiresAt });
  }

  /**
   * Remove and return the job; a second call for the same token returns undefined.
   */
  take(token: string): Job | undefined {
    const job = this.jobs.get(token);
    if (!job) return undefined;
    this.jobs.delete(token);
    this.log.debug('job_taken', { token });
    return job;
  }

  /** Read without consuming. */
  peek(token: string): Job | undefined {
    return this.jobs.get(token);
  }

  /** Remove and return every stored job. */
  drain(): Job[] {
    const all = Array.from(this.jobs.values());
    this.jobs.clear();
    return all;
  }

  get size(): number {
    return this.jobs.size;
  }
}
