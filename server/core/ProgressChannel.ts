import { setTimeout as delay } from 'node:timers/promises';

export type DownloadingEvent = {
  type: 'downloading';
  percent: number | null;
  speedBps: number | null;
  etaSeconds: number | null;
  sourceFilename: string | null;
};

export type StatusEvent = { type: 'status'; text: string };
export type DoneEvent = { type: 'done'; token: string; displayName: string };
export type FailedEvent = { type: 'failed'; message: string };

export type TerminalEvent = DoneEvent | FailedEvent;
export type ProgressEvent = DownloadingEvent | StatusEvent | TerminalEvent;

export type ChannelItem = { kind: 'event'; event: ProgressEvent } | { kind: 'keepalive' };

export type DrainOptions = {
  /** Sleep between empty polls. */
  pollMs?: number;
  /** Idle time before a keep-alive marker is yielded. */
  keepAliveMs?: number;
  /** Aborts the consumer only; the producer is untouched. */
  signal?: AbortSignal;
};

export const isTerminal = (event: ProgressEvent): event is TerminalEvent =>
  event.type === 'done' || event.type === 'failed';

/**
 * ProgressChannel - ordered, unbounded event queue between one conversion
 * worker and one stream writer
 *
 * The producer pushes events, then its terminal event, then calls close().
 * The consumer stops only once the channel is closed *and* empty, so a close
 * that races ahead of delivery never loses an event.
 */
export class ProgressChannel {
  private queue: ProgressEvent[] = [];
  private closed = false;
  private terminal: TerminalEvent | undefined;

  /**
   * Append an event. Anything after the terminal event is refused.
   */
  push(event: ProgressEvent): boolean {
    if (this.closed || this.terminal) return false;
    if (isTerminal(event)) this.terminal = event;
    this.queue.push(event);
    return true;
  }

  close(): void {
    this.closed = true;
  }

  tryPop(): ProgressEvent | undefined {
    return this.queue.shift();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isDrained(): boolean {
    return this.closed && this.queue.length === 0;
  }

  get pending(): number {
    return this.queue.length;
  }

  get terminalEvent(): TerminalEvent | undefined {
    return this.terminal;
  }

  async *drain(options: DrainOptions = {}): AsyncGenerator<ChannelItem> {
    const pollMs = Math.max(1, options.pollMs ?? 250);
    const keepAliveMs = Math.max(pollMs, options.keepAliveMs ?? 10_000);
    const { signal } = options;
    let idleMs = 0;

    while (!this.isDrained) {
      if (signal?.aborted) return;

      const event = this.tryPop();
      if (event) {
        idleMs = 0;
        yield { kind: 'event', event };
        continue;
      }

      if (idleMs >= keepAliveMs) {
        idleMs = 0;
        yield { kind: 'keepalive' };
      }

      try {
        await delay(pollMs, undefined, { signal });
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }
      idleMs += pollMs;
    }
  }
}
