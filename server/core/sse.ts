import type { ProgressEvent } from './ProgressChannel.js';

export const SSE_KEEP_ALIVE = ': keep-alive\n\n';

export type WireEvent = {
  name: 'progress' | 'done' | 'error';
  data: Record<string, unknown>;
};

export function formatSseEvent(name: string, data: unknown): string {
  return `event: ${name}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Client-facing shape of each channel event
 */
export function toWireEvent(event: ProgressEvent): WireEvent {
  switch (event.type) {
    case 'downloading':
      return {
        name: 'progress',
        data: {
          status: 'downloading',
          percent: event.percent,
          speed: event.speedBps,
          eta: event.etaSeconds,
          filename: event.sourceFilename,
        },
      };
    case 'status':
      return { name: 'progress', data: { status: event.text } };
    case 'done':
      return { name: 'done', data: { token: event.token, filename: event.displayName } };
    case 'failed':
      return { name: 'error', data: { error: event.message } };
  }
}
