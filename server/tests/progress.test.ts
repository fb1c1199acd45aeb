import type { Server } from 'node:http';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp, type AppContext } from '../app.js';
import { CONVERTING_NOTE } from '../core/ConversionOrchestrator.js';
import {
  FakeEngine,
  createMockLogger,
  deferred,
  listJobDirs,
  makeTmpRoot,
  removeTmpRoot,
  testConfig,
  type FakeScript,
} from './helpers.js';

type SseMessage = { event: string; data: unknown };

function parseSse(text: string): SseMessage[] {
  const out: SseMessage[] = [];
  for (const block of text.split('\n\n')) {
    const lines = block.split('\n');
    const event = lines.find((l) => l.startsWith('event: '));
    const data = lines.find((l) => l.startsWith('data: '));
    if (event && data) {
      out.push({ event: event.slice('event: '.length), data: JSON.parse(data.slice('data: '.length)) });
    }
  }
  return out;
}

describe('GET /progress', () => {
  let root: string;
  let engine: FakeEngine;
  let ctx: AppContext;
  let server: Server;
  let base: string;

  async function boot(script: FakeScript) {
    engine = new FakeEngine(script);
    ctx = createApp({ config: testConfig(root), engine, log: createMockLogger() });
    server = ctx.app.listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    base = `http://127.0.0.1:${address.port}`;
  }

  beforeEach(async () => {
    root = await makeTmpRoot();
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await ctx.orchestrator.settled();
    await ctx.shutdown();
    await removeTmpRoot(root);
  });

  it('streams progress, then done with a token that downloads once', async () => {
    await boot({
      progress: [{ status: 'downloading', downloadedBytes: 1, totalBytes: 4 }, { status: 'finished' }],
      files: { 'Song.mp3': 'audio' },
      info: { id: 'abc', title: 'Song' },
    });

    const res = await fetch(`${base}/progress?url=${encodeURIComponent('https://youtu.be/abc')}`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/event-stream');
    expect(res.headers.get('cache-control')).toBe('no-store');

    const text = await res.text();
    expect(text.startsWith(': keep-alive\n\n')).toBe(true);
    const messages = parseSse(text);
    expect(messages.slice(0, 2)).toEqual([
      {
        event: 'progress',
        data: { status: 'downloading', percent: 25, speed: null, eta: null, filename: null },
      },
      { event: 'progress', data: { status: CONVERTING_NOTE } },
    ]);
    expect(messages).toHaveLength(3);
    const token = /"token":"([^"]+)"/.exec(text)?.[1] ?? '';
    expect(messages[2]).toEqual({ event: 'done', data: { token, filename: 'Song.mp3' } });

    const first = await request(ctx.app).get(`/download/${token}`).responseType('blob');
    expect(first.status).toBe(200);
    expect(Buffer.from(first.body).toString('utf8')).toBe('audio');

    const second = await request(ctx.app).get(`/download/${token}`);
    expect(second.status).toBe(404);
    expect(second.body).toEqual({ error: 'invalid or expired token' });
  });

  it('ends with an error event when the engine fails', async () => {
    await boot({ fail: 'ERROR: [youtube] abc: Video unavailable' });

    const res = await fetch(`${base}/progress?url=${encodeURIComponent('https://youtu.be/abc')}`);
    const messages = parseSse(await res.text());

    expect(messages).toEqual([{ event: 'error', data: { error: 'ERROR: [youtube] abc: Video unavailable' } }]);
    expect(ctx.store.size).toBe(0);
    expect(listJobDirs(root)).toEqual([]);
  });

  it('rejects an unsupported url before starting anything', async () => {
    await boot({});

    const res = await request(ctx.app).get('/progress').query({ url: 'https://example.com/watch?v=1' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'unsupported url domain' });
    expect(engine.requests).toEqual([]);
    expect(listJobDirs(root)).toEqual([]);
  });

  it('rejects a missing url', async () => {
    await boot({});

    const res = await request(ctx.app).get('/progress');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'missing url parameter' });
  });

  it('keeps converting after the client disconnects', async () => {
    const gate = deferred();
    await boot({ gate: gate.promise, files: { 'Song.mp3': 'audio' }, info: { title: 'Song' } });

    const abort = new AbortController();
    const res = await fetch(`${base}/progress?url=${encodeURIComponent('https://youtu.be/abc')}`, {
      signal: abort.signal,
    });
    expect(res.status).toBe(200);
    abort.abort();

    gate.resolve();
    await ctx.orchestrator.settled();

    expect(ctx.store.size).toBe(1);
    expect(ctx.reclaimer.scheduled).toBe(1);
  });
});
