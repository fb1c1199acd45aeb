import fs from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JobStore } from '../core/JobStore.js';
import { Reclaimer } from '../core/Reclaimer.js';
import { createMockLogger, makeTmpRoot, removeTmpRoot, waitFor } from './helpers.js';

describe('Reclaimer', () => {
  let root: string;
  let store: JobStore;
  let reclaimer: Reclaimer;

  async function storeJob(token: string): Promise<string> {
    const dir = path.join(root, `job-${token}`);
    await mkdir(dir);
    const outputPath = path.join(dir, 'track.mp3');
    await writeFile(outputPath, 'audio');
    store.put({ token, outputPath, displayName: 'track.mp3', expiresAt: Date.now() });
    return dir;
  }

  beforeEach(async () => {
    root = await makeTmpRoot();
    const log = createMockLogger();
    store = new JobStore(log);
    reclaimer = new Reclaimer(store, log);
  });

  afterEach(async () => {
    reclaimer.dispose();
    await removeTmpRoot(root);
  });

  it('deletes the job directory when the timer fires', async () => {
    const dir = await storeJob('t1');
    reclaimer.schedule('t1', 5);
    expect(reclaimer.scheduled).toBe(1);

    await waitFor(() => reclaimer.scheduled === 0);
    await reclaimer.idle();

    expect(store.peek('t1')).toBeUndefined();
    expect(fs.existsSync(dir)).toBe(false);
  });

  it('is a no-op when the job was already taken', async () => {
    const dir = await storeJob('t1');
    const taken = store.take('t1');
    expect(taken?.token).toBe('t1');

    await expect(reclaimer.reclaim('t1')).resolves.toBe(false);
    // Directory now belongs to whoever took the job
    expect(fs.existsSync(dir)).toBe(true);
  });

  it('reclaims only once when called twice', async () => {
    await storeJob('t1');
    await expect(reclaimer.reclaim('t1')).resolves.toBe(true);
    await expect(reclaimer.reclaim('t1')).resolves.toBe(false);
  });

  it('dispose cancels armed timers', async () => {
    const dir = await storeJob('t1');
    reclaimer.schedule('t1', 20);
    reclaimer.dispose();
    expect(reclaimer.scheduled).toBe(0);

    await new Promise((r) => setTimeout(r, 40));
    expect(store.peek('t1')?.token).toBe('t1');
    expect(fs.existsSync(dir)).toBe(true);
  });

  it('shutdown removes every stored job', async () => {
    const a = await storeJob('a');
    const b = await storeJob('b');
    reclaimer.schedule('a', 60_000);

    await expect(reclaimer.shutdown()).resolves.toBe(2);
    expect(store.size).toBe(0);
    expect(fs.existsSync(a)).toBe(false);
    expect(fs.existsSync(b)).toBe(false);
  });
});
