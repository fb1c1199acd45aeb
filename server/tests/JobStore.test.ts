import { beforeEach, describe, expect, it } from 'vitest';
import { JobStore, type Job } from '../core/JobStore.js';
import { createMockLogger } from './helpers.js';

const job = (token: string): Job => ({
  token,
  outputPath: `/tmp/job-${token}/track.mp3`,
  displayName: 'track.mp3',
  expiresAt: 1_000,
});

describe('JobStore', () => {
  let store: JobStore;

  beforeEach(() => {
    store = new JobStore(createMockLogger());
  });

  it('returns a stored job exactly once from take', () => {
    store.put(job('t1'));
    expect(store.take('t1')).toEqual(job('t1'));
    expect(store.take('t1')).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('peeks without consuming', () => {
    store.put(job('t1'));
    expect(store.peek('t1')?.displayName).toBe('track.mp3');
    expect(store.size).toBe(1);
    expect(store.take('t1')?.token).toBe('t1');
  });

  it('returns undefined for unknown tokens', () => {
    expect(store.take('nope')).toBeUndefined();
    expect(store.peek('nope')).toBeUndefined();
  });

  it('refuses a duplicate token', () => {
    store.put(job('t1'));
    expect(() => store.put(job('t1'))).toThrow('token already registered: t1');
  });

  it('drains every job', () => {
    store.put(job('a'));
    store.put(job('b'));
    expect(store.drain().map((j) => j.token)).toEqual(['a', 'b']);
    expect(store.size).toBe(0);
  });
});
