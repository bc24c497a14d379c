import { describe, it, expect } from 'vitest';
import { AsyncQueue } from './async-queue';

describe('AsyncQueue', () => {
  it('hands items to waiting and later consumers in order', async () => {
    const q = new AsyncQueue<number>();
    const first = q.next();
    q.push(1);
    q.push(2);
    expect(await first).toEqual({ value: 1, done: false });
    expect(q.size).toBe(1);
    expect(await q.next()).toEqual({ value: 2, done: false });
  });

  it('drains buffered items after close, then ends', async () => {
    const q = new AsyncQueue<string>();
    q.push('a');
    q.close();
    expect(q.push('b')).toBe(false);
    const out: string[] = [];
    for await (const s of q) out.push(s);
    expect(out).toEqual(['a']);
  });

  it('releases pending consumers on close', async () => {
    const q = new AsyncQueue<string>();
    const pending = q.next();
    q.close();
    expect(await pending).toEqual({ value: undefined, done: true });
  });
});
