// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { WriteQueue, enqueueWrite, getWriteQueue } from '../src/write-queue.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WriteQueue', () => {
  it('runs operations one at a time in submission order', async () => {
    const queue = new WriteQueue();
    const events: string[] = [];
    let running = 0;
    let maxRunning = 0;

    const task = (name: string, ms: number) =>
      queue.run(async () => {
        running += 1;
        maxRunning = Math.max(maxRunning, running);
        events.push(`start:${name}`);
        await delay(ms);
        events.push(`end:${name}`);
        running -= 1;
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 0), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
    expect(maxRunning).toBe(1);
  });

  it('keeps going after a failed operation', async () => {
    const queue = new WriteQueue();
    const failing = queue.run(async () => {
      throw new Error('disk on fire');
    });
    const following = queue.run(async () => 'written');

    await expect(failing).rejects.toThrow('disk on fire');
    await expect(following).resolves.toBe('written');
  });

  it('tracks pending operations until idle', async () => {
    const queue = new WriteQueue();
    const first = queue.run(() => delay(5));
    const second = queue.run(() => delay(5));

    expect(queue.size).toBe(2);
    await queue.idle();
    expect(queue.size).toBe(0);
    await Promise.all([first, second]);
  });
});

describe('enqueueWrite', () => {
  const base = join('tmp', 'shellguard-queue');

  it('serializes writers of the same resolved path', async () => {
    const events: string[] = [];
    const write = (path: string, name: string, ms: number) =>
      enqueueWrite(path, async () => {
        events.push(`start:${name}`);
        await delay(ms);
        events.push(`end:${name}`);
      });

    await Promise.all([
      write(join(base, 'audit.log'), 'a', 15),
      write(join(base, 'nested', '..', 'audit.log'), 'b', 0),
    ]);

    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });

  it('keeps a queue only while writes are pending', async () => {
    const path = join(base, 'drain.log');
    expect(getWriteQueue(path)).toBeUndefined();

    const first = enqueueWrite(path, () => delay(5));
    const second = enqueueWrite(path, () => delay(5));
    const queue = getWriteQueue(path);

    expect(queue?.size).toBe(2);
    await first;
    expect(getWriteQueue(path)).toBe(queue);
    await second;
    expect(getWriteQueue(path)).toBeUndefined();
  });

  it('drops the queue after a failed write', async () => {
    const path = join(base, 'failing.log');

    await expect(
      enqueueWrite(path, async () => {
        throw new Error('disk on fire');
      }),
    ).rejects.toThrow('disk on fire');
    expect(getWriteQueue(path)).toBeUndefined();
  });
});
