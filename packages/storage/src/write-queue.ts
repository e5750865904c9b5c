// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { resolve } from 'path';

/**
 * Single-writer queue: operations run one at a time, in submission order.
 * A failed operation does not stall the ones queued behind it.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async run<T>(op: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let releaseCurrent: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });

    this.tail = previous.then(() => current);
    this.pending += 1;

    try {
      await previous;
      return await op();
    } finally {
      this.pending -= 1;
      releaseCurrent();
    }
  }

  /** Operations queued or running. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has settled. */
  async idle(): Promise<void> {
    await this.tail;
  }
}

const writeQueues = new Map<string, WriteQueue>();

/**
 * Run `op` on the process-wide queue for a file. Every writer of the same
 * resolved path shares the queue, however many store instances point there.
 * The queue is dropped once it drains.
 */
export async function enqueueWrite<T>(filePath: string, op: () => Promise<T>): Promise<T> {
  const key = resolve(filePath);
  let queue = writeQueues.get(key);
  if (!queue) {
    queue = new WriteQueue();
    writeQueues.set(key, queue);
  }

  try {
    return await queue.run(op);
  } finally {
    if (queue.size === 0 && writeQueues.get(key) === queue) {
      writeQueues.delete(key);
    }
  }
}

/**
 * The live queue for a file, if writes to it are queued or running.
 */
export function getWriteQueue(filePath: string): WriteQueue | undefined {
  return writeQueues.get(resolve(filePath));
}
