/**
 * FrameQueue — Bounded channel between audio capture and the gate.
 *
 * The producer never blocks: when the queue is full the oldest frame is
 * dropped. A single consumer drains it with `for await`.
 */

import { CircularBuffer } from '../utils/circular-buffer.js';
import type { AudioFrame } from './types.js';

export class FrameQueue implements AsyncIterable<AudioFrame> {
  private readonly buffer: CircularBuffer<AudioFrame>;
  private waiter: ((result: IteratorResult<AudioFrame>) => void) | null = null;
  private closed = false;
  private dropped = 0;

  constructor(capacity: number) {
    this.buffer = new CircularBuffer<AudioFrame>(capacity);
  }

  push(frame: AudioFrame): void {
    if (this.closed) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: frame, done: false });
      return;
    }

    if (this.buffer.push(frame) !== undefined) {
      this.dropped++;
    }
  }

  /**
   * Stop accepting frames. Buffered frames are still delivered.
   */
  close(): void {
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  get length(): number {
    return this.buffer.length;
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<AudioFrame>> {
    const frame = this.buffer.shift();
    if (frame !== undefined) {
      return Promise.resolve({ value: frame, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('FrameQueue supports a single consumer'));
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<AudioFrame> {
    return { next: () => this.next() };
  }
}
