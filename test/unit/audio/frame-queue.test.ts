import { describe, it, expect } from 'vitest';
import { FrameQueue } from '../../../src/audio/frame-queue.js';
import { frameAt } from '../../helpers/audio.js';

describe('FrameQueue', () => {
  it('delivers frames in push order', async () => {
    const q = new FrameQueue(4);
    q.push(frameAt(0, 1));
    q.push(frameAt(30, 2));
    expect((await q.next()).value?.timestamp).toBe(0);
    expect((await q.next()).value?.timestamp).toBe(30);
  });

  it('drops the oldest frame when full and counts it', async () => {
    const q = new FrameQueue(2);
    q.push(frameAt(0, 1));
    q.push(frameAt(30, 1));
    q.push(frameAt(60, 1));
    expect(q.droppedFrames).toBe(1);
    expect(q.length).toBe(2);
    expect((await q.next()).value?.timestamp).toBe(30);
  });

  it('hands a frame straight to a waiting consumer', async () => {
    const q = new FrameQueue(2);
    const pending = q.next();
    q.push(frameAt(90, 1));
    const result = await pending;
    expect(result.done).toBe(false);
    expect(result.value?.timestamp).toBe(90);
    expect(q.length).toBe(0);
  });

  it('drains buffered frames after close, then ends', async () => {
    const q = new FrameQueue(4);
    q.push(frameAt(0, 1));
    q.push(frameAt(30, 1));
    q.close();
    q.push(frameAt(60, 1));

    const seen: number[] = [];
    for await (const frame of q) {
      seen.push(frame.timestamp);
    }
    expect(seen).toEqual([0, 30]);
    expect(q.isClosed).toBe(true);
  });

  it('wakes a waiting consumer on close', async () => {
    const q = new FrameQueue(2);
    const pending = q.next();
    q.close();
    expect((await pending).done).toBe(true);
  });

  it('rejects a second concurrent consumer', async () => {
    const q = new FrameQueue(2);
    const first = q.next();
    await expect(q.next()).rejects.toThrow('FrameQueue supports a single consumer');
    q.close();
    await first;
  });
});
