/**
 * Split a byte stream of raw s16le mono PCM into fixed-size AudioFrames.
 */

import type { Readable } from 'node:stream';
import type { AudioFrame } from './types.js';

export interface PcmReaderOptions {
  sampleRate: number;
  frameMs: number;
  /** Timestamp of the first sample (ms). Defaults to 0. */
  startAt?: number;
}

export async function* readPcmFrames(
  stream: Readable | AsyncIterable<Buffer>,
  options: PcmReaderOptions,
): AsyncGenerator<AudioFrame> {
  const samplesPerFrame = Math.max(1, Math.round((options.sampleRate * options.frameMs) / 1000));
  const bytesPerFrame = samplesPerFrame * 2;
  const startAt = options.startAt ?? 0;
  let pending: Buffer = Buffer.alloc(0);
  let emittedSamples = 0;

  for await (const chunk of stream) {
    const bytes: Buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : Buffer.from(chunk);
    pending = pending.length > 0 ? Buffer.concat([pending, bytes]) : bytes;

    while (pending.length >= bytesPerFrame) {
      const samples = new Int16Array(samplesPerFrame);
      for (let i = 0; i < samplesPerFrame; i++) {
        samples[i] = pending.readInt16LE(i * 2);
      }
      pending = pending.subarray(bytesPerFrame);
      yield {
        samples,
        sampleRate: options.sampleRate,
        timestamp: startAt + (emittedSamples / options.sampleRate) * 1000,
      };
      emittedSamples += samplesPerFrame;
    }
  }
  // A trailing partial frame is dropped.
}
