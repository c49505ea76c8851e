import type { AudioFrame } from './types.js';

const INT16_SCALE = 32768;

/**
 * Root-mean-square energy of a frame, normalized to 0-1.
 */
export function frameEnergy(samples: Int16Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const s = samples[i] / INT16_SCALE;
    sum += s * s;
  }
  return Math.sqrt(sum / samples.length);
}

export function frameDurationMs(frame: AudioFrame): number {
  return (frame.samples.length / frame.sampleRate) * 1000;
}

export function concatSamples(frames: readonly AudioFrame[]): Int16Array {
  let total = 0;
  for (const f of frames) total += f.samples.length;
  const out = new Int16Array(total);
  let offset = 0;
  for (const f of frames) {
    out.set(f.samples, offset);
    offset += f.samples.length;
  }
  return out;
}

/**
 * Wrap mono 16-bit PCM in a RIFF/WAVE container.
 */
export function encodeWav(samples: Int16Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const buf = Buffer.alloc(44 + dataBytes);

  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);          // fmt chunk size
  buf.writeUInt16LE(1, 20);           // PCM
  buf.writeUInt16LE(1, 22);           // mono
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28);
  buf.writeUInt16LE(2, 32);           // block align
  buf.writeUInt16LE(16, 34);          // bits per sample
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    buf.writeInt16LE(samples[i], 44 + i * 2);
  }
  return buf;
}
