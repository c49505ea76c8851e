import { describe, it, expect } from 'vitest';
import { calibrate } from '../../../src/audio/calibration.js';
import { sequence } from '../../helpers/audio.js';

const BACKGROUND = 328;   // energy ≈ 0.0100
const VOICE = 6554;       // energy ≈ 0.2000

describe('calibrate', () => {
  it('recommends the voice-based threshold when speech is present', () => {
    const frames = sequence([[3, BACKGROUND], [1, 100], [2, VOICE]]);
    const report = calibrate(frames, 90);

    expect(report.frames).toBe(6);
    expect(report.backgroundFrames).toBe(3);
    expect(report.voiceFrames).toBe(2);
    expect(report.backgroundMean).toBeCloseTo(0.01001, 5);
    expect(report.voiceMin).toBeCloseTo(0.2, 4);
    expect(report.recommendedThreshold).toBeCloseTo(0.14, 4);
    expect(report.suggested.initialNoiseFloor).toBeCloseTo(0.01001, 5);
    expect(report.suggested.initialMargin).toBeCloseTo(0.13, 3);
  });

  it('falls back to background plus headroom without speech', () => {
    const report = calibrate(sequence([[6, BACKGROUND]]), 90);
    expect(report.voiceFrames).toBe(0);
    expect(report.voiceMean).toBeNull();
    expect(report.voiceMin).toBeNull();
    expect(report.recommendedThreshold).toBeCloseTo(0.03001, 5);
  });

  it('never recommends above the ceiling', () => {
    const report = calibrate(sequence([[3, 16384], [3, 32000]]), 90);
    expect(report.recommendedThreshold).toBe(0.3);
  });
});
