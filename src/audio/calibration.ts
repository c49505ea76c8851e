/**
 * Calibration — recommend a voice threshold from a recording that starts
 * with silence and then contains speech.
 *
 * recommended = min(max(backgroundMean + 0.02, voiceMin × 0.7), 0.3)
 */

import { frameDurationMs, frameEnergy } from './pcm.js';
import type { AudioFrame } from './types.js';

export const CALIBRATION_HEADROOM = 0.02;
export const CALIBRATION_VOICE_RATIO = 0.7;
export const CALIBRATION_CEILING = 0.3;

export interface CalibrationReport {
  frames: number;
  backgroundFrames: number;
  voiceFrames: number;
  backgroundMean: number;
  backgroundMax: number;
  /** null when nothing rose above the background */
  voiceMean: number | null;
  voiceMin: number | null;
  recommendedThreshold: number;
  /** Values to put under `threshold` in config.yaml */
  suggested: { initialNoiseFloor: number; initialMargin: number };
}

/**
 * @param silenceMs length of the silent lead-in
 */
export function calibrate(frames: Iterable<AudioFrame>, silenceMs: number): CalibrationReport {
  const background: number[] = [];
  const rest: number[] = [];
  let elapsed = 0;
  let total = 0;

  for (const frame of frames) {
    const energy = frameEnergy(frame.samples);
    if (elapsed < silenceMs) {
      background.push(energy);
    } else {
      rest.push(energy);
    }
    elapsed += frameDurationMs(frame);
    total++;
  }

  const backgroundMean = background.length > 0
    ? background.reduce((s, e) => s + e, 0) / background.length
    : 0;
  const backgroundMax = background.reduce((m, e) => Math.max(m, e), 0);

  const voice = rest.filter(e => e > backgroundMax);
  const voiceMean = voice.length > 0 ? voice.reduce((s, e) => s + e, 0) / voice.length : null;
  const voiceMin = voice.length > 0 ? voice.reduce((m, e) => Math.min(m, e), Infinity) : null;

  const floorBased = backgroundMean + CALIBRATION_HEADROOM;
  const voiceBased = voiceMin === null ? 0 : voiceMin * CALIBRATION_VOICE_RATIO;
  const recommendedThreshold = Math.min(Math.max(floorBased, voiceBased), CALIBRATION_CEILING);

  return {
    frames: total,
    backgroundFrames: background.length,
    voiceFrames: voice.length,
    backgroundMean,
    backgroundMax,
    voiceMean,
    voiceMin,
    recommendedThreshold,
    suggested: {
      initialNoiseFloor: backgroundMean,
      initialMargin: Math.max(recommendedThreshold - backgroundMean, 0),
    },
  };
}
