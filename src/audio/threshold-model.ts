/**
 * NoiseThresholdModel — Adaptive voice-presence threshold.
 *
 * Tracks an exponentially weighted estimate of background energy and derives
 * the threshold as noise floor + margin. The margin is widened or narrowed by
 * the correction learner and decays slowly back toward its minimum.
 *
 * Every mutation is synchronous, so a snapshot taken between two calls is
 * always a complete state.
 */

import { getLogger } from '../core/logger.js';
import type { ThresholdConfig } from '../core/types.js';
import type { ThresholdState } from './types.js';

export interface ManualThreshold {
  noiseFloor?: number;
  margin?: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export class NoiseThresholdModel {
  private noiseFloor: number;
  private margin: number;
  private adaptive = true;
  private readonly logger = getLogger();

  constructor(private readonly config: ThresholdConfig) {
    this.noiseFloor = clamp(config.initialNoiseFloor, 0, 1);
    this.margin = clamp(config.initialMargin, config.marginMin, config.marginMax);
  }

  // ─────────────────────────────────────────────────────────
  // ADAPTATION
  // ─────────────────────────────────────────────────────────

  /**
   * Feed the energy of a frame that the gate classified as silence.
   */
  update(energy: number): ThresholdState {
    if (this.adaptive && Number.isFinite(energy)) {
      const e = clamp(energy, 0, 1);
      this.noiseFloor += this.config.adaptationRate * (e - this.noiseFloor);
      this.margin = Math.max(this.config.marginMin, this.margin - this.config.marginDecay);
    }
    return this.snapshot();
  }

  /**
   * Raise the margin, making detection stricter. Returns the applied delta.
   */
  widenMargin(step: number): number {
    return this.shiftMargin(Math.abs(step));
  }

  /**
   * Lower the margin, making detection more permissive. Returns the applied delta.
   */
  narrowMargin(step: number): number {
    return this.shiftMargin(-Math.abs(step));
  }

  // ─────────────────────────────────────────────────────────
  // MANUAL OVERRIDE
  // ─────────────────────────────────────────────────────────

  /**
   * Pin floor and/or margin. Adaptation stays off until enableAdaptation().
   */
  setManual(values: ManualThreshold): ThresholdState {
    if (values.noiseFloor !== undefined) {
      this.noiseFloor = clamp(values.noiseFloor, 0, 1);
    }
    if (values.margin !== undefined) {
      this.margin = clamp(values.margin, this.config.marginMin, this.config.marginMax);
    }
    this.adaptive = false;
    this.logger.info({ noiseFloor: this.noiseFloor, margin: this.margin }, 'Manual threshold override');
    return this.snapshot();
  }

  enableAdaptation(): void {
    this.adaptive = true;
  }

  isAdaptive(): boolean {
    return this.adaptive;
  }

  // ─────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────

  snapshot(): ThresholdState {
    const threshold = clamp(
      this.noiseFloor + this.margin,
      this.config.thresholdMin,
      this.config.thresholdMax,
    );
    return Object.freeze({
      noiseFloor: this.noiseFloor,
      margin: this.margin,
      threshold,
      enterThreshold: threshold,
      exitThreshold: Math.max(threshold - this.config.hysteresis, 0),
      hysteresis: this.config.hysteresis,
      adaptationRate: this.config.adaptationRate,
      adaptive: this.adaptive,
    });
  }

  private shiftMargin(delta: number): number {
    if (!this.adaptive) {
      this.logger.debug({ delta }, 'Margin adjustment skipped: manual override active');
      return 0;
    }
    const before = this.margin;
    this.margin = clamp(this.margin + delta, this.config.marginMin, this.config.marginMax);
    return this.margin - before;
  }
}
