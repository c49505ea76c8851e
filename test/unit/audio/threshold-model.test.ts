import { describe, it, expect } from 'vitest';
import { NoiseThresholdModel } from '../../../src/audio/threshold-model.js';
import { defaultConfig } from '../../../src/core/config.js';

function model(overrides = {}): NoiseThresholdModel {
  return new NoiseThresholdModel({ ...defaultConfig().threshold, ...overrides });
}

describe('NoiseThresholdModel', () => {
  it('starts from the configured floor and margin', () => {
    const state = model().snapshot();
    expect(state.noiseFloor).toBe(0.01);
    expect(state.margin).toBe(0.02);
    expect(state.threshold).toBeCloseTo(0.03, 10);
    expect(state.enterThreshold).toBeCloseTo(0.03, 10);
    expect(state.exitThreshold).toBeCloseTo(0.025, 10);
    expect(state.adaptive).toBe(true);
  });

  it('returns frozen snapshots', () => {
    const state = model().snapshot();
    expect(Object.isFrozen(state)).toBe(true);
  });

  describe('update', () => {
    it('moves the floor toward silence energy and decays the margin', () => {
      const state = model().update(0.05);
      expect(state.noiseFloor).toBeCloseTo(0.012, 10);
      expect(state.margin).toBeCloseTo(0.01999, 10);
    });

    it('never decays the margin below its minimum', () => {
      const m = model({ initialMargin: 0.01, marginDecay: 0.005 });
      expect(m.update(0).margin).toBe(0.01);
    });

    it('ignores non-finite energy', () => {
      const m = model();
      m.update(Number.NaN);
      expect(m.snapshot().noiseFloor).toBe(0.01);
    });

    it('clamps the threshold to the configured ceiling', () => {
      const m = model();
      for (let i = 0; i < 200; i++) m.update(1);
      expect(m.snapshot().threshold).toBe(0.3);
    });
  });

  describe('margin adjustment', () => {
    it('widens and reports the applied delta', () => {
      const m = model();
      expect(m.widenMargin(0.005)).toBeCloseTo(0.005, 10);
      expect(m.snapshot().margin).toBeCloseTo(0.025, 10);
    });

    it('clamps widening at marginMax', () => {
      const m = model();
      expect(m.widenMargin(1)).toBeCloseTo(0.08, 10);
      expect(m.snapshot().margin).toBe(0.1);
    });

    it('clamps narrowing at marginMin', () => {
      const m = model();
      expect(m.narrowMargin(0.05)).toBeCloseTo(-0.01, 10);
      expect(m.snapshot().margin).toBe(0.01);
    });

    it('treats the step sign as irrelevant', () => {
      const m = model();
      expect(m.widenMargin(-0.005)).toBeCloseTo(0.005, 10);
    });
  });

  describe('manual override', () => {
    it('pins values and suspends adaptation', () => {
      const m = model();
      const pinned = m.setManual({ margin: 0.05 });
      expect(pinned.margin).toBe(0.05);
      expect(pinned.adaptive).toBe(false);

      m.update(0.2);
      expect(m.widenMargin(0.01)).toBe(0);
      expect(m.snapshot().noiseFloor).toBe(0.01);
      expect(m.snapshot().margin).toBe(0.05);
    });

    it('clamps manual values', () => {
      const state = model().setManual({ noiseFloor: 2, margin: 0.5 });
      expect(state.noiseFloor).toBe(1);
      expect(state.margin).toBe(0.1);
      expect(state.threshold).toBe(0.3);
    });

    it('resumes adaptation on request', () => {
      const m = model();
      m.setManual({ margin: 0.05 });
      m.enableAdaptation();
      expect(m.isAdaptive()).toBe(true);
      expect(m.update(0.05).noiseFloor).toBeCloseTo(0.012, 10);
    });
  });
});
