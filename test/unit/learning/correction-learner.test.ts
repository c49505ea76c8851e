import { describe, it, expect, beforeEach } from 'vitest';
import { CorrectionLearner } from '../../../src/learning/correction-learner.js';
import type { LearningUpdate } from '../../../src/learning/types.js';
import { ClassifierState } from '../../../src/intent/classifier-state.js';
import { NoiseThresholdModel } from '../../../src/audio/threshold-model.js';
import { TranscriptNormalizer } from '../../../src/asr/normalize.js';
import { defaultConfig } from '../../../src/core/config.js';
import type { CorrectionIgnoredError } from '../../../src/core/errors.js';
import { turn } from '../../helpers/turns.js';

describe('CorrectionLearner', () => {
  let now: number;
  let state: ClassifierState;
  let threshold: NoiseThresholdModel;
  let normalizer: TranscriptNormalizer;
  let learner: CorrectionLearner;
  let updates: LearningUpdate[];
  let ignored: CorrectionIgnoredError[];

  beforeEach(() => {
    const config = defaultConfig();
    now = 1000;
    state = new ClassifierState(config.learning);
    threshold = new NoiseThresholdModel(config.threshold);
    normalizer = new TranscriptNormalizer(config.asr.locale);
    learner = new CorrectionLearner({
      state,
      threshold,
      normalizer,
      config: config.learning,
      floors: config.classifier,
      clock: () => now,
    });
    updates = [];
    ignored = [];
    learner.on('update', (u: LearningUpdate) => updates.push(u));
    learner.on('ignored', (e: CorrectionIgnoredError) => ignored.push(e));
  });

  function explicit(extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      reason: 'explicit',
      turnId: 'turn_1',
      text: 'open mail',
      turnAt: 0,
      predictedTaskType: 'query',
      correctedTaskType: 'app-control',
      correctedSlots: { operation: 'launch', app: 'thunderbird' },
      ...extra,
    };
  }

  describe('explicit corrections', () => {
    it('shifts weights toward the corrected task type and away from the predicted one', () => {
      learner.observe(explicit());

      expect(updates).toHaveLength(1);
      const [update] = updates;
      expect(update.reason).toBe('explicit');
      expect(update.weightDeltas?.['app-control']).toBeCloseTo(0.1, 10);
      expect(update.weightDeltas?.query).toBeCloseTo(-0.1, 10);
      expect(state.weight('app-control')).toBeCloseTo(1.1, 10);
      expect(state.weight('query')).toBeCloseTo(0.9, 10);
    });

    it('learns the phrase with its corrected slots', () => {
      learner.observe(explicit());
      expect(updates[0].learnedPhrase).toBe(true);
      expect(state.lookupPhrase('open mail')).toEqual({
        taskType: 'app-control',
        slots: { operation: 'launch', app: 'thunderbird' },
      });
    });

    it('leaves the unknown type unweighted', () => {
      learner.observe(explicit({ correctedTaskType: 'unknown' }));
      expect(Object.keys(updates[0].weightDeltas ?? {})).toEqual(['query']);
    });

    it('learns a transcript correction when the corrected text differs', () => {
      learner.observe(explicit({ text: 'call bob', correctedText: 'call rob' }));
      expect(updates[0].learnedCorrection).toBe(true);
      expect(normalizer.normalize('call bob')).toBe('call rob');
    });

    it('does not learn a correction identical to the heard text', () => {
      learner.observe(explicit({ correctedText: 'Open mail.' }));
      expect(updates[0].learnedCorrection).toBe(false);
    });

    it('clears a suspect mark on the corrected text', () => {
      state.markSuspect('open mail', 'query');
      learner.observe(explicit());
      expect(state.isSuspect('open mail')).toBe(false);
    });

    it('nudges the margin by half a step on an explicit threshold signal', () => {
      learner.observe(explicit({ thresholdSignal: 'too-permissive' }));
      expect(updates[0].marginDelta).toBeCloseTo(0.0025, 10);
      expect(threshold.snapshot().margin).toBeCloseTo(0.0225, 10);
    });

    it('derives a permissive signal from loud trailing audio', () => {
      learner.observe(explicit({ energy: { peak: 0.3, mean: 0.1, trailing: 0.05, noiseFloor: 0.01 } }));
      expect(updates[0].marginDelta).toBeCloseTo(0.0025, 10);
    });

    it('derives a strict signal from quiet trailing audio', () => {
      learner.observe(explicit({ energy: { peak: 0.3, mean: 0.1, trailing: 0.015, noiseFloor: 0.01 } }));
      expect(updates[0].marginDelta).toBeCloseTo(-0.0025, 10);
      expect(threshold.snapshot().margin).toBeCloseTo(0.0175, 10);
    });

    it('leaves the margin alone without a signal or energy profile', () => {
      learner.observe(explicit());
      expect(updates[0].marginDelta).toBe(0);
      expect(threshold.snapshot().margin).toBe(0.02);
    });
  });

  describe('rejected events', () => {
    it('ignores malformed events', () => {
      learner.observe({ reason: 'explicit', turnId: 'turn_1' });
      learner.observe(null);
      learner.observe({ reason: 'praise', turnId: 'turn_1', text: 'x', turnAt: 0 });

      expect(updates).toEqual([]);
      expect(ignored.map(e => e.reason)).toEqual(['malformed', 'malformed', 'malformed']);
      expect(ignored[0].message).toMatch(/^Malformed correction event: /);
      expect(ignored[0].code).toBe('CORRECTION_IGNORED');
    });

    it('ignores corrections older than the window', () => {
      now = 300_001;
      learner.observe(explicit());

      expect(updates).toEqual([]);
      expect(ignored).toHaveLength(1);
      expect(ignored[0].reason).toBe('out-of-window');
      expect(ignored[0].message).toBe(
        'Correction for turn turn_1 arrived 300001ms after it, window is 300000ms',
      );
      expect(state.weight('app-control')).toBe(1);
    });

    it('accepts a correction exactly at the window edge', () => {
      now = 300_000;
      learner.observe(explicit());
      expect(updates).toHaveLength(1);
    });
  });

  describe('execution failures', () => {
    it('marks the transcript suspect for its task type', () => {
      learner.observe({
        reason: 'execution-failure',
        turnId: 'turn_1',
        text: 'open notes',
        turnAt: 0,
        taskType: 'app-control',
      });
      expect(updates[0]).toEqual({ reason: 'execution-failure', turnId: 'turn_1', text: 'open notes', suspect: true });
      expect(state.suspectTaskType('open notes')).toBe('app-control');
    });

    it('does not mark unknown task types', () => {
      learner.observe({
        reason: 'execution-failure',
        turnId: 'turn_1',
        text: 'open notes',
        turnAt: 0,
        taskType: 'unknown',
      });
      expect(updates[0].suspect).toBe(false);
      expect(state.isSuspect('open notes')).toBe(false);
    });
  });

  describe('recordTurn', () => {
    it('derives an execution-failure event from a failed command', () => {
      learner.recordTurn(turn({ text: 'open notes', outcome: 'failed', createdAt: 500 }));
      expect(updates.map(u => u.reason)).toEqual(['execution-failure']);
      expect(state.isSuspect('open notes')).toBe(true);
    });

    it('derives nothing from a failed turn without a command', () => {
      learner.recordTurn(turn({ text: 'open notes', outcome: 'failed', command: null, createdAt: 500 }));
      expect(updates).toEqual([]);
    });

    it('clears the suspect mark when the same text later succeeds', () => {
      state.markSuspect('open notes', 'app-control');
      learner.recordTurn(turn({ text: 'open notes', outcome: 'succeeded', createdAt: 500 }));
      expect(state.isSuspect('open notes')).toBe(false);
    });

    it('settles the confirmed transcript rather than the confirming one', () => {
      state.markSuspect('open notes', 'app-control');
      learner.recordTurn(turn({ text: 'yes', confirms: 'open notes', outcome: 'succeeded', createdAt: 500 }));
      expect(state.isSuspect('open notes')).toBe(false);

      learner.recordTurn(turn({ text: 'yes', confirms: 'open notes', outcome: 'failed', createdAt: 600 }));
      expect(state.suspectTaskType('open notes')).toBe('app-control');
      expect(state.isSuspect('yes')).toBe(false);
    });

    it('widens the margin and relaxes floors when an utterance keeps being repeated', () => {
      now = 2000;
      learner.recordTurn(turn({ text: 'open notes', outcome: 'succeeded', createdAt: 0 }));
      learner.recordTurn(turn({ text: 'open notes', outcome: 'failed', createdAt: 1000 }));
      learner.recordTurn(turn({ text: 'open notes', outcome: 'succeeded', createdAt: 2000 }));

      expect(updates.map(u => u.reason)).toEqual(['execution-failure', 'repeated-utterance']);
      const repeated = updates[1];
      expect(repeated.marginDelta).toBeCloseTo(0.005, 10);
      expect(repeated.floorRelief).toBeCloseTo(0.05, 10);
      expect(threshold.snapshot().margin).toBeCloseTo(0.025, 10);
      expect(state.floorFor('open notes', 0.35, 0.2)).toBeCloseTo(0.3, 10);
      expect(state.isSuspect('open notes')).toBe(false);
    });

    it('does not treat identical outcomes as a repetition', () => {
      now = 2000;
      for (const at of [0, 1000, 2000]) {
        learner.recordTurn(turn({ text: 'open notes', outcome: 'succeeded', createdAt: at }));
      }
      expect(updates).toEqual([]);
    });
  });
});
