/**
 * CorrectionLearner — narrow, bounded parameter updates from feedback.
 *
 *   explicit            → task weights, learned phrase, transcript correction,
 *                         weak threshold nudge
 *   repeated-utterance  → wider voice margin, relaxed floors for that text
 *   execution-failure   → transcript marked suspect for its task type
 *
 * observe() never throws. Malformed or stale events are logged as
 * CorrectionIgnored and dropped.
 */

import { EventEmitter } from 'node:events';
import { getLogger } from '../core/logger.js';
import { CorrectionIgnoredError } from '../core/errors.js';
import type { ClassifierConfig, LearningConfig, TaskType } from '../core/types.js';
import type { NoiseThresholdModel } from '../audio/threshold-model.js';
import type { TranscriptNormalizer } from '../asr/normalize.js';
import type { ClassifierState } from '../intent/classifier-state.js';
import type { ContextTurn } from '../context/types.js';
import { RepetitionDetector } from './repetition-detector.js';
import {
  CorrectionEventSchema,
  type LearningUpdate,
  type ParsedCorrectionEvent,
  type ThresholdSignal,
} from './types.js';

export interface CorrectionLearnerOptions {
  state: ClassifierState;
  threshold: NoiseThresholdModel;
  normalizer: TranscriptNormalizer;
  config: LearningConfig;
  floors: Pick<ClassifierConfig, 'ruleConfidenceFloor' | 'remoteConfidenceFloor' | 'floorMin'>;
  clock?: () => number;
}

type ExplicitEvent = Extract<ParsedCorrectionEvent, { reason: 'explicit' }>;

export class CorrectionLearner extends EventEmitter {
  private readonly state: ClassifierState;
  private readonly threshold: NoiseThresholdModel;
  private readonly normalizer: TranscriptNormalizer;
  private readonly config: LearningConfig;
  private readonly maxRelief: number;
  private readonly clock: () => number;
  private readonly repetitions: RepetitionDetector;
  private readonly logger = getLogger();

  constructor(options: CorrectionLearnerOptions) {
    super();
    this.state = options.state;
    this.threshold = options.threshold;
    this.normalizer = options.normalizer;
    this.config = options.config;
    this.clock = options.clock ?? Date.now;
    this.maxRelief = Math.max(
      options.floors.ruleConfidenceFloor - options.floors.floorMin,
      options.floors.remoteConfidenceFloor - options.floors.floorMin,
      0,
    );
    this.repetitions = new RepetitionDetector({
      count: options.config.repeatCount,
      windowMs: options.config.repeatWindowMs,
    });
  }

  // ─────────────────────────────────────────────────────────
  // EVENTS
  // ─────────────────────────────────────────────────────────

  observe(event: unknown): void {
    const parsed = CorrectionEventSchema.safeParse(event);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      this.ignore(new CorrectionIgnoredError(`Malformed correction event: ${issues}`, 'malformed'));
      return;
    }

    const e = parsed.data;
    const age = this.clock() - e.turnAt;
    if (age > this.config.correctionWindowMs) {
      this.ignore(new CorrectionIgnoredError(
        `Correction for turn ${e.turnId} arrived ${age}ms after it, window is ${this.config.correctionWindowMs}ms`,
        'out-of-window',
      ));
      return;
    }

    let update: LearningUpdate;
    try {
      update = this.apply(e);
    } catch (err) {
      this.ignore(new CorrectionIgnoredError(
        `Correction for turn ${e.turnId} could not be applied: ${err instanceof Error ? err.message : String(err)}`,
        'apply-failed',
      ));
      return;
    }

    this.logger.info(update, 'Learning update applied');
    this.emit('update', update);
  }

  /**
   * Feed a completed turn. Derives repeated-utterance and execution-failure
   * events, and clears a suspect mark when the same text, or a confirmed
   * retry of it, now succeeds.
   */
  recordTurn(turn: ContextTurn): void {
    const text = turn.transcript.text;
    const outcomeKey = `${turn.command?.taskType ?? turn.classification.taskType}:${turn.command?.action ?? '-'}:${turn.outcome}`;

    if (this.repetitions.record(text, outcomeKey, turn.createdAt)) {
      this.observe({ reason: 'repeated-utterance', turnId: turn.id, text, turnAt: turn.createdAt });
    }

    if (!turn.command) return;

    // A confirmed retry settles the transcript that was confirmed.
    const subject = turn.confirms ?? text;
    if (turn.outcome === 'failed') {
      this.observe({
        reason: 'execution-failure',
        turnId: turn.id,
        text: subject,
        turnAt: turn.createdAt,
        taskType: turn.command.taskType,
      });
    } else if (turn.outcome === 'succeeded' && this.state.clearSuspect(subject)) {
      this.logger.debug({ text: subject }, 'Suspect mark cleared by successful execution');
    }
  }

  // ─────────────────────────────────────────────────────────
  // UPDATES
  // ─────────────────────────────────────────────────────────

  private apply(e: ParsedCorrectionEvent): LearningUpdate {
    switch (e.reason) {
      case 'explicit':
        return this.applyExplicit(e);
      case 'repeated-utterance':
        return this.applyRepetition(e.turnId, e.text);
      case 'execution-failure':
        return this.applyFailure(e.turnId, e.text, e.taskType);
    }
  }

  private applyExplicit(e: ExplicitEvent): LearningUpdate {
    const weightDeltas: Record<string, number> = {};
    if (e.correctedTaskType !== 'unknown') {
      weightDeltas[e.correctedTaskType] = this.state.adjustWeight(e.correctedTaskType, this.config.weightStep);
    }
    if (e.predictedTaskType !== e.correctedTaskType && e.predictedTaskType !== 'unknown') {
      weightDeltas[e.predictedTaskType] = this.state.adjustWeight(e.predictedTaskType, -this.config.weightStep);
    }

    this.state.learnPhrase(e.text, e.correctedTaskType, e.correctedSlots);
    this.state.clearSuspect(e.text);

    const learnedCorrection = e.correctedText ? this.normalizer.learn(e.text, e.correctedText) : false;

    let marginDelta = 0;
    const signal = e.thresholdSignal ?? this.deriveSignal(e.energy);
    if (signal === 'too-permissive') {
      marginDelta = this.threshold.widenMargin(this.config.marginStep / 2);
    } else if (signal === 'too-strict') {
      marginDelta = this.threshold.narrowMargin(this.config.marginStep / 2);
    }

    return {
      reason: 'explicit',
      turnId: e.turnId,
      text: e.text,
      weightDeltas,
      marginDelta,
      learnedPhrase: true,
      learnedCorrection,
    };
  }

  private applyRepetition(turnId: string, text: string): LearningUpdate {
    const marginDelta = this.threshold.widenMargin(this.config.marginStep);
    const floorRelief = this.state.relaxFloor(text, this.config.floorStep, this.maxRelief);
    return { reason: 'repeated-utterance', turnId, text, marginDelta, floorRelief };
  }

  private applyFailure(turnId: string, text: string, taskType: TaskType): LearningUpdate {
    if (taskType !== 'unknown') {
      this.state.markSuspect(text, taskType);
    }
    return { reason: 'execution-failure', turnId, text, suspect: taskType !== 'unknown' };
  }

  /**
   * Trailing audio well above the floor means the gate stayed open on noise.
   */
  private deriveSignal(energy: ExplicitEvent['energy']): ThresholdSignal | null {
    if (!energy) return null;
    const { margin } = this.threshold.snapshot();
    return energy.trailing > energy.noiseFloor + margin / 2 ? 'too-permissive' : 'too-strict';
  }

  private ignore(error: CorrectionIgnoredError): void {
    this.logger.warn({ code: error.code, reason: error.reason }, error.message);
    this.emit('ignored', error);
  }
}
