/**
 * ClassifierState — the rule tier's adaptive parameters for one session.
 *
 * Read by the rule-based classifier, written only by the correction learner.
 * Every write is clamped to its configured range.
 */

import { getLogger } from '../core/logger.js';
import { TASK_TYPES, type LearningConfig, type TaskType } from '../core/types.js';
import { BoundedMap } from '../utils/bounded-map.js';
import type { LearnedPhrase, Slots } from './types.js';

export type ClassifierStateLimits = Pick<
  LearningConfig,
  'weightMin' | 'weightMax' | 'maxLearnedPhrases'
>;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export class ClassifierState {
  private readonly weights = new Map<TaskType, number>();
  private readonly phrases: BoundedMap<string, LearnedPhrase>;
  private readonly suspects: BoundedMap<string, TaskType>;
  private readonly reliefByText: BoundedMap<string, number>;
  private readonly logger = getLogger();

  constructor(private readonly limits: ClassifierStateLimits) {
    for (const taskType of TASK_TYPES) {
      this.weights.set(taskType, clamp(1, limits.weightMin, limits.weightMax));
    }
    this.phrases = new BoundedMap(limits.maxLearnedPhrases, (text, phrase) => {
      this.logger.debug({ text, taskType: phrase.taskType }, 'Learned phrase evicted');
    });
    this.suspects = new BoundedMap(limits.maxLearnedPhrases);
    this.reliefByText = new BoundedMap(limits.maxLearnedPhrases);
  }

  // ── Pattern weights ──

  weight(taskType: TaskType): number {
    return this.weights.get(taskType) ?? 1;
  }

  /**
   * Shift a task type's weight, clamped. Returns the applied delta.
   */
  adjustWeight(taskType: TaskType, delta: number): number {
    const before = this.weight(taskType);
    const after = clamp(before + delta, this.limits.weightMin, this.limits.weightMax);
    this.weights.set(taskType, after);
    return after - before;
  }

  weightsSnapshot(): ReadonlyMap<TaskType, number> {
    return new Map(this.weights);
  }

  // ── Learned phrases ──

  learnPhrase(text: string, taskType: TaskType, slots: Slots): void {
    this.phrases.set(text, { taskType, slots: { ...slots } });
  }

  lookupPhrase(text: string): LearnedPhrase | undefined {
    const found = this.phrases.get(text);
    return found ? { taskType: found.taskType, slots: { ...found.slots } } : undefined;
  }

  get learnedPhraseCount(): number {
    return this.phrases.size;
  }

  // ── Suspect transcripts ──

  markSuspect(text: string, taskType: TaskType): void {
    this.suspects.set(text, taskType);
  }

  clearSuspect(text: string): boolean {
    return this.suspects.delete(text);
  }

  suspectTaskType(text: string): TaskType | undefined {
    return this.suspects.get(text);
  }

  isSuspect(text: string): boolean {
    return this.suspects.has(text);
  }

  // ── Confidence floors ──

  /**
   * Lower the floors applied to one transcript by `step`, up to `maxRelief`
   * in total. Returns the transcript's accumulated relief.
   */
  relaxFloor(text: string, step: number, maxRelief: number): number {
    const relief = Math.min((this.reliefByText.get(text) ?? 0) + Math.abs(step), Math.max(maxRelief, 0));
    this.reliefByText.set(text, relief);
    return relief;
  }

  floorRelief(text: string): number {
    return this.reliefByText.get(text) ?? 0;
  }

  /**
   * Floor for this transcript: `base` minus any relief, never below `min`
   * (nor above `base`).
   */
  floorFor(text: string, base: number, min: number): number {
    const relief = this.reliefByText.get(text) ?? 0;
    return clamp(base - relief, Math.min(min, base), base);
  }
}
