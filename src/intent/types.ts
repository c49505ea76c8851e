import type { TaskType } from '../core/types.js';

export type Slots = Record<string, string>;

export type ClassifierProvenance = 'remote' | 'rule-based';

/** How the rule tier arrived at its answer */
export type RuleMatch = 'phrase' | 'pattern' | 'keyword';

/** A rule-tier answer withheld because it failed when last executed */
export interface SuspectMatch {
  taskType: Exclude<TaskType, 'unknown'>;
  slots: Readonly<Slots>;
}

export interface ClassificationResult {
  taskType: TaskType;
  /** 0-1 */
  complexity: number;
  slots: Readonly<Slots>;
  /** 0-1 */
  confidence: number;
  provenance: ClassifierProvenance;
  /** Task type and slots were copied from the previous turn */
  inherited: boolean;
  /** The remote tier was attempted and could not be used */
  degraded?: boolean;
  /** Rule tier only; absent for `unknown` */
  matchedBy?: RuleMatch;
  /** Set on an `unknown` that vetoed a suspect match */
  suspect?: SuspectMatch;
}

export interface RemoteClassification {
  taskType: TaskType;
  /** null when the backend gives none; the heuristic score is used instead */
  complexity: number | null;
  slots: Slots;
  confidence: number;
}

/**
 * Heavier classifier behind a network or local inference call.
 */
export interface RemoteClassifier {
  readonly name: string;
  classify(text: string, options: { signal: AbortSignal }): Promise<RemoteClassification>;
}

export interface LearnedPhrase {
  taskType: TaskType;
  slots: Slots;
}
