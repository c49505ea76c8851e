import type { Transcript } from '../asr/types.js';
import type { ClassificationResult } from '../intent/types.js';
import type { Command, DisambiguationRequest } from '../planner/types.js';

export type TurnOutcome = 'succeeded' | 'failed' | 'ambiguous';

export interface ContextTurn {
  id: string;
  transcript: Transcript;
  classification: ClassificationResult;
  command: Command | null;
  /** Set when the turn ended waiting for an answer */
  disambiguation?: DisambiguationRequest;
  /** Transcript of the suspect turn this one confirmed */
  confirms?: string;
  outcome: TurnOutcome;
  /** Clock time the turn was recorded (ms) */
  createdAt: number;
}

/**
 * Read side of the context history. recent() is a pure snapshot read.
 */
export interface ContextReader {
  recent(n: number): readonly ContextTurn[];
}

export type EvictionReason = 'ttl' | 'overflow';

export interface EvictedTurn {
  turn: ContextTurn;
  reason: EvictionReason;
}
