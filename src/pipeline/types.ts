import type { Transcript } from '../asr/types.js';
import type { ContextTurn } from '../context/types.js';
import type { RecognitionUnavailableError, UnresolvableIntentError } from '../core/errors.js';
import type { TaskType } from '../core/types.js';
import type { Slots } from '../intent/types.js';
import type { ThresholdSignal } from '../learning/types.js';
import type { Command, DisambiguationRequest } from '../planner/types.js';

export interface ExecutionResult {
  success: boolean;
  /** e.g. "target window not found" */
  detail?: string;
}

/**
 * Carries out a Command (OS or browser automation). A thrown error counts as
 * a failed execution.
 */
export interface Executor {
  execute(command: Command): Promise<ExecutionResult>;
}

/**
 * Renders prompts and confirmations. Fire-and-forget.
 */
export interface SpeechOutput {
  say(text: string): void | Promise<void>;
}

export type TurnResult =
  | { kind: 'command'; turn: ContextTurn; command: Command; execution: ExecutionResult }
  | { kind: 'disambiguation'; turn: ContextTurn; request: DisambiguationRequest }
  | { kind: 'unresolvable'; turn: ContextTurn; error: UnresolvableIntentError }
  | { kind: 'cancelled'; turn: ContextTurn; request: DisambiguationRequest }
  | { kind: 'unrecognized'; utteranceId: string; error: RecognitionUnavailableError }
  | { kind: 'superseded'; utteranceId: string; transcript: Transcript };

export interface UserCorrection {
  taskType: TaskType;
  slots?: Slots;
  /** What was actually said, when recognition misheard */
  text?: string;
  thresholdSignal?: ThresholdSignal;
}
