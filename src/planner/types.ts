import type { TaskType } from '../core/types.js';
import type { Slots } from '../intent/types.js';

export type ResolvedTaskType = Exclude<TaskType, 'unknown'>;

export interface SubAction {
  index: number;
  action: string;
  args: Readonly<Slots>;
  /** Step that must report success first; null for the first step */
  dependsOn: number | null;
}

export interface Command {
  kind: 'command';
  id: string;
  taskType: ResolvedTaskType;
  action: string;
  slots: Readonly<Slots>;
  steps: readonly SubAction[];
  /** Slot names filled from an earlier turn */
  inheritedSlots: readonly string[];
}

export interface DisambiguationRequest {
  kind: 'disambiguation';
  taskType: ResolvedTaskType;
  missingSlots: readonly string[];
  /** Question per missing slot */
  prompts: Readonly<Record<string, string>>;
  /** Question for the first missing slot */
  prompt: string;
  /** Slots already known, carried into the answering turn */
  partialSlots: Readonly<Slots>;
}

export type PlanResult = Command | DisambiguationRequest;
