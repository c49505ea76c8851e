/**
 * Builders for transcripts, classifications and context turns.
 */

import type { Transcript } from '../../src/asr/types.js';
import type { ContextReader, ContextTurn } from '../../src/context/types.js';
import type { TaskType } from '../../src/core/types.js';
import type { ClassificationResult, Slots } from '../../src/intent/types.js';
import type { Command, ResolvedTaskType } from '../../src/planner/types.js';

let counter = 0;

export function transcript(text: string, overrides: Partial<Transcript> = {}): Transcript {
  counter++;
  return {
    text,
    rawText: text,
    engine: 'primary',
    engineName: 'fake',
    confidence: 0.9,
    utteranceId: `utt_${counter}`,
    startedAt: 0,
    endedAt: 500,
    durationMs: 500,
    ...overrides,
  };
}

export function classification(
  taskType: TaskType,
  slots: Slots = {},
  overrides: Partial<ClassificationResult> = {},
): ClassificationResult {
  return {
    taskType,
    complexity: 0.1,
    slots,
    confidence: 0.9,
    provenance: 'rule-based',
    inherited: false,
    ...overrides,
  };
}

export function command(taskType: ResolvedTaskType, action: string, slots: Slots): Command {
  counter++;
  return {
    kind: 'command',
    id: `cmd_${counter}`,
    taskType,
    action,
    slots,
    steps: [{ index: 0, action, args: slots, dependsOn: null }],
    inheritedSlots: [],
  };
}

export function turn(overrides: Partial<ContextTurn> & { text?: string } = {}): ContextTurn {
  counter++;
  const { text = 'open notepad', ...rest } = overrides;
  return {
    id: `turn_${counter}`,
    transcript: transcript(text),
    classification: classification('app-control', { operation: 'launch', app: 'notepad' }),
    command: command('app-control', 'launch', { operation: 'launch', app: 'notepad' }),
    outcome: 'succeeded',
    createdAt: 0,
    ...rest,
  };
}

/**
 * Read-only context over a fixed list, most recent first.
 */
export function contextOf(...turns: ContextTurn[]): ContextReader {
  return { recent: (n: number) => turns.slice(0, Math.max(n, 0)) };
}
