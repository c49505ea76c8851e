/**
 * CommandPlanner — turns a classification into an executable Command.
 *
 * Required slots come from the task catalog. A slot missing from the current
 * classification is taken from the previous turn when both turns share a task
 * type; anything still missing yields a DisambiguationRequest. A transcript
 * whose last execution failed is confirmed with the user before it is
 * planned again. The planner never guesses and never executes.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import { UnresolvableIntentError } from '../core/errors.js';
import type { TaskCatalog, TaskType } from '../core/types.js';
import type { ContextReader, ContextTurn } from '../context/types.js';
import type { ClassificationResult, Slots, SuspectMatch } from '../intent/types.js';
import type { Command, DisambiguationRequest, PlanResult, ResolvedTaskType, SubAction } from './types.js';

const SLOT_PROMPTS: Record<string, string> = {
  app: 'Which application do you mean?',
  action: 'What should I do in it?',
  text: 'What should I enter?',
  contact: 'Who should I send it to?',
  message: 'What should the message say?',
  query: 'What should I search for?',
  operation: 'What should I do?',
  target: 'Which file or folder?',
};

/** Slot a yes/no confirmation asks for */
export const CONFIRMATION_SLOT = 'confirmation';

export function promptForSlot(slot: string): string {
  return SLOT_PROMPTS[slot] ?? `What is the ${slot}?`;
}

export function isConfirmation(request: DisambiguationRequest): boolean {
  return request.missingSlots.length === 1 && request.missingSlots[0] === CONFIRMATION_SLOT;
}

function pick(slots: Slots, ...keys: string[]): Slots {
  const out: Slots = {};
  for (const key of keys) {
    if (slots[key]) out[key] = slots[key];
  }
  return out;
}

function turnTaskType(turn: ContextTurn): TaskType {
  return turn.command?.taskType ?? turn.disambiguation?.taskType ?? turn.classification.taskType;
}

function turnSlots(turn: ContextTurn): Readonly<Slots> {
  return turn.command?.slots ?? turn.disambiguation?.partialSlots ?? turn.classification.slots;
}

export class CommandPlanner {
  private readonly logger = getLogger();

  constructor(private readonly tasks: TaskCatalog) {}

  /**
   * @param utterance text shown in UnresolvableIntentError
   * @throws UnresolvableIntentError for `unknown` with nothing to inherit
   */
  plan(classification: ClassificationResult, context: ContextReader, utterance = ''): PlanResult {
    const [previous] = context.recent(1);
    const slots: Slots = { ...classification.slots };
    const inherited: string[] = [];
    let taskType: ResolvedTaskType;

    if (classification.taskType === 'unknown' && classification.suspect) {
      return this.confirmation(classification.suspect, utterance);
    }

    if (classification.taskType === 'unknown') {
      const pending = previous?.outcome === 'ambiguous' ? previous.disambiguation : undefined;
      if (!pending || Object.keys(slots).length === 0) {
        throw new UnresolvableIntentError(utterance);
      }
      // An answer to the previous turn's question.
      taskType = pending.taskType;
      for (const [key, value] of Object.entries(pending.partialSlots)) {
        if (!(key in slots)) {
          slots[key] = value;
          inherited.push(key);
        }
      }
    } else {
      taskType = classification.taskType;
    }

    const required = this.tasks[taskType].requiredSlots;
    let missing = required.filter(slot => !slots[slot]);

    if (missing.length > 0 && previous && turnTaskType(previous) === taskType) {
      const prior = turnSlots(previous);
      for (const slot of missing) {
        const value = prior[slot];
        if (value) {
          slots[slot] = value;
          inherited.push(slot);
        }
      }
      missing = required.filter(slot => !slots[slot]);
    }

    if (missing.length > 0) {
      const prompts: Record<string, string> = {};
      for (const slot of missing) prompts[slot] = promptForSlot(slot);
      const request: DisambiguationRequest = {
        kind: 'disambiguation',
        taskType,
        missingSlots: missing,
        prompts,
        prompt: prompts[missing[0]],
        partialSlots: slots,
      };
      this.logger.debug({ taskType, missing }, 'Disambiguation required');
      return request;
    }

    const action = this.actionFor(taskType, slots);
    const command: Command = {
      kind: 'command',
      id: `cmd_${nanoid(10)}`,
      taskType,
      action,
      slots,
      steps: this.stepsFor(taskType, action, slots),
      inheritedSlots: inherited,
    };
    this.logger.debug({ commandId: command.id, taskType, action, inherited }, 'Command planned');
    return command;
  }

  /**
   * Whether planning this classification now would draw on the previous turn,
   * either as an answer to its question or for an inherited slot.
   */
  readsContext(classification: ClassificationResult, context: ContextReader): boolean {
    const [previous] = context.recent(1);
    if (!previous) return false;

    if (classification.taskType === 'unknown') {
      return !classification.suspect && previous.outcome === 'ambiguous' && previous.disambiguation !== undefined;
    }
    if (turnTaskType(previous) !== classification.taskType) return false;

    const prior = turnSlots(previous);
    return this.tasks[classification.taskType].requiredSlots
      .some(slot => !classification.slots[slot] && Boolean(prior[slot]));
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private confirmation(suspect: SuspectMatch, utterance: string): DisambiguationRequest {
    const prompt = utterance
      ? `"${utterance}" didn't work last time. Should I try it again?`
      : "That didn't work last time. Should I try it again?";
    this.logger.debug({ taskType: suspect.taskType }, 'Confirmation required for suspect transcript');
    return {
      kind: 'disambiguation',
      taskType: suspect.taskType,
      missingSlots: [CONFIRMATION_SLOT],
      prompts: { [CONFIRMATION_SLOT]: prompt },
      prompt,
      partialSlots: { ...suspect.slots },
    };
  }

  private actionFor(taskType: ResolvedTaskType, slots: Slots): string {
    switch (taskType) {
      case 'app-control':
        return slots.operation ?? 'launch';
      case 'app-action':
        return 'perform-in-app';
      case 'messaging':
        return 'send-message';
      case 'query':
        return 'search';
      case 'file-op':
      case 'system-op':
        return slots.operation ?? taskType;
      case 'conversation':
        return 'reply';
    }
  }

  private stepsFor(taskType: ResolvedTaskType, action: string, slots: Slots): SubAction[] {
    if (!this.tasks[taskType].multiStep) {
      return [{ index: 0, action, args: { ...slots }, dependsOn: null }];
    }

    let recipe: Array<[string, Slots]>;
    switch (taskType) {
      case 'app-action':
        recipe = [
          ['launch', pick(slots, 'app')],
          ['focus', pick(slots, 'app')],
          [slots.action || 'act', pick(slots, 'app', 'text')],
        ];
        break;
      case 'messaging':
        recipe = [
          ['open-conversation', pick(slots, 'contact')],
          ['type-message', pick(slots, 'message')],
          ['send', pick(slots, 'contact')],
        ];
        break;
      default:
        recipe = [[action, { ...slots }]];
    }

    return recipe.map(([stepAction, args], index) => ({
      index,
      action: stepAction,
      args,
      dependsOn: index === 0 ? null : index - 1,
    }));
  }
}
