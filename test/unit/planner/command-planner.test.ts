import { describe, it, expect } from 'vitest';
import { CommandPlanner, isConfirmation, promptForSlot } from '../../../src/planner/command-planner.js';
import type { Command, DisambiguationRequest, PlanResult } from '../../../src/planner/types.js';
import { defaultConfig, type ConfigOverrides } from '../../../src/core/config.js';
import { UnresolvableIntentError } from '../../../src/core/errors.js';
import { classification, command, contextOf, turn } from '../../helpers/turns.js';

function planner(overrides: ConfigOverrides = {}): CommandPlanner {
  return new CommandPlanner(defaultConfig(overrides).tasks);
}

function asCommand(result: PlanResult): Command {
  if (result.kind !== 'command') throw new Error(`expected a command, got ${result.kind}`);
  return result;
}

function asRequest(result: PlanResult): DisambiguationRequest {
  if (result.kind !== 'disambiguation') throw new Error(`expected a disambiguation, got ${result.kind}`);
  return result;
}

const empty = contextOf();

describe('CommandPlanner', () => {
  describe('complete classifications', () => {
    it('plans a single-step app command', () => {
      const cmd = asCommand(planner().plan(
        classification('app-control', { operation: 'launch', app: 'notepad' }),
        empty,
      ));
      expect(cmd.id).toMatch(/^cmd_[a-z0-9]{10}$/);
      expect(cmd.taskType).toBe('app-control');
      expect(cmd.action).toBe('launch');
      expect(cmd.slots).toEqual({ operation: 'launch', app: 'notepad' });
      expect(cmd.steps).toEqual([
        { index: 0, action: 'launch', args: { operation: 'launch', app: 'notepad' }, dependsOn: null },
      ]);
      expect(cmd.inheritedSlots).toEqual([]);
    });

    it('expands an in-app action into ordered steps', () => {
      const cmd = asCommand(planner().plan(
        classification('app-action', { app: 'notepad', action: 'type', text: 'hello' }),
        empty,
      ));
      expect(cmd.action).toBe('perform-in-app');
      expect(cmd.steps).toEqual([
        { index: 0, action: 'launch', args: { app: 'notepad' }, dependsOn: null },
        { index: 1, action: 'focus', args: { app: 'notepad' }, dependsOn: 0 },
        { index: 2, action: 'type', args: { app: 'notepad', text: 'hello' }, dependsOn: 1 },
      ]);
    });

    it('expands a message into open, type and send', () => {
      const cmd = asCommand(planner().plan(
        classification('messaging', { contact: 'sam', message: 'running late' }),
        empty,
      ));
      expect(cmd.action).toBe('send-message');
      expect(cmd.steps.map(s => [s.action, s.args])).toEqual([
        ['open-conversation', { contact: 'sam' }],
        ['type-message', { message: 'running late' }],
        ['send', { contact: 'sam' }],
      ]);
    });

    it.each([
      ['query', { query: 'weather' }, 'search'],
      ['system-op', { operation: 'mute' }, 'mute'],
      ['file-op', { operation: 'create', target: 'reports' }, 'create'],
      ['conversation', {}, 'reply'],
    ] as const)('maps %s to action %s', (taskType, slots, action) => {
      expect(asCommand(planner().plan(classification(taskType, slots), empty)).action).toBe(action);
    });

    it('runs a multi-step task without a recipe as one step', () => {
      const cmd = asCommand(planner({ tasks: { query: { requiredSlots: ['query'], multiStep: true } } }).plan(
        classification('query', { query: 'weather' }),
        empty,
      ));
      expect(cmd.steps).toEqual([{ index: 0, action: 'search', args: { query: 'weather' }, dependsOn: null }]);
    });
  });

  describe('context carry-over', () => {
    it('inherits a missing slot from a previous turn of the same task type', () => {
      const previous = turn({ command: command('app-control', 'launch', { operation: 'launch', app: 'firefox' }) });
      const cmd = asCommand(planner().plan(
        classification('app-control', { operation: 'close' }),
        contextOf(previous),
      ));
      expect(cmd.action).toBe('close');
      expect(cmd.slots).toEqual({ operation: 'close', app: 'firefox' });
      expect(cmd.inheritedSlots).toEqual(['app']);
    });

    it('does not inherit across task types', () => {
      const previous = turn({ command: command('query', 'search', { query: 'firefox' }) });
      const request = asRequest(planner().plan(
        classification('app-control', { operation: 'close' }),
        contextOf(previous),
      ));
      expect(request.missingSlots).toEqual(['app']);
      expect(request.prompt).toBe('Which application do you mean?');
      expect(request.partialSlots).toEqual({ operation: 'close' });
    });

    it('never overrides a slot the current turn supplied', () => {
      const previous = turn({ command: command('app-control', 'launch', { operation: 'launch', app: 'firefox' }) });
      const cmd = asCommand(planner().plan(
        classification('app-control', { operation: 'launch', app: 'chrome' }),
        contextOf(previous),
      ));
      expect(cmd.slots.app).toBe('chrome');
      expect(cmd.inheritedSlots).toEqual([]);
    });
  });

  describe('readsContext', () => {
    const previous = turn();

    it('is true when a missing slot would come from the previous turn', () => {
      expect(planner().readsContext(classification('app-control', { operation: 'close' }), contextOf(previous))).toBe(true);
    });

    it('is false for a complete classification or a different task type', () => {
      expect(planner().readsContext(
        classification('app-control', { operation: 'close', app: 'chrome' }),
        contextOf(previous),
      )).toBe(false);
      expect(planner().readsContext(classification('query', {}), contextOf(previous))).toBe(false);
      expect(planner().readsContext(classification('app-control', { operation: 'close' }), empty)).toBe(false);
    });

    it('is true for an unknown that would answer a pending question', () => {
      const asking = turn({
        command: null,
        outcome: 'ambiguous',
        disambiguation: asRequest(planner().plan(classification('messaging', {}), empty)),
      });
      expect(planner().readsContext(classification('unknown', {}), contextOf(asking))).toBe(true);
      expect(planner().readsContext(classification('unknown', {}), contextOf(previous))).toBe(false);
    });
  });

  describe('disambiguation', () => {
    it('asks for every missing slot, first one as the prompt', () => {
      const request = asRequest(planner().plan(classification('messaging', {}), empty));
      expect(request).toEqual({
        kind: 'disambiguation',
        taskType: 'messaging',
        missingSlots: ['contact', 'message'],
        prompts: {
          contact: 'Who should I send it to?',
          message: 'What should the message say?',
        },
        prompt: 'Who should I send it to?',
        partialSlots: {},
      });
    });

    it('completes a pending request from an answer', () => {
      const previous = turn({
        command: null,
        outcome: 'ambiguous',
        classification: classification('messaging', { contact: 'sam' }),
        disambiguation: asRequest(planner().plan(classification('messaging', { contact: 'sam' }), empty)),
      });
      const cmd = asCommand(planner().plan(
        classification('unknown', { message: 'see you soon' }),
        contextOf(previous),
      ));
      expect(cmd.taskType).toBe('messaging');
      expect(cmd.slots).toEqual({ message: 'see you soon', contact: 'sam' });
      expect(cmd.inheritedSlots).toEqual(['contact']);
    });

    it('asks to confirm a suspect transcript instead of planning it', () => {
      const request = asRequest(planner().plan(
        classification('unknown', {}, {
          suspect: { taskType: 'app-control', slots: { operation: 'launch', app: 'notepad' } },
        }),
        empty,
        'open notepad',
      ));
      expect(request).toEqual({
        kind: 'disambiguation',
        taskType: 'app-control',
        missingSlots: ['confirmation'],
        prompts: { confirmation: '"open notepad" didn\'t work last time. Should I try it again?' },
        prompt: '"open notepad" didn\'t work last time. Should I try it again?',
        partialSlots: { operation: 'launch', app: 'notepad' },
      });
      expect(isConfirmation(request)).toBe(true);
      expect(isConfirmation(asRequest(planner().plan(classification('messaging', {}), empty)))).toBe(false);
    });

    it('uses catalog slots it has no wording for', () => {
      const request = asRequest(planner({ tasks: { query: { requiredSlots: ['query', 'engine'] } } }).plan(
        classification('query', { query: 'weather' }),
        empty,
      ));
      expect(request.prompt).toBe('What is the engine?');
    });
  });

  describe('unresolvable', () => {
    it('throws for unknown with nothing pending', () => {
      expect(() => planner().plan(classification('unknown'), empty, 'do the thing'))
        .toThrow(new UnresolvableIntentError('do the thing'));
    });

    it('throws for an empty answer to a pending request', () => {
      const previous = turn({
        command: null,
        outcome: 'ambiguous',
        disambiguation: asRequest(planner().plan(classification('messaging', {}), empty)),
      });
      expect(() => planner().plan(classification('unknown'), contextOf(previous), 'hmm'))
        .toThrow(UnresolvableIntentError);
    });
  });
});

describe('promptForSlot', () => {
  it('has wording for the built-in slots', () => {
    expect(promptForSlot('target')).toBe('Which file or folder?');
    expect(promptForSlot('colour')).toBe('What is the colour?');
  });
});
