import { describe, it, expect } from 'vitest';
import { IntentClassifier } from '../../../src/intent/intent-classifier.js';
import { ClassifierState } from '../../../src/intent/classifier-state.js';
import { defaultConfig, type ConfigOverrides } from '../../../src/core/config.js';
import { ClassificationDegradedError } from '../../../src/core/errors.js';
import { FakeRemoteClassifier } from '../../helpers/fakes.js';
import { classification, contextOf, turn } from '../../helpers/turns.js';

interface Degraded {
  text: string;
  error: ClassificationDegradedError;
}

function setup(remote?: FakeRemoteClassifier, overrides: ConfigOverrides = {}) {
  const config = defaultConfig({
    classifier: { remoteEnabled: true, remoteTimeoutMs: 50 },
    ...overrides,
  });
  const state = new ClassifierState(config.learning);
  const classifier = new IntentClassifier({ state, config: config.classifier, remote });
  const degraded: Degraded[] = [];
  classifier.on('degraded', (e: Degraded) => degraded.push(e));
  return { classifier, state, degraded };
}

const empty = contextOf();

describe('IntentClassifier', () => {
  describe('remote tier', () => {
    it('accepts a confident remote verdict', async () => {
      const remote = new FakeRemoteClassifier().answer({
        taskType: 'query',
        complexity: null,
        slots: { query: 'jazz' },
        confidence: 0.8,
      });
      const { classifier, degraded } = setup(remote);

      const result = await classifier.classify({ text: 'play some jazz' }, empty);
      expect(result).toEqual({
        taskType: 'query',
        complexity: 0.09,
        slots: { query: 'jazz' },
        confidence: 0.8,
        provenance: 'remote',
        inherited: false,
      });
      expect(remote.classify).toHaveBeenCalledWith('play some jazz', expect.objectContaining({ signal: expect.any(AbortSignal) }));
      expect(degraded).toEqual([]);
    });

    it('is skipped when disabled in config', async () => {
      const remote = new FakeRemoteClassifier().answer({ taskType: 'query', complexity: 0.5, slots: {}, confidence: 1 });
      const { classifier } = setup(remote, { classifier: { remoteEnabled: false } });
      const result = await classifier.classify({ text: 'open notepad' }, empty);
      expect(result.provenance).toBe('rule-based');
      expect(result.degraded).toBeUndefined();
      expect(remote.classify).not.toHaveBeenCalled();
    });

    it('falls back to rules below the remote floor', async () => {
      const remote = new FakeRemoteClassifier().answer({ taskType: 'query', complexity: 0.2, slots: {}, confidence: 0.5 });
      const { classifier, degraded } = setup(remote);
      const result = await classifier.classify({ text: 'open notepad' }, empty);

      expect(result.taskType).toBe('app-control');
      expect(result.provenance).toBe('rule-based');
      expect(result.degraded).toBe(true);
      expect(degraded).toHaveLength(1);
      expect(degraded[0].error.message).toBe('Remote confidence 0.50 below floor 0.60');
    });

    it('treats an unknown verdict as degraded', async () => {
      const remote = new FakeRemoteClassifier().answer({ taskType: 'unknown', complexity: 0, slots: {}, confidence: 0.9 });
      const { classifier, degraded } = setup(remote);
      const result = await classifier.classify({ text: 'open notepad' }, empty);
      expect(result.taskType).toBe('app-control');
      expect(degraded[0].error.message).toBe('Remote classifier returned unknown');
    });

    it('degrades on transport errors', async () => {
      const remote = new FakeRemoteClassifier().fail(new Error('ECONNREFUSED'));
      const { classifier, degraded } = setup(remote);
      const result = await classifier.classify({ text: 'open notepad' }, empty);

      expect(result.taskType).toBe('app-control');
      expect(result.degraded).toBe(true);
      expect(degraded[0].text).toBe('open notepad');
      expect(degraded[0].error).toBeInstanceOf(ClassificationDegradedError);
      expect(degraded[0].error.cause?.message).toBe('ECONNREFUSED');
    });

    it('degrades when the remote misses its deadline', async () => {
      const remote = new FakeRemoteClassifier().hang();
      const { classifier, degraded } = setup(remote);
      const result = await classifier.classify({ text: 'open notepad' }, empty);
      expect(result.taskType).toBe('app-control');
      expect(degraded[0].error.cause?.message).toBe('fake-remote classifier timed out after 50ms');
    });

    it('is not consulted for a transcript whose command failed', async () => {
      const remote = new FakeRemoteClassifier().answer({ taskType: 'app-control', complexity: 0.1, slots: {}, confidence: 0.9 });
      const { classifier, state } = setup(remote);
      state.markSuspect('open notepad', 'app-control');

      const result = await classifier.classify({ text: 'open notepad' }, empty);
      expect(remote.classify).not.toHaveBeenCalled();
      expect(result.taskType).toBe('unknown');
      expect(result.degraded).toBeUndefined();
    });

    it('applies learned floor relief to the remote tier', async () => {
      const remote = new FakeRemoteClassifier().answer({ taskType: 'query', complexity: 0.2, slots: {}, confidence: 0.55 });
      const { classifier, state } = setup(remote);
      state.relaxFloor('play some jazz', 0.1, 0.4);
      const result = await classifier.classify({ text: 'play some jazz' }, empty);
      expect(result.provenance).toBe('remote');
      expect(result.complexity).toBe(0.2);
    });
  });

  describe('repeat phrases', () => {
    it('copies the previous command', async () => {
      const remote = new FakeRemoteClassifier().answer({ taskType: 'query', complexity: 0.1, slots: {}, confidence: 0.9 });
      const { classifier } = setup(remote);
      const previous = turn();

      const result = await classifier.classify({ text: 'do that again' }, contextOf(previous));
      expect(result).toEqual({
        taskType: 'app-control',
        complexity: 0.1,
        slots: { operation: 'launch', app: 'notepad' },
        confidence: 0.9,
        provenance: 'rule-based',
        inherited: true,
      });
      expect(remote.classify).not.toHaveBeenCalled();
    });

    it('copies classification slots when the previous turn had no command', async () => {
      const { classifier } = setup();
      const previous = turn({
        command: null,
        outcome: 'ambiguous',
        classification: classification('messaging', { contact: 'sam' }),
      });
      const result = await classifier.classify({ text: 'assistant, repeat that' }, contextOf(previous));
      expect(result.taskType).toBe('messaging');
      expect(result.slots).toEqual({ contact: 'sam' });
    });

    it('does not repeat an unknown turn', async () => {
      const { classifier } = setup();
      const previous = turn({ command: null, outcome: 'failed', classification: classification('unknown') });
      const result = await classifier.classify({ text: 'again' }, contextOf(previous));
      expect(result.taskType).toBe('unknown');
      expect(result.inherited).toBe(false);
    });

    it('recognises repeat phrases through the wake word', () => {
      const { classifier } = setup();
      expect(classifier.isRepeatRequest('assistant, do it again')).toBe(true);
      expect(classifier.isRepeatRequest('open notepad')).toBe(false);
    });

    it('needs a previous turn', async () => {
      const { classifier } = setup();
      const result = await classifier.classify({ text: 'do it again' }, empty);
      expect(result.inherited).toBe(false);
    });
  });
});
