/**
 * IntentClassifier — two-tier classification with context carry-over.
 *
 *   repeat phrase ("do that again")  → copy the previous turn
 *   remote tier (optional, bounded)  → accepted at or above its floor
 *   rule tier                        → always answers, at worst `unknown`
 *
 * The remote tier never raises past this class: timeouts, transport errors
 * and low confidence are logged as ClassificationDegraded and the rule tier
 * decides, with `degraded: true` on the result.
 */

import { EventEmitter } from 'node:events';
import { getLogger } from '../core/logger.js';
import { ClassificationDegradedError, toError } from '../core/errors.js';
import type { ClassifierConfig } from '../core/types.js';
import type { ContextReader } from '../context/types.js';
import { withTimeout } from '../utils/async.js';
import type { ClassifierState } from './classifier-state.js';
import { scoreComplexity } from './complexity.js';
import { RuleBasedClassifier, toCommandText } from './rule-classifier.js';
import type { ClassificationResult, RemoteClassifier } from './types.js';

const REPEAT_PHRASES = new Set([
  'again',
  'do that again',
  'do it again',
  'repeat that',
  'same again',
  'one more time',
]);

export interface IntentClassifierOptions {
  state: ClassifierState;
  config: ClassifierConfig;
  /** Remote tier; only consulted when config.remoteEnabled is set */
  remote?: RemoteClassifier;
}

export interface ClassifyInput {
  text: string;
}

export class IntentClassifier extends EventEmitter {
  private readonly state: ClassifierState;
  private readonly config: ClassifierConfig;
  private readonly remote: RemoteClassifier | undefined;
  private readonly rules: RuleBasedClassifier;
  private readonly logger = getLogger();

  constructor(options: IntentClassifierOptions) {
    super();
    this.state = options.state;
    this.config = options.config;
    this.remote = options.config.remoteEnabled ? options.remote : undefined;
    this.rules = new RuleBasedClassifier(options.state, options.config);
  }

  /**
   * The deterministic tier on its own, for callers that must not touch the network.
   */
  get ruleTier(): RuleBasedClassifier {
    return this.rules;
  }

  async classify(transcript: ClassifyInput, context: ContextReader): Promise<ClassificationResult> {
    const text = transcript.text;

    const repeated = this.repeatPrevious(text, context);
    if (repeated) return repeated;

    let degraded = false;
    if (this.remote && !this.state.isSuspect(text)) {
      const remote = await this.tryRemote(this.remote, text);
      if (remote) return remote;
      degraded = true;
    }

    const result = this.rules.classify(text);
    return degraded ? { ...result, degraded: true } : result;
  }

  isRepeatRequest(text: string): boolean {
    return REPEAT_PHRASES.has(toCommandText(text, this.config.wakeWord));
  }

  /**
   * The previous turn's task and slots for a repeat phrase, or null when the
   * text is not one or there is nothing to repeat.
   */
  repeatPrevious(text: string, context: ContextReader): ClassificationResult | null {
    if (!this.isRepeatRequest(text)) return null;

    const [previous] = context.recent(1);
    if (!previous) return null;

    const taskType = previous.command?.taskType ?? previous.classification.taskType;
    if (taskType === 'unknown') return null;

    return {
      taskType,
      complexity: previous.classification.complexity,
      slots: { ...(previous.command?.slots ?? previous.classification.slots) },
      confidence: previous.classification.confidence,
      provenance: previous.classification.provenance,
      inherited: true,
    };
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async tryRemote(remote: RemoteClassifier, text: string): Promise<ClassificationResult | null> {
    const floor = this.state.floorFor(text, this.config.remoteConfidenceFloor, this.config.floorMin);

    try {
      const verdict = await withTimeout(
        signal => remote.classify(text, { signal }),
        this.config.remoteTimeoutMs,
        `${remote.name} classifier`,
      );

      if (verdict.taskType === 'unknown') {
        this.degrade(text, new ClassificationDegradedError('Remote classifier returned unknown'));
        return null;
      }
      if (verdict.confidence < floor) {
        this.degrade(text, new ClassificationDegradedError(
          `Remote confidence ${verdict.confidence.toFixed(2)} below floor ${floor.toFixed(2)}`,
        ));
        return null;
      }

      return {
        taskType: verdict.taskType,
        complexity: verdict.complexity ?? scoreComplexity(text),
        slots: { ...verdict.slots },
        confidence: verdict.confidence,
        provenance: 'remote',
        inherited: false,
      };
    } catch (err) {
      this.degrade(text, new ClassificationDegradedError('Remote classifier unavailable', toError(err)));
      return null;
    }
  }

  private degrade(text: string, error: ClassificationDegradedError): void {
    this.logger.warn(
      { text, code: error.code, reason: error.message, cause: error.cause?.message },
      'Classification degraded to rule tier',
    );
    this.emit('degraded', { text, error });
  }
}
