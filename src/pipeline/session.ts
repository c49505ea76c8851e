/**
 * VoiceSession — one running pipeline and the adaptive state it owns.
 *
 *   frames → gate → arbiter → classifier → planner → executor
 *                                                   ↘ learner, context
 *
 * Utterances overlap: recognition and classification of utterance N+1 may
 * run while N is still in flight. Turns are still committed in emission
 * order: each utterance reserves its place on the commit lock the moment the
 * gate emits it, and plans, executes and appends only once it holds the lock.
 * A remote classification that arrives after a newer utterance was already
 * classified against the context it would have changed is discarded
 * (superseded) and the user is asked to repeat it.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import { EventBus, type VoxdeskEvents } from '../core/events.js';
import { AsyncMutex } from '../core/mutex.js';
import {
  RecognitionUnavailableError,
  UnresolvableIntentError,
  toError,
} from '../core/errors.js';
import type { VoxdeskConfig } from '../core/types.js';
import { NoiseThresholdModel } from '../audio/threshold-model.js';
import { VoiceActivityGate } from '../audio/voice-activity-gate.js';
import type { FrameQueue } from '../audio/frame-queue.js';
import type { AudioFrame, Utterance } from '../audio/types.js';
import { AsrArbiter } from '../asr/arbiter.js';
import { TranscriptNormalizer } from '../asr/normalize.js';
import type { SpeechToTextProvider, Transcript } from '../asr/types.js';
import { ContextManager } from '../context/context-manager.js';
import type { ContextTurn, TurnOutcome } from '../context/types.js';
import { ClassifierState } from '../intent/classifier-state.js';
import { IntentClassifier } from '../intent/intent-classifier.js';
import { toCommandText } from '../intent/rule-classifier.js';
import type { ClassificationResult, RemoteClassifier } from '../intent/types.js';
import { CorrectionLearner } from '../learning/correction-learner.js';
import { CommandPlanner } from '../planner/command-planner.js';
import { isConfirmation } from '../planner/command-planner.js';
import type { Command, DisambiguationRequest, PlanResult } from '../planner/types.js';
import { BoundedMap } from '../utils/bounded-map.js';
import type { ExecutionResult, Executor, SpeechOutput, TurnResult, UserCorrection } from './types.js';

export interface VoiceSessionOptions {
  config: VoxdeskConfig;
  primary: SpeechToTextProvider;
  secondary: SpeechToTextProvider;
  executor: Executor;
  speech?: SpeechOutput;
  /** Remote classifier tier, used when config.classifier.remoteEnabled */
  remote?: RemoteClassifier;
  bus?: EventBus;
  clock?: () => number;
}

const DIDNT_CATCH = "Sorry, I didn't catch that.";
const DIDNT_UNDERSTAND = "Sorry, I didn't understand that.";
const LOST_TRACK = 'Sorry, I lost track of that. Please say it again.';
const CANCELLED = "Okay, I won't.";
const AFFIRMATIVE = /^(?:yes|yeah|yep|yup|sure|ok|okay|correct|right|do it|go ahead|try (?:it )?again)$/;
const TURN_LOG_SIZE = 100;

export class VoiceSession {
  readonly bus: EventBus;
  readonly threshold: NoiseThresholdModel;
  readonly gate: VoiceActivityGate;
  readonly normalizer: TranscriptNormalizer;
  readonly arbiter: AsrArbiter;
  readonly classifierState: ClassifierState;
  readonly classifier: IntentClassifier;
  readonly context: ContextManager;
  readonly planner: CommandPlanner;
  readonly learner: CorrectionLearner;

  private readonly config: VoxdeskConfig;
  private readonly executor: Executor;
  private readonly speech: SpeechOutput | undefined;
  private readonly clock: () => number;
  private readonly commitLock = new AsyncMutex();
  private readonly turnLog = new BoundedMap<string, ContextTurn>(TURN_LOG_SIZE);
  private readonly inFlight = new Set<Promise<void>>();
  private emittedSeq = 0;
  /** Uncommitted utterances whose classification read the context */
  private readonly contextDependent = new Set<number>();
  private readonly logger = getLogger();

  constructor(options: VoiceSessionOptions) {
    const { config } = options;
    this.config = config;
    this.executor = options.executor;
    this.speech = options.speech;
    this.clock = options.clock ?? Date.now;
    this.bus = options.bus ?? new EventBus();

    this.threshold = new NoiseThresholdModel(config.threshold);
    this.gate = new VoiceActivityGate(this.threshold, config.gate);
    this.normalizer = new TranscriptNormalizer(config.asr.locale, config.learning.maxLearnedPhrases);
    this.arbiter = new AsrArbiter({
      primary: options.primary,
      secondary: options.secondary,
      normalizer: this.normalizer,
      config: config.asr,
    });
    this.classifierState = new ClassifierState(config.learning);
    this.classifier = new IntentClassifier({
      state: this.classifierState,
      config: config.classifier,
      remote: options.remote,
    });
    this.context = new ContextManager(config.context, this.clock);
    this.planner = new CommandPlanner(config.tasks);
    this.learner = new CorrectionLearner({
      state: this.classifierState,
      threshold: this.threshold,
      normalizer: this.normalizer,
      config: config.learning,
      floors: config.classifier,
      clock: this.clock,
    });

    this.bridgeEvents();
  }

  // ─────────────────────────────────────────────────────────
  // AUDIO INGESTION
  // ─────────────────────────────────────────────────────────

  /**
   * Feed one frame. Never throws; a closed utterance is processed in the
   * background (see drain()).
   */
  ingest(frame: AudioFrame): void {
    const utterance = this.gate.process(frame);
    if (utterance) {
      this.track(this.handleUtterance(utterance));
    }
  }

  /**
   * Consume a frame queue until it is closed, then wait for in-flight turns.
   */
  async run(queue: FrameQueue): Promise<void> {
    for await (const frame of queue) {
      this.ingest(frame);
    }
    await this.drain();
  }

  /**
   * Wait for every utterance already emitted to finish.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ─────────────────────────────────────────────────────────
  // TURN PROCESSING
  // ─────────────────────────────────────────────────────────

  async handleUtterance(utterance: Utterance): Promise<TurnResult> {
    const seq = ++this.emittedSeq;
    const slot = this.commitLock.acquire();

    let transcript: Transcript;
    try {
      transcript = await this.arbiter.transcribe(utterance);
    } catch (err) {
      const release = await slot;
      release();
      const error = err instanceof RecognitionUnavailableError
        ? err
        : new RecognitionUnavailableError([{ engine: 'arbiter', reason: toError(err).message }]);
      this.logger.warn({ utteranceId: utterance.id, failures: error.failures }, 'Recognition unavailable');
      this.bus.emit('asr:unavailable', { utteranceId: utterance.id, error });
      this.speak(DIDNT_CATCH);
      return { kind: 'unrecognized', utteranceId: utterance.id, error };
    }

    return this.process(transcript, seq, slot);
  }

  /**
   * Run a transcript that did not come from the gate (typed input, tests).
   */
  handleTranscript(transcript: Transcript): Promise<TurnResult> {
    const seq = ++this.emittedSeq;
    const slot = this.commitLock.acquire();
    return this.process(transcript, seq, slot);
  }

  /**
   * Explicit user correction of an earlier turn. Returns false when the turn
   * is no longer known.
   */
  correct(turnId: string, correction: UserCorrection): boolean {
    const turn = this.turnLog.get(turnId);
    if (!turn) {
      this.logger.warn({ turnId }, 'Correction for unknown turn ignored');
      return false;
    }

    this.learner.observe({
      reason: 'explicit',
      turnId,
      text: turn.transcript.text,
      turnAt: turn.createdAt,
      predictedTaskType: turn.command?.taskType ?? turn.classification.taskType,
      correctedTaskType: correction.taskType,
      correctedSlots: correction.slots ?? {},
      correctedText: correction.text,
      thresholdSignal: correction.thresholdSignal,
      energy: turn.transcript.energy,
    });
    return true;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async process(
    transcript: Transcript,
    seq: number,
    slot: Promise<() => void>,
  ): Promise<TurnResult> {
    this.bus.emit('transcript', transcript);

    let classification: ClassificationResult;
    try {
      classification = await this.classifier.classify(transcript, this.context);
    } catch (err) {
      // The classifier absorbs its own failures; this is a last resort.
      this.logger.error({ err: toError(err).message }, 'Classifier failed unexpectedly');
      classification = this.classifier.ruleTier.classify(transcript.text);
    }
    this.bus.emit('classification', { utteranceId: transcript.utteranceId, result: classification });

    if (this.readsContext(transcript.text, classification)) {
      this.contextDependent.add(seq);
    }

    const release = await slot;
    try {
      if (classification.provenance === 'remote' && !classification.inherited && this.overtaken(seq)) {
        return this.supersede(transcript);
      }
      return await this.commit(transcript, classification);
    } finally {
      this.contextDependent.delete(seq);
      release();
    }
  }

  private async commit(transcript: Transcript, initial: ClassificationResult): Promise<TurnResult> {
    const text = transcript.text;
    let classification = initial;
    if (this.classifier.isRepeatRequest(text)) {
      // The turn to repeat may have been appended after classification.
      classification = this.classifier.repeatPrevious(text, this.context) ?? classification;
    }
    let planned: PlanResult | UnresolvableIntentError = this.tryPlan(classification, text);
    let confirms: string | undefined;

    const pending = this.pendingQuestion();
    if (pending && this.preemptsQuestion(planned, text)) {
      this.logger.debug({ text }, 'New request replaces pending question');
    } else if (pending && isConfirmation(pending.request)) {
      const answer = toCommandText(text, this.config.classifier.wakeWord);
      if (!AFFIRMATIVE.test(answer)) {
        const turn = this.appendTurn(transcript, classification, null, 'failed');
        this.speak(CANCELLED);
        return { kind: 'cancelled', turn, request: pending.request };
      }
      classification = {
        ...classification,
        taskType: pending.request.taskType,
        slots: { ...pending.request.partialSlots },
        inherited: true,
        matchedBy: undefined,
        suspect: undefined,
      };
      planned = this.tryPlan(classification, text);
      confirms = pending.turn.confirms ?? pending.turn.transcript.text;
    } else if (pending) {
      const answer = toCommandText(text, this.config.classifier.wakeWord) || text;
      classification = {
        ...classification,
        taskType: 'unknown',
        slots: { [pending.request.missingSlots[0]]: answer },
        inherited: false,
        matchedBy: undefined,
        suspect: undefined,
      };
      planned = this.tryPlan(classification, text);
      confirms = pending.turn.confirms;
    }

    if (planned instanceof UnresolvableIntentError) {
      const turn = this.appendTurn(transcript, classification, null, 'failed');
      this.bus.emit('unresolvable', planned);
      this.speak(DIDNT_UNDERSTAND);
      return { kind: 'unresolvable', turn, error: planned };
    }

    if (planned.kind === 'disambiguation') {
      const turn = this.appendTurn(transcript, classification, null, 'ambiguous', planned, confirms);
      this.bus.emit('disambiguation', planned);
      this.speak(planned.prompt);
      return { kind: 'disambiguation', turn, request: planned };
    }

    this.bus.emit('command', planned);
    const execution = await this.execute(planned);
    const turn = this.appendTurn(
      transcript,
      classification,
      planned,
      execution.success ? 'succeeded' : 'failed',
      undefined,
      confirms,
    );
    if (!execution.success) {
      this.speak(execution.detail ? `That didn't work: ${execution.detail}` : "That didn't work.");
    }
    return { kind: 'command', turn, command: planned, execution };
  }

  private supersede(transcript: Transcript): TurnResult {
    this.logger.info(
      { utteranceId: transcript.utteranceId, text: transcript.text },
      'Remote classification discarded, a newer turn already used the context',
    );
    this.bus.emit('turn:superseded', { utteranceId: transcript.utteranceId, text: transcript.text });
    this.speak(LOST_TRACK);
    return { kind: 'superseded', utteranceId: transcript.utteranceId, transcript };
  }

  private readsContext(text: string, classification: ClassificationResult): boolean {
    if (classification.inherited || this.classifier.isRepeatRequest(text)) return true;
    return this.planner.readsContext(classification, this.context);
  }

  /** A newer, still uncommitted utterance was classified against context */
  private overtaken(seq: number): boolean {
    for (const newer of this.contextDependent) {
      if (newer > seq) return true;
    }
    return false;
  }

  /**
   * A pending question gives way to a new command only when the rule tier
   * recognised the text by pattern or learned phrase, or to a confirmation.
   * Anything weaker is taken as the answer.
   */
  private preemptsQuestion(planned: PlanResult | UnresolvableIntentError, text: string): boolean {
    if (planned instanceof UnresolvableIntentError) return false;
    if (planned.kind === 'disambiguation') return isConfirmation(planned);
    const matchedBy = this.classifier.ruleTier.classify(text).matchedBy;
    return matchedBy === 'pattern' || matchedBy === 'phrase';
  }

  private tryPlan(classification: ClassificationResult, text: string): PlanResult | UnresolvableIntentError {
    try {
      return this.planner.plan(classification, this.context, text);
    } catch (err) {
      if (err instanceof UnresolvableIntentError) return err;
      throw err;
    }
  }

  private pendingQuestion(): { turn: ContextTurn; request: DisambiguationRequest } | undefined {
    const [previous] = this.context.recent(1);
    if (previous?.outcome !== 'ambiguous' || !previous.disambiguation) return undefined;
    return { turn: previous, request: previous.disambiguation };
  }

  private async execute(command: Command): Promise<ExecutionResult> {
    try {
      return await this.executor.execute(command);
    } catch (err) {
      const detail = toError(err).message;
      this.logger.warn({ commandId: command.id, detail }, 'Executor threw');
      return { success: false, detail };
    }
  }

  private appendTurn(
    transcript: Transcript,
    classification: ClassificationResult,
    command: Command | null,
    outcome: TurnOutcome,
    disambiguation?: DisambiguationRequest,
    confirms?: string,
  ): ContextTurn {
    const turn: ContextTurn = {
      id: `turn_${nanoid(10)}`,
      transcript,
      classification,
      command,
      outcome,
      createdAt: this.clock(),
      ...(disambiguation ? { disambiguation } : {}),
      ...(confirms ? { confirms } : {}),
    };
    this.context.append(turn);
    this.turnLog.set(turn.id, turn);
    this.bus.emit('turn:appended', turn);
    this.learner.recordTurn(turn);
    return turn;
  }

  private speak(text: string): void {
    if (!this.speech) return;
    const speech = this.speech;
    Promise.resolve()
      .then(() => speech.say(text))
      .catch(err => this.logger.warn({ err: toError(err).message }, 'Speech output failed'));
  }

  private track(work: Promise<TurnResult>): void {
    const tracked: Promise<void> = work
      .then(
        () => undefined,
        (err: unknown) => {
          // Expected failures resolve as TurnResults; anything else is a bug.
          this.logger.error({ err: toError(err).message }, 'Turn processing failed');
        },
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private bridgeEvents(): void {
    this.gate.on('state', (change: VoxdeskEvents['gate:state']) => this.bus.emit('gate:state', change));
    this.gate.on('utterance', (utterance: Utterance) => this.bus.emit('utterance:emitted', utterance));
    this.gate.on('discarded', (discarded: VoxdeskEvents['utterance:discarded']) => {
      this.bus.emit('utterance:discarded', discarded);
    });
    this.arbiter.on('fallback', (event: VoxdeskEvents['asr:fallback']) => this.bus.emit('asr:fallback', event));
    this.classifier.on('degraded', (event: VoxdeskEvents['classification:degraded']) => {
      this.bus.emit('classification:degraded', event);
    });
    this.context.on('evicted', (evicted: VoxdeskEvents['turn:evicted']) => this.bus.emit('turn:evicted', evicted));
    this.learner.on('update', (update: VoxdeskEvents['learning:update']) => this.bus.emit('learning:update', update));
    this.learner.on('ignored', (error: VoxdeskEvents['learning:ignored']) => this.bus.emit('learning:ignored', error));
  }
}
