/**
 * AsrArbiter — primary/secondary speech recognition with a bounded timeout.
 *
 * The primary engine gets one attempt under its deadline. A timeout, a thrown
 * error or blank text hands the utterance to the secondary engine, once.
 * Only when both fail does transcribe() reject, with RecognitionUnavailableError.
 */

import { EventEmitter } from 'node:events';
import { getLogger } from '../core/logger.js';
import { EngineTimeoutError, RecognitionUnavailableError, toError, type EngineFailure } from '../core/errors.js';
import type { AsrConfig } from '../core/types.js';
import { concatSamples } from '../audio/pcm.js';
import type { Utterance } from '../audio/types.js';
import { withTimeout } from '../utils/async.js';
import { stopwatch } from '../utils/timer.js';
import type { TranscriptNormalizer } from './normalize.js';
import type {
  EngineRole,
  EngineStats,
  RecognitionResult,
  SpeechToTextProvider,
  Transcript,
} from './types.js';

export interface AsrArbiterOptions {
  primary: SpeechToTextProvider;
  secondary: SpeechToTextProvider;
  normalizer: TranscriptNormalizer;
  config: Pick<AsrConfig, 'primaryTimeoutMs' | 'secondaryTimeoutMs' | 'languageHint'>;
}

export interface FallbackEvent {
  utteranceId: string;
  failure: EngineFailure;
}

type Attempt =
  | { ok: true; result: RecognitionResult; text: string }
  | { ok: false; failure: EngineFailure };

function emptyStats(): EngineStats {
  return { attempts: 0, successes: 0, failures: 0, timeouts: 0 };
}

export class AsrArbiter extends EventEmitter {
  private readonly primary: SpeechToTextProvider;
  private readonly secondary: SpeechToTextProvider;
  private readonly normalizer: TranscriptNormalizer;
  private readonly config: AsrArbiterOptions['config'];
  private readonly stats: Record<EngineRole, EngineStats> = {
    primary: emptyStats(),
    secondary: emptyStats(),
  };
  private readonly logger = getLogger();

  constructor(options: AsrArbiterOptions) {
    super();
    this.primary = options.primary;
    this.secondary = options.secondary;
    this.normalizer = options.normalizer;
    this.config = options.config;
  }

  async transcribe(utterance: Utterance): Promise<Transcript> {
    const samples = concatSamples(utterance.frames);

    const first = await this.attempt('primary', samples, utterance);
    if (first.ok) {
      return this.buildTranscript('primary', first, utterance);
    }

    this.logger.warn(
      { utteranceId: utterance.id, engine: first.failure.engine, reason: first.failure.reason },
      'Primary recognizer failed, trying secondary',
    );
    const fallback: FallbackEvent = { utteranceId: utterance.id, failure: first.failure };
    this.emit('fallback', fallback);

    const second = await this.attempt('secondary', samples, utterance);
    if (second.ok) {
      return this.buildTranscript('secondary', second, utterance);
    }

    throw new RecognitionUnavailableError([first.failure, second.failure]);
  }

  getStats(): Record<EngineRole, EngineStats> {
    return {
      primary: { ...this.stats.primary },
      secondary: { ...this.stats.secondary },
    };
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async attempt(role: EngineRole, samples: Int16Array, utterance: Utterance): Promise<Attempt> {
    const engine = role === 'primary' ? this.primary : this.secondary;
    const timeoutMs = role === 'primary' ? this.config.primaryTimeoutMs : this.config.secondaryTimeoutMs;
    const stats = this.stats[role];
    const sw = stopwatch();
    stats.attempts++;

    try {
      const result = await withTimeout(
        signal => engine.transcribe(samples, {
          sampleRate: utterance.sampleRate,
          languageHint: this.config.languageHint,
          signal,
        }),
        timeoutMs,
        engine.name,
      );

      const text = this.normalizer.normalize(result.text);
      if (text.length === 0) {
        stats.failures++;
        return { ok: false, failure: { engine: engine.name, reason: 'empty transcript' } };
      }

      stats.successes++;
      this.logger.debug({ engine: engine.name, role, elapsedMs: Math.round(sw.elapsed()) }, 'Recognizer answered');
      return { ok: true, result, text };
    } catch (err) {
      if (err instanceof EngineTimeoutError) {
        stats.timeouts++;
        return { ok: false, failure: { engine: engine.name, reason: `timeout after ${timeoutMs}ms` } };
      }
      stats.failures++;
      return { ok: false, failure: { engine: engine.name, reason: toError(err).message } };
    }
  }

  private buildTranscript(
    role: EngineRole,
    attempt: Extract<Attempt, { ok: true }>,
    utterance: Utterance,
  ): Transcript {
    const engine = role === 'primary' ? this.primary : this.secondary;
    const confidence = attempt.result.confidence === null
      ? null
      : Math.min(1, Math.max(0, attempt.result.confidence));

    return Object.freeze({
      text: attempt.text,
      rawText: attempt.result.text,
      engine: role,
      engineName: engine.name,
      confidence,
      utteranceId: utterance.id,
      startedAt: utterance.startedAt,
      endedAt: utterance.endedAt,
      durationMs: utterance.durationMs,
      energy: {
        peak: utterance.peakEnergy,
        mean: utterance.meanEnergy,
        trailing: utterance.trailingEnergy,
        noiseFloor: utterance.noiseFloorAtClose,
      },
    });
  }
}
