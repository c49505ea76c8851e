export type PipelineStage = 'config' | 'gate' | 'asr' | 'classify' | 'plan' | 'execute' | 'learn';

export class VoxdeskError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: PipelineStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VoxdeskError';
  }
}

export class ConfigError extends VoxdeskError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class EngineTimeoutError extends VoxdeskError {
  constructor(public readonly target: string, public readonly timeoutMs: number) {
    super(`${target} timed out after ${timeoutMs}ms`, 'ENGINE_TIMEOUT');
    this.name = 'EngineTimeoutError';
  }
}

export interface EngineFailure {
  engine: string;
  reason: string;
}

/**
 * Both recognizers failed for one utterance. The utterance is dropped and
 * no turn is recorded.
 */
export class RecognitionUnavailableError extends VoxdeskError {
  constructor(public readonly failures: EngineFailure[]) {
    super(
      `Speech recognition unavailable: ${failures.map(f => `${f.engine} (${f.reason})`).join(', ')}`,
      'RECOGNITION_UNAVAILABLE',
      'asr',
    );
    this.name = 'RecognitionUnavailableError';
  }
}

/**
 * Remote classifier tier could not be used. Logged, never thrown to callers.
 */
export class ClassificationDegradedError extends VoxdeskError {
  constructor(message: string, cause?: Error) {
    super(message, 'CLASSIFICATION_DEGRADED', 'classify', cause);
    this.name = 'ClassificationDegradedError';
  }
}

export class UnresolvableIntentError extends VoxdeskError {
  constructor(public readonly text: string) {
    super(`Could not resolve an intent for "${text}"`, 'UNRESOLVABLE_INTENT', 'plan');
    this.name = 'UnresolvableIntentError';
  }
}

/**
 * Malformed or stale correction event. Logged by the learner, never thrown.
 */
export class CorrectionIgnoredError extends VoxdeskError {
  constructor(message: string, public readonly reason?: string) {
    super(message, 'CORRECTION_IGNORED', 'learn');
    this.name = 'CorrectionIgnoredError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
