/**
 * ASR Types — speech-to-text capability and the transcript it feeds downstream.
 */

import type { EnergyProfile } from '../audio/types.js';

export interface TranscribeOptions {
  sampleRate: number;
  languageHint: string;
  signal: AbortSignal;
}

export interface RecognitionResult {
  text: string;
  /** 0-1, or null when the engine reports none */
  confidence: number | null;
}

/**
 * A speech-to-text backend. Any thrown error or empty text counts as a failure.
 */
export interface SpeechToTextProvider {
  readonly name: string;
  transcribe(samples: Int16Array, options: TranscribeOptions): Promise<RecognitionResult>;
}

export type EngineRole = 'primary' | 'secondary';

export interface Transcript {
  /** Normalized text */
  text: string;
  /** Engine output before normalization */
  rawText: string;
  engine: EngineRole;
  engineName: string;
  confidence: number | null;
  utteranceId: string;
  startedAt: number;
  endedAt: number;
  durationMs: number;
  energy?: EnergyProfile;
}

export interface EngineStats {
  attempts: number;
  successes: number;
  failures: number;
  timeouts: number;
}
