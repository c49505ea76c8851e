import { nanoid } from 'nanoid';
import type { TranscriptNormalizer } from '../asr/normalize.js';
import type { Transcript } from '../asr/types.js';

/**
 * Wrap typed text as a Transcript so it can enter the pipeline after ASR.
 */
export function textTranscript(
  rawText: string,
  normalizer: TranscriptNormalizer,
  at: number = Date.now(),
): Transcript {
  return {
    text: normalizer.normalize(rawText),
    rawText,
    engine: 'primary',
    engineName: 'text',
    confidence: 1,
    utteranceId: `txt_${nanoid(10)}`,
    startedAt: at,
    endedAt: at,
    durationMs: 0,
  };
}
