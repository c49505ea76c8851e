/**
 * Whisper HTTP engine — whisper.cpp-style server over plain fetch().
 *
 * POST {baseUrl}/inference, multipart with a 16-bit mono WAV under `file`.
 * The server answers { text }; it reports no confidence.
 */

import { z } from 'zod';
import { encodeWav } from '../../audio/pcm.js';
import type { RecognitionResult, SpeechToTextProvider, TranscribeOptions } from '../types.js';

const InferenceResponseSchema = z.object({
  text: z.string(),
});

export interface WhisperHttpOptions {
  baseUrl: string;
  /** Override for tests */
  fetch?: typeof fetch;
}

export class WhisperHttpEngine implements SpeechToTextProvider {
  readonly name = 'whisper';

  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: WhisperHttpOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async transcribe(samples: Int16Array, options: TranscribeOptions): Promise<RecognitionResult> {
    const wav = encodeWav(samples, options.sampleRate);
    const form = new FormData();
    form.append('file', new Blob([wav], { type: 'audio/wav' }), 'utterance.wav');
    form.append('response_format', 'json');
    form.append('temperature', '0');
    form.append('language', options.languageHint);

    const response = await this.fetchImpl(`${this.baseUrl}/inference`, {
      method: 'POST',
      body: form,
      signal: options.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Whisper server error (${response.status}): ${errorText}`);
    }

    const parsed = InferenceResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Whisper server returned an unexpected payload');
    }
    return { text: parsed.data.text, confidence: null };
  }
}
