import type { AsrConfig } from '../core/types.js';
import { VoskWebSocketEngine } from './providers/vosk-ws.js';
import { WhisperHttpEngine } from './providers/whisper-http.js';
import type { SpeechToTextProvider } from './types.js';

export type EngineKind = AsrConfig['primary'];

/**
 * Build the configured adapter for one recognizer slot.
 */
export function createSpeechEngine(kind: EngineKind, config: AsrConfig): SpeechToTextProvider {
  switch (kind) {
    case 'whisper':
      return new WhisperHttpEngine({ baseUrl: config.whisperUrl });
    case 'vosk':
      return new VoskWebSocketEngine({ url: config.voskUrl });
  }
}
