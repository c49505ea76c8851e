/**
 * Vosk WebSocket engine — vosk-server protocol over `ws`.
 *
 * One connection per utterance:
 *   → {"config":{"sample_rate":16000,"words":1}}
 *   → binary PCM chunks
 *   → {"eof":1}
 *   ← one reply per audio chunk ({ partial } or a segment { text, result[] })
 *   ← one final { text, result[] } for the eof
 * Segments are joined in order. Confidence is the mean of every word's
 * `conf` when the server reports them.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import type { RecognitionResult, SpeechToTextProvider, TranscribeOptions } from '../types.js';

const WordSchema = z.object({
  word: z.string().optional(),
  conf: z.number().optional(),
});

const SegmentSchema = z.object({
  text: z.string(),
  result: z.array(WordSchema).optional(),
});

export interface VoskWebSocketOptions {
  url: string;
  /** Bytes per binary message. Defaults to 8000 (0.25 s at 16 kHz). */
  chunkBytes?: number;
}

type Word = z.infer<typeof WordSchema>;

function meanConfidence(words: Word[]): number | null {
  const confs = words.map(w => w.conf).filter((c): c is number => c !== undefined);
  if (confs.length === 0) return null;
  return confs.reduce((sum, c) => sum + c, 0) / confs.length;
}

export class VoskWebSocketEngine implements SpeechToTextProvider {
  readonly name = 'vosk';

  private url: string;
  private chunkBytes: number;

  constructor(options: VoskWebSocketOptions) {
    this.url = options.url;
    this.chunkBytes = options.chunkBytes ?? 8000;
  }

  transcribe(samples: Int16Array, options: TranscribeOptions): Promise<RecognitionResult> {
    return new Promise<RecognitionResult>((resolve, reject) => {
      if (options.signal.aborted) {
        reject(new Error('Vosk request aborted'));
        return;
      }

      const ws = new WebSocket(this.url);
      const segments: string[] = [];
      const words: Word[] = [];
      let expectedReplies = Infinity;
      let replies = 0;
      let settled = false;

      const finish = (outcome: { result: RecognitionResult } | { error: Error }): void => {
        if (settled) return;
        settled = true;
        options.signal.removeEventListener('abort', onAbort);
        if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
          ws.terminate();
        }
        if ('result' in outcome) {
          resolve(outcome.result);
        } else {
          reject(outcome.error);
        }
      };

      const onAbort = (): void => finish({ error: new Error('Vosk request aborted') });
      options.signal.addEventListener('abort', onAbort);

      ws.on('open', () => {
        ws.send(JSON.stringify({ config: { sample_rate: options.sampleRate, words: 1 } }));
        const pcm = Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
        let chunks = 0;
        for (let offset = 0; offset < pcm.length; offset += this.chunkBytes) {
          ws.send(pcm.subarray(offset, offset + this.chunkBytes));
          chunks++;
        }
        ws.send(JSON.stringify({ eof: 1 }));
        expectedReplies = chunks + 1;
      });

      ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) return;
        let payload: unknown;
        try {
          payload = JSON.parse(data.toString());
        } catch (err) {
          finish({ error: new Error(`Vosk sent invalid JSON: ${err instanceof Error ? err.message : String(err)}`) });
          return;
        }
        replies++;
        const segment = SegmentSchema.safeParse(payload);
        if (segment.success) {
          if (segment.data.text.trim()) segments.push(segment.data.text.trim());
          words.push(...(segment.data.result ?? []));
        }
        if (replies >= expectedReplies) {
          finish({ result: { text: segments.join(' '), confidence: meanConfidence(words) } });
        }
      });

      ws.on('error', (err: Error) => finish({ error: err }));
      ws.on('close', () => finish({ error: new Error('Vosk connection closed before a final result') }));
    });
  }
}
