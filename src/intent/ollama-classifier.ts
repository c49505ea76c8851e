/**
 * OllamaTaskClassifier — remote tier backed by a local Ollama model.
 *
 * Raw fetch() against POST {baseUrl}/api/generate with `format: "json"`;
 * the model's reply is parsed and validated with zod. Any transport,
 * HTTP or shape error throws and the caller falls back to the rule tier.
 */

import { z } from 'zod';
import { TASK_TYPES, TaskTypeSchema } from '../core/types.js';
import type { RemoteClassification, RemoteClassifier } from './types.js';

const GenerateResponseSchema = z.object({
  response: z.string(),
});

const ModelVerdictSchema = z.object({
  taskType: TaskTypeSchema,
  confidence: z.number().min(0).max(1),
  complexity: z.number().min(0).max(1).optional(),
  slots: z.record(z.union([z.string(), z.number(), z.boolean()]))
    .default({})
    .transform(slots => {
      const out: Record<string, string> = {};
      for (const [key, value] of Object.entries(slots)) {
        const text = String(value).trim();
        if (text) out[key] = text;
      }
      return out;
    }),
});

export interface OllamaClassifierOptions {
  baseUrl: string;
  model: string;
  /** Override for tests */
  fetch?: typeof fetch;
}

export function buildClassifierPrompt(text: string): string {
  return [
    'Classify a spoken desktop command.',
    `Task types: ${TASK_TYPES.join(', ')}.`,
    'Slots by task type: app-control {operation, app}; app-action {app, action, text};',
    'messaging {contact, message}; query {query}; file-op {operation, kind, target};',
    'system-op {operation}; conversation {}.',
    'Answer with JSON only: {"taskType": string, "confidence": number 0-1,',
    '"complexity": number 0-1, "slots": object of string values}.',
    `Command: ${JSON.stringify(text)}`,
  ].join('\n');
}

export class OllamaTaskClassifier implements RemoteClassifier {
  readonly name = 'ollama';

  private baseUrl: string;
  private model: string;
  private fetchImpl: typeof fetch;

  constructor(options: OllamaClassifierOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async classify(text: string, options: { signal: AbortSignal }): Promise<RemoteClassification> {
    const response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: buildClassifierPrompt(text),
        format: 'json',
        stream: false,
        options: { temperature: 0 },
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ollama API error (${response.status}): ${errorText}`);
    }

    const envelope = GenerateResponseSchema.parse(await response.json());
    let body: unknown;
    try {
      body = JSON.parse(envelope.response);
    } catch {
      throw new Error('Ollama model reply was not valid JSON');
    }

    const verdict = ModelVerdictSchema.parse(body);
    return {
      taskType: verdict.taskType,
      confidence: verdict.confidence,
      complexity: verdict.complexity ?? null,
      slots: verdict.slots,
    };
  }
}
