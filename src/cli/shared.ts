/**
 * Helpers shared by the CLI commands: config loading, logger setup and
 * session assembly from configuration.
 */

import { resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { VoxdeskConfig } from '../core/types.js';
import { createSpeechEngine } from '../asr/engines.js';
import { OllamaTaskClassifier } from '../intent/ollama-classifier.js';
import { VoiceSession } from '../pipeline/session.js';
import type { Executor, SpeechOutput, TurnResult } from '../pipeline/types.js';

export interface CommonOptions {
  dir: string;
  verbose?: boolean;
}

export interface LoadedConfig {
  manager: ConfigManager;
  config: VoxdeskConfig;
}

/**
 * Load configuration for a project directory and install the logger it asks for.
 * Must run before any component is constructed.
 */
export function prepare(options: CommonOptions): LoadedConfig {
  const manager = new ConfigManager(resolve(options.dir));
  const config = manager.load();
  setLogger(createLogger('voxdesk', {
    verbose: options.verbose || config.logging.pretty,
    level: options.verbose ? 'debug' : config.logging.level,
  }));
  return { manager, config };
}

export function createSession(
  config: VoxdeskConfig,
  collaborators: { executor: Executor; speech?: SpeechOutput },
): VoiceSession {
  return new VoiceSession({
    config,
    primary: createSpeechEngine(config.asr.primary, config.asr),
    secondary: createSpeechEngine(config.asr.secondary, config.asr),
    remote: config.classifier.remoteEnabled
      ? new OllamaTaskClassifier({ baseUrl: config.classifier.remoteUrl, model: config.classifier.remoteModel })
      : undefined,
    executor: collaborators.executor,
    speech: collaborators.speech,
  });
}

export interface TurnSummary {
  kind: TurnResult['kind'];
  text: string;
  taskType?: string;
  confidence?: number;
  provenance?: string;
  action?: string;
  slots?: Readonly<Record<string, string>>;
  inheritedSlots?: readonly string[];
  steps?: string[];
  prompt?: string;
  error?: string;
}

export function summarizeTurn(result: TurnResult): TurnSummary {
  switch (result.kind) {
    case 'command': {
      const { classification, transcript } = result.turn;
      return {
        kind: result.kind,
        text: transcript.text,
        taskType: result.command.taskType,
        confidence: classification.confidence,
        provenance: classification.provenance,
        action: result.command.action,
        slots: result.command.slots,
        inheritedSlots: result.command.inheritedSlots,
        steps: result.command.steps.map(step => step.action),
        ...(result.execution.success ? {} : { error: result.execution.detail ?? 'execution failed' }),
      };
    }
    case 'disambiguation':
      return {
        kind: result.kind,
        text: result.turn.transcript.text,
        taskType: result.request.taskType,
        slots: result.request.partialSlots,
        prompt: result.request.prompt,
      };
    case 'unresolvable':
      return { kind: result.kind, text: result.turn.transcript.text, error: result.error.message };
    case 'cancelled':
      return { kind: result.kind, text: result.turn.transcript.text, taskType: result.request.taskType };
    case 'unrecognized':
      return { kind: result.kind, text: '', error: result.error.message };
    case 'superseded':
      return { kind: result.kind, text: result.transcript.text };
  }
}

export function formatSummary(summary: TurnSummary): string {
  const quoted = summary.text ? `"${summary.text}"` : '(no transcript)';
  switch (summary.kind) {
    case 'command': {
      const slots = Object.entries(summary.slots ?? {}).map(([k, v]) => `${k}=${v}`).join(' ');
      const steps = summary.steps && summary.steps.length > 1 ? ` [${summary.steps.join(' → ')}]` : '';
      const failed = summary.error ? `  ✗ ${summary.error}` : '';
      return `  ${quoted} → ${summary.taskType}/${summary.action}${slots ? ` ${slots}` : ''}${steps}${failed}`;
    }
    case 'disambiguation':
      return `  ${quoted} → ${summary.taskType}? ${summary.prompt}`;
    default:
      return `  ${quoted} → ${summary.kind}${summary.error ? `: ${summary.error}` : ''}`;
  }
}
