/**
 * Stand-in collaborators for running the pipeline without desktop automation.
 */

import { getLogger } from '../core/logger.js';
import type { Command } from '../planner/types.js';
import type { ExecutionResult, Executor, SpeechOutput } from './types.js';

/**
 * Reports every command as executed without touching the desktop.
 */
export class DryRunExecutor implements Executor {
  readonly executed: Command[] = [];
  private readonly logger = getLogger();

  constructor(private readonly onCommand?: (command: Command) => void) {}

  async execute(command: Command): Promise<ExecutionResult> {
    this.executed.push(command);
    this.logger.info({ commandId: command.id, action: command.action, slots: command.slots }, 'Dry run');
    this.onCommand?.(command);
    return { success: true, detail: 'dry run' };
  }
}

/**
 * Writes prompts to a stream (stdout by default) instead of speaking them.
 */
export class ConsoleSpeech implements SpeechOutput {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  say(text: string): void {
    this.out.write(`» ${text}\n`);
  }
}
