/**
 * `voxdesk parse` — run typed utterances through classification and planning.
 *
 * Each argument is one turn, so context carries between them:
 *   voxdesk parse "open firefox" "close it"
 */

import { Command } from 'commander';
import { DryRunExecutor } from '../../pipeline/collaborators.js';
import { textTranscript } from '../../pipeline/text-input.js';
import { createSession, formatSummary, prepare, summarizeTurn, type TurnSummary } from '../shared.js';

interface ParseOptions {
  dir: string;
  json?: boolean;
}

export function createParseCommand(): Command {
  const cmd = new Command('parse');

  cmd
    .description('Classify and plan typed utterances without executing them')
    .argument('<utterances...>', 'One or more utterances, each treated as a separate turn')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (utterances: string[], options: ParseOptions, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
      await runParse(utterances, { ...options, verbose });
    });

  return cmd;
}

async function runParse(utterances: string[], options: ParseOptions & { verbose?: boolean }): Promise<void> {
  const { config } = prepare(options);
  const session = createSession(config, { executor: new DryRunExecutor() });

  const summaries: TurnSummary[] = [];
  for (const utterance of utterances) {
    const result = await session.handleTranscript(textTranscript(utterance, session.normalizer));
    summaries.push(summarizeTurn(result));
  }

  if (options.json) {
    console.log(JSON.stringify(summaries, null, 2));
    return;
  }

  console.log('');
  for (const summary of summaries) {
    console.log(formatSummary(summary));
  }
  console.log('');
}
