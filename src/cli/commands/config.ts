/**
 * `voxdesk config` — show the resolved configuration.
 */

import { Command } from 'commander';
import { join } from 'path';
import { stringify as toYaml } from 'yaml';
import { prepare } from '../shared.js';

interface ConfigOptions {
  dir: string;
  json?: boolean;
  init?: boolean;
}

export function createConfigCommand(): Command {
  const cmd = new Command('config');

  cmd
    .description('Print the merged configuration (defaults, files, environment)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .option('--init', 'Write a starter global config if none exists')
    .action((options: ConfigOptions, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
      showConfig({ ...options, verbose });
    });

  return cmd;
}

function showConfig(options: ConfigOptions & { verbose?: boolean }): void {
  const { manager, config } = prepare(options);

  if (options.init) {
    const written = manager.createDefaultConfig();
    console.log(written
      ? `\n  Wrote ${written}\n`
      : `\n  ${join(manager.getGlobalDir(), 'config.yaml')} already exists\n`);
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log(`\n  # global:  ${join(manager.getGlobalDir(), 'config.yaml')}`);
  console.log(`  # project: ${join(manager.getProjectDir(), '.voxdesk.yaml')}\n`);
  for (const line of toYaml(config).trimEnd().split('\n')) {
    console.log(`  ${line}`);
  }
  console.log('');
}
