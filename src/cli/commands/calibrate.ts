/**
 * `voxdesk calibrate` — recommend threshold settings from a recording that
 * opens with a few seconds of room silence followed by normal speech.
 */

import { Command } from 'commander';
import { createReadStream } from 'fs';
import { resolve } from 'path';
import { stringify as toYaml } from 'yaml';
import { calibrate, type CalibrationReport } from '../../audio/calibration.js';
import { readPcmFrames } from '../../audio/pcm-reader.js';
import type { AudioFrame } from '../../audio/types.js';
import { ConfigError } from '../../core/errors.js';
import { prepare } from '../shared.js';

interface CalibrateOptions {
  dir: string;
  input: string;
  silenceSeconds: number;
  json?: boolean;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`--silence-seconds must be a positive number, got "${value}"`);
  }
  return seconds;
}

export function createCalibrateCommand(): Command {
  const cmd = new Command('calibrate');

  cmd
    .description('Measure background noise and speech level from a PCM recording')
    .requiredOption('-i, --input <file>', 'Raw 16-bit mono PCM recording')
    .option('-s, --silence-seconds <seconds>', 'Length of the silent lead-in', parseSeconds, 2)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: CalibrateOptions, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
      await runCalibrate({ ...options, verbose });
    });

  return cmd;
}

async function runCalibrate(options: CalibrateOptions & { verbose?: boolean }): Promise<void> {
  const { config } = prepare(options);

  const frames: AudioFrame[] = [];
  const stream = createReadStream(resolve(options.input));
  for await (const frame of readPcmFrames(stream, config.audio)) {
    frames.push(frame);
  }

  const report = calibrate(frames, options.silenceSeconds * 1000);
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  printReport(report);
}

function printReport(report: CalibrationReport): void {
  const fmt = (n: number | null): string => (n === null ? '-' : n.toFixed(4));

  console.log('\n  Calibration');
  console.log('  ' + '─'.repeat(40));
  console.log(`  Frames:            ${report.frames} (${report.backgroundFrames} background, ${report.voiceFrames} voice)`);
  console.log(`  Background mean:   ${fmt(report.backgroundMean)}`);
  console.log(`  Background max:    ${fmt(report.backgroundMax)}`);
  console.log(`  Voice mean:        ${fmt(report.voiceMean)}`);
  console.log(`  Voice min:         ${fmt(report.voiceMin)}`);
  console.log(`  Recommended:       ${fmt(report.recommendedThreshold)}`);
  if (report.voiceFrames === 0) {
    console.log('\n  No speech rose above the background; the recommendation uses the noise floor only.');
  }
  console.log('\n  Suggested config.yaml:\n');
  const snippet = toYaml({ threshold: report.suggested });
  for (const line of snippet.trimEnd().split('\n')) {
    console.log(`    ${line}`);
  }
  console.log('');
}
