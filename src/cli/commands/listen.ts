/**
 * `voxdesk listen` — run the full pipeline on raw PCM audio.
 *
 * Input is 16-bit little-endian mono PCM at audio.sampleRate, from a file or
 * stdin (e.g. `arecord -f S16_LE -r 16000 -c 1 | voxdesk listen`). Commands
 * are dry-run; prompts are printed.
 */

import { Command } from 'commander';
import { createReadStream } from 'fs';
import { resolve } from 'path';
import { FrameQueue } from '../../audio/frame-queue.js';
import { readPcmFrames } from '../../audio/pcm-reader.js';
import type { AudioFrame } from '../../audio/types.js';
import { ConsoleSpeech, DryRunExecutor } from '../../pipeline/collaborators.js';
import type { VoiceSession } from '../../pipeline/session.js';
import { createSession, formatSummary, prepare } from '../shared.js';

interface ListenOptions {
  dir: string;
  input: string;
}

export function createListenCommand(): Command {
  const cmd = new Command('listen');

  cmd
    .description('Listen to raw PCM audio and print the commands it yields')
    .option('-i, --input <file>', 'PCM file, or - for stdin', '-')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (options: ListenOptions, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
      await runListen({ ...options, verbose });
    });

  return cmd;
}

async function runListen(options: ListenOptions & { verbose?: boolean }): Promise<void> {
  const { config } = prepare(options);
  const session = createSession(config, {
    executor: new DryRunExecutor(),
    speech: new ConsoleSpeech(),
  });

  session.bus.on('turn:appended', turn => {
    const slots = Object.entries(turn.command?.slots ?? turn.classification.slots)
      .map(([k, v]) => `${k}=${v}`)
      .join(' ');
    const label = turn.command ? `${turn.command.taskType}/${turn.command.action}` : turn.outcome;
    console.log(`  "${turn.transcript.text}" → ${label}${slots ? ` ${slots}` : ''}`);
  });

  const frameOptions = { sampleRate: config.audio.sampleRate, frameMs: config.audio.frameMs };
  const live = options.input === '-';
  console.log(`\n  Listening on ${live ? 'stdin' : options.input} (${config.audio.sampleRate} Hz, ${config.asr.primary} → ${config.asr.secondary})\n`);

  if (live) {
    await listenLive(session, readPcmFrames(process.stdin, frameOptions), config.gate.queueCapacity);
  } else {
    // A file is read faster than real time; feed the gate directly so no frame is dropped.
    for await (const frame of readPcmFrames(createReadStream(resolve(options.input)), frameOptions)) {
      session.ingest(frame);
    }
    await session.drain();
  }

  const stats = session.arbiter.getStats();
  console.log(`\n  ${session.context.size} turn(s). ${config.asr.primary}: ${stats.primary.successes}/${stats.primary.attempts}, ${config.asr.secondary}: ${stats.secondary.successes}/${stats.secondary.attempts}\n`);
}

async function listenLive(
  session: VoiceSession,
  frames: AsyncIterable<AudioFrame>,
  capacity: number,
): Promise<void> {
  const queue = new FrameQueue(capacity);
  const produce = async (): Promise<void> => {
    try {
      for await (const frame of frames) queue.push(frame);
    } finally {
      queue.close();
    }
  };
  await Promise.all([session.run(queue), produce()]);
  if (queue.droppedFrames > 0) {
    console.log(`  ${queue.droppedFrames} frame(s) dropped while the pipeline was busy`);
  }
}
