#!/usr/bin/env node
/**
 * Beacon Light - command line entry point
 *
 * Reads raw s16le mono PCM from stdin (or synthesizes a beacon with
 * --simulate) and renders the decoded light pattern in the terminal:
 *
 *   arecord -q -f S16_LE -c 1 -r 44100 | beacon-light
 *   beacon-light --simulate 25
 */
import { createWriteStream } from 'node:fs';
import { parseArgs } from 'node:util';
import { BeaconPipeline } from './audio/pipeline';
import { BeaconToneSource, PcmStreamSource, type AudioSource } from './audio/source';
import { FeedbackSynthesizer } from './audio/synth';
import { LIGHT_ACTIONS } from './light/patterns';
import { createTerminalRenderer } from './render/terminal';
import { StateStore } from './state/store';
import type { BeaconConfig } from './types';
import { createConfig, type ConfigOverrides } from './utils/config';
import { describeError } from './utils/errors';

const USAGE = `Usage: beacon-light [options]

Options:
  --simulate <code>       Synthesize the beacon for <code> instead of reading stdin
  --sample-rate <hz>      Input sample rate (default 44100)
  --fft-size <n>          Samples per analysis block (default 1024)
  --frame-interval <ms>   Animation frame interval (default 50)
  --feedback-out <file>   Write audible feedback PCM (s16le) to <file>
  --list                  Print the light action table and exit
  -h, --help              Show this help`;

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

function printActions(): void {
  for (const action of LIGHT_ACTIONS) {
    console.log(`${String(action.code).padStart(3)}  ${action.behavior.kind.padEnd(9)}  ${action.name}`);
  }
}

function createSource(config: BeaconConfig, simulate: number | undefined): AudioSource {
  if (simulate !== undefined) {
    return new BeaconToneSource(simulate, config, { realtime: true, gapBlocks: 8 });
  }
  return new PcmStreamSource(process.stdin, config);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      simulate: { type: 'string' },
      'sample-rate': { type: 'string' },
      'fft-size': { type: 'string' },
      'frame-interval': { type: 'string' },
      'feedback-out': { type: 'string' },
      list: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }
  if (values.list) {
    printActions();
    return;
  }

  const overrides: { -readonly [P in keyof ConfigOverrides]: ConfigOverrides[P] } = {};
  const sampleRate = parseNumber('sample-rate', values['sample-rate']);
  const fftSize = parseNumber('fft-size', values['fft-size']);
  const frameIntervalMs = parseNumber('frame-interval', values['frame-interval']);
  if (sampleRate !== undefined) overrides.sampleRate = sampleRate;
  if (fftSize !== undefined) overrides.fftSize = fftSize;
  if (frameIntervalMs !== undefined) overrides.frameIntervalMs = frameIntervalMs;

  const config = createConfig(overrides);
  const simulate = parseNumber('simulate', values.simulate);

  const store = new StateStore();
  store.on('error', (error) => console.error(`[main] ${describeError(error)}`));

  const renderer = createTerminalRenderer(process.stdout, {
    label: () => {
      const { activeAction, detected } = store.state;
      const active = activeAction ? `${activeAction.code}: ${activeAction.name}` : '---';
      const seen = detected ? `${detected.code}: ${detected.action?.name ?? 'undefined'}` : '---';
      return `showing ${active} | detected ${seen}`;
    },
  });

  const feedbackPath = values['feedback-out'];
  const feedbackStream = feedbackPath ? createWriteStream(feedbackPath) : null;
  const synthesizer = feedbackStream
    ? new FeedbackSynthesizer(
        config,
        {
          write: (pcm) =>
            new Promise<void>((resolve, reject) => {
              feedbackStream.write(Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength), (err) =>
                err ? reject(err) : resolve()
              );
            }),
        },
        { onError: (error) => store.reportError(error) }
      )
    : undefined;

  const pipeline = new BeaconPipeline(config, renderer, { store, synthesizer });
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  synthesizer?.start();
  try {
    await pipeline.run(createSource(config, simulate), controller.signal);
  } finally {
    await pipeline.stop();
    feedbackStream?.end();
    process.stdout.write('\n');
  }
}

main().catch((err: unknown) => {
  console.error(`[main] ${describeError(err)}`);
  process.exitCode = 1;
});
