/**
 * Tests for PCM stream re-chunking and the simulated beacon
 */
import { PassThrough, Readable } from 'node:stream';
import { AudioSourceError } from '../../types';
import { createConfig } from '../../utils/config';
import { SpectralAnalyzer } from '../fft';
import { dominantSymbol, encodeCode } from '../processing';
import { BeaconToneSource, PcmStreamSource, type AudioSource } from '../source';

async function collect(source: AudioSource, signal?: AbortSignal): Promise<Int16Array[]> {
  const blocks: Int16Array[] = [];
  for await (const block of source.blocks(signal)) {
    blocks.push(block);
  }
  return blocks;
}

function pcmBytes(samples: readonly number[]): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => buffer.writeInt16LE(sample, i * 2));
  return buffer;
}

describe('PcmStreamSource', () => {
  const format = { sampleRate: 8000, fftSize: 4 };

  test('re-chunks arbitrary byte boundaries into whole blocks', async () => {
    const bytes = pcmBytes([1, -2, 300, -32768, 32767, 0, 5, 6, 7, 8]);
    // Splits that cut samples in half
    const chunks = [bytes.subarray(0, 3), bytes.subarray(3, 4), bytes.subarray(4, 13), bytes.subarray(13)];
    const source = new PcmStreamSource(Readable.from(chunks), format);

    const blocks = await collect(source);
    expect(blocks.map((b) => Array.from(b))).toEqual([
      [1, -2, 300, -32768],
      [32767, 0, 5, 6],
    ]);
  });

  test('reports the stream format', () => {
    const source = new PcmStreamSource(Readable.from([]), format);
    expect(source.sampleRate).toBe(8000);
    expect(source.blockSize).toBe(4);
  });

  test('stops when the signal aborts', async () => {
    const controller = new AbortController();
    const source = new PcmStreamSource(Readable.from([pcmBytes(new Array<number>(12).fill(1))]), format);

    const blocks: Int16Array[] = [];
    for await (const block of source.blocks(controller.signal)) {
      blocks.push(block);
      controller.abort();
    }
    expect(blocks).toHaveLength(1);
  });

  test('an idle stream ends as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const stream = new PassThrough();
    const blocks = new PcmStreamSource(stream, format).blocks(controller.signal);

    const next = blocks.next();
    controller.abort();

    await expect(next).resolves.toEqual({ done: true, value: undefined });
    expect(stream.destroyed).toBe(true);
  });

  test('a partial block is dropped when the signal aborts', async () => {
    const controller = new AbortController();
    const stream = new PassThrough();
    stream.write(pcmBytes([1, 2, 3]));
    const source = new PcmStreamSource(stream, format);

    const collected = collect(source, controller.signal);
    await new Promise<void>((resolve) => setImmediate(resolve));
    controller.abort();

    await expect(collected).resolves.toEqual([]);
  });

  test('wraps stream failures', async () => {
    const stream = new Readable({
      read() {
        this.destroy(new Error('device unplugged'));
      },
    });
    const source = new PcmStreamSource(stream, format);

    const error = await collect(source).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AudioSourceError);
    expect(error).toHaveProperty('message', 'PCM stream failed');
    expect(error).toHaveProperty('originalError.message', 'device unplugged');
  });
});

describe('BeaconToneSource', () => {
  const config = createConfig();

  test('emits each symbol for the configured number of blocks, then the gap', async () => {
    const source = new BeaconToneSource(25, config, { repetitions: 1, blocksPerSymbol: 2, gapBlocks: 1 });
    const blocks = await collect(source);

    expect(source.sequence).toEqual(encodeCode(25));
    expect(blocks).toHaveLength(17);
    expect(blocks.every((b) => b.length === 1024)).toBe(true);
    expect(Array.from(blocks[16]).every((s) => s === 0)).toBe(true);
  });

  test('stays within the amplitude', async () => {
    const source = new BeaconToneSource(0, config, { repetitions: 1, blocksPerSymbol: 1, amplitude: 1000 });
    const blocks = await collect(source);
    const peak = Math.max(...blocks.flatMap((b) => Array.from(b, Math.abs)));
    expect(peak).toBeLessThanOrEqual(1000);
    expect(peak).toBeGreaterThan(990);
  });

  test('every block carries its symbol', async () => {
    const analyzer = new SpectralAnalyzer(config);
    const source = new BeaconToneSource(99, config, { repetitions: 1, blocksPerSymbol: 1 });
    const symbols = (await collect(source)).map((block) =>
      dominantSymbol(analyzer.analyze(block), config.dominanceFloor, config.dominanceRatio)
    );
    expect(symbols).toEqual(encodeCode(99));
  });

  test('rejects an out-of-range code', () => {
    expect(() => new BeaconToneSource(200, config)).toThrow(RangeError);
  });
});
