import { describe, it, expect } from 'vitest';
import { PassThrough, Readable, Writable } from 'stream';
import { copyRaw, untilEnded } from './streams.js';
import { CancelledError } from '../errors.js';

function sink(): Writable & { text(): string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return Object.assign(stream, { text: () => Buffer.concat(chunks).toString('utf8') });
}

describe('untilEnded', () => {
  it('resolves after the consumer saw every chunk', async () => {
    const seen: string[] = [];
    const source = Readable.from(['a', 'b']);

    await untilEnded(source, () => source.on('data', (chunk: string) => seen.push(chunk)));

    expect(seen).toEqual(['a', 'b']);
  });

  it('resolves when the source is destroyed without ending', async () => {
    const source = new PassThrough();
    const done = untilEnded(source, () => source.resume());

    source.destroy();

    await expect(done).resolves.toBeUndefined();
  });

  it('rejects with the source error', async () => {
    const source = new PassThrough();
    const done = untilEnded(source, () => source.resume());

    source.destroy(new Error('connection reset'));

    await expect(done).rejects.toThrow('connection reset');
  });

  it('destroys the source on cancellation', async () => {
    const source = new PassThrough();
    const controller = new AbortController();
    const done = untilEnded(source, () => source.resume(), controller.signal);

    controller.abort();

    await expect(done).rejects.toBeInstanceOf(CancelledError);
    expect(source.destroyed).toBe(true);
  });
});

describe('copyRaw', () => {
  it('copies bytes unchanged without ending the destination', async () => {
    const out = sink();
    await copyRaw(Readable.from([Buffer.from('\x1b[1mbold\x1b[0m')]), out);
    expect(out.text()).toBe('\x1b[1mbold\x1b[0m');
    expect(out.writableEnded).toBe(false);
  });
});
