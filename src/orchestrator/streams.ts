import { Readable, Writable } from 'stream';
import { once } from 'events';
import { pipeline } from 'stream/promises';
import { CancelledError, StreamFailureError } from '../errors.js';

/**
 * Resolve once `source` ends or closes, after `start` wired its consumers.
 * The signal destroys the source and rejects with CancelledError.
 */
export function untilEnded(source: Readable, start: () => void, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const cleanup = () => {
      source.off('end', onEnd);
      source.off('close', onEnd);
      signal?.removeEventListener('abort', onAbort);
    };
    const onEnd = () => {
      cleanup();
      resolve();
    };
    const onAbort = () => {
      cleanup();
      source.destroy();
      reject(new CancelledError());
    };
    // Stays attached: a late error on a settled stream must not go unhandled.
    source.on('error', (error: Error) => {
      cleanup();
      reject(error);
    });
    source.on('end', onEnd);
    source.on('close', onEnd);
    signal?.addEventListener('abort', onAbort, { once: true });
    start();
  });
}

async function forward(target: Writable, payload: Buffer): Promise<void> {
  if (!target.write(payload)) {
    await once(target, 'drain');
  }
}

/**
 * Writable that forwards raw bytes to a destination without ending it.
 */
class RawForwarder extends Writable {
  constructor(private readonly target: Writable) {
    super();
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    forward(this.target, chunk).then(
      () => callback(),
      (error: unknown) => callback(error instanceof Error ? error : new StreamFailureError(String(error)))
    );
  }
}

/**
 * Copy an unframed (TTY) stream to a destination until the source ends.
 */
export async function copyRaw(source: NodeJS.ReadableStream, target: Writable, signal?: AbortSignal): Promise<void> {
  await pipeline(source, new RawForwarder(target), signal ? { signal } : {});
}
