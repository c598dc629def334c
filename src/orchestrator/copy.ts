import { ChildProcess, spawn } from 'child_process';
import { mkdir, mkdtemp, readdir, rename, rm, stat } from 'fs/promises';
import path from 'path';
import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import pino from 'pino';
import { DaemonClient } from './client.js';
import { ContainerPath, parseContainerPath } from './naming.js';
import { CancelledError, InvalidArgumentsError, StreamFailureError, getErrorMessage } from '../errors.js';
import type { IOStreams } from '../types.js';

/**
 * Packs and unpacks tar archives on the host.
 */
export interface TarRunner {
  /** Archive `entry` (relative to `cwd`) as a tar stream */
  pack(cwd: string, entry: string): Readable;
  /** Unpack a tar stream into `directory` */
  unpack(directory: string): Writable;
}

function awaitExit(child: ChildProcess, what: string): Promise<void> {
  return new Promise((resolve, reject) => {
    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });
    child.once('error', reject);
    child.once('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`${what} exited with status ${code}: ${stderr.trim()}`));
      }
    });
  });
}

/**
 * The host tar binary. Failures surface as stream errors so pipeline
 * rejects.
 */
export const hostTar: TarRunner = {
  pack(cwd, entry) {
    const child = spawn('tar', ['-c', '-f', '-', '-C', cwd, entry], { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout = child.stdout;
    awaitExit(child, 'tar -c').catch((error: unknown) => stdout.destroy(error instanceof Error ? error : undefined));
    return stdout;
  },
  unpack(directory) {
    const child = spawn('tar', ['-x', '-f', '-', '-C', directory], { stdio: ['pipe', 'ignore', 'pipe'] });
    const stdin = child.stdin;
    const exited = awaitExit(child, 'tar -x');
    exited.catch((error: unknown) => stdin.destroy(error instanceof Error ? error : undefined));
    return new Writable({
      write(chunk: Buffer, _encoding, callback) {
        stdin.write(chunk, callback);
      },
      final(callback) {
        stdin.end();
        exited.then(() => callback(), callback);
      },
    });
  },
};

export interface CopyEngineOptions {
  logger?: pino.Logger;
  signal?: AbortSignal;
  cwd?: string;
  tar?: TarRunner;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Copies files between the host and a container through the daemon's
 * archive endpoints. `-` stands for a tar stream on stdin or stdout.
 */
export class CopyEngine {
  private log: pino.Logger;
  private signal: AbortSignal | undefined;
  private cwd: string;
  private tar: TarRunner;

  constructor(
    private readonly client: DaemonClient,
    private readonly io: IOStreams,
    options: CopyEngineOptions = {}
  ) {
    this.log = options.logger ?? pino({ level: 'silent' });
    this.signal = options.signal;
    this.cwd = options.cwd ?? process.cwd();
    this.tar = options.tar ?? hostTar;
  }

  async copy(source: string, destination: string): Promise<void> {
    const from = parseContainerPath(source);
    const to = parseContainerPath(destination);
    if (from.isStdio && to.isStdio) {
      throw new InvalidArgumentsError('source and destination cannot both be "-"');
    }
    if (from.isContainer && to.isContainer) {
      throw new InvalidArgumentsError('copying between containers is not supported');
    }
    if (!from.isContainer && !to.isContainer) {
      throw new InvalidArgumentsError('must specify at least one container source or destination');
    }
    for (const operand of [from, to]) {
      if (operand.isContainer && operand.container === '') {
        throw new InvalidArgumentsError(`"${operand.path}" needs a container name or --agent`);
      }
    }

    if (from.isContainer) {
      await this.copyFromContainer(from, to);
    } else {
      await this.copyToContainer(from, to);
    }
  }

  private async copyFromContainer(from: ContainerPath, to: ContainerPath): Promise<void> {
    const container = await this.client.findContainer(from.container, this.signal);
    const archive = await this.client.getArchive(container.id, from.path, this.signal);
    this.log.debug({ container: container.name, path: from.path, destination: to.path }, 'Copying from container');

    if (to.isStdio) {
      await this.pump(archive, this.io.out);
      return;
    }

    const destination = path.resolve(this.cwd, to.path);
    if (await isDirectory(destination)) {
      await this.pump(archive, this.tar.unpack(destination));
      return;
    }

    // Unpack beside the destination, then move the single entry into place.
    const parent = path.dirname(destination);
    await mkdir(parent, { recursive: true });
    const staging = await mkdtemp(path.join(parent, '.berth-cp-'));
    try {
      await this.pump(archive, this.tar.unpack(staging));
      const entries = await readdir(staging);
      if (entries.length !== 1) {
        throw new StreamFailureError(`expected one entry in the archive of ${from.path}, found ${entries.length}`);
      }
      await rename(path.join(staging, entries[0]), destination);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
  }

  private async copyToContainer(from: ContainerPath, to: ContainerPath): Promise<void> {
    const container = await this.client.findContainer(to.container, this.signal);
    let archive: Readable;
    if (from.isStdio) {
      archive = this.io.in;
    } else {
      const source = path.resolve(this.cwd, from.path);
      try {
        await stat(source);
      } catch (error) {
        throw new InvalidArgumentsError(`no such file or directory: ${source}`, { cause: error });
      }
      archive = this.tar.pack(path.dirname(source), path.basename(source));
    }
    this.log.debug({ container: container.name, path: to.path, source: from.path }, 'Copying into container');
    try {
      await this.client.putArchive(container.id, to.path, archive, this.signal);
    } catch (error) {
      if (!from.isStdio) {
        archive.destroy();
      }
      throw error;
    }
  }

  private async pump(source: NodeJS.ReadableStream, target: Writable): Promise<void> {
    try {
      await pipeline(source, target, { signal: this.signal, end: target !== this.io.out });
    } catch (error) {
      if (this.signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof StreamFailureError) {
        throw error;
      }
      throw new StreamFailureError(`copy failed: ${getErrorMessage(error)}`, error);
    }
  }
}
