import { Duplex } from 'stream';
import pino from 'pino';
import { DaemonClient, ExecCreateRequest, LogOptions, WaitOutcome } from './client.js';
import { copyRaw } from './streams.js';
import { RawModeGuard, ResizeMonitor, setInteractiveMode, terminalSize } from './terminal.js';
import {
  BerthError,
  CancelledError,
  ContainerExitedNonZeroError,
  NotRunningError,
  StreamFailureError,
  getErrorMessage,
} from '../errors.js';
import type { IOStreams, TerminalSize } from '../types.js';

/** Bound on draining output after the exit event arrived first. */
const DRAIN_TIMEOUT_MS = 1000;
/** Bound on waiting for the exit event after the stream closed first. */
const EXIT_POLL_TIMEOUT_MS = 2000;
const EXEC_INSPECT_INTERVAL_MS = 50;

export interface ContainerAttachOptions {
  /** Forward host stdin to the container */
  interactive: boolean;
  signal?: AbortSignal;
  /**
   * Start the container once the connection and the exit subscription are
   * open, so no output of a short-lived process is lost.
   */
  start?: () => Promise<void>;
}

export interface ExecAttachOptions {
  interactive: boolean;
  signal?: AbortSignal;
}

export interface StreamEngineOptions {
  logger?: pino.Logger;
  /** Poll the terminal size as well as listening for 'resize' */
  resizePollMs?: number;
}

type Ending =
  | { kind: 'eof' }
  | { kind: 'exit'; outcome: WaitOutcome }
  | { kind: 'cancelled' }
  | { kind: 'failed'; error: BerthError };

interface SessionParams {
  connection: Duplex;
  raw: boolean;
  forwardStdin: boolean;
  exit: Promise<WaitOutcome> | null;
  signal?: AbortSignal;
  label: string;
}

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => {
    setTimeout(() => resolve(value), ms).unref();
  });
}

function whenAborted(signal: AbortSignal | undefined): { promise: Promise<Ending>; dispose: () => void } {
  if (!signal) {
    return { promise: new Promise<Ending>(() => undefined), dispose: () => undefined };
  }
  let onAbort: () => void = () => undefined;
  const promise = new Promise<Ending>((resolve) => {
    onAbort = () => resolve({ kind: 'cancelled' });
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

function toStreamFailure(error: unknown): BerthError {
  if (error instanceof BerthError) {
    return error;
  }
  return new StreamFailureError(`attach stream failed: ${getErrorMessage(error)}`, error);
}

/**
 * Connects the caller's standard streams to a container's main process or to
 * an exec session. TTY sessions put the host terminal in raw mode and forward
 * window changes; other sessions demultiplex stdout/stderr frames.
 */
export class StreamEngine {
  private log: pino.Logger;
  private resizePollMs: number | undefined;

  constructor(
    private readonly client: DaemonClient,
    private readonly io: IOStreams,
    options: StreamEngineOptions = {}
  ) {
    this.log = options.logger ?? pino({ level: 'silent' });
    this.resizePollMs = options.resizePollMs;
  }

  /**
   * Attach to a container's primary process and return once it exits, the
   * stream closes, or the signal fires.
   *
   * @throws ContainerExitedNonZeroError when the process exits non-zero
   * @throws CancelledError when the signal fires; the container keeps running
   */
  async attachContainer(id: string, options: ContainerAttachOptions): Promise<void> {
    const { signal } = options;
    const info = await this.client.inspectContainer(id, signal);
    const name = info.Name.replace(/^\//, '');
    const starting = options.start !== undefined;
    if (!starting && !info.State.Running) {
      throw new NotRunningError(name);
    }

    const containerTty = info.Config.Tty === true;
    const forwardStdin = options.interactive && info.Config.OpenStdin === true;
    const terminal = containerTty && options.interactive && this.io.in.isTTY === true;

    const local = new AbortController();
    const guard = new RawModeGuard(this.io.in);
    let monitor: ResizeMonitor | null = null;
    let connection: Duplex | null = null;

    try {
      if (terminal) {
        guard.acquire();
        setInteractiveMode(this.log, true);
      }
      connection = await this.client.attachContainer(id, { stdin: forwardStdin }, signal);
      const exit = this.client.waitContainer(id, starting ? 'next-exit' : 'not-running', local.signal);

      if (options.start) {
        await options.start();
      }
      if (terminal) {
        monitor = await this.startResize((size) => this.client.resizeContainer(id, size, signal));
      }

      this.log.debug({ container: name, tty: containerTty, stdin: forwardStdin }, 'Attached');
      const code = await this.runSession({ connection, raw: containerTty, forwardStdin, exit, signal, label: name });
      if (code !== null && code !== 0) {
        throw new ContainerExitedNonZeroError(code);
      }
    } finally {
      local.abort();
      monitor?.stop();
      connection?.destroy();
      if (terminal) {
        setInteractiveMode(this.log, false);
      }
      guard.release();
    }
  }

  /**
   * Run a command inside a running container, attached to the caller's
   * streams. Exec sessions have no wait primitive: the session ends when the
   * stream closes, then the exit code is read from the exec's status.
   */
  async attachExec(containerId: string, request: ExecCreateRequest, options: ExecAttachOptions): Promise<void> {
    const { signal } = options;
    const info = await this.client.inspectContainer(containerId, signal);
    const name = info.Name.replace(/^\//, '');
    if (!info.State.Running) {
      throw new NotRunningError(name);
    }

    const forwardStdin = options.interactive && request.stdin;
    const terminal = request.tty && forwardStdin && this.io.in.isTTY === true;
    const execId = await this.client.createExec(containerId, { ...request, stdin: forwardStdin }, signal);

    const guard = new RawModeGuard(this.io.in);
    let monitor: ResizeMonitor | null = null;
    let connection: Duplex | null = null;

    try {
      if (terminal) {
        guard.acquire();
        setInteractiveMode(this.log, true);
      }
      connection = await this.client.startExec(execId, { stdin: forwardStdin, tty: request.tty }, signal);
      if (terminal) {
        monitor = await this.startResize((size) => this.client.resizeExec(execId, size, signal));
      }

      await this.runSession({ connection, raw: request.tty, forwardStdin, exit: null, signal, label: name });
    } finally {
      monitor?.stop();
      connection?.destroy();
      if (terminal) {
        setInteractiveMode(this.log, false);
      }
      guard.release();
    }

    const code = await this.execExitCode(execId, signal);
    if (code !== 0) {
      throw new ContainerExitedNonZeroError(code);
    }
  }

  /**
   * Copy container output to the caller until the daemon closes the stream
   * or the signal fires.
   */
  async followLogs(id: string, options: LogOptions, signal?: AbortSignal): Promise<void> {
    const info = await this.client.inspectContainer(id, signal);
    const stream = await this.client.logs(id, options, signal);
    try {
      if (info.Config.Tty) {
        await copyRaw(stream, this.io.out, signal);
      } else {
        await this.client.demultiplex(stream, this.io.out, this.io.err, signal);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw toStreamFailure(error);
    }
  }

  private async startResize(resize: (size: TerminalSize) => Promise<void>): Promise<ResizeMonitor> {
    const size = terminalSize(this.io.out);
    if (size) {
      try {
        // One larger first so the remote side sees a change and redraws.
        await resize({ rows: size.rows + 1, columns: size.columns + 1 });
        await resize(size);
      } catch (error) {
        this.log.debug({ err: getErrorMessage(error) }, 'Initial resize failed');
      }
    }
    const monitor = new ResizeMonitor(this.io.out, resize, this.log, this.resizePollMs);
    monitor.start(size);
    return monitor;
  }

  private forwardInput(connection: Duplex): () => void {
    const input = this.io.in;
    const onEnd = () => {
      if (!connection.destroyed && !connection.writableEnded) {
        connection.end();
      }
    };
    input.pipe(connection, { end: false });
    input.once('end', onEnd);
    return () => {
      input.unpipe(connection);
      input.removeListener('end', onEnd);
      input.pause();
    };
  }

  /**
   * @returns the exit code, or null when the stream closed without one
   */
  private async runSession(params: SessionParams): Promise<number | null> {
    const { connection, raw, forwardStdin, exit, signal, label } = params;

    connection.on('error', (error: Error) => {
      this.log.debug({ container: label, err: error.message }, 'Attach connection error');
    });

    const copy = raw ? copyRaw(connection, this.io.out) : this.client.demultiplex(connection, this.io.out, this.io.err);
    const output = copy.then(
      (): Ending => ({ kind: 'eof' }),
      (error: unknown): Ending => ({ kind: 'failed', error: toStreamFailure(error) })
    );
    const exited = exit ? exit.then((outcome): Ending => ({ kind: 'exit', outcome })) : null;
    const cancelled = whenAborted(signal);

    // Host stdin may block indefinitely, so this copy is never awaited.
    const detachInput = forwardStdin ? this.forwardInput(connection) : () => undefined;

    try {
      const first = await Promise.race(exited ? [output, exited, cancelled.promise] : [output, cancelled.promise]);

      if (first.kind === 'cancelled') {
        throw new CancelledError();
      }
      if (first.kind === 'failed') {
        throw first.error;
      }
      if (first.kind === 'exit') {
        const drained = await Promise.race([output, cancelled.promise, delay<Ending>(DRAIN_TIMEOUT_MS, { kind: 'eof' })]);
        if (drained.kind === 'cancelled') {
          throw new CancelledError();
        }
        return this.exitCode(first.outcome);
      }

      // Output ended first: give the exit event a bounded chance to arrive.
      if (!exited) {
        return null;
      }
      const late = await Promise.race([exited, cancelled.promise, delay<Ending>(EXIT_POLL_TIMEOUT_MS, { kind: 'eof' })]);
      if (late.kind === 'cancelled') {
        throw new CancelledError();
      }
      if (late.kind === 'exit') {
        return this.exitCode(late.outcome);
      }
      this.log.debug({ container: label }, 'Stream closed without an exit status; container detached');
      return null;
    } finally {
      detachInput();
      cancelled.dispose();
    }
  }

  private exitCode(outcome: WaitOutcome): number {
    if (outcome.kind === 'error') {
      throw outcome.error;
    }
    return outcome.code;
  }

  private async execExitCode(execId: string, signal?: AbortSignal): Promise<number> {
    const deadline = Date.now() + EXIT_POLL_TIMEOUT_MS;
    let status = await this.client.inspectExec(execId, signal);
    while (status.running && Date.now() < deadline) {
      await delay(EXEC_INSPECT_INTERVAL_MS, undefined);
      status = await this.client.inspectExec(execId, signal);
    }
    if (status.running) {
      throw new StreamFailureError('exec stream closed before the command finished');
    }
    return status.exitCode ?? 0;
  }
}
