import pino from 'pino';
import { ConflictError, getErrorMessage } from '../errors.js';
import type { TerminalInput, TerminalOutput, TerminalSize } from '../types.js';

const held = new WeakSet<TerminalInput>();

/**
 * Exclusive hold on the host terminal's raw mode. Acquire before the hijack,
 * release on every exit path; release restores the mode captured at acquire.
 */
export class RawModeGuard {
  private previous: boolean | null = null;
  private readonly restoreOnExit = () => this.release();

  constructor(private readonly input: TerminalInput) {}

  get active(): boolean {
    return this.previous !== null;
  }

  acquire(): void {
    if (held.has(this.input)) {
      throw new ConflictError('the terminal is already attached to another session');
    }
    if (!this.input.isTTY || !this.input.setRawMode) {
      return;
    }
    this.previous = this.input.isRaw ?? false;
    this.input.setRawMode(true);
    held.add(this.input);
    process.once('exit', this.restoreOnExit);
  }

  release(): void {
    if (this.previous === null) {
      return;
    }
    const previous = this.previous;
    this.previous = null;
    held.delete(this.input);
    process.removeListener('exit', this.restoreOnExit);
    this.input.setRawMode?.(previous);
  }
}

export function terminalSize(output: TerminalOutput): TerminalSize | null {
  const rows = output.rows ?? 0;
  const columns = output.columns ?? 0;
  if (rows <= 0 || columns <= 0) {
    return null;
  }
  return { rows, columns };
}

/**
 * Forwards host window changes to the container (or exec session). Listens
 * for the output's 'resize' event; pollIntervalMs adds a poller for hosts
 * that do not emit one.
 */
export class ResizeMonitor {
  private last: TerminalSize | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly listener = () => this.check();

  constructor(
    private readonly output: TerminalOutput,
    private readonly onResize: (size: TerminalSize) => Promise<void>,
    private readonly log: pino.Logger,
    private readonly pollIntervalMs?: number
  ) {}

  start(initial: TerminalSize | null): void {
    this.last = initial;
    this.output.on('resize', this.listener);
    if (this.pollIntervalMs) {
      this.timer = setInterval(this.listener, this.pollIntervalMs);
      this.timer.unref();
    }
  }

  stop(): void {
    this.output.removeListener('resize', this.listener);
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private check(): void {
    const size = terminalSize(this.output);
    if (!size || (this.last && this.last.rows === size.rows && this.last.columns === size.columns)) {
      return;
    }
    this.last = size;
    this.onResize(size).catch((error: unknown) => {
      this.log.debug({ err: getErrorMessage(error), size }, 'Resize failed');
    });
  }
}

const savedLevels = new WeakMap<pino.Logger, string>();

/**
 * While a TTY session owns the screen only errors are logged. Turning the
 * mode off restores the level in effect when it was turned on.
 */
export function setInteractiveMode(logger: pino.Logger, active: boolean): void {
  if (active) {
    if (!savedLevels.has(logger)) {
      savedLevels.set(logger, logger.level);
      if (logger.levelVal < logger.levels.values.error) {
        logger.level = 'error';
      }
    }
    return;
  }
  const saved = savedLevels.get(logger);
  if (saved !== undefined) {
    savedLevels.delete(logger);
    logger.level = saved;
  }
}
