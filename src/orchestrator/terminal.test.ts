import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { RawModeGuard, ResizeMonitor, setInteractiveMode, terminalSize } from './terminal.js';
import { FakeTerminalInput, FakeTerminalOutput } from '../testing/fake-io.js';
import { ConflictError } from '../errors.js';
import type { TerminalSize } from '../types.js';

describe('RawModeGuard', () => {
  it('restores the mode captured at acquire', () => {
    const input = new FakeTerminalInput({ isTTY: true });
    const guard = new RawModeGuard(input);

    guard.acquire();
    expect(guard.active).toBe(true);
    guard.release();
    guard.release();

    expect(input.rawModeHistory).toEqual([true, false]);
    expect(guard.active).toBe(false);
  });

  it('keeps raw mode when it was already on', () => {
    const input = new FakeTerminalInput({ isTTY: true });
    input.isRaw = true;
    const guard = new RawModeGuard(input);

    guard.acquire();
    guard.release();

    expect(input.rawModeHistory).toEqual([true, true]);
  });

  it('allows one holder per terminal', () => {
    const input = new FakeTerminalInput({ isTTY: true });
    const first = new RawModeGuard(input);
    first.acquire();

    expect(() => new RawModeGuard(input).acquire()).toThrow(ConflictError);

    first.release();
    const second = new RawModeGuard(input);
    second.acquire();
    second.release();
  });

  it('does nothing without a TTY', () => {
    const input = new FakeTerminalInput();
    const guard = new RawModeGuard(input);

    guard.acquire();
    guard.release();

    expect(input.rawModeHistory).toEqual([]);
  });
});

describe('terminalSize', () => {
  it('ignores unknown dimensions', () => {
    expect(terminalSize(new FakeTerminalOutput({ rows: 30, columns: 100 }))).toEqual({ rows: 30, columns: 100 });
    expect(terminalSize(new FakeTerminalOutput({ rows: 0, columns: 100 }))).toBeNull();
  });
});

describe('ResizeMonitor', () => {
  it('forwards changed sizes only', () => {
    const output = new FakeTerminalOutput({ rows: 24, columns: 80 });
    const sizes: TerminalSize[] = [];
    const monitor = new ResizeMonitor(output, async (size) => {
      sizes.push(size);
    }, pino({ level: 'silent' }));

    monitor.start({ rows: 24, columns: 80 });
    output.resize(24, 80);
    output.resize(40, 120);
    output.resize(40, 120);
    monitor.stop();
    output.resize(50, 150);

    expect(sizes).toEqual([{ rows: 40, columns: 120 }]);
  });

  it('keeps going after a failed resize', async () => {
    const output = new FakeTerminalOutput({ rows: 24, columns: 80 });
    const onResize = vi.fn().mockRejectedValueOnce(new Error('gone')).mockResolvedValue(undefined);
    const monitor = new ResizeMonitor(output, onResize, pino({ level: 'silent' }));

    monitor.start(null);
    output.resize(30, 90);
    output.resize(31, 91);
    monitor.stop();

    expect(onResize).toHaveBeenCalledTimes(2);
  });
});

describe('setInteractiveMode', () => {
  it('quiets the logger and restores its level', () => {
    const logger = pino({ level: 'debug' });

    setInteractiveMode(logger, true);
    expect(logger.level).toBe('error');
    setInteractiveMode(logger, true);
    setInteractiveMode(logger, false);
    expect(logger.level).toBe('debug');
  });

  it('leaves a quieter logger alone', () => {
    const logger = pino({ level: 'fatal' });

    setInteractiveMode(logger, true);
    expect(logger.level).toBe('fatal');
    setInteractiveMode(logger, false);
    expect(logger.level).toBe('fatal');
  });
});
