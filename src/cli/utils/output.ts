import pc from 'picocolors';
import { BerthError, getErrorMessage } from '../../errors.js';
import type { IOStreams, TerminalOutput } from '../../types.js';

const MAX_NEXT_STEPS = 3;

export function colorsFor(stream: TerminalOutput) {
  return pc.createColors(stream.isTTY === true);
}

/**
 * Write `Error: <summary>` and up to three next steps to stderr.
 */
export function printError(io: IOStreams, error: unknown): void {
  const c = colorsFor(io.err);
  const message = error instanceof BerthError ? error.message : getErrorMessage(error);
  io.err.write(`${c.red('Error:')} ${message}\n`);

  const steps = error instanceof BerthError ? error.nextSteps.slice(0, MAX_NEXT_STEPS) : [];
  if (steps.length === 0) {
    return;
  }
  io.err.write(`\n${c.bold('Next Steps:')}\n`);
  steps.forEach((step, index) => io.err.write(`  ${index + 1}. ${step}\n`));
}

/**
 * Left-aligned columns separated by three spaces. Headers are bold on a TTY.
 */
export function printTable(out: TerminalOutput, headers: string[], rows: string[][]): void {
  const c = colorsFor(out);
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column])))
      .join('   ')
      .trimEnd();

  out.write(`${c.bold(render(headers))}\n`);
  for (const row of rows) {
    out.write(`${render(row)}\n`);
  }
}

/**
 * "5 seconds ago", "3 minutes ago"; `now` and `then` in unix seconds.
 */
export function formatAge(then: number, now: number = Date.now() / 1000): string {
  const seconds = Math.max(0, Math.floor(now - then));
  const units: Array<[string, number]> = [
    ['day', 86400],
    ['hour', 3600],
    ['minute', 60],
  ];
  for (const [unit, size] of units) {
    if (seconds >= size) {
      const count = Math.floor(seconds / size);
      return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
    }
  }
  return seconds < 1 ? 'Less than a second ago' : `${seconds} second${seconds === 1 ? '' : 's'} ago`;
}
