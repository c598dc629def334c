import { describe, it, expect } from 'vitest';
import {
  AlreadyInStateError,
  BatchError,
  CancelledError,
  ConfigError,
  ConflictError,
  ContainerExitedNonZeroError,
  DaemonError,
  DaemonUnavailableError,
  InvalidArgumentsError,
  NotFoundError,
  classifyDaemonError,
  daemonMessage,
  exitCodeFor,
} from './errors.js';

function dockerError(statusCode: number, message: string): Error & { statusCode: number; json: unknown } {
  return Object.assign(new Error(`(HTTP code ${statusCode}) ${message}`), { statusCode, json: { message } });
}

describe('classifyDaemonError', () => {
  it('maps a 404 to NotFound for the named resource', () => {
    const error = classifyDaemonError(dockerError(404, 'No such container: x'), {
      op: 'inspect',
      resource: 'container',
      target: 'x',
    });
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('container "x" not found');
    expect(error.nextSteps[0]).toBe('List managed containers: berth ps');
  });

  it('maps a 404 without a resource to a daemon error', () => {
    const error = classifyDaemonError(dockerError(404, 'page not found'), { op: 'ping' });
    expect(error).toBeInstanceOf(DaemonError);
    expect(error.message).toBe('ping failed: page not found');
  });

  it('separates already-in-state from other conflicts', () => {
    expect(classifyDaemonError(dockerError(409, 'Container abc is already paused'), { op: 'pause' })).toBeInstanceOf(
      AlreadyInStateError
    );
    const conflict = classifyDaemonError(dockerError(409, 'volume is in use'), { op: 'volume remove' });
    expect(conflict).toBeInstanceOf(ConflictError);
    expect(conflict.message).toBe('volume is in use');
    expect(classifyDaemonError(dockerError(304, ''), { op: 'stop', target: 'web' }).message).toBe(
      'web: already in requested state'
    );
    const bare = Object.assign(new Error('(HTTP code 304) container already stopped'), { statusCode: 304, json: null });
    expect(classifyDaemonError(bare, { op: 'stop', target: 'web' }).message).toBe('web: already in requested state');
  });

  it('recognizes transport failures and aborts', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    expect(classifyDaemonError(refused, { op: 'list' })).toBeInstanceOf(DaemonUnavailableError);
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(classifyDaemonError(abort, { op: 'list' })).toBeInstanceOf(CancelledError);
  });

  it('passes classified errors through unchanged', () => {
    const original = new InvalidArgumentsError('bad');
    expect(classifyDaemonError(original, { op: 'x' })).toBe(original);
  });
});

describe('daemonMessage', () => {
  it('prefers the JSON body over the wrapped message', () => {
    expect(daemonMessage(dockerError(500, 'disk full '))).toBe('disk full');
    expect(daemonMessage(new Error('plain'))).toBe('plain');
    expect(daemonMessage('not an error')).toBe('Unknown error');
  });
});

describe('exitCodeFor', () => {
  it('maps error kinds to process exit codes', () => {
    expect(exitCodeFor(new ConfigError('bad yaml'))).toBe(2);
    expect(exitCodeFor(new DaemonUnavailableError())).toBe(125);
    expect(exitCodeFor(new DaemonError('boom', 500))).toBe(125);
    expect(exitCodeFor(new CancelledError())).toBe(130);
    expect(exitCodeFor(new ContainerExitedNonZeroError(42))).toBe(1);
    expect(exitCodeFor(new Error('other'))).toBe(1);
  });

  it('keeps the shared code of a batch and falls back to 1', () => {
    const daemonOnly = new BatchError('stop', [
      { target: 'a', error: new DaemonError('x', 500) },
      { target: 'b', error: new DaemonError('y', 500) },
    ]);
    expect(exitCodeFor(daemonOnly)).toBe(125);

    const mixed = new BatchError('stop', [
      { target: 'a', error: new DaemonError('x', 500) },
      { target: 'b', error: new NotFoundError('container', 'b') },
    ]);
    expect(exitCodeFor(mixed)).toBe(1);
    expect(mixed.message).toBe('failed to stop 2 container(s)');
  });
});
