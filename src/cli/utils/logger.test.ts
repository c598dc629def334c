import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import { createLogger } from './logger.js';

function capture(): { stream: Writable; records: () => Array<Record<string, unknown>> } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
  return {
    stream,
    records: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line !== '')
        .map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

describe('createLogger', () => {
  it('redacts registry credentials', () => {
    const { stream, records } = capture();
    const logger = createLogger({ level: 'info', destination: stream });

    logger.info({ registryAuth: 'test-secret', image: 'alpine' }, 'pulling');

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({ registryAuth: '[REDACTED]', image: 'alpine', msg: 'pulling' });
  });

  it('drops records below the level', () => {
    const { stream, records } = capture();
    const logger = createLogger({ level: 'warn', destination: stream });

    logger.info('quiet');
    logger.warn('loud');

    expect(records().map((record) => record.msg)).toEqual(['loud']);
  });
});
