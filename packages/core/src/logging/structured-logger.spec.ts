import { describe, expect, it } from 'vitest';

import {
  JsonLineLogger,
  MemoryLogger,
  noopLogger,
  withMinimumLevel,
} from './structured-logger.js';

describe('JsonLineLogger', () => {
  it('writes one timestamped JSON document per entry', () => {
    const lines: string[] = [];
    const logger = new JsonLineLogger(
      { write: (line) => lines.push(line) },
      { now: () => new Date('2024-01-01T00:00:00Z') },
    );

    logger.log({
      level: 'info',
      name: 'valscope-printer',
      event: 'render.completed',
      data: { characters: 12 },
    });

    expect(lines).toEqual([
      '{"level":"info","name":"valscope-printer","event":"render.completed","data":{"characters":12},"timestamp":"2024-01-01T00:00:00.000Z"}\n',
    ]);
  });
});

describe('MemoryLogger', () => {
  it('records entries in arrival order', () => {
    const logger = new MemoryLogger();

    logger.log({ level: 'debug', name: 'valscope-printer', event: 'first' });
    logger.log({ level: 'warn', name: 'valscope-printer', event: 'second' });

    expect(logger.entries.map((entry) => entry.event)).toEqual(['first', 'second']);
  });
});

describe('withMinimumLevel', () => {
  it('drops entries below the minimum level', () => {
    const memory = new MemoryLogger();
    const logger = withMinimumLevel(memory, 'info');

    logger.log({ level: 'debug', name: 'valscope-cli', event: 'config.resolved' });
    logger.log({ level: 'info', name: 'valscope-cli', event: 'snapshot.loaded' });
    logger.log({ level: 'error', name: 'valscope-cli', event: 'render.failed' });

    expect(memory.entries.map((entry) => entry.event)).toEqual([
      'snapshot.loaded',
      'render.failed',
    ]);
  });
});

describe('noopLogger', () => {
  it('ignores log entries', () => {
    expect(() =>
      noopLogger.log({ level: 'debug', name: 'valscope-cli', event: 'ignored' }),
    ).not.toThrow();
  });
});
