import { describe, expect, it } from 'vitest';

import * as testing from './index.js';

describe('testing entry point', () => {
  it('builds in-memory IO with terminal flags', () => {
    const io = testing.createMemoryCliIo({ terminal: { stdout: true } });

    io.writeOut('[>1, 2]\n');

    expect(io.isTerminal('stdout')).toBe(true);
    expect(io.stdoutBuffer).toBe('[>1, 2]\n');
  });
});
