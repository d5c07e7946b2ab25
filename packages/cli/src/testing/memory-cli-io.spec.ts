import { describe, expect, it } from 'vitest';

import { createMemoryCliIo } from './memory-cli-io.js';

describe('createMemoryCliIo', () => {
  it('captures output buffers and recorded exit codes', () => {
    const io = createMemoryCliIo();

    io.writeOut('hello');
    io.writeOut(' world');
    io.writeErr('error');

    expect(io.stdoutBuffer).toBe('hello world');
    expect(io.stderrBuffer).toBe('error');
    expect(io.exitCodes).toEqual([]);

    expect(() => io.exit(2)).toThrow('process exit called with code 2');
    expect(io.exitCodes).toEqual([2]);
  });

  it('reports no terminals unless configured', () => {
    const plain = createMemoryCliIo();
    const tty = createMemoryCliIo({ terminal: { stderr: true } });

    expect(plain.isTerminal('stdout')).toBe(false);
    expect(tty.isTerminal('stdout')).toBe(false);
    expect(tty.isTerminal('stderr')).toBe(true);
  });
});
