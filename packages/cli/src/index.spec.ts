import { describe, expect, it } from 'vitest';

import { createCliKernel } from './index.js';
import type { CliGlobalOptions } from './kernel/types.js';
import { createMemoryCliIo } from './testing/memory-cli-io.js';

describe('CLI kernel', () => {
  const baseOptions = {
    programName: 'valscope',
    version: '0.0.0-test',
  } as const;

  it('executes registered command actions', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });

    kernel.register({
      id: 'hello-command',
      register(command, context) {
        command
          .command('hello')
          .description('Prints a friendly greeting.')
          .action(() => {
            context.io.writeOut('Hello from the CLI kernel!');
          });
      },
    });

    const exitCode = await kernel.run(['node', 'valscope', 'hello']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('Hello from the CLI kernel!');
  });

  it('makes global options available to command modules', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });
    let observedOptions: CliGlobalOptions | undefined;

    kernel.register({
      id: 'inspect-globals',
      register(command, context) {
        command.command('inspect-globals').action(() => {
          observedOptions = context.getGlobalOptions();
        });
      },
    });

    await kernel.run(['node', 'valscope', '--json-logs', 'inspect-globals']);

    expect(observedOptions).toEqual({ logFormat: 'json' });
  });

  it('defaults to pretty logs', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });
    let observedOptions: CliGlobalOptions | undefined;

    kernel.register({
      id: 'inspect-globals',
      register(command, context) {
        command.command('inspect-globals').action(() => {
          observedOptions = context.getGlobalOptions();
        });
      },
    });

    await kernel.run(['node', 'valscope', 'inspect-globals']);

    expect(observedOptions).toEqual({ logFormat: 'pretty' });
  });

  it('reports unexpected errors to stderr and propagates a failure code', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });

    kernel.register({
      id: 'explode',
      register(command) {
        command.command('explode').action(() => {
          throw new Error('boom');
        });
      },
    });

    const exitCode = await kernel.run(['node', 'valscope', 'explode']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain('boom');
  });

  it('returns the exit code a command sets and restores the previous one', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });
    const previous = process.exitCode;

    kernel.register({
      id: 'fail-softly',
      register(command) {
        command.command('fail-softly').action(() => {
          process.exitCode = 3;
        });
      },
    });

    const exitCode = await kernel.run(['node', 'valscope', 'fail-softly']);

    expect(exitCode).toBe(3);
    expect(process.exitCode).toBe(previous);
  });

  it('rejects an empty argument vector', async () => {
    const kernel = createCliKernel({ ...baseOptions, io: createMemoryCliIo() });

    await expect(kernel.run([])).rejects.toThrow(
      'Argument vector must include at least the node executable.',
    );
  });
});
