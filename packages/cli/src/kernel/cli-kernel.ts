import process from 'node:process';

import { CommanderError } from 'commander';

import { createCommanderProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
} from './types.js';

/** `process.exitCode` when a command set it to something other than zero. */
const readFailureExitCode = (): number | undefined => {
  const { exitCode } = process;
  return typeof exitCode === 'number' && exitCode !== 0 ? exitCode : undefined;
};

const readCommanderExitCode = (error: CommanderError): number | undefined => {
  const exitCode: unknown = error.exitCode;
  if (typeof exitCode === 'number') {
    return exitCode;
  }
  if (typeof exitCode === 'string') {
    const parsed = Number.parseInt(exitCode, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

/**
 * Builds the commander program, lets command modules register on it, and turns
 * every outcome of a run into an exit code. Commands signal failure by setting
 * `process.exitCode` or by throwing; the previous exit code is restored after
 * each run.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    examples: options.examples,
    io,
  });

  let globalOptions: CliGlobalOptions = createDefaultGlobalOptions();

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => globalOptions,
  };

  program.hook('preAction', () => {
    globalOptions = readGlobalOptions(program);
  });

  const reportFailure = (error: unknown): number => {
    if (error instanceof CommanderError) {
      return readFailureExitCode() ?? readCommanderExitCode(error) ?? 1;
    }

    const message = formatCliError(error);
    io.writeErr(message.endsWith('\n') ? message : `${message}\n`);
    return readFailureExitCode() ?? 1;
  };

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      if (argv.length === 0) {
        throw new Error('Argument vector must include at least the node executable.');
      }

      const previousExitCode = process.exitCode;
      try {
        await program.parseAsync([...argv], { from: 'node' });
        globalOptions = readGlobalOptions(program);
        return readFailureExitCode() ?? 0;
      } catch (error) {
        return reportFailure(error);
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };
};
