import { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import { registerGlobalOptions } from './global-options.js';

export interface CommanderProgramOptions {
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  /** Invocations listed under "Examples:" at the end of the root help. */
  readonly examples?: readonly string[] | undefined;
  readonly io: CliIo;
}

export const formatExamples = (examples: readonly string[]): string =>
  ['', 'Examples:', ...examples.map((example) => `  $ ${example}`)].join('\n');

/**
 * Root commander program wired to the CLI streams. Errors surface as thrown
 * `CommanderError`s so the kernel decides the exit code.
 */
export const createCommanderProgram = (options: CommanderProgramOptions): Command => {
  const program = new Command();
  const { io } = options;

  program
    .name(options.name)
    .configureHelp({ sortOptions: true, sortSubcommands: true })
    .description(options.description ?? '')
    .version(options.version)
    .configureOutput({
      writeOut: (text: string) => io.writeOut(text),
      writeErr: (text: string) => io.writeErr(text),
      outputError: (text: string) => io.writeErr(text),
    })
    .showHelpAfterError('(add --help for usage information)')
    .showSuggestionAfterError();

  if (options.examples && options.examples.length > 0) {
    program.addHelpText('after', formatExamples(options.examples));
  }

  registerGlobalOptions(program);
  program.exitOverride();

  return program;
};
