import type { Command } from 'commander';

import type { CliIo } from '../io/cli-io.js';

export type CliLogFormat = 'pretty' | 'json';

/** Options shared by every command, read from the root program before each action. */
export interface CliGlobalOptions {
  readonly logFormat: CliLogFormat;
}

export interface CliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  /** Invocations shown at the end of the root help. */
  readonly examples?: readonly string[] | undefined;
  /** Defaults to the current process streams. */
  readonly io?: CliIo | undefined;
}

export interface CliKernelContext {
  readonly io: CliIo;
  readonly getGlobalOptions: () => CliGlobalOptions;
}

/**
 * A unit of CLI functionality. `register` adds subcommands to the root program;
 * actions signal failure by throwing or by setting `process.exitCode`.
 */
export interface CliCommandModule {
  /** Dotted identifier such as `render.snapshot`. */
  readonly id: string;
  register(program: Command, context: CliKernelContext): void;
}

export interface CliKernel {
  register(module: CliCommandModule): CliKernel;
  /** Parses `argv` (node-style, executable first) and resolves to the exit code. */
  run(argv?: readonly string[]): Promise<number>;
}
