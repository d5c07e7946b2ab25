import process from 'node:process';

import { isInteractiveStream } from '../utils/streams.js';
import type { CliIo } from './cli-io.js';

/** The parts of `process` the CLI touches. */
export interface CliProcess {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  readonly exitCode?: number | string | null | undefined;
  exit(code?: number): never;
}

export interface ProcessCliIoOptions {
  readonly process?: CliProcess;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target: CliProcess = options.process ?? process;

  return {
    stdin: target.stdin,
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    isTerminal: (stream) => isInteractiveStream(stream === 'stdout' ? target.stdout : target.stderr),
    exit: (code: number): never => {
      const nonZeroExitCode =
        typeof target.exitCode === 'number' && target.exitCode !== 0 ? target.exitCode : undefined;
      const resolvedCode = code === 0 && nonZeroExitCode !== undefined ? nonZeroExitCode : code;
      return target.exit(resolvedCode);
    },
  };
};
