export type CliOutputStream = 'stdout' | 'stderr';

/** Streams and process hooks a command may touch. Commands reach `process` only through this. */
export interface CliIo {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;

  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  /** Whether the stream is attached to a terminal. Colour and pretty logs depend on it. */
  isTerminal(stream: CliOutputStream): boolean;
  exit(code: number): never;
}
