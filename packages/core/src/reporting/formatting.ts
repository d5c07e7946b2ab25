/** Anything with a `write(text)` method, such as a CLI output adapter. */
export interface WritableTarget {
  write(text: string): void;
}

export interface SerialisedError {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
  readonly cause?: SerialisedError;
}

const LINE_TERMINATOR = '\n';

/**
 * Formats a duration for log lines: `12.3ms` below one second, `1.25s` from
 * one second up.
 */
export function formatDurationMs(value: number): string {
  if (value >= 1000) {
    return `${(value / 1000).toFixed(2)}s`;
  }
  return `${value.toFixed(1)}ms`;
}

/** `Name: message` for errors, `String(value)` for anything else. */
export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Turns a thrown value into plain data for structured log events. The
 * `cause` chain is followed.
 */
export function serialiseError(error: unknown): SerialisedError {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) };
  }

  return {
    name: error.name,
    message: error.message,
    ...(error.stack ? { stack: error.stack } : {}),
    ...(error.cause === undefined ? {} : { cause: serialiseError(error.cause) }),
  };
}

/**
 * Writes `payload` as one JSON document followed by a newline. Big integers
 * are written as decimal strings.
 */
export function writeJson(target: WritableTarget, payload: unknown, space?: number): void {
  const text = JSON.stringify(
    payload,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
    space,
  );
  target.write(`${text}${LINE_TERMINATOR}`);
}

export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
