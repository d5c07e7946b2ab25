export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface StructuredLogEvent {
  readonly level: LogLevel;
  /** Component that emitted the event, e.g. `valscope-printer`. */
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export interface JsonLineLoggerOptions {
  readonly now?: () => Date;
}

/**
 * Writes each entry as one JSON document per line, stamped with an ISO timestamp.
 */
export class JsonLineLogger implements StructuredLogger {
  private readonly now: () => Date;

  constructor(
    private readonly output: { write(line: string): void },
    options: JsonLineLoggerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({ ...entry, timestamp: this.now().toISOString() });
    this.output.write(`${payload}\n`);
  }
}

/**
 * Collects entries in memory. Used by tests and by callers that forward entries later.
 */
export class MemoryLogger implements StructuredLogger {
  private readonly recorded: StructuredLogEvent[] = [];

  get entries(): readonly StructuredLogEvent[] {
    return this.recorded;
  }

  log(entry: StructuredLogEvent): void {
    this.recorded.push(entry);
  }
}

/** Forwards entries at or above `minimum` to `logger`. */
export const withMinimumLevel = (logger: StructuredLogger, minimum: LogLevel): StructuredLogger => ({
  log(entry) {
    if (LEVEL_RANK[entry.level] >= LEVEL_RANK[minimum]) {
      logger.log(entry);
    }
  },
});

export const noopLogger: StructuredLogger = {
  log() {
    // discarded
  },
};
