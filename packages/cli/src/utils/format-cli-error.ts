import { inspect } from 'node:util';

import { formatUnknownError } from '@valscope/core/reporting';

/**
 * Text written to stderr for an error that escaped a command. Errors show their
 * stack, or their message and cause chain when the stack is missing.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.stack ?? describeErrorChain(error);
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};

const describeErrorChain = (error: Error): string => {
  const lines = [error.message];
  let cause: unknown = error.cause;
  while (cause !== undefined) {
    lines.push(`Caused by: ${formatUnknownError(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines.join('\n');
};
