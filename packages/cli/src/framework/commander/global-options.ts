import type { Command } from 'commander';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit machine-readable JSON logs on stderr.';

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'pretty',
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
});

export const registerGlobalOptions = (program: Command): void => {
  program.option('--json-logs', JSON_LOGS_HELP, false);
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.optsWithGlobals<{ jsonLogs?: boolean }>();

  return {
    logFormat: options.jsonLogs === true ? 'json' : defaultGlobalOptions.logFormat,
  };
};
