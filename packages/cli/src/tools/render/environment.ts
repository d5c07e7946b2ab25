import process from 'node:process';

import {
  JsonLineLogger,
  noopLogger,
  withMinimumLevel,
  type StructuredLogger,
} from '@valscope/core/logging';
import { formatDurationMs } from '@valscope/core/reporting';
import {
  loadPrintConfig,
  resolvePrintSettings,
  type LoadPrintConfigOptions,
  type LoadedPrintConfig,
  type PrintSettings,
  type PrintSettingsOverrides,
} from '@valscope/printer';

import type { CliIo } from '../../io/cli-io.js';
import type { CliLogFormat } from '../../kernel/types.js';
import { toPrintSettingsOverrides, type RenderCliOptions } from './options.js';

export const CLI_LOGGER_NAME = 'valscope-cli';

export interface PreparedRenderEnvironment {
  readonly logger: StructuredLogger;
  readonly settings: PrintSettings;
  readonly configPath: string | undefined;
}

export interface PrepareRenderEnvironmentDependencies {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly loadConfig?: (options: LoadPrintConfigOptions) => Promise<LoadedPrintConfig>;
}

/**
 * Resolves the logger and the print settings for one command. Settings are
 * layered: defaults, terminal detection, configuration file, `NO_COLOR`, then
 * command line flags.
 */
export const prepareRenderEnvironment = async (
  options: RenderCliOptions,
  logFormat: CliLogFormat,
  io: CliIo,
  dependencies: PrepareRenderEnvironmentDependencies = {},
): Promise<PreparedRenderEnvironment> => {
  const logger = createLogger(logFormat, io);
  const env = dependencies.env ?? process.env;
  const loadConfig = dependencies.loadConfig ?? loadPrintConfig;

  const loaded = await loadConfig({
    ...(dependencies.cwd === undefined ? {} : { cwd: dependencies.cwd }),
    ...(options.config === undefined ? {} : { configPath: options.config }),
  });

  const terminal: PrintSettingsOverrides = io.isTerminal('stdout') ? {} : { colored: false };
  const noColor: PrintSettingsOverrides = isNoColorSet(env) ? { colored: false } : {};
  const settings = resolvePrintSettings(
    terminal,
    loaded.settings,
    noColor,
    toPrintSettingsOverrides(options),
  );

  logger.log({
    level: 'debug',
    name: CLI_LOGGER_NAME,
    event: 'config.resolved',
    data: {
      configPath: loaded.path ?? null,
      colored: settings.colored,
      radix: settings.radix,
    },
  });

  return { logger, settings, configPath: loaded.path };
};

const isNoColorSet = (env: NodeJS.ProcessEnv): boolean => {
  const value = env['NO_COLOR'];
  return value !== undefined && value !== '';
};

export const createLogger = (logFormat: CliLogFormat, io: CliIo): StructuredLogger => {
  if (logFormat === 'json') {
    return new JsonLineLogger({ write: (line) => io.writeErr(line) });
  }

  if (io.isTerminal('stderr')) {
    return withMinimumLevel(
      {
        log(entry) {
          const elapsed =
            entry.elapsedMs === undefined ? '' : ` (${formatDurationMs(entry.elapsedMs)})`;
          const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
          io.writeErr(`[${entry.level}] ${entry.event}${elapsed}${data}\n`);
        },
      },
      'info',
    );
  }

  return noopLogger;
};
