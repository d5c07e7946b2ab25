import path from 'node:path';
import process from 'node:process';

import type { Command } from 'commander';

import { serialiseError } from '@valscope/core/reporting';

import type { CliCommandModule } from '../../kernel/types.js';
import {
  CLI_LOGGER_NAME,
  prepareRenderEnvironment,
  type PrepareRenderEnvironmentDependencies,
} from './environment.js';
import { registerRenderCliOptions, resolveRenderCliOptions } from './options.js';
import { executeRenderCommand } from './render-command-runner.js';

export const createRenderCommandModule = (
  dependencies: PrepareRenderEnvironmentDependencies = {},
): CliCommandModule => ({
  id: 'render.snapshot',
  register(program, context) {
    const renderCommand = program
      .command('render')
      .summary('Render the root value of a heap snapshot.')
      .description(
        'Load a JSON heap snapshot, then print its root value using the configured print settings.',
      )
      .argument('<snapshot>', 'Path to the snapshot JSON file');

    registerRenderCliOptions(renderCommand);
    renderCommand.action(async (snapshotPath: string, _options: unknown, command: Command) => {
      const options = resolveRenderCliOptions(command);
      const environment = await prepareRenderEnvironment(
        options,
        context.getGlobalOptions().logFormat,
        context.io,
        dependencies,
      );
      const resolvedPath = path.resolve(dependencies.cwd ?? process.cwd(), snapshotPath);
      try {
        await executeRenderCommand({
          snapshotPath: resolvedPath,
          settings: environment.settings,
          logger: environment.logger,
          io: context.io,
        });
      } catch (error) {
        environment.logger.log({
          level: 'error',
          name: CLI_LOGGER_NAME,
          event: 'render.failed',
          data: { path: resolvedPath, error: serialiseError(error) },
        });
        throw error;
      }
    });
  },
});

export const renderCommandModule = createRenderCommandModule();
