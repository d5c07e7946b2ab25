import { performance } from 'node:perf_hooks';

import type { StructuredLogger } from '@valscope/core/logging';
import { createValueRenderer, loadSnapshot, type PrintSettings } from '@valscope/printer';

import type { CliIo } from '../../io/cli-io.js';
import { CLI_LOGGER_NAME } from './environment.js';

export interface ExecuteRenderCommandOptions {
  readonly snapshotPath: string;
  readonly settings: PrintSettings;
  readonly logger: StructuredLogger;
  readonly io: CliIo;
  readonly clock?: { now(): number };
}

/**
 * Loads a snapshot and writes its rendering, followed by a newline, to stdout.
 */
export const executeRenderCommand = async (options: ExecuteRenderCommandOptions): Promise<void> => {
  const clock = options.clock ?? performance;
  const started = clock.now();

  const snapshot = await loadSnapshot(options.snapshotPath);
  options.logger.log({
    level: 'info',
    name: CLI_LOGGER_NAME,
    event: 'snapshot.loaded',
    data: {
      path: options.snapshotPath,
      heapBytes: snapshot.heap.byteLength,
      types: snapshot.registry.entries().length,
    },
  });

  const renderer = createValueRenderer({
    heap: snapshot.heap,
    registry: snapshot.registry,
    logger: options.logger,
  });
  const text = renderer.render(snapshot.root, options.settings);
  options.io.writeOut(`${text}\n`);

  options.logger.log({
    level: 'info',
    name: CLI_LOGGER_NAME,
    event: 'render.completed',
    elapsedMs: clock.now() - started,
    data: { characters: text.length },
  });
};
