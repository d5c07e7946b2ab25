import path from 'node:path';
import process from 'node:process';

import { writeJson, writeLine } from '@valscope/core/reporting';
import { loadSnapshot } from '@valscope/printer';

import type { CliCommandModule } from '../../kernel/types.js';
import { describeTypeTable, formatTypeTable } from './format-type-table.js';

export interface TypesCommandDependencies {
  readonly cwd?: string;
}

interface TypesCommandOptions {
  readonly json?: boolean;
}

export const createTypesCommandModule = (
  dependencies: TypesCommandDependencies = {},
): CliCommandModule => ({
  id: 'types.list',
  register(program, context) {
    program
      .command('types')
      .summary('List the type table of a heap snapshot.')
      .description('Print every record and enum a snapshot defines, with its hash bucket.')
      .argument('<snapshot>', 'Path to the snapshot JSON file')
      .option('--json', 'Print the table as a JSON array')
      .action(async (snapshotPath: string, options: TypesCommandOptions) => {
        const { registry } = await loadSnapshot(
          path.resolve(dependencies.cwd ?? process.cwd(), snapshotPath),
        );
        const output = { write: (text: string) => context.io.writeOut(text) };

        if (options.json === true) {
          writeJson(output, describeTypeTable(registry));
          return;
        }

        const lines = formatTypeTable(registry);
        if (lines.length === 0) {
          writeLine(output, 'No types defined.');
          return;
        }
        for (const line of lines) {
          writeLine(output, line);
        }
      });
  },
});

export const typesCommandModule = createTypesCommandModule();
