import process from 'node:process';

import { createCliKernel } from './kernel/cli-kernel.js';
import type { CliKernel } from './kernel/types.js';
import type { CliIo } from './io/cli-io.js';
import { createRenderCommandModule } from './tools/render/render-command-module.js';
import type { PrepareRenderEnvironmentDependencies } from './tools/render/environment.js';
import { createTypesCommandModule } from './tools/types/types-command-module.js';

const VALSCOPE_EXAMPLES = [
  'valscope render heap.json',
  'valscope render heap.json --radix hex --no-suffix',
  'valscope --json-logs render heap.json --wrap 80',
  'valscope types heap.json',
] as const;

export interface CreateValscopeCliKernelOptions {
  readonly programName?: string | undefined;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
  /** Overrides for the environment, working directory and config loader. */
  readonly environment?: PrepareRenderEnvironmentDependencies | undefined;
}

export const createValscopeCliKernel = (options: CreateValscopeCliKernelOptions): CliKernel => {
  const kernel = createCliKernel({
    programName: options.programName ?? 'valscope',
    version: options.version,
    description: options.description,
    examples: VALSCOPE_EXAMPLES,
    io: options.io,
  });
  const environment = options.environment ?? {};
  kernel.register(createRenderCommandModule(environment));
  kernel.register(
    createTypesCommandModule(environment.cwd === undefined ? {} : { cwd: environment.cwd }),
  );
  return kernel;
};

export interface RunValscopeCliOptions extends CreateValscopeCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runValscopeCli = async ({
  argv = process.argv,
  ...options
}: RunValscopeCliOptions): Promise<number> => createValscopeCliKernel(options).run(argv);
