export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo } from './io/process-cli-io.js';
export type { CliProcess, ProcessCliIoOptions } from './io/process-cli-io.js';
export type { CliIo, CliOutputStream } from './io/cli-io.js';
export { formatCliError } from './utils/format-cli-error.js';
export {
  createRenderCommandModule,
  renderCommandModule,
} from './tools/render/render-command-module.js';
export type { RenderCliOptions } from './tools/render/options.js';
export { createTypesCommandModule, typesCommandModule } from './tools/types/types-command-module.js';
export { describeTypeTable, formatTypeTable } from './tools/types/format-type-table.js';
export type { TypeTableCase, TypeTableEntry } from './tools/types/format-type-table.js';
export { createValscopeCliKernel, runValscopeCli } from './run-valscope-cli.js';
