export type PackageName = `@valscope/${string}`;

export interface PackageManifest {
  readonly name: PackageName;
  readonly summary: string;
}

export type FrozenManifest<T extends PackageManifest = PackageManifest> = Readonly<T>;

export const createPlaceholderManifest = <T extends PackageManifest>(
  manifest: T,
): FrozenManifest<T> => Object.freeze({ ...manifest });

export {
  JsonLineLogger,
  MemoryLogger,
  noopLogger,
  withMinimumLevel,
  type JsonLineLoggerOptions,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
  type SerialisedError,
  type WritableTarget,
} from './reporting/index.js';

export {
  DEFAULT_VALSCOPE_CONFIG_FILES,
  findConfigPath,
  loadConfigModule,
  resolveConfigPath,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
  type ResolveConfigPathOptions,
} from './config/index.js';

const manifestDefinition = {
  name: '@valscope/core',
  summary: 'Shared logging, configuration, and error formatting utilities for valscope packages.',
} as const satisfies PackageManifest;

export const manifest = createPlaceholderManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
