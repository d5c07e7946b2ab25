import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

type NonNullableCosmiconfigResult = Exclude<CosmiconfigResult, null>;

export const DEFAULT_VALSCOPE_CONFIG_FILES = Object.freeze([
  'valscope.config.mjs',
  'valscope.config.js',
  'valscope.config.cjs',
  'valscope.config.json',
] as const);

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule<TConfig = unknown> {
  readonly path: string;
  readonly directory: string;
  readonly config: TConfig;
}

const MODULE_NAME = 'valscope';

/** Export names checked, in order, when a config module has no default export. */
const NAMED_CONFIG_EXPORTS = ['config', 'printConfig'] as const;

const moduleLoader: Loader = async (filepath: string, _content: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!isRecord(importedModule)) {
    return importedModule;
  }

  if ('default' in importedModule) {
    return importedModule['default'];
  }

  for (const name of NAMED_CONFIG_EXPORTS) {
    if (name in importedModule) {
      return importedModule[name];
    }
  }

  return importedModule;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) => (result ? transformResult(result) : result),
  });
}

const searchPlacesFor = (candidates: readonly string[] | undefined): readonly string[] =>
  candidates ?? DEFAULT_VALSCOPE_CONFIG_FILES;

const notFound = (label: string): Error => new Error(`Configuration file not found: ${label}`);

/** Loads `filePath` with `explorer`, mapping a missing or empty file to `notFound(label)`. */
async function loadExisting(
  explorer: ReturnType<typeof createExplorer>,
  filePath: string,
  label: string,
): Promise<NonNullableCosmiconfigResult> {
  let result: CosmiconfigResult;
  try {
    result = await explorer.load(filePath);
  } catch (error) {
    throw isMissingFileError(error) ? notFound(label) : error;
  }
  if (!result || result.isEmpty) {
    throw notFound(label);
  }
  return result;
}

/**
 * Absolute path of the configuration file: `configPath` when given, otherwise
 * the first candidate found in `cwd`.
 *
 * @throws {Error} When the file does not exist.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    const explorer = createExplorer(searchPlacesFor(options.candidates), cwd);
    const loaded = await loadExisting(
      explorer,
      path.resolve(cwd, options.configPath),
      options.configPath,
    );
    return loaded.filepath;
  }

  const found = await findConfigPath({ ...options, cwd });
  if (found === undefined) {
    throw new Error('Unable to locate valscope configuration file in the current directory.');
  }
  return found;
}

/** Like {@link resolveConfigPath} without `configPath`, but `undefined` when nothing is found. */
export async function findConfigPath(
  options: Omit<ResolveConfigPathOptions, 'configPath'> = {},
): Promise<string | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const result = await createExplorer(searchPlacesFor(options.candidates), cwd).search(cwd);

  return result && !result.isEmpty ? result.filepath : undefined;
}

/**
 * Loads a configuration module. Function exports are called and promises
 * awaited until a plain value remains.
 */
export async function loadConfigModule(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_VALSCOPE_CONFIG_FILES, path.dirname(resolvedPath));
  const result = await loadExisting(explorer, resolvedPath, resolvedPath);

  const config: unknown = result.config;
  return { path: result.filepath, directory: path.dirname(result.filepath), config };
}

async function transformResult(
  result: NonNullableCosmiconfigResult,
): Promise<NonNullableCosmiconfigResult> {
  const resolvedConfig = await resolveExportedValue(result.config);
  return { ...result, config: resolvedConfig };
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value: unknown = candidate;

  for (;;) {
    if (typeof value === 'function') {
      value = await Promise.resolve(value());
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object';
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error['code'] === 'ENOENT';
}
