import { findConfigPath, loadConfigModule } from '@valscope/core/config';

import type { PrintSettingsOverrides } from './print-settings.js';
import { parsePrintSettings } from './settings-schema.js';

export interface LoadPrintConfigOptions {
  readonly cwd?: string;
  /** Explicit configuration file; when omitted the working directory is searched. */
  readonly configPath?: string;
}

export interface LoadedPrintConfig {
  /** `undefined` when no configuration file was found. */
  readonly path: string | undefined;
  readonly settings: PrintSettingsOverrides;
}

/**
 * Loads the `print` section of a valscope configuration file.
 *
 * A missing `print` section yields empty overrides. A missing file is only an
 * error when `configPath` names it explicitly.
 *
 * @throws {Error} When the file cannot be loaded or the section is invalid.
 */
export async function loadPrintConfig(
  options: LoadPrintConfigOptions = {},
): Promise<LoadedPrintConfig> {
  const path =
    options.configPath ?? (await findConfigPath(options.cwd ? { cwd: options.cwd } : {}));
  if (path === undefined) {
    return { path: undefined, settings: {} };
  }

  const loaded = await loadConfigModule(
    options.cwd ? { path, cwd: options.cwd } : { path },
  );
  const section = readPrintSection(loaded.config);

  return {
    path: loaded.path,
    settings: section === undefined ? {} : parsePrintSettings(section, `print settings in ${loaded.path}`),
  };
}

function readPrintSection(config: unknown): unknown {
  if (config === null || config === undefined) {
    return undefined;
  }
  if (typeof config !== 'object' || Array.isArray(config)) {
    throw new TypeError('Configuration must export an object.');
  }
  return 'print' in config ? config.print : undefined;
}
