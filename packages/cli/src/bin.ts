#!/usr/bin/env -S node --import tsx
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createProcessCliIo, createValscopeCliKernel } from './index.js';

const MANIFEST_NAME = '@valscope/cli';

interface PackageManifest {
  readonly name?: string;
  readonly version?: string;
  readonly description?: string;
}

const readStringField = (record: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' ? value : undefined;
};

const readManifest = (manifestPath: string): PackageManifest | undefined => {
  const parsed: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }
  return {
    name: readStringField(parsed, 'name'),
    version: readStringField(parsed, 'version'),
    description: readStringField(parsed, 'description'),
  };
};

const loadPackageManifest = (): PackageManifest => {
  let directory = path.dirname(fileURLToPath(import.meta.url));

  while (true) {
    const manifestPath = path.join(directory, 'package.json');
    if (existsSync(manifestPath)) {
      const manifest = readManifest(manifestPath);
      if (manifest?.name === MANIFEST_NAME) {
        return manifest;
      }
    }

    const parentDirectory = path.dirname(directory);
    if (parentDirectory === directory) {
      return {};
    }
    directory = parentDirectory;
  }
};

const packageManifest = loadPackageManifest();
const io = createProcessCliIo({ process });

const kernel = createValscopeCliKernel({
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

const exitCode = await kernel.run(process.argv);

if (process.argv.length <= 2) {
  io.writeOut(
    `${packageManifest.name ?? MANIFEST_NAME} renders value snapshots. ` +
      'Explore `valscope render --help` or `valscope types --help` to get started.\n',
  );
}

io.exit(exitCode);
