import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, test } from 'vitest';
import assert from 'node:assert/strict';

import { loadPrintConfig } from '../../src/settings/config-loader.js';
import {
  defaultPrintSettings,
  resolvePrintSettings,
  wrapThreshold,
} from '../../src/settings/print-settings.js';
import { parsePrintSettings } from '../../src/settings/settings-schema.js';

const directories: string[] = [];

afterEach(async () => {
  await Promise.all(
    directories.splice(0).map((directory) => rm(directory, { recursive: true, force: true })),
  );
});

async function createWorkspace(files: Record<string, string>): Promise<string> {
  const directory = await mkdtemp(path.join(os.tmpdir(), 'valscope-settings-'));
  directories.push(directory);
  await Promise.all(
    Object.entries(files).map(([name, content]) => writeFile(path.join(directory, name), content)),
  );
  return directory;
}

test('defaults match the documented print policy', () => {
  assert.deepEqual(defaultPrintSettings, {
    colored: true,
    indentAmount: 2,
    maxDepth: Number.POSITIVE_INFINITY,
    newLineChar: '\n',
    printSuffix: true,
    byteLimit: 32,
    rainbowBracket: false,
    radix: 'dec',
    forceNewLine: false,
    listWrap: 200,
    arrayWrap: 200,
    recordWrap: 200,
    tupleWrap: 200,
  });
});

test('resolvePrintSettings layers overrides left to right', () => {
  const settings = resolvePrintSettings({ radix: 'hex', indentAmount: 4 }, { radix: 'bin' });
  assert.equal(settings.radix, 'bin');
  assert.equal(settings.indentAmount, 4);
  assert.equal(settings.colored, true);
});

test('resolvePrintSettings keeps earlier values for undefined keys and clears null thresholds', () => {
  const settings = resolvePrintSettings(
    { listWrap: 10, colored: false },
    { listWrap: undefined, colored: undefined, tupleWrap: null },
  );
  assert.equal(settings.listWrap, 10);
  assert.equal(settings.colored, false);
  assert.equal(settings.tupleWrap, undefined);
  assert.equal(wrapThreshold(settings, 'tuple'), undefined);
  assert.equal(wrapThreshold(settings, 'record'), 200);
});

test('parsePrintSettings rejects unknown keys and out-of-range values', () => {
  assert.deepEqual(parsePrintSettings({ radix: 'oct', recordWrap: null }), {
    radix: 'oct',
    recordWrap: null,
  });
  assert.throws(() => parsePrintSettings({ radix: 'base64' }), /Invalid print settings: radix/);
  assert.throws(() => parsePrintSettings({ indent: 2 }), /Unrecognized key/);
  assert.throws(() => parsePrintSettings({ indentAmount: -1 }), /indentAmount/);
});

test('loadPrintConfig reads the print section of a discovered JSON config', async () => {
  const cwd = await createWorkspace({
    'valscope.config.json': JSON.stringify({ print: { rainbowBracket: true, byteLimit: 8 } }),
  });

  const loaded = await loadPrintConfig({ cwd });
  assert.equal(loaded.path, path.join(cwd, 'valscope.config.json'));
  assert.deepEqual(loaded.settings, { rainbowBracket: true, byteLimit: 8 });
});

test('loadPrintConfig returns empty overrides when nothing is configured', async () => {
  const cwd = await createWorkspace({ 'valscope.config.json': JSON.stringify({ other: 1 }) });
  assert.deepEqual((await loadPrintConfig({ cwd })).settings, {});
});

test('loadPrintConfig reports invalid print sections with the file path', async () => {
  const cwd = await createWorkspace({
    'custom.json': JSON.stringify({ print: { radix: 'roman' } }),
  });

  await assert.rejects(
    loadPrintConfig({ cwd, configPath: 'custom.json' }),
    (error: unknown) =>
      error instanceof Error &&
      error.message.startsWith(`Invalid print settings in ${path.join(cwd, 'custom.json')}: radix`),
  );
});
