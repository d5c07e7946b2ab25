import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import stripAnsi from 'strip-ansi';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runValscopeCli } from '../../run-valscope-cli.js';
import { createMemoryCliIo, type MemoryCliIo } from '../../testing/memory-cli-io.js';

const SNAPSHOT = { value: { array: [255, { uint8: 7 }, 'hi'] } };

describe('valscope render', () => {
  let workspace: string;
  let io: MemoryCliIo;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'valscope-cli-render-'));
    io = createMemoryCliIo();
    await writeFile(path.join(workspace, 'values.json'), JSON.stringify(SNAPSHOT), 'utf8');
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  const run = (...args: string[]): Promise<number> =>
    runValscopeCli({
      version: '0.0.0-test',
      io,
      argv: ['node', 'valscope', ...args],
      environment: { env: {}, cwd: workspace },
    });

  it('renders the root value resolved against the working directory', async () => {
    const exitCode = await run('render', 'values.json');

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('[>255, 7us, "hi"]\n');
  });

  it('applies radix and suffix flags', async () => {
    await run('render', 'values.json', '--radix', 'hex', '--no-suffix');

    expect(io.stdoutBuffer).toBe('[>0xff, 0x7, "hi"]\n');
  });

  it('splits containers whose inline width reaches the wrap threshold', async () => {
    await run('render', 'values.json', '--wrap', '17');

    expect(io.stdoutBuffer).toBe('[>\n  255,\n  7us,\n  "hi"\n]\n');
  });

  it('keeps containers inline below the wrap threshold', async () => {
    await run('render', 'values.json', '--wrap', '18');

    expect(io.stdoutBuffer).toBe('[>255, 7us, "hi"]\n');
  });

  it('replaces values beyond the maximum depth', async () => {
    await run('render', 'values.json', '--max-depth', '0');

    expect(io.stdoutBuffer).toBe('[><item>, <item>, <item>]\n');
  });

  it('colours output when --color is given', async () => {
    await run('render', 'values.json', '--color');

    expect(io.stdoutBuffer).toContain('\u001B[38;2;181;206;168m255');
    expect(stripAnsi(io.stdoutBuffer)).toBe('[>255, 7us, "hi"]\n');
  });

  it('reads print settings from the configuration file', async () => {
    await writeFile(
      path.join(workspace, 'valscope.config.json'),
      JSON.stringify({ print: { radix: 'bin', printSuffix: false } }),
      'utf8',
    );

    await run('render', 'values.json');

    expect(io.stdoutBuffer).toBe('[>0b11111111, 0b111, "hi"]\n');
  });

  it('emits JSON log events on stderr', async () => {
    await run('--json-logs', 'render', 'values.json');

    const events = io.stderrBuffer
      .trimEnd()
      .split('\n')
      .map((line): unknown => JSON.parse(line))
      .map((entry) =>
        typeof entry === 'object' && entry !== null && 'event' in entry ? entry.event : undefined,
      );
    expect(events).toEqual(['config.resolved', 'snapshot.loaded', 'render.completed']);
    expect(io.stdoutBuffer).toBe('[>255, 7us, "hi"]\n');
  });

  it('fails with a message when the snapshot is missing', async () => {
    const exitCode = await run('render', 'missing.json');

    expect(exitCode).toBe(1);
    expect(io.stdoutBuffer).toBe('');
    expect(io.stderrBuffer).toContain('missing.json');
  });

  it('fails with a message when the snapshot does not match the schema', async () => {
    await writeFile(path.join(workspace, 'broken.json'), JSON.stringify({ types: [] }), 'utf8');

    const exitCode = await run('render', 'broken.json');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain(
      'broken.json: value: a snapshot needs a "value" entry holding the value to render.',
    );
  });

  it('logs a failed render before reporting it', async () => {
    await run('--json-logs', 'render', 'missing.json');

    const failure: unknown = JSON.parse(io.stderrBuffer.split('\n')[1] ?? '');
    expect(failure).toMatchObject({
      level: 'error',
      event: 'render.failed',
      data: { path: path.join(workspace, 'missing.json'), error: { name: 'Error' } },
    });
  });

  it('fails when an explicit configuration file is missing', async () => {
    const exitCode = await run('render', 'values.json', '--config', 'nope.json');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain(
      `Configuration file not found: ${path.join(workspace, 'nope.json')}`,
    );
  });
});
