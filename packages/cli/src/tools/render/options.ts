import { InvalidOptionArgumentError, Option, type Command } from 'commander';

import type { PrintSettingsOverrides, Radix } from '@valscope/printer';

export interface RenderCliOptions {
  readonly config?: string;
  readonly color?: boolean;
  readonly indent?: number;
  readonly maxDepth?: number;
  readonly radix?: Radix;
  readonly suffix?: boolean;
  readonly byteLimit?: number;
  readonly rainbow?: boolean;
  readonly forceNewline?: boolean;
  /** A threshold for every container kind, or `false` to never wrap. */
  readonly wrap?: number | false;
}

const RADIX_CHOICES: readonly Radix[] = ['hex', 'dec', 'oct', 'bin'];

const parseCount =
  (label: string, minimum: number) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new InvalidOptionArgumentError(
        `${label} must be an integer of at least ${String(minimum)}, received "${value}".`,
      );
    }
    return parsed;
  };

export const registerRenderCliOptions = (command: Command): void => {
  command
    .option('-c, --config <path>', 'Path to the valscope configuration file')
    .option('--color', 'Force coloured output')
    .option('--no-color', 'Disable coloured output')
    .option('--indent <n>', 'Spaces per nesting level', parseCount('--indent', 0))
    .option('--max-depth <n>', 'Render containers below this depth as <item>', parseCount('--max-depth', 0))
    .addOption(
      new Option('--radix <radix>', 'Radix for integers').choices([...RADIX_CHOICES]),
    )
    .option('--suffix', 'Print numeric type suffixes')
    .option('--no-suffix', 'Omit numeric type suffixes')
    .option('--byte-limit <n>', 'Bytes shown before truncating byte sequences', parseCount('--byte-limit', 0))
    .option('--rainbow', 'Colour brackets by nesting level')
    .option('--force-newline', 'Split every non-empty container over several lines')
    .option('--wrap <n>', 'Wrap threshold for lists, arrays, records and tuples', parseCount('--wrap', 1))
    .option('--no-wrap', 'Keep every container on one line');
};

const readBoolean = (value: unknown): boolean | undefined =>
  typeof value === 'boolean' ? value : undefined;

const readNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;

const isRadix = (value: unknown): value is Radix =>
  RADIX_CHOICES.some((choice) => choice === value);

export const resolveRenderCliOptions = (command: Command): RenderCliOptions => {
  const options = command.opts<Record<string, unknown>>();
  const config = typeof options['config'] === 'string' ? options['config'] : undefined;
  const radix = isRadix(options['radix']) ? options['radix'] : undefined;
  const wrapValue = options['wrap'];
  const wrap = wrapValue === false ? false : readNumber(wrapValue);

  const resolved: RenderCliOptions = {
    ...(config === undefined ? {} : { config }),
    ...definedEntry('color', readBoolean(options['color'])),
    ...definedEntry('indent', readNumber(options['indent'])),
    ...definedEntry('maxDepth', readNumber(options['maxDepth'])),
    ...(radix === undefined ? {} : { radix }),
    ...definedEntry('suffix', readBoolean(options['suffix'])),
    ...definedEntry('byteLimit', readNumber(options['byteLimit'])),
    ...definedEntry('rainbow', readBoolean(options['rainbow'])),
    ...definedEntry('forceNewline', readBoolean(options['forceNewline'])),
    ...(wrap === undefined ? {} : { wrap }),
  };
  return resolved;
};

const definedEntry = <K extends string, V>(
  key: K,
  value: V | undefined,
): Partial<Record<K, V>> => {
  if (value === undefined) {
    return {};
  }
  const entry: Partial<Record<K, V>> = {};
  entry[key] = value;
  return entry;
};

/**
 * Maps command line flags onto print settings overrides. Flags that were not
 * given stay out of the result so lower layers keep their values.
 */
export const toPrintSettingsOverrides = (options: RenderCliOptions): PrintSettingsOverrides => {
  const wrap = options.wrap === false ? null : options.wrap;
  return {
    colored: options.color,
    indentAmount: options.indent,
    maxDepth: options.maxDepth,
    radix: options.radix,
    printSuffix: options.suffix,
    byteLimit: options.byteLimit,
    rainbowBracket: options.rainbow,
    forceNewLine: options.forceNewline,
    listWrap: wrap,
    arrayWrap: wrap,
    recordWrap: wrap,
    tupleWrap: wrap,
  };
};
