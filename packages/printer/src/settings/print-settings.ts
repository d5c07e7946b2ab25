export type Radix = 'hex' | 'dec' | 'oct' | 'bin';

export type WrapKind = 'list' | 'array' | 'record' | 'tuple';

/**
 * Rendering policy for one render call.
 */
export interface PrintSettings {
  readonly colored: boolean;
  readonly indentAmount: number;
  /** Containers deeper than this render their elements as `<item>`. */
  readonly maxDepth: number;
  readonly newLineChar: string;
  readonly printSuffix: boolean;
  /** Bytes shown before a byte sequence is cut off with `...`. */
  readonly byteLimit: number;
  readonly rainbowBracket: boolean;
  readonly radix: Radix;
  readonly forceNewLine: boolean;
  /** Rendered widths at or above a threshold split the container over several lines. */
  readonly listWrap: number | undefined;
  readonly arrayWrap: number | undefined;
  readonly recordWrap: number | undefined;
  readonly tupleWrap: number | undefined;
}

type WrapSettingKey = 'listWrap' | 'arrayWrap' | 'recordWrap' | 'tupleWrap';

/**
 * Partial settings layered over the defaults. `null` clears a wrap threshold.
 */
export type PrintSettingsOverrides = {
  readonly [Key in Exclude<keyof PrintSettings, WrapSettingKey>]?: PrintSettings[Key];
} & {
  readonly [Key in WrapSettingKey]?: number | null | undefined;
};

export const DEFAULT_WRAP_THRESHOLD = 200;

export const defaultPrintSettings: PrintSettings = Object.freeze({
  colored: true,
  indentAmount: 2,
  maxDepth: Number.POSITIVE_INFINITY,
  newLineChar: '\n',
  printSuffix: true,
  byteLimit: 32,
  rainbowBracket: false,
  radix: 'dec',
  forceNewLine: false,
  listWrap: DEFAULT_WRAP_THRESHOLD,
  arrayWrap: DEFAULT_WRAP_THRESHOLD,
  recordWrap: DEFAULT_WRAP_THRESHOLD,
  tupleWrap: DEFAULT_WRAP_THRESHOLD,
} as const);

const WRAP_KEYS: readonly WrapSettingKey[] = ['listWrap', 'arrayWrap', 'recordWrap', 'tupleWrap'];

/**
 * Layers override objects, later ones winning, onto {@link defaultPrintSettings}.
 * Keys left `undefined` in an override keep the earlier value.
 */
export function resolvePrintSettings(
  ...overrides: readonly (PrintSettingsOverrides | undefined)[]
): PrintSettings {
  let settings: PrintSettings = defaultPrintSettings;

  for (const override of overrides) {
    if (!override) {
      continue;
    }

    const { listWrap, arrayWrap, recordWrap, tupleWrap, ...scalars } = override;
    const defined = Object.fromEntries(
      Object.entries(scalars).filter(([, value]) => value !== undefined),
    );
    const thresholds = { listWrap, arrayWrap, recordWrap, tupleWrap };
    const wrap: Partial<Record<WrapSettingKey, number | undefined>> = {};
    for (const key of WRAP_KEYS) {
      const threshold = thresholds[key];
      if (threshold !== undefined) {
        wrap[key] = threshold ?? undefined;
      }
    }

    settings = { ...settings, ...defined, ...wrap };
  }

  return Object.freeze(settings);
}

export function wrapThreshold(settings: PrintSettings, kind: WrapKind): number | undefined {
  switch (kind) {
    case 'list': {
      return settings.listWrap;
    }
    case 'array': {
      return settings.arrayWrap;
    }
    case 'record': {
      return settings.recordWrap;
    }
    case 'tuple': {
      return settings.tupleWrap;
    }
  }
}
