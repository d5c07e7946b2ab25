import { colord } from 'colord';

export const ANSI_RESET = '\u001B[0m';

export type ThemeCategory =
  | 'number'
  | 'string'
  | 'char'
  | 'true'
  | 'false'
  | 'void'
  | 'lambda'
  | 'bytes'
  | 'box'
  | 'sumType'
  | 'recordKey'
  | 'unknown'
  | 'default'
  | 'bracket';

/** Colours as CSS colour strings, usually hex. */
export interface ThemeDefinition {
  readonly colors: Readonly<Record<ThemeCategory, string>>;
  readonly rainbow: readonly string[];
}

export interface ThemeOverrides {
  readonly colors?: Partial<Readonly<Record<ThemeCategory, string>>>;
  readonly rainbow?: readonly string[];
}

/**
 * Resolved terminal escapes for each category.
 */
export interface Theme {
  color(category: ThemeCategory): string;
  /** Escape for the rainbow slot `index mod palette size`. */
  rainbow(index: number): string;
}

export const defaultThemeDefinition: ThemeDefinition = {
  colors: {
    number: '#b5cea8',
    string: '#ce9178',
    char: '#d7ba7d',
    true: '#569cd6',
    false: '#569cd6',
    void: '#808080',
    lambda: '#c586c0',
    bytes: '#9cdcfe',
    box: '#4ec9b0',
    sumType: '#4ec9b0',
    recordKey: '#9cdcfe',
    unknown: '#f44747',
    default: '#d4d4d4',
    bracket: '#ffd700',
  },
  rainbow: ['#ffd700', '#da70d6', '#179fff'],
};

/**
 * Converts a CSS colour into a 24-bit foreground escape.
 *
 * @throws {Error} When colord cannot parse the colour.
 */
export function toAnsiForeground(value: string): string {
  const instance = colord(value);
  if (!instance.isValid()) {
    throw new Error(`Invalid theme colour: ${value}`);
  }
  const { r, g, b } = instance.toRgb();
  return `\u001B[38;2;${String(r)};${String(g)};${String(b)}m`;
}

/**
 * Builds a theme from the default definition and optional overrides. Every
 * colour is converted once, up front.
 *
 * @throws {Error} When a colour is invalid or the rainbow palette is empty.
 */
export function createTheme(overrides: ThemeOverrides = {}): Theme {
  const definition = {
    ...defaultThemeDefinition.colors,
    ...overrides.colors,
  };
  const palette = overrides.rainbow ?? defaultThemeDefinition.rainbow;
  if (palette.length === 0) {
    throw new Error('Rainbow palette must contain at least one colour.');
  }

  const escapes = new Map<ThemeCategory, string>();
  for (const [category, value] of Object.entries(definition)) {
    if (value !== undefined) {
      escapes.set(toCategory(category), toAnsiForeground(value));
    }
  }
  const rainbow = palette.map((value) => toAnsiForeground(value));
  const fallback = toAnsiForeground(defaultThemeDefinition.colors.default);

  return {
    color: (category) => escapes.get(category) ?? fallback,
    rainbow: (index) => rainbow[index % rainbow.length] ?? fallback,
  };
}

const CATEGORIES: ReadonlySet<string> = new Set(Object.keys(defaultThemeDefinition.colors));

function toCategory(name: string): ThemeCategory {
  if (!isThemeCategory(name)) {
    throw new Error(`Unknown theme category: ${name}`);
  }
  return name;
}

export function isThemeCategory(name: string): name is ThemeCategory {
  return CATEGORIES.has(name);
}
