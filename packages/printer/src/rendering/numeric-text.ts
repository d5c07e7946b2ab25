import type { Radix } from '../settings/print-settings.js';

export type SizedNumericType =
  | 'int8'
  | 'int16'
  | 'uint8'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64';

const SUFFIXES: Readonly<Record<SizedNumericType, string>> = {
  int8: 's',
  int16: 'S',
  uint8: 'us',
  uint16: 'uS',
  int32: 'l',
  uint32: 'ul',
  int64: 'L',
  uint64: 'uL',
  float32: 'f',
  float64: '',
};

const RADIX_BASES: Readonly<Record<Radix, { readonly base: number; readonly prefix: string }>> = {
  hex: { base: 16, prefix: '0x' },
  dec: { base: 10, prefix: '' },
  oct: { base: 8, prefix: '0o' },
  bin: { base: 2, prefix: '0b' },
};

const MAX_FLOAT32_DIGITS = 9;

export function numericSuffix(type: SizedNumericType): string {
  return SUFFIXES[type];
}

/**
 * Formats an integer in the given radix with its prefix. The sign goes before
 * the prefix: `-0x5`.
 */
export function formatInteger(value: bigint | number, radix: Radix): string {
  const integer = typeof value === 'bigint' ? value : BigInt(value);
  const { base, prefix } = RADIX_BASES[radix];
  const magnitude = integer < 0n ? -integer : integer;
  return `${integer < 0n ? '-' : ''}${prefix}${magnitude.toString(base)}`;
}

/**
 * Formats a float in decimal. Integral finite values keep a trailing `.0`.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Object.is(value, -0)) {
    return '-0.0';
  }
  const text = String(value);
  return Number.isInteger(value) && !text.includes('e') ? `${text}.0` : text;
}

/**
 * Formats a single-precision value with the fewest significant digits that
 * read back to the same float32.
 */
export function formatFloat32(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return formatFloat(value);
  }
  for (let digits = 1; digits <= MAX_FLOAT32_DIGITS; digits += 1) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) {
      return formatFloat(candidate);
    }
  }
  return formatFloat(value);
}

export function formatBigInt(value: bigint): string {
  return value.toString();
}
