/**
 * Heap object headers.
 *
 * ```
 *  63            32 31        16 15     8 7      0
 * +----------------+------------+--------+--------+
 * |     length     |    aux     | subtag |  tag   |
 * +----------------+------------+--------+--------+
 * ```
 *
 * `length` is a byte count for strings and bytes, an element count for arrays
 * and the arity of tuples, records and variants. `aux` carries the variant id
 * of sum-type values and the sign of boxed big integers.
 */

export const WORD_SIZE = 8;

export const ObjectTag = {
  string: 1,
  bytes: 2,
  tuple: 3,
  array: 4,
  record: 5,
  variant: 6,
  number: 7,
  function: 8,
} as const;

export type ObjectTagName = keyof typeof ObjectTag;

export const NumberSubtag = {
  int32: 1,
  uint32: 2,
  int64: 3,
  uint64: 4,
  float32: 5,
  float64: 6,
  rational: 7,
  bigint: 8,
} as const;

export type NumberSubtype = keyof typeof NumberSubtag;

export interface ObjectHeader {
  readonly tag: number;
  readonly subtag: number;
  readonly aux: number;
  readonly length: number;
}

export function encodeHeader(header: ObjectHeader): bigint {
  return (
    (BigInt(header.length >>> 0) << 32n) |
    (BigInt(header.aux & 0xff_ff) << 16n) |
    (BigInt(header.subtag & 0xff) << 8n) |
    BigInt(header.tag & 0xff)
  );
}

export function decodeHeader(word: bigint): ObjectHeader {
  return {
    tag: Number(word & 0xffn),
    subtag: Number((word >> 8n) & 0xffn),
    aux: Number((word >> 16n) & 0xff_ffn),
    length: Number((word >> 32n) & 0xff_ff_ff_ffn),
  };
}

const OBJECT_TAG_NAMES: readonly ObjectTagName[] = [
  'string',
  'bytes',
  'tuple',
  'array',
  'record',
  'variant',
  'number',
  'function',
];

const NUMBER_SUBTYPES: readonly NumberSubtype[] = [
  'int32',
  'uint32',
  'int64',
  'uint64',
  'float32',
  'float64',
  'rational',
  'bigint',
];

const TAG_NAMES: ReadonlyMap<number, ObjectTagName> = new Map(
  OBJECT_TAG_NAMES.map((name): [number, ObjectTagName] => [ObjectTag[name], name]),
);

const SUBTYPE_NAMES: ReadonlyMap<number, NumberSubtype> = new Map(
  NUMBER_SUBTYPES.map((name): [number, NumberSubtype] => [NumberSubtag[name], name]),
);

export function objectTagName(tag: number): ObjectTagName | undefined {
  return TAG_NAMES.get(tag);
}

export function numberSubtypeName(subtag: number): NumberSubtype | undefined {
  return SUBTYPE_NAMES.get(subtag);
}

export function wordsForBytes(byteLength: number): number {
  return Math.ceil(byteLength / WORD_SIZE);
}
