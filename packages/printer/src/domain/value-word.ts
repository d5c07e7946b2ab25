/**
 * Tagged value words.
 *
 * Every runtime value is a single unsigned 64-bit word. The low bits say how to
 * read the rest of it:
 *
 * | low bits | meaning                                                  |
 * | -------- | -------------------------------------------------------- |
 * | `xx1`    | immediate number, signed 63-bit payload in bits 1..63    |
 * | `x10`    | short inline value, sub-tag in bits 2..4, payload 8..39  |
 * | `100`    | constant (false, true, void)                             |
 * | `000`    | heap pointer (non-zero, 8-byte aligned address)          |
 *
 * {@link classifyWord} is the only place that looks at these bits; everything
 * downstream matches on the {@link ValueKind} union it returns.
 */

export type ValueWord = bigint;

export type ShortInlineType = 'char' | 'int8' | 'int16' | 'uint8' | 'uint16';

export type ConstantName = 'false' | 'true' | 'void';

export type ValueKind =
  | { readonly kind: 'immediate-number'; readonly value: bigint }
  | { readonly kind: 'constant'; readonly name: ConstantName }
  | { readonly kind: 'short-inline'; readonly type: ShortInlineType; readonly value: number }
  | { readonly kind: 'heap-pointer'; readonly address: number }
  | { readonly kind: 'unknown-constant'; readonly word: ValueWord }
  | { readonly kind: 'unknown-short'; readonly word: ValueWord }
  | { readonly kind: 'unknown'; readonly word: ValueWord };

const WORD_BITS = 64;
const MAX_WORD = (1n << 64n) - 1n;

const IMMEDIATE_MASK = 0b1n;
const SHORT_MASK = 0b11n;
const SHORT_TAG = 0b10n;
const POINTER_MASK = 0b111n;
const CONSTANT_TAG = 0b100n;

const SHORT_SUBTAG_SHIFT = 2n;
const SHORT_SUBTAG_MASK = 0b111n;
const SHORT_PAYLOAD_SHIFT = 8n;
const SHORT_PAYLOAD_MASK = 0xff_ff_ff_ffn;

const MAX_CODE_POINT = 0x10_ff_ff;

export const IMMEDIATE_MIN = -(1n << 62n);
export const IMMEDIATE_MAX = (1n << 62n) - 1n;

export const FALSE_WORD: ValueWord = 0x04n;
export const TRUE_WORD: ValueWord = 0x0cn;
export const VOID_WORD: ValueWord = 0x14n;

const SHORT_SUBTAGS: readonly ShortInlineType[] = ['char', 'int8', 'int16', 'uint8', 'uint16'];

const CONSTANTS: ReadonlyMap<ValueWord, ConstantName> = new Map([
  [FALSE_WORD, 'false'],
  [TRUE_WORD, 'true'],
  [VOID_WORD, 'void'],
]);

/**
 * Decodes a word into its kind. Total: unrecognised patterns come back as one
 * of the `unknown*` kinds rather than throwing.
 */
export function classifyWord(word: ValueWord): ValueKind {
  if (word < 0n || word > MAX_WORD) {
    return { kind: 'unknown', word };
  }

  if ((word & IMMEDIATE_MASK) === IMMEDIATE_MASK) {
    return { kind: 'immediate-number', value: BigInt.asIntN(WORD_BITS, word) >> 1n };
  }

  if ((word & SHORT_MASK) === SHORT_TAG) {
    return decodeShortInline(word);
  }

  if ((word & POINTER_MASK) === CONSTANT_TAG) {
    const name = CONSTANTS.get(word);
    return name === undefined ? { kind: 'unknown-constant', word } : { kind: 'constant', name };
  }

  if (word === 0n || word > BigInt(Number.MAX_SAFE_INTEGER)) {
    return { kind: 'unknown', word };
  }

  return { kind: 'heap-pointer', address: Number(word) };
}

function decodeShortInline(word: ValueWord): ValueKind {
  const subtag = Number((word >> SHORT_SUBTAG_SHIFT) & SHORT_SUBTAG_MASK);
  const type = SHORT_SUBTAGS[subtag];
  if (type === undefined) {
    return { kind: 'unknown-short', word };
  }

  const payload = Number((word >> SHORT_PAYLOAD_SHIFT) & SHORT_PAYLOAD_MASK);
  switch (type) {
    case 'int8': {
      return { kind: 'short-inline', type, value: (payload << 24) >> 24 };
    }
    case 'int16': {
      return { kind: 'short-inline', type, value: (payload << 16) >> 16 };
    }
    case 'uint8': {
      return { kind: 'short-inline', type, value: payload & 0xff };
    }
    case 'uint16': {
      return { kind: 'short-inline', type, value: payload & 0xff_ff };
    }
    case 'char': {
      return payload > MAX_CODE_POINT
        ? { kind: 'unknown-short', word }
        : { kind: 'short-inline', type, value: payload };
    }
  }
}

/**
 * Encodes an integer as an immediate number word.
 *
 * @throws {RangeError} When the value does not fit in 63 signed bits.
 */
export function encodeImmediate(value: bigint | number): ValueWord {
  const integer = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
  if (integer < IMMEDIATE_MIN || integer > IMMEDIATE_MAX) {
    throw new RangeError(`Value ${integer.toString()} does not fit in an immediate number.`);
  }
  return BigInt.asUintN(WORD_BITS, (integer << 1n) | IMMEDIATE_MASK);
}

export function canEncodeImmediate(value: bigint): boolean {
  return value >= IMMEDIATE_MIN && value <= IMMEDIATE_MAX;
}

/**
 * Encodes a short inline value. Out-of-range payloads are truncated to the
 * width of the type, the way a narrowing store would.
 */
export function encodeShortInline(type: ShortInlineType, value: number): ValueWord {
  const subtag = BigInt(SHORT_SUBTAGS.indexOf(type));
  const payload = BigInt(truncateShortPayload(type, value));
  return (payload << SHORT_PAYLOAD_SHIFT) | (subtag << SHORT_SUBTAG_SHIFT) | SHORT_TAG;
}

export function encodeChar(character: string): ValueWord {
  const codePoint = character.codePointAt(0);
  if (codePoint === undefined) {
    throw new RangeError('Cannot encode an empty string as a char.');
  }
  return encodeShortInline('char', codePoint);
}

export function encodeBoolean(value: boolean): ValueWord {
  return value ? TRUE_WORD : FALSE_WORD;
}

function truncateShortPayload(type: ShortInlineType, value: number): number {
  const integer = Math.trunc(value);
  switch (type) {
    case 'int8':
    case 'uint8': {
      return integer & 0xff;
    }
    case 'int16':
    case 'uint16': {
      return integer & 0xff_ff;
    }
    case 'char': {
      return integer & 0x1f_ff_ff;
    }
  }
}
