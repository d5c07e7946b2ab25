import type { HeapView } from '../memory/heap-view.js';
import {
  WORD_SIZE,
  decodeHeader,
  numberSubtypeName,
  objectTagName,
  type ObjectHeader,
} from './heap-layout.js';
import type { ValueWord } from './value-word.js';

export type BoxedNumber =
  | { readonly subtype: 'int32' | 'uint32' | 'float32' | 'float64'; readonly value: number }
  | { readonly subtype: 'int64' | 'uint64' | 'bigint'; readonly value: bigint }
  | {
      readonly subtype: 'rational';
      readonly numerator: ValueWord;
      readonly denominator: ValueWord;
    };

export type HeapObject =
  | { readonly type: 'string'; readonly text: string }
  | { readonly type: 'bytes'; readonly bytes: Uint8Array }
  | { readonly type: 'tuple'; readonly elements: readonly ValueWord[] }
  | { readonly type: 'array'; readonly elements: readonly ValueWord[] }
  | {
      readonly type: 'record';
      readonly typeHash: bigint;
      readonly fields: readonly ValueWord[];
    }
  | {
      readonly type: 'variant';
      readonly typeHash: bigint;
      readonly variantId: number;
      readonly fields: readonly ValueWord[];
    }
  | { readonly type: 'number'; readonly number: BoxedNumber }
  | { readonly type: 'unknown-number'; readonly subtag: number }
  | { readonly type: 'function' };

const utf8 = new TextDecoder('utf-8');

/**
 * Reads the object whose header sits at `address`. Returns `undefined` for an
 * unrecognised header tag or when the declared payload does not fit inside
 * the heap; nothing past the declared length is read.
 */
export function readHeapObject(heap: HeapView, address: number): HeapObject | undefined {
  const headerWord = heap.readWord(address);
  if (headerWord === undefined) {
    return undefined;
  }

  const header = decodeHeader(headerWord);
  const payload = address + WORD_SIZE;

  switch (objectTagName(header.tag)) {
    case 'string': {
      const bytes = heap.readBytes(payload, header.length);
      return bytes && { type: 'string', text: utf8.decode(bytes) };
    }
    case 'bytes': {
      const bytes = heap.readBytes(payload, header.length);
      return bytes && { type: 'bytes', bytes };
    }
    case 'tuple': {
      const elements = readWords(heap, payload, header.length);
      return elements && { type: 'tuple', elements };
    }
    case 'array': {
      const elements = readWords(heap, payload, header.length);
      return elements && { type: 'array', elements };
    }
    case 'record': {
      const words = readWords(heap, payload, header.length + 1);
      const [hash, ...fields] = words ?? [];
      return hash === undefined ? undefined : { type: 'record', typeHash: hash, fields };
    }
    case 'variant': {
      const words = readWords(heap, payload, header.length + 1);
      const [hash, ...fields] = words ?? [];
      return hash === undefined
        ? undefined
        : { type: 'variant', typeHash: hash, variantId: header.aux, fields };
    }
    case 'number': {
      return readBoxedNumber(heap, payload, header);
    }
    case 'function': {
      return { type: 'function' };
    }
    case undefined: {
      return undefined;
    }
  }
}

function readBoxedNumber(
  heap: HeapView,
  payload: number,
  header: ObjectHeader,
): HeapObject | undefined {
  const subtype = numberSubtypeName(header.subtag);
  if (subtype === undefined) {
    return { type: 'unknown-number', subtag: header.subtag };
  }

  if (subtype === 'bigint') {
    const limbs = readWords(heap, payload, header.length);
    if (!limbs) {
      return undefined;
    }
    const magnitude = limbs.reduceRight((total, limb) => (total << 64n) | limb, 0n);
    const value = header.aux === 1 ? -magnitude : magnitude;
    return { type: 'number', number: { subtype, value } };
  }

  if (subtype === 'rational') {
    const [numerator, denominator] = readWords(heap, payload, 2) ?? [];
    if (numerator === undefined || denominator === undefined) {
      return undefined;
    }
    return { type: 'number', number: { subtype, numerator, denominator } };
  }

  const bits = heap.readWord(payload);
  if (bits === undefined) {
    return undefined;
  }

  switch (subtype) {
    case 'int32': {
      return { type: 'number', number: { subtype, value: Number(BigInt.asIntN(32, bits)) } };
    }
    case 'uint32': {
      return { type: 'number', number: { subtype, value: Number(BigInt.asUintN(32, bits)) } };
    }
    case 'int64': {
      return { type: 'number', number: { subtype, value: BigInt.asIntN(64, bits) } };
    }
    case 'uint64': {
      return { type: 'number', number: { subtype, value: bits } };
    }
    case 'float32': {
      return { type: 'number', number: { subtype, value: float32FromBits(bits) } };
    }
    case 'float64': {
      return { type: 'number', number: { subtype, value: float64FromBits(bits) } };
    }
  }
}

function readWords(heap: HeapView, start: number, count: number): bigint[] | undefined {
  if (start + count * WORD_SIZE > heap.byteLength) {
    return undefined;
  }

  const words: bigint[] = [];
  for (let index = 0; index < count; index += 1) {
    const word = heap.readWord(start + index * WORD_SIZE);
    if (word === undefined) {
      return undefined;
    }
    words.push(word);
  }
  return words;
}

const scratch = new DataView(new ArrayBuffer(8));

export function float32FromBits(bits: bigint): number {
  scratch.setUint32(0, Number(bits & 0xff_ff_ff_ffn), true);
  return scratch.getFloat32(0, true);
}

export function float64FromBits(bits: bigint): number {
  scratch.setBigUint64(0, bits, true);
  return scratch.getFloat64(0, true);
}

export function float32ToBits(value: number): bigint {
  scratch.setFloat32(0, value, true);
  return BigInt(scratch.getUint32(0, true));
}

export function float64ToBits(value: number): bigint {
  scratch.setFloat64(0, value, true);
  return scratch.getBigUint64(0, true);
}
