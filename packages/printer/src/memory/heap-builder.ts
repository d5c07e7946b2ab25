import {
  LIST_TYPE_HASH,
  ListVariant,
  OPTION_TYPE_HASH,
  OptionVariant,
  RESULT_TYPE_HASH,
  ResultVariant,
} from '../domain/builtin-types.js';
import { float32ToBits, float64ToBits } from '../domain/heap-object.js';
import {
  NumberSubtag,
  ObjectTag,
  WORD_SIZE,
  encodeHeader,
  wordsForBytes,
  type ObjectHeader,
} from '../domain/heap-layout.js';
import { canEncodeImmediate, encodeImmediate, type ValueWord } from '../domain/value-word.js';
import { HeapImage } from './heap-view.js';

const INITIAL_CAPACITY = 256;
const LIMB_MASK = (1n << 64n) - 1n;

const utf8 = new TextEncoder();

/**
 * Bump allocator that lays objects out in the heap format read by
 * `readHeapObject`. Address 0 is never handed out so that a zero word stays an
 * invalid pointer.
 */
export class HeapBuilder {
  private bytes = new Uint8Array(INITIAL_CAPACITY);
  private top = WORD_SIZE;

  string(text: string): ValueWord {
    const encoded = utf8.encode(text);
    return this.allocateBytes({ tag: ObjectTag.string, subtag: 0, aux: 0, length: encoded.length }, encoded);
  }

  bytesValue(data: Uint8Array | readonly number[]): ValueWord {
    const payload = data instanceof Uint8Array ? data : Uint8Array.from(data);
    return this.allocateBytes({ tag: ObjectTag.bytes, subtag: 0, aux: 0, length: payload.length }, payload);
  }

  tuple(elements: readonly ValueWord[]): ValueWord {
    return this.raw({ tag: ObjectTag.tuple, subtag: 0, aux: 0, length: elements.length }, elements);
  }

  array(elements: readonly ValueWord[]): ValueWord {
    return this.raw({ tag: ObjectTag.array, subtag: 0, aux: 0, length: elements.length }, elements);
  }

  record(typeHash: bigint, fields: readonly ValueWord[]): ValueWord {
    return this.raw({ tag: ObjectTag.record, subtag: 0, aux: 0, length: fields.length }, [
      typeHash,
      ...fields,
    ]);
  }

  variant(typeHash: bigint, variantId: number, fields: readonly ValueWord[]): ValueWord {
    return this.raw(
      { tag: ObjectTag.variant, subtag: 0, aux: variantId, length: fields.length },
      [typeHash, ...fields],
    );
  }

  /** Builds a cons-cell list, last element first. */
  list(elements: readonly ValueWord[]): ValueWord {
    let cell = this.variant(LIST_TYPE_HASH, ListVariant.empty, []);
    for (const element of [...elements].reverse()) {
      cell = this.variant(LIST_TYPE_HASH, ListVariant.more, [element, cell]);
    }
    return cell;
  }

  some(value: ValueWord): ValueWord {
    return this.variant(OPTION_TYPE_HASH, OptionVariant.some, [value]);
  }

  none(): ValueWord {
    return this.variant(OPTION_TYPE_HASH, OptionVariant.none, []);
  }

  ok(value: ValueWord): ValueWord {
    return this.variant(RESULT_TYPE_HASH, ResultVariant.ok, [value]);
  }

  err(value: ValueWord): ValueWord {
    return this.variant(RESULT_TYPE_HASH, ResultVariant.err, [value]);
  }

  int32(value: number): ValueWord {
    return this.boxed(NumberSubtag.int32, BigInt.asUintN(64, BigInt(Math.trunc(value))));
  }

  uint32(value: number): ValueWord {
    return this.boxed(NumberSubtag.uint32, BigInt.asUintN(32, BigInt(Math.trunc(value))));
  }

  int64(value: bigint): ValueWord {
    return this.boxed(NumberSubtag.int64, BigInt.asUintN(64, value));
  }

  uint64(value: bigint): ValueWord {
    return this.boxed(NumberSubtag.uint64, BigInt.asUintN(64, value));
  }

  float32(value: number): ValueWord {
    return this.boxed(NumberSubtag.float32, float32ToBits(value));
  }

  float64(value: number): ValueWord {
    return this.boxed(NumberSubtag.float64, float64ToBits(value));
  }

  bigint(value: bigint): ValueWord {
    const limbs: bigint[] = [];
    for (let magnitude = value < 0n ? -value : value; magnitude > 0n; magnitude >>= 64n) {
      limbs.push(magnitude & LIMB_MASK);
    }
    return this.raw(
      {
        tag: ObjectTag.number,
        subtag: NumberSubtag.bigint,
        aux: value < 0n ? 1 : 0,
        length: limbs.length,
      },
      limbs,
    );
  }

  /** An immediate number when the value fits in one, a boxed big integer otherwise. */
  integer(value: bigint): ValueWord {
    return canEncodeImmediate(value) ? encodeImmediate(value) : this.bigint(value);
  }

  rational(numerator: bigint, denominator: bigint): ValueWord {
    return this.raw(
      { tag: ObjectTag.number, subtag: NumberSubtag.rational, aux: 0, length: 2 },
      [this.integer(numerator), this.integer(denominator)],
    );
  }

  lambda(codeIndex = 0): ValueWord {
    return this.raw({ tag: ObjectTag.function, subtag: 0, aux: 0, length: 1 }, [
      BigInt(codeIndex),
    ]);
  }

  /**
   * Writes a header followed by payload words verbatim. Lets callers lay out
   * objects the typed helpers refuse to produce.
   */
  raw(header: ObjectHeader, payload: readonly bigint[]): ValueWord {
    const address = this.reserve(1 + payload.length);
    const view = this.view();
    view.setBigUint64(address, encodeHeader(header), true);
    payload.forEach((word, index) => {
      view.setBigUint64(address + (index + 1) * WORD_SIZE, BigInt.asUintN(64, word), true);
    });
    return BigInt(address);
  }

  build(): HeapImage {
    return new HeapImage(this.bytes.slice(0, this.top));
  }

  private boxed(subtag: number, bits: bigint): ValueWord {
    return this.raw({ tag: ObjectTag.number, subtag, aux: 0, length: 1 }, [bits]);
  }

  private allocateBytes(header: ObjectHeader, payload: Uint8Array): ValueWord {
    const address = this.reserve(1 + wordsForBytes(payload.length));
    this.view().setBigUint64(address, encodeHeader(header), true);
    this.bytes.set(payload, address + WORD_SIZE);
    return BigInt(address);
  }

  private reserve(words: number): number {
    const address = this.top;
    const required = address + words * WORD_SIZE;
    if (required > this.bytes.length) {
      let capacity = this.bytes.length;
      while (capacity < required) {
        capacity *= 2;
      }
      const grown = new Uint8Array(capacity);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.top = required;
    return address;
  }

  private view(): DataView {
    return new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength);
  }
}
