import { test } from 'vitest';
import assert from 'node:assert/strict';

import {
  ObjectTag,
  decodeHeader,
  encodeHeader,
} from '../../src/domain/heap-layout.js';
import { readHeapObject } from '../../src/domain/heap-object.js';
import { encodeImmediate } from '../../src/domain/value-word.js';
import { HeapBuilder } from '../../src/memory/heap-builder.js';

test('encodeHeader packs tag, subtag, aux and length into their bit ranges', () => {
  const word = encodeHeader({ tag: ObjectTag.variant, subtag: 0, aux: 3, length: 2 });
  assert.equal(word, (2n << 32n) | (3n << 16n) | 6n);
  assert.deepEqual(decodeHeader(word), { tag: 6, subtag: 0, aux: 3, length: 2 });
});

test('readHeapObject decodes strings as UTF-8', () => {
  const builder = new HeapBuilder();
  const pointer = builder.string('héllo');
  assert.deepEqual(readHeapObject(builder.build(), Number(pointer)), {
    type: 'string',
    text: 'héllo',
  });
});

test('readHeapObject splits the type hash from record fields', () => {
  const builder = new HeapBuilder();
  const pointer = builder.record(0x1234n, [encodeImmediate(1n), encodeImmediate(2n)]);
  assert.deepEqual(readHeapObject(builder.build(), Number(pointer)), {
    type: 'record',
    typeHash: 0x1234n,
    fields: [3n, 5n],
  });
});

test('readHeapObject reads sized and big boxed numbers', () => {
  const builder = new HeapBuilder();
  const int32 = builder.int32(-7);
  const uint64 = builder.uint64((1n << 64n) - 1n);
  const float32 = builder.float32(1.5);
  const big = builder.bigint(-(1n << 70n));
  const heap = builder.build();

  assert.deepEqual(readHeapObject(heap, Number(int32)), {
    type: 'number',
    number: { subtype: 'int32', value: -7 },
  });
  assert.deepEqual(readHeapObject(heap, Number(uint64)), {
    type: 'number',
    number: { subtype: 'uint64', value: (1n << 64n) - 1n },
  });
  assert.deepEqual(readHeapObject(heap, Number(float32)), {
    type: 'number',
    number: { subtype: 'float32', value: 1.5 },
  });
  assert.deepEqual(readHeapObject(heap, Number(big)), {
    type: 'number',
    number: { subtype: 'bigint', value: -(1n << 70n) },
  });
});

test('readHeapObject refuses unknown tags and payloads running past the heap', () => {
  const builder = new HeapBuilder();
  const unknownTag = builder.raw({ tag: 0x2a, subtag: 0, aux: 0, length: 0 }, []);
  const overlong = builder.raw({ tag: ObjectTag.tuple, subtag: 0, aux: 0, length: 100 }, [1n]);
  const heap = builder.build();

  assert.equal(readHeapObject(heap, Number(unknownTag)), undefined);
  assert.equal(readHeapObject(heap, Number(overlong)), undefined);
  assert.equal(readHeapObject(heap, 4096), undefined);
});

test('readHeapObject reports unassigned numeric sub-tags', () => {
  const builder = new HeapBuilder();
  const pointer = builder.raw({ tag: ObjectTag.number, subtag: 0x33, aux: 0, length: 1 }, [0n]);
  assert.deepEqual(readHeapObject(builder.build(), Number(pointer)), {
    type: 'unknown-number',
    subtag: 0x33,
  });
});
