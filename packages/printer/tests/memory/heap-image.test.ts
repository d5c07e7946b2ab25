import { test } from 'vitest';
import assert from 'node:assert/strict';

import { HeapBuilder } from '../../src/memory/heap-builder.js';
import { HeapImage } from '../../src/memory/heap-view.js';

test('HeapImage reads little-endian words at aligned addresses only', () => {
  const bytes = new Uint8Array(16);
  bytes[8] = 0x01;
  bytes[9] = 0x02;
  const heap = new HeapImage(bytes);

  assert.equal(heap.readWord(8), 0x02_01n);
  assert.equal(heap.readWord(4), undefined);
  assert.equal(heap.readWord(16), undefined);
  assert.equal(heap.readWord(-8), undefined);
});

test('HeapImage.readBytes stays inside the buffer', () => {
  const heap = new HeapImage(Uint8Array.from([1, 2, 3, 4]));
  assert.deepEqual([...(heap.readBytes(1, 2) ?? [])], [2, 3]);
  assert.equal(heap.readBytes(3, 2), undefined);
});

test('HeapBuilder never hands out address zero and keeps objects word aligned', () => {
  const builder = new HeapBuilder();
  const first = builder.string('abc');
  const second = builder.tuple([]);

  assert.equal(first, 8n);
  // header word plus one word for three bytes
  assert.equal(second, 24n);
  assert.equal(builder.build().byteLength, 32);
});

test('HeapBuilder grows past its initial capacity', () => {
  const builder = new HeapBuilder();
  const text = 'x'.repeat(1000);
  const pointer = builder.string(text);
  const heap = builder.build();

  assert.equal(heap.byteLength, 8 + 8 + 1000);
  assert.equal(new TextDecoder().decode(heap.readBytes(Number(pointer) + 8, 1000)), text);
});

test('HeapBuilder.integer boxes values that do not fit in an immediate word', () => {
  const builder = new HeapBuilder();
  assert.equal(builder.integer(10n), 21n);
  assert.equal(builder.build().byteLength, 8);
  assert.equal(builder.integer(1n << 62n), 8n);
});
