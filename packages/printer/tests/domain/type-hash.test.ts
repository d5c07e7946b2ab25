import { test } from 'vitest';
import assert from 'node:assert/strict';

import {
  LIST_TYPE_HASH,
  OPTION_TYPE_HASH,
  RESULT_TYPE_HASH,
  builtinVariant,
  isListType,
} from '../../src/domain/builtin-types.js';
import { formatTypeHash, typeHash } from '../../src/domain/type-hash.js';

test('typeHash is 64-bit FNV-1a over the UTF-8 name', () => {
  assert.equal(typeHash(''), 0xcb_f2_9c_e4_84_22_23_25n);
  assert.equal(typeHash('a'), 0xaf_63_dc_4c_86_01_ec_8cn);
  assert.equal(LIST_TYPE_HASH, typeHash('core.List'));
});

test('formatTypeHash pads to sixteen hex digits', () => {
  assert.equal(formatTypeHash(0xffn), '0x00000000000000ff');
});

test('builtinVariant names Option and Result cases from fixed tables', () => {
  assert.deepEqual(builtinVariant(OPTION_TYPE_HASH, 0), { name: 'None', arity: 0 });
  assert.deepEqual(builtinVariant(OPTION_TYPE_HASH, 1), { name: 'Some', arity: 1 });
  assert.deepEqual(builtinVariant(RESULT_TYPE_HASH, 0), { name: 'Ok', arity: 1 });
  assert.deepEqual(builtinVariant(RESULT_TYPE_HASH, 1), { name: 'Err', arity: 1 });
  assert.equal(builtinVariant(RESULT_TYPE_HASH, 2), undefined);
  assert.equal(builtinVariant(typeHash('geo.Shape'), 0), undefined);
});

test('isListType matches only the built-in list hash', () => {
  assert.equal(isListType(LIST_TYPE_HASH), true);
  assert.equal(isListType(OPTION_TYPE_HASH), false);
});
