import { typeHash } from './type-hash.js';

export const LIST_TYPE_NAME = 'core.List';
export const OPTION_TYPE_NAME = 'core.Option';
export const RESULT_TYPE_NAME = 'core.Result';

export const LIST_TYPE_HASH = typeHash(LIST_TYPE_NAME);
export const OPTION_TYPE_HASH = typeHash(OPTION_TYPE_NAME);
export const RESULT_TYPE_HASH = typeHash(RESULT_TYPE_NAME);

/** Variant ids of the cons-cell list type. */
export const ListVariant = {
  empty: 0,
  more: 1,
} as const;

export const OptionVariant = {
  none: 0,
  some: 1,
} as const;

export const ResultVariant = {
  ok: 0,
  err: 1,
} as const;

export interface BuiltinVariant {
  readonly name: string;
  readonly arity: number;
}

const OPTION_VARIANTS: readonly BuiltinVariant[] = [
  { name: 'None', arity: 0 },
  { name: 'Some', arity: 1 },
];

const RESULT_VARIANTS: readonly BuiltinVariant[] = [
  { name: 'Ok', arity: 1 },
  { name: 'Err', arity: 1 },
];

/**
 * Names Option and Result variants from fixed tables. Returns `undefined` for
 * every other type, and for ids outside the two known variants.
 */
export function builtinVariant(hash: bigint, variantId: number): BuiltinVariant | undefined {
  if (hash === OPTION_TYPE_HASH) {
    return OPTION_VARIANTS[variantId];
  }
  if (hash === RESULT_TYPE_HASH) {
    return RESULT_VARIANTS[variantId];
  }
  return undefined;
}

export function isListType(hash: bigint): boolean {
  return hash === LIST_TYPE_HASH;
}
