import { builtinVariant } from '../domain/builtin-types.js';
import type {
  EnumMetadataBlock,
  RecordMetadataBlock,
  TypeMetadataBlock,
  TypeRegistry,
} from './type-registry.js';

export interface ResolvedVariant {
  readonly name: string;
  readonly arity: number;
  /** Field names of an inline-record payload; `undefined` for positional payloads. */
  readonly fields: readonly string[] | undefined;
}

export function findType(registry: TypeRegistry, typeHash: bigint): TypeMetadataBlock | undefined {
  return registry.lookup(typeHash);
}

/**
 * Copies a record's field names out of the registry's pool. A heap record whose
 * arity disagrees with its metadata is treated as unresolved.
 */
export function fieldNames(
  registry: TypeRegistry,
  block: RecordMetadataBlock,
  arity: number,
): string[] | undefined {
  if (arity !== block.arity) {
    return undefined;
  }
  const names = registry.names(block.fieldOffset, arity);
  return names ? [...names] : undefined;
}

export function variantInfo(
  registry: TypeRegistry,
  block: EnumMetadataBlock,
  variantId: number,
): ResolvedVariant | undefined {
  const variant = block.variants.find((candidate) => candidate.id === variantId);
  if (!variant) {
    return undefined;
  }

  if (variant.recordFieldOffset === 0) {
    return { name: variant.name, arity: variant.arity, fields: undefined };
  }

  const names = registry.names(variant.recordFieldOffset, variant.arity);
  return names ? { name: variant.name, arity: variant.arity, fields: [...names] } : undefined;
}

/**
 * Resolves the record shape of a heap record with `arity` fields.
 */
export function resolveRecordFields(
  registry: TypeRegistry,
  typeHash: bigint,
  arity: number,
): string[] | undefined {
  const block = findType(registry, typeHash);
  return block?.kind === 'record' ? fieldNames(registry, block, arity) : undefined;
}

/**
 * Resolves a sum-type variant. Option and Result are answered from fixed
 * tables; everything else goes through the registry.
 */
export function resolveVariant(
  registry: TypeRegistry,
  typeHash: bigint,
  variantId: number,
): ResolvedVariant | undefined {
  const builtin = builtinVariant(typeHash, variantId);
  if (builtin) {
    return { name: builtin.name, arity: builtin.arity, fields: undefined };
  }

  const block = findType(registry, typeHash);
  return block?.kind === 'enum' ? variantInfo(registry, block, variantId) : undefined;
}
