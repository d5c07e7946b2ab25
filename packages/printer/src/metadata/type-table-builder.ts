import { typeHash } from '../domain/type-hash.js';
import {
  BucketedTypeTable,
  DEFAULT_BUCKET_COUNT,
  type TypeMetadataBlock,
  type VariantMetadata,
} from './type-registry.js';

export type VariantDefinition =
  | { readonly name: string; readonly arity?: number }
  | { readonly name: string; readonly fields: readonly string[] };

/**
 * Collects record and enum definitions and freezes them into a
 * {@link BucketedTypeTable}. Field names are interned in one shared pool.
 */
export class TypeTableBuilder {
  private readonly blocks = new Map<bigint, TypeMetadataBlock>();
  // Slot 0 stays empty so that every real offset is non-zero.
  private readonly pool: string[] = [''];

  defineRecord(name: string, fields: readonly string[]): bigint {
    const hash = this.claim(name);
    this.blocks.set(hash, {
      kind: 'record',
      typeHash: hash,
      name,
      arity: fields.length,
      fieldOffset: this.intern(fields),
    });
    return hash;
  }

  defineEnum(name: string, variants: readonly VariantDefinition[]): bigint {
    const hash = this.claim(name);
    const metadata = variants.map((variant, id): VariantMetadata => {
      if ('fields' in variant) {
        return {
          id,
          name: variant.name,
          arity: variant.fields.length,
          recordFieldOffset: variant.fields.length > 0 ? this.intern(variant.fields) : 0,
        };
      }
      return { id, name: variant.name, arity: variant.arity ?? 0, recordFieldOffset: 0 };
    });

    this.blocks.set(hash, { kind: 'enum', typeHash: hash, name, variants: metadata });
    return hash;
  }

  build(bucketCount = DEFAULT_BUCKET_COUNT): BucketedTypeTable {
    return new BucketedTypeTable([...this.blocks.values()], [...this.pool], bucketCount);
  }

  private claim(name: string): bigint {
    const hash = typeHash(name);
    if (this.blocks.has(hash)) {
      throw new Error(`Type "${name}" is already defined.`);
    }
    return hash;
  }

  private intern(names: readonly string[]): number {
    const offset = this.pool.length;
    this.pool.push(...names);
    return offset;
  }
}
