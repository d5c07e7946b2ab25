export interface VariantMetadata {
  readonly id: number;
  readonly name: string;
  readonly arity: number;
  /**
   * Offset of the variant's field names in the name pool. Zero means the
   * payload is positional; anything else marks an inline record.
   */
  readonly recordFieldOffset: number;
}

export interface RecordMetadataBlock {
  readonly kind: 'record';
  readonly typeHash: bigint;
  readonly name: string;
  readonly arity: number;
  readonly fieldOffset: number;
}

export interface EnumMetadataBlock {
  readonly kind: 'enum';
  readonly typeHash: bigint;
  readonly name: string;
  readonly variants: readonly VariantMetadata[];
}

export type TypeMetadataBlock = RecordMetadataBlock | EnumMetadataBlock;

/**
 * Read-only lookup of type shapes by type hash. Shared by every render call;
 * nothing in the renderer mutates it.
 */
export interface TypeRegistry {
  readonly bucketCount: number;
  lookup(typeHash: bigint): TypeMetadataBlock | undefined;
  /** `count` names starting at `offset` in the name pool, or `undefined` if the pool is too short. */
  names(offset: number, count: number): readonly string[] | undefined;
}

export const DEFAULT_BUCKET_COUNT = 64;

/**
 * Hash-bucketed type table. A lookup picks the bucket `typeHash mod
 * bucketCount` and scans its entries for an exact hash match.
 */
export class BucketedTypeTable implements TypeRegistry {
  readonly bucketCount: number;
  private readonly buckets: readonly (readonly TypeMetadataBlock[])[];

  constructor(
    blocks: readonly TypeMetadataBlock[],
    private readonly namePool: readonly string[],
    bucketCount = DEFAULT_BUCKET_COUNT,
  ) {
    if (!Number.isInteger(bucketCount) || bucketCount < 1) {
      throw new RangeError(`Bucket count must be a positive integer, received ${String(bucketCount)}.`);
    }

    this.bucketCount = bucketCount;
    const buckets: TypeMetadataBlock[][] = Array.from({ length: bucketCount }, () => []);
    for (const block of blocks) {
      buckets[this.bucketIndex(block.typeHash)]?.push(block);
    }
    this.buckets = buckets;
  }

  bucketIndex(typeHash: bigint): number {
    return Number(typeHash % BigInt(this.bucketCount));
  }

  lookup(typeHash: bigint): TypeMetadataBlock | undefined {
    const bucket = this.buckets[this.bucketIndex(typeHash)] ?? [];
    for (const block of bucket) {
      if (block.typeHash === typeHash) {
        return block;
      }
    }
    return undefined;
  }

  names(offset: number, count: number): readonly string[] | undefined {
    if (offset < 1 || count < 0 || offset + count > this.namePool.length) {
      return undefined;
    }
    return this.namePool.slice(offset, offset + count);
  }

  /** Every block, bucket by bucket. */
  entries(): readonly TypeMetadataBlock[] {
    return this.buckets.flat();
  }
}

/** A registry that knows no types. Every record and variant renders as a placeholder. */
export const emptyTypeRegistry: TypeRegistry = {
  bucketCount: 1,
  lookup: () => undefined,
  names: () => undefined,
};
