import {
  variantInfo,
  type BucketedTypeTable,
  type EnumMetadataBlock,
  type RecordMetadataBlock,
} from '@valscope/printer';

export interface TypeTableCase {
  readonly name: string;
  readonly arity: number;
  /** Present when the case carries named fields. */
  readonly fields?: readonly string[];
}

export type TypeTableEntry =
  | {
      readonly bucket: number;
      readonly kind: 'record';
      readonly name: string;
      readonly fields: readonly string[];
    }
  | {
      readonly bucket: number;
      readonly kind: 'enum';
      readonly name: string;
      readonly cases: readonly TypeTableCase[];
    };

/** The type table in bucket order, as plain data. */
export const describeTypeTable = (table: BucketedTypeTable): TypeTableEntry[] =>
  table.entries().map((block): TypeTableEntry => {
    const bucket = table.bucketIndex(block.typeHash);
    return block.kind === 'record'
      ? { bucket, kind: 'record', name: block.name, fields: recordFields(table, block) }
      : { bucket, kind: 'enum', name: block.name, cases: enumCases(table, block) };
  });

/**
 * One line per type, in bucket order:
 * `bucket 3: enum geo.Shape = Dot | Circle(1) | Rect { w, h }`.
 */
export const formatTypeTable = (table: BucketedTypeTable): string[] =>
  describeTypeTable(table).map((entry) => {
    const description =
      entry.kind === 'record'
        ? `record ${entry.name} ${fieldList(entry.fields)}`
        : `enum ${entry.name} = ${entry.cases.map(describeCase).join(' | ')}`;
    return `bucket ${String(entry.bucket)}: ${description}`;
  });

const fieldList = (names: readonly string[]): string =>
  names.length === 0 ? '{ }' : `{ ${names.join(', ')} }`;

const describeCase = (entry: TypeTableCase): string => {
  if (entry.fields) {
    return `${entry.name} ${fieldList(entry.fields)}`;
  }
  return entry.arity === 0 ? entry.name : `${entry.name}(${String(entry.arity)})`;
};

const recordFields = (table: BucketedTypeTable, block: RecordMetadataBlock): readonly string[] =>
  table.names(block.fieldOffset, block.arity) ?? [];

const enumCases = (table: BucketedTypeTable, block: EnumMetadataBlock): TypeTableCase[] =>
  block.variants.map((variant) => {
    const fields = variantInfo(table, block, variant.id)?.fields;
    return fields
      ? { name: variant.name, arity: variant.arity, fields }
      : { name: variant.name, arity: variant.arity };
  });
