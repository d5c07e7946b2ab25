import { z } from 'zod';

type SnapshotFields = Readonly<Record<string, SnapshotValue>>;

/**
 * JSON form of a runtime value. Plain JSON scalars cover the common cases;
 * single-key objects name every other kind.
 */
export type SnapshotValue =
  | number
  | string
  | boolean
  | null
  | { readonly char: string }
  | { readonly int8: number }
  | { readonly int16: number }
  | { readonly uint8: number }
  | { readonly uint16: number }
  | { readonly int32: number }
  | { readonly uint32: number }
  | { readonly float32: number }
  | { readonly float64: number }
  | { readonly int64: string }
  | { readonly uint64: string }
  | { readonly bigint: string }
  | { readonly rational: readonly [string | number, string | number] }
  | { readonly bytes: string }
  | { readonly tuple: readonly SnapshotValue[] }
  | { readonly array: readonly SnapshotValue[] }
  | { readonly list: readonly SnapshotValue[] }
  | { readonly record: string; readonly fields: SnapshotFields }
  | {
      readonly variant: string;
      readonly case: string;
      readonly values?: readonly SnapshotValue[] | undefined;
      readonly fields?: SnapshotFields | undefined;
    }
  | { readonly some: SnapshotValue }
  | { readonly none: true }
  | { readonly ok: SnapshotValue }
  | { readonly err: SnapshotValue }
  | { readonly lambda: true }
  | { readonly word: string };

const integerText = z.string().regex(/^-?\d+$/, 'Expected a decimal integer string.');
const typeName = z.string().min(1);
const fieldName = z.string().min(1);

export const snapshotValueSchema: z.ZodType<SnapshotValue> = z.lazy(() =>
  z.union([
    z.number(),
    z.string(),
    z.boolean(),
    z.null(),
    z.object({ char: z.string().min(1) }).strict(),
    z.object({ int8: z.number().int().min(-128).max(127) }).strict(),
    z.object({ int16: z.number().int().min(-32_768).max(32_767) }).strict(),
    z.object({ uint8: z.number().int().min(0).max(255) }).strict(),
    z.object({ uint16: z.number().int().min(0).max(65_535) }).strict(),
    z.object({ int32: z.number().int().min(-2_147_483_648).max(2_147_483_647) }).strict(),
    z.object({ uint32: z.number().int().min(0).max(4_294_967_295) }).strict(),
    z.object({ float32: z.number() }).strict(),
    z.object({ float64: z.number() }).strict(),
    z.object({ int64: integerText }).strict(),
    z.object({ uint64: integerText }).strict(),
    z.object({ bigint: integerText }).strict(),
    z
      .object({ rational: z.tuple([integerText.or(z.number().int()), integerText.or(z.number().int())]) })
      .strict(),
    z.object({ bytes: z.string() }).strict(),
    z.object({ tuple: z.array(snapshotValueSchema) }).strict(),
    z.object({ array: z.array(snapshotValueSchema) }).strict(),
    z.object({ list: z.array(snapshotValueSchema) }).strict(),
    z.object({ record: typeName, fields: z.record(z.string(), snapshotValueSchema) }).strict(),
    z
      .object({
        variant: typeName,
        case: z.string().min(1),
        values: z.array(snapshotValueSchema).optional(),
        fields: z.record(z.string(), snapshotValueSchema).optional(),
      })
      .strict(),
    z.object({ some: snapshotValueSchema }).strict(),
    z.object({ none: z.literal(true) }).strict(),
    z.object({ ok: snapshotValueSchema }).strict(),
    z.object({ err: snapshotValueSchema }).strict(),
    z.object({ lambda: z.literal(true) }).strict(),
    z.object({ word: z.string().regex(/^(?:0x)?[0-9a-fA-F]{1,16}$/, 'Expected up to 16 hex digits.') }).strict(),
  ]),
);

const variantDefinitionSchema = z.union([
  z.object({ name: z.string().min(1), fields: z.array(fieldName) }).strict(),
  z.object({ name: z.string().min(1), arity: z.number().int().nonnegative().optional() }).strict(),
]);

export const typeDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('record'), name: typeName, fields: z.array(fieldName) }).strict(),
  z
    .object({ kind: z.literal('enum'), name: typeName, variants: z.array(variantDefinitionSchema).min(1) })
    .strict(),
]);

export const snapshotDocumentSchema = z
  .object({
    bucketCount: z.number().int().positive().optional(),
    types: z.array(typeDefinitionSchema).default([]),
    value: snapshotValueSchema,
  })
  .strict();

export type TypeDefinition = z.infer<typeof typeDefinitionSchema>;
export type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>;
