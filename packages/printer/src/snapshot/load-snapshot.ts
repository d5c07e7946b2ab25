import { readFile } from 'node:fs/promises';

import {
  VOID_WORD,
  encodeBoolean,
  encodeChar,
  encodeShortInline,
  type ValueWord,
} from '../domain/value-word.js';
import { HeapBuilder } from '../memory/heap-builder.js';
import type { HeapImage } from '../memory/heap-view.js';
import type { BucketedTypeTable } from '../metadata/type-registry.js';
import { TypeTableBuilder } from '../metadata/type-table-builder.js';
import {
  snapshotDocumentSchema,
  type SnapshotDocument,
  type SnapshotValue,
  type TypeDefinition,
} from './snapshot-schema.js';

export interface LoadedSnapshot {
  readonly heap: HeapImage;
  readonly registry: BucketedTypeTable;
  readonly root: ValueWord;
}

interface DefinedType {
  readonly hash: bigint;
  readonly definition: TypeDefinition;
}

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
const UINT64_MAX = (1n << 64n) - 1n;

const MISSING_VALUE_MESSAGE = 'a snapshot needs a "value" entry holding the value to render.';

/**
 * Validates a parsed JSON document against the snapshot schema.
 *
 * @param source - Label used in the error message, such as a file path.
 * @throws {Error} Listing every schema issue.
 */
export function parseSnapshot(document: unknown, source = 'snapshot'): SnapshotDocument {
  if (isPlainObject(document) && !('value' in document)) {
    throw new Error(`Invalid ${source}: value: ${MISSING_VALUE_MESSAGE}`);
  }
  const result = snapshotDocumentSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Lays the document's value out on a fresh heap and builds its type table.
 *
 * @throws {Error} When a value refers to an undefined type, case or field.
 */
export function buildSnapshot(document: SnapshotDocument): LoadedSnapshot {
  const types = new TypeTableBuilder();
  const defined = new Map<string, DefinedType>();

  for (const definition of document.types) {
    const hash =
      definition.kind === 'record'
        ? types.defineRecord(definition.name, definition.fields)
        : types.defineEnum(definition.name, definition.variants);
    defined.set(definition.name, { hash, definition });
  }

  const heap = new HeapBuilder();
  const root = new SnapshotMaterializer(heap, defined).value(document.value);

  return {
    heap: heap.build(),
    registry: types.build(document.bucketCount),
    root,
  };
}

/**
 * Reads, validates and materialises a snapshot file.
 */
export async function loadSnapshot(filePath: string): Promise<LoadedSnapshot> {
  const text = await readFile(filePath, 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new Error(`Snapshot ${filePath} is not valid JSON.`, { cause: error });
  }
  return buildSnapshot(parseSnapshot(document, `snapshot ${filePath}`));
}

class SnapshotMaterializer {
  constructor(
    private readonly heap: HeapBuilder,
    private readonly types: ReadonlyMap<string, DefinedType>,
  ) {}

  value(node: SnapshotValue): ValueWord {
    if (node === null) {
      return VOID_WORD;
    }
    if (typeof node === 'boolean') {
      return encodeBoolean(node);
    }
    if (typeof node === 'string') {
      return this.heap.string(node);
    }
    if (typeof node === 'number') {
      return Number.isInteger(node) ? this.heap.integer(BigInt(node)) : this.heap.float64(node);
    }

    if ('char' in node) {
      if ([...node.char].length !== 1) {
        throw new Error(`A char must hold exactly one character, received "${node.char}".`);
      }
      return encodeChar(node.char);
    }
    if ('int8' in node) {
      return encodeShortInline('int8', node.int8);
    }
    if ('int16' in node) {
      return encodeShortInline('int16', node.int16);
    }
    if ('uint8' in node) {
      return encodeShortInline('uint8', node.uint8);
    }
    if ('uint16' in node) {
      return encodeShortInline('uint16', node.uint16);
    }
    if ('int32' in node) {
      return this.heap.int32(node.int32);
    }
    if ('uint32' in node) {
      return this.heap.uint32(node.uint32);
    }
    if ('float32' in node) {
      return this.heap.float32(node.float32);
    }
    if ('float64' in node) {
      return this.heap.float64(node.float64);
    }
    if ('int64' in node) {
      return this.heap.int64(inRange(BigInt(node.int64), INT64_MIN, INT64_MAX, 'int64'));
    }
    if ('uint64' in node) {
      return this.heap.uint64(inRange(BigInt(node.uint64), 0n, UINT64_MAX, 'uint64'));
    }
    if ('bigint' in node) {
      return this.heap.bigint(BigInt(node.bigint));
    }
    if ('rational' in node) {
      const [numerator, denominator] = node.rational;
      const denominatorValue = BigInt(denominator);
      if (denominatorValue === 0n) {
        throw new Error('A rational must have a non-zero denominator.');
      }
      return this.heap.rational(BigInt(numerator), denominatorValue);
    }
    if ('bytes' in node) {
      return this.heap.bytesValue(parseHex(node.bytes));
    }
    if ('tuple' in node) {
      return this.heap.tuple(node.tuple.map((element) => this.value(element)));
    }
    if ('array' in node) {
      return this.heap.array(node.array.map((element) => this.value(element)));
    }
    if ('list' in node) {
      return this.heap.list(node.list.map((element) => this.value(element)));
    }
    if ('record' in node) {
      return this.record(node.record, node.fields);
    }
    if ('variant' in node) {
      return this.variant(node.variant, node.case, node.values, node.fields);
    }
    if ('some' in node) {
      return this.heap.some(this.value(node.some));
    }
    if ('none' in node) {
      return this.heap.none();
    }
    if ('ok' in node) {
      return this.heap.ok(this.value(node.ok));
    }
    if ('err' in node) {
      return this.heap.err(this.value(node.err));
    }
    if ('lambda' in node) {
      return this.heap.lambda();
    }
    return BigInt(node.word.startsWith('0x') ? node.word : `0x${node.word}`);
  }

  private record(name: string, fields: Readonly<Record<string, SnapshotValue>>): ValueWord {
    const type = this.types.get(name);
    if (type?.definition.kind !== 'record') {
      throw new Error(`Record type "${name}" is not defined.`);
    }
    return this.heap.record(type.hash, this.orderedFields(name, type.definition.fields, fields));
  }

  private variant(
    name: string,
    caseName: string,
    values: readonly SnapshotValue[] | undefined,
    fields: Readonly<Record<string, SnapshotValue>> | undefined,
  ): ValueWord {
    const type = this.types.get(name);
    if (type?.definition.kind !== 'enum') {
      throw new Error(`Enum type "${name}" is not defined.`);
    }

    const variantId = type.definition.variants.findIndex((variant) => variant.name === caseName);
    const variant = type.definition.variants[variantId];
    if (variant === undefined) {
      throw new Error(`Enum type "${name}" has no case "${caseName}".`);
    }

    const label = `${name}.${caseName}`;
    if ('fields' in variant) {
      if (values !== undefined) {
        throw new Error(`Case ${label} takes named fields, not positional values.`);
      }
      return this.heap.variant(
        type.hash,
        variantId,
        this.orderedFields(label, variant.fields, fields ?? {}),
      );
    }

    if (fields !== undefined) {
      throw new Error(`Case ${label} takes positional values, not named fields.`);
    }
    const payload = values ?? [];
    const arity = variant.arity ?? 0;
    if (payload.length !== arity) {
      throw new Error(
        `Case ${label} takes ${String(arity)} value(s), received ${String(payload.length)}.`,
      );
    }
    return this.heap.variant(
      type.hash,
      variantId,
      payload.map((element) => this.value(element)),
    );
  }

  private orderedFields(
    label: string,
    names: readonly string[],
    fields: Readonly<Record<string, SnapshotValue>>,
  ): ValueWord[] {
    const unexpected = Object.keys(fields).filter((key) => !names.includes(key));
    if (unexpected.length > 0) {
      throw new Error(`${label} has no field(s) ${unexpected.join(', ')}.`);
    }
    return names.map((fieldName) => {
      const field = fields[fieldName];
      if (field === undefined) {
        throw new Error(`${label} is missing field "${fieldName}".`);
      }
      return this.value(field);
    });
  }
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function inRange(value: bigint, min: bigint, max: bigint, type: string): bigint {
  if (value < min || value > max) {
    throw new RangeError(`${value.toString()} is out of range for ${type}.`);
  }
  return value;
}

/** Parses hex digits, ignoring whitespace: `"0a ff"`. */
export function parseHex(text: string): Uint8Array {
  const digits = text.replaceAll(/\s+/g, '');
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(digits)) {
    throw new Error(`Invalid byte string "${text}": expected pairs of hex digits.`);
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let index = 0; index < bytes.length; index += 1) {
    bytes[index] = Number.parseInt(digits.slice(index * 2, index * 2 + 2), 16);
  }
  return bytes;
}
