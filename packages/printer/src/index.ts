export { manifest } from './manifest.js';

export type {
  ConstantName,
  ShortInlineType,
  ValueKind,
  ValueWord,
} from './domain/value-word.js';
export {
  FALSE_WORD,
  IMMEDIATE_MAX,
  IMMEDIATE_MIN,
  TRUE_WORD,
  VOID_WORD,
  canEncodeImmediate,
  classifyWord,
  encodeBoolean,
  encodeChar,
  encodeImmediate,
  encodeShortInline,
} from './domain/value-word.js';
export { formatTypeHash, typeHash } from './domain/type-hash.js';
export {
  LIST_TYPE_HASH,
  LIST_TYPE_NAME,
  ListVariant,
  OPTION_TYPE_HASH,
  OPTION_TYPE_NAME,
  OptionVariant,
  RESULT_TYPE_HASH,
  RESULT_TYPE_NAME,
  ResultVariant,
  builtinVariant,
  isListType,
} from './domain/builtin-types.js';
export type { NumberSubtype, ObjectHeader, ObjectTagName } from './domain/heap-layout.js';
export {
  NumberSubtag,
  ObjectTag,
  WORD_SIZE,
  decodeHeader,
  encodeHeader,
} from './domain/heap-layout.js';
export type { BoxedNumber, HeapObject } from './domain/heap-object.js';
export { readHeapObject } from './domain/heap-object.js';

export type { HeapView } from './memory/heap-view.js';
export { HeapImage } from './memory/heap-view.js';
export { HeapBuilder } from './memory/heap-builder.js';

export type {
  EnumMetadataBlock,
  RecordMetadataBlock,
  TypeMetadataBlock,
  TypeRegistry,
  VariantMetadata,
} from './metadata/type-registry.js';
export {
  BucketedTypeTable,
  DEFAULT_BUCKET_COUNT,
  emptyTypeRegistry,
} from './metadata/type-registry.js';
export type { VariantDefinition } from './metadata/type-table-builder.js';
export { TypeTableBuilder } from './metadata/type-table-builder.js';
export type { ResolvedVariant } from './metadata/type-resolver.js';
export {
  fieldNames,
  findType,
  resolveRecordFields,
  resolveVariant,
  variantInfo,
} from './metadata/type-resolver.js';

export type {
  PrintSettings,
  PrintSettingsOverrides,
  Radix,
  WrapKind,
} from './settings/print-settings.js';
export {
  DEFAULT_WRAP_THRESHOLD,
  defaultPrintSettings,
  resolvePrintSettings,
  wrapThreshold,
} from './settings/print-settings.js';
export type { PrintSettingsInput } from './settings/settings-schema.js';
export { parsePrintSettings, printSettingsSchema } from './settings/settings-schema.js';
export type { LoadPrintConfigOptions, LoadedPrintConfig } from './settings/config-loader.js';
export { loadPrintConfig } from './settings/config-loader.js';

export type { Theme, ThemeCategory, ThemeDefinition, ThemeOverrides } from './rendering/theme.js';
export {
  ANSI_RESET,
  createTheme,
  defaultThemeDefinition,
  toAnsiForeground,
} from './rendering/theme.js';
export { RenderBuffer } from './rendering/render-buffer.js';
export { measureWidth } from './rendering/measure.js';
export { escapeText, quoteChar, quoteString } from './rendering/escape.js';
export type { SizedNumericType } from './rendering/numeric-text.js';
export {
  formatBigInt,
  formatFloat,
  formatFloat32,
  formatInteger,
  numericSuffix,
} from './rendering/numeric-text.js';
export type {
  PlaceholderStage,
  PlaceholderText,
  ValueRenderer,
  ValueRendererOptions,
} from './rendering/renderer.js';
export {
  LAMBDA_TEXT,
  Placeholder,
  createValueRenderer,
  renderValue,
} from './rendering/renderer.js';

export type { SnapshotValue, SnapshotDocument, TypeDefinition } from './snapshot/snapshot-schema.js';
export { snapshotDocumentSchema, snapshotValueSchema } from './snapshot/snapshot-schema.js';
export type { LoadedSnapshot } from './snapshot/load-snapshot.js';
export { buildSnapshot, loadSnapshot, parseHex, parseSnapshot } from './snapshot/load-snapshot.js';
