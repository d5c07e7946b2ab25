import { noopLogger, type StructuredLogger } from '@valscope/core/logging';

import { ListVariant, isListType } from '../domain/builtin-types.js';
import { readHeapObject, type BoxedNumber, type HeapObject } from '../domain/heap-object.js';
import { classifyWord, type ShortInlineType, type ValueWord } from '../domain/value-word.js';
import type { HeapView } from '../memory/heap-view.js';
import { emptyTypeRegistry, type TypeRegistry } from '../metadata/type-registry.js';
import { resolveRecordFields, resolveVariant } from '../metadata/type-resolver.js';
import {
  defaultPrintSettings,
  wrapThreshold,
  type PrintSettings,
  type WrapKind,
} from '../settings/print-settings.js';
import { quoteChar, quoteString } from './escape.js';
import { measureWidth } from './measure.js';
import {
  formatBigInt,
  formatFloat,
  formatFloat32,
  formatInteger,
  numericSuffix,
  type SizedNumericType,
} from './numeric-text.js';
import { RenderBuffer } from './render-buffer.js';
import { createTheme, type Theme, type ThemeCategory } from './theme.js';

export const Placeholder = {
  item: '<item>',
  unknownValue: '<unknown value>',
  unknownHeapValue: '<unknown heap value>',
  unknownConstant: '<unknown constant>',
  unknownShort: '<unknown short value>',
  unknownNumber: '<unknown number>',
  recordValue: '<record value>',
  enumValue: '<enum value>',
} as const;

export type PlaceholderText = (typeof Placeholder)[keyof typeof Placeholder];

/** Which step failed to identify a value that rendered as a placeholder. */
export type PlaceholderStage = 'tag-decoder' | 'heap-dispatcher' | 'metadata-resolver' | 'depth-limit';

export const LAMBDA_TEXT = '<lambda>';

export interface ValueRendererOptions {
  readonly heap: HeapView;
  readonly registry?: TypeRegistry;
  /** Receives a `render.placeholder` debug event for each placeholder written. */
  readonly logger?: StructuredLogger;
  readonly theme?: Theme;
}

export interface ValueRenderer {
  render(value: ValueWord, settings?: PrintSettings): string;
}

interface Frame {
  readonly depth: number;
  readonly bracketIndex: number;
  /** Set while measuring; nothing is logged from a dry run. */
  readonly dryRun: boolean;
}

type DrawElement = (buffer: RenderBuffer, frame: Frame) => void;

interface ContainerHead {
  readonly text: string;
  readonly category: ThemeCategory;
  readonly gap: string;
}

interface ContainerLayout {
  readonly head?: ContainerHead;
  readonly open: string;
  readonly close: string;
  /** Space kept inside the brackets on a single line, as in `{ a: 1 }`. */
  readonly padding: string;
  readonly elements: readonly DrawElement[];
  /** Threshold used for the split decision; `undefined` never splits. */
  readonly wrap: WrapKind | undefined;
}

const LOGGER_NAME = 'valscope-printer';

export function createValueRenderer(options: ValueRendererOptions): ValueRenderer {
  const registry = options.registry ?? emptyTypeRegistry;
  const logger = options.logger ?? noopLogger;
  const theme = options.theme ?? createTheme();

  return {
    render(value, settings = defaultPrintSettings) {
      const buffer = new RenderBuffer(settings.colored);
      const pass = new RenderPass(options.heap, registry, theme, settings, logger);
      pass.value(buffer, value, { depth: 0, bracketIndex: 0, dryRun: false });
      return buffer.finish();
    },
  };
}

/**
 * Renders a single value without keeping the renderer around.
 */
export function renderValue(
  value: ValueWord,
  options: ValueRendererOptions & { readonly settings?: PrintSettings },
): string {
  return createValueRenderer(options).render(value, options.settings);
}

class RenderPass {
  /** Colourless widths of heap objects drawn in dry runs, by address, depth and bracket. */
  private readonly measuredWidths = new Map<string, number>();

  constructor(
    private readonly heap: HeapView,
    private readonly registry: TypeRegistry,
    private readonly theme: Theme,
    private readonly settings: PrintSettings,
    private readonly logger: StructuredLogger,
  ) {}

  value(buffer: RenderBuffer, word: ValueWord, frame: Frame): void {
    if (frame.depth > this.settings.maxDepth) {
      this.placeholder(buffer, Placeholder.item, 'depth-limit', frame);
      return;
    }

    const kind = classifyWord(word);
    switch (kind.kind) {
      case 'immediate-number': {
        buffer.write(formatInteger(kind.value, this.settings.radix), this.theme.color('number'));
        return;
      }
      case 'constant': {
        buffer.write(kind.name, this.theme.color(kind.name));
        return;
      }
      case 'short-inline': {
        this.shortInline(buffer, kind.type, kind.value, frame);
        return;
      }
      case 'heap-pointer': {
        if (frame.dryRun) {
          this.measuredHeapObject(buffer, kind.address, frame);
        } else {
          this.heapObject(buffer, kind.address, frame);
        }
        return;
      }
      case 'unknown-constant': {
        this.placeholder(buffer, Placeholder.unknownConstant, 'tag-decoder', frame);
        return;
      }
      case 'unknown-short': {
        this.placeholder(buffer, Placeholder.unknownShort, 'tag-decoder', frame);
        return;
      }
      case 'unknown': {
        this.placeholder(buffer, Placeholder.unknownValue, 'tag-decoder', frame);
        return;
      }
    }
  }

  private shortInline(
    buffer: RenderBuffer,
    type: ShortInlineType,
    value: number,
    frame: Frame,
  ): void {
    if (type === 'char') {
      const character = String.fromCodePoint(value);
      buffer.write(frame.depth === 0 ? character : quoteChar(character), this.theme.color('char'));
      return;
    }
    this.sizedInteger(buffer, value, type);
  }

  private measuredHeapObject(buffer: RenderBuffer, address: number, frame: Frame): void {
    const key = `${address}:${frame.depth}:${frame.bracketIndex}`;
    const known = this.measuredWidths.get(key);
    if (known !== undefined) {
      buffer.advance(known);
      return;
    }
    const start = buffer.width;
    this.heapObject(buffer, address, frame);
    this.measuredWidths.set(key, buffer.width - start);
  }

  private heapObject(buffer: RenderBuffer, address: number, frame: Frame): void {
    const object = readHeapObject(this.heap, address);
    if (!object) {
      this.placeholder(buffer, Placeholder.unknownHeapValue, 'heap-dispatcher', frame);
      return;
    }

    switch (object.type) {
      case 'string': {
        const text = frame.depth === 0 ? object.text : quoteString(object.text);
        buffer.write(text, this.theme.color('string'));
        return;
      }
      case 'bytes': {
        buffer.write(this.bytesText(object.bytes), this.theme.color('bytes'));
        return;
      }
      case 'tuple': {
        this.tuple(buffer, object.elements, frame);
        return;
      }
      case 'array': {
        this.container(buffer, frame, {
          open: '[>',
          close: ']',
          padding: '',
          elements: object.elements.map((word) => this.element(word)),
          wrap: 'array',
        });
        return;
      }
      case 'record': {
        this.record(buffer, object.typeHash, object.fields, frame);
        return;
      }
      case 'variant': {
        if (isListType(object.typeHash)) {
          this.list(buffer, address, object, frame);
        } else {
          this.variant(buffer, object.typeHash, object.variantId, object.fields, frame);
        }
        return;
      }
      case 'number': {
        this.boxedNumber(buffer, object.number, frame);
        return;
      }
      case 'unknown-number': {
        this.placeholder(buffer, Placeholder.unknownNumber, 'heap-dispatcher', frame);
        return;
      }
      case 'function': {
        buffer.write(LAMBDA_TEXT, this.theme.color('lambda'));
        return;
      }
    }
  }

  private tuple(buffer: RenderBuffer, elements: readonly ValueWord[], frame: Frame): void {
    const drawn = elements.map((word) => this.element(word));
    if (drawn.length === 1) {
      this.container(buffer, frame, {
        head: { text: 'box', category: 'box', gap: '' },
        open: '(',
        close: ')',
        padding: '',
        elements: drawn,
        wrap: undefined,
      });
      return;
    }
    this.container(buffer, frame, {
      open: '(',
      close: ')',
      padding: '',
      elements: drawn,
      wrap: 'tuple',
    });
  }

  private record(
    buffer: RenderBuffer,
    typeHash: bigint,
    fields: readonly ValueWord[],
    frame: Frame,
  ): void {
    const names = resolveRecordFields(this.registry, typeHash, fields.length);
    if (!names) {
      this.placeholder(buffer, Placeholder.recordValue, 'metadata-resolver', frame);
      return;
    }
    this.container(buffer, frame, {
      open: '{',
      close: '}',
      padding: ' ',
      elements: this.keyedElements(names, fields),
      wrap: 'record',
    });
  }

  private variant(
    buffer: RenderBuffer,
    typeHash: bigint,
    variantId: number,
    fields: readonly ValueWord[],
    frame: Frame,
  ): void {
    const resolved = resolveVariant(this.registry, typeHash, variantId);
    if (!resolved || resolved.arity !== fields.length) {
      this.placeholder(buffer, Placeholder.enumValue, 'metadata-resolver', frame);
      return;
    }

    if (fields.length === 0) {
      buffer.write(resolved.name, this.theme.color('sumType'));
      return;
    }

    if (resolved.fields) {
      this.container(buffer, frame, {
        head: { text: resolved.name, category: 'sumType', gap: ' ' },
        open: '{',
        close: '}',
        padding: ' ',
        elements: this.keyedElements(resolved.fields, fields),
        wrap: 'record',
      });
      return;
    }

    this.container(buffer, frame, {
      head: { text: resolved.name, category: 'sumType', gap: '' },
      open: '(',
      close: ')',
      padding: '',
      elements: fields.map((word) => this.element(word)),
      wrap: 'tuple',
    });
  }

  /**
   * Walks cons cells from `first`. A tail that is not a list cell, or that
   * points back at a cell already walked, ends the list with an unknown-value
   * element.
   */
  private list(buffer: RenderBuffer, address: number, first: HeapObject, frame: Frame): void {
    const elements: DrawElement[] = [];
    const visited = new Set<number>([address]);
    let cell: HeapObject | undefined = first;

    for (;;) {
      if (cell?.type === 'variant' && isListType(cell.typeHash)) {
        if (cell.variantId === ListVariant.empty && cell.fields.length === 0) {
          break;
        }
        const [head, tail] = cell.fields;
        if (
          cell.variantId === ListVariant.more &&
          cell.fields.length === 2 &&
          head !== undefined &&
          tail !== undefined
        ) {
          elements.push(this.element(head));
          cell = this.listCell(tail, visited);
          continue;
        }
      }
      elements.push((target, inner) => {
        this.placeholder(target, Placeholder.unknownValue, 'heap-dispatcher', inner);
      });
      break;
    }

    this.container(buffer, frame, {
      open: '[',
      close: ']',
      padding: '',
      elements,
      wrap: 'list',
    });
  }

  private listCell(word: ValueWord, visited: Set<number>): HeapObject | undefined {
    const kind = classifyWord(word);
    if (kind.kind !== 'heap-pointer' || visited.has(kind.address)) {
      return undefined;
    }
    visited.add(kind.address);
    return readHeapObject(this.heap, kind.address);
  }

  private boxedNumber(buffer: RenderBuffer, number: BoxedNumber, frame: Frame): void {
    switch (number.subtype) {
      case 'int32':
      case 'uint32':
      case 'int64':
      case 'uint64': {
        this.sizedInteger(buffer, number.value, number.subtype);
        return;
      }
      case 'float32': {
        buffer.write(
          `${formatFloat32(number.value)}${this.suffix('float32')}`,
          this.theme.color('number'),
        );
        return;
      }
      case 'float64': {
        buffer.write(formatFloat(number.value), this.theme.color('number'));
        return;
      }
      case 'bigint': {
        buffer.write(formatBigInt(number.value), this.theme.color('number'));
        return;
      }
      case 'rational': {
        const numerator = this.rationalPart(number.numerator);
        const denominator = this.rationalPart(number.denominator);
        if (numerator === undefined || denominator === undefined) {
          this.placeholder(buffer, Placeholder.unknownNumber, 'heap-dispatcher', frame);
          return;
        }
        buffer.write(
          `${formatBigInt(numerator)}/${formatBigInt(denominator)}`,
          this.theme.color('number'),
        );
        return;
      }
    }
  }

  /** A rational's parts are immediate numbers or boxed big integers. */
  private rationalPart(word: ValueWord): bigint | undefined {
    const kind = classifyWord(word);
    if (kind.kind === 'immediate-number') {
      return kind.value;
    }
    if (kind.kind !== 'heap-pointer') {
      return undefined;
    }
    const object = readHeapObject(this.heap, kind.address);
    return object?.type === 'number' && object.number.subtype === 'bigint'
      ? object.number.value
      : undefined;
  }

  private sizedInteger(
    buffer: RenderBuffer,
    value: bigint | number,
    type: SizedNumericType,
  ): void {
    buffer.write(
      `${formatInteger(value, this.settings.radix)}${this.suffix(type)}`,
      this.theme.color('number'),
    );
  }

  private suffix(type: SizedNumericType): string {
    return this.settings.printSuffix ? numericSuffix(type) : '';
  }

  private bytesText(bytes: Uint8Array): string {
    const limit = Math.max(0, this.settings.byteLimit);
    const groups = [...bytes.subarray(0, limit)].map((byte) => byte.toString(16).padStart(2, '0'));
    const shown = groups.length > 0 ? ` ${groups.join(' ')}` : '';
    const truncated = bytes.length > limit ? ' ...' : '';
    return `<bytes:${shown}${truncated}>`;
  }

  private element(word: ValueWord): DrawElement {
    return (buffer, frame) => {
      this.value(buffer, word, frame);
    };
  }

  private keyedElements(
    names: readonly string[],
    fields: readonly ValueWord[],
  ): DrawElement[] {
    return fields.map((word, index) => (buffer: RenderBuffer, frame: Frame) => {
      buffer.write(names[index] ?? '', this.theme.color('recordKey'));
      buffer.write(': ', this.theme.color('default'));
      this.value(buffer, word, frame);
    });
  }

  private container(buffer: RenderBuffer, frame: Frame, layout: ContainerLayout): void {
    if (this.shouldSplit(layout, frame)) {
      this.drawSplit(buffer, layout, frame);
    } else {
      this.drawInline(buffer, layout, frame);
    }
  }

  private shouldSplit(layout: ContainerLayout, frame: Frame): boolean {
    if (layout.wrap === undefined || layout.elements.length === 0) {
      return false;
    }
    if (this.settings.forceNewLine) {
      return true;
    }
    const threshold = wrapThreshold(this.settings, layout.wrap);
    if (threshold === undefined) {
      return false;
    }
    const width = measureWidth((scratch) => {
      this.drawInline(scratch, layout, { ...frame, dryRun: true });
    });
    return width >= threshold;
  }

  private drawInline(buffer: RenderBuffer, layout: ContainerLayout, frame: Frame): void {
    const bracket = this.bracketColor(frame);
    const inner = this.childFrame(frame);

    this.drawHead(buffer, layout);
    buffer.write(layout.open, bracket);
    buffer.write(layout.padding);
    layout.elements.forEach((draw, index) => {
      if (index > 0) {
        buffer.write(', ', this.theme.color('default'));
      }
      draw(buffer, inner);
    });
    if (layout.elements.length > 0) {
      buffer.write(layout.padding);
    }
    buffer.write(layout.close, bracket);
  }

  private drawSplit(buffer: RenderBuffer, layout: ContainerLayout, frame: Frame): void {
    const bracket = this.bracketColor(frame);
    const inner = this.childFrame(frame);
    const { indentAmount, newLineChar } = this.settings;
    const elementIndent = ' '.repeat(indentAmount * (frame.depth + 1));
    const closeIndent = ' '.repeat(indentAmount * frame.depth);

    this.drawHead(buffer, layout);
    buffer.write(layout.open, bracket);
    layout.elements.forEach((draw, index) => {
      buffer.write(`${newLineChar}${elementIndent}`);
      draw(buffer, inner);
      if (index < layout.elements.length - 1) {
        buffer.write(',', this.theme.color('default'));
      }
    });
    buffer.write(`${newLineChar}${closeIndent}`);
    buffer.write(layout.close, bracket);
  }

  private drawHead(buffer: RenderBuffer, layout: ContainerLayout): void {
    if (layout.head) {
      buffer.write(layout.head.text, this.theme.color(layout.head.category));
      buffer.write(layout.head.gap);
    }
  }

  private bracketColor(frame: Frame): string {
    return this.settings.rainbowBracket
      ? this.theme.rainbow(frame.bracketIndex)
      : this.theme.color('bracket');
  }

  private childFrame(frame: Frame): Frame {
    return { depth: frame.depth + 1, bracketIndex: frame.bracketIndex + 1, dryRun: frame.dryRun };
  }

  private placeholder(
    buffer: RenderBuffer,
    text: PlaceholderText,
    stage: PlaceholderStage,
    frame: Frame,
  ): void {
    buffer.write(text, this.theme.color('unknown'));
    if (!frame.dryRun) {
      this.logger.log({
        level: 'debug',
        name: LOGGER_NAME,
        event: 'render.placeholder',
        data: { placeholder: text, stage, depth: frame.depth },
      });
    }
  }
}
