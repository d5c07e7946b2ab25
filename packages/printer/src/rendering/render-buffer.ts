import { ANSI_RESET } from './theme.js';

/**
 * Accumulates rendered text. When colour is on, an escape is written only when
 * the requested colour differs from the last one written.
 */
export class RenderBuffer {
  private readonly parts: string[] = [];
  private currentColor: string | undefined;
  private textLength = 0;

  constructor(readonly colored: boolean) {}

  /** Number of code points written so far, escapes excluded. */
  get width(): number {
    return this.textLength;
  }

  write(text: string, color?: string): void {
    if (text.length === 0) {
      return;
    }
    if (this.colored && color !== undefined && color !== this.currentColor) {
      this.parts.push(color);
      this.currentColor = color;
    }
    this.parts.push(text);
    this.textLength += [...text].length;
  }

  /** Counts `width` characters without keeping text. Only for measuring buffers. */
  advance(width: number): void {
    this.textLength += width;
  }

  toString(): string {
    return this.parts.join('');
  }

  /** Returns the text, with a trailing reset when colour is on. */
  finish(): string {
    return this.colored ? `${this.toString()}${ANSI_RESET}` : this.toString();
  }
}
