import { RenderBuffer } from './render-buffer.js';

/**
 * Runs `draw` against a throwaway colourless buffer and returns the number of
 * characters it wrote.
 */
export function measureWidth(draw: (buffer: RenderBuffer) => void): number {
  const buffer = new RenderBuffer(false);
  draw(buffer);
  return buffer.width;
}
