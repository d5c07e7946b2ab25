const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['\b', '\\b'],
  ['\f', '\\f'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
  ['\v', '\\v'],
  ['\\', '\\\\'],
]);

/**
 * Escapes control characters, backslashes and the given quote, C-style.
 */
export function escapeText(text: string, quote: '"' | "'"): string {
  let escaped = '';
  for (const character of text) {
    if (character === quote) {
      escaped += `\\${quote}`;
      continue;
    }
    escaped += ESCAPES.get(character) ?? character;
  }
  return escaped;
}

export function quoteString(text: string): string {
  return `"${escapeText(text, '"')}"`;
}

export function quoteChar(character: string): string {
  return `'${escapeText(character, "'")}'`;
}
