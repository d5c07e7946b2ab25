import stripAnsi from 'strip-ansi';
import { test } from 'vitest';
import assert from 'node:assert/strict';

import { encodeImmediate } from '../../src/domain/value-word.js';
import { HeapBuilder } from '../../src/memory/heap-builder.js';
import { RenderBuffer } from '../../src/rendering/render-buffer.js';
import { renderValue } from '../../src/rendering/renderer.js';
import { ANSI_RESET, createTheme, toAnsiForeground } from '../../src/rendering/theme.js';
import { resolvePrintSettings } from '../../src/settings/print-settings.js';

const NUMBER = '\u001B[38;2;181;206;168m';
const BRACKET = '\u001B[38;2;255;215;0m';
const PUNCTUATION = '\u001B[38;2;212;212;212m';

test('toAnsiForeground converts CSS colours to 24-bit escapes', () => {
  assert.equal(toAnsiForeground('#b5cea8'), NUMBER);
  assert.equal(toAnsiForeground('rgb(1, 2, 3)'), '\u001B[38;2;1;2;3m');
  assert.throws(() => toAnsiForeground('not-a-colour'), /Invalid theme colour/);
});

test('createTheme applies overrides and cycles the rainbow palette', () => {
  const theme = createTheme({ colors: { number: '#010203' }, rainbow: ['#ff0000', '#00ff00'] });
  assert.equal(theme.color('number'), '\u001B[38;2;1;2;3m');
  assert.equal(theme.color('bracket'), BRACKET);
  assert.equal(theme.rainbow(2), '\u001B[38;2;255;0;0m');
  assert.throws(() => createTheme({ rainbow: [] }), /at least one colour/);
});

test('RenderBuffer only writes an escape when the colour changes', () => {
  const buffer = new RenderBuffer(true);
  buffer.write('a', NUMBER);
  buffer.write('b', NUMBER);
  buffer.write(' ');
  buffer.write('c', BRACKET);

  assert.equal(buffer.finish(), `${NUMBER}ab ${BRACKET}c${ANSI_RESET}`);
  assert.equal(buffer.width, 4);
});

test('coloured renders end with a reset', () => {
  const heap = new HeapBuilder().build();
  const settings = resolvePrintSettings();

  assert.equal(renderValue(encodeImmediate(42), { heap, settings }), `${NUMBER}42${ANSI_RESET}`);
});

test('adjacent tokens of one colour share a single escape', () => {
  const builder = new HeapBuilder();
  const pair = builder.list([encodeImmediate(1), encodeImmediate(2)]);
  const nested = builder.list([builder.list([])]);
  const heap = builder.build();
  const settings = resolvePrintSettings();

  assert.equal(
    renderValue(pair, { heap, settings }),
    `${BRACKET}[${NUMBER}1${PUNCTUATION}, ${NUMBER}2${BRACKET}]${ANSI_RESET}`,
  );
  assert.equal(renderValue(nested, { heap, settings }), `${BRACKET}[[]]${ANSI_RESET}`);
});

test('rainbow brackets advance one palette slot per level', () => {
  const red = '\u001B[38;2;255;0;0m';
  const green = '\u001B[38;2;0;255;0m';
  const builder = new HeapBuilder();
  const value = builder.list([builder.list([builder.list([])])]);
  const heap = builder.build();
  const theme = createTheme({ rainbow: ['#ff0000', '#00ff00'] });

  const text = renderValue(value, {
    heap,
    theme,
    settings: resolvePrintSettings({ rainbowBracket: true }),
  });

  assert.equal(text, `${red}[${green}[${red}[]${green}]${red}]${ANSI_RESET}`);
  assert.equal(stripAnsi(text), '[[[]]]');
});

test('colourless renders contain no escapes', () => {
  const builder = new HeapBuilder();
  const value = builder.list([encodeImmediate(1)]);
  const heap = builder.build();

  assert.equal(
    renderValue(value, { heap, settings: resolvePrintSettings({ colored: false }) }),
    '[1]',
  );
});
