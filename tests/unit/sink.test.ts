import { describe, expect, it } from 'vitest';

import { colorSequence, detectColors, RESET, StreamSink, StringSink } from '../../src/core/sink.js';

describe('colorSequence', () => {
  it('emits bold and plain ANSI colour codes', () => {
    expect(colorSequence('red', true)).toBe('\x1b[0;1;31m');
    expect(colorSequence('blue')).toBe('\x1b[0;34m');
    expect(colorSequence('savedColor', true)).toBe('\x1b[1m');
    expect(colorSequence('savedColor')).toBe('');
    expect(RESET).toBe('\x1b[0m');
  });
});

describe('detectColors', () => {
  it('follows NO_COLOR, then FORCE_COLOR, then the TTY flag', () => {
    expect(detectColors({ write: () => true, isTTY: true }, {})).toBe(true);
    expect(detectColors({ write: () => true }, {})).toBe(false);
    expect(detectColors({ write: () => true, isTTY: true }, { NO_COLOR: '1' })).toBe(false);
    expect(detectColors({ write: () => true }, { FORCE_COLOR: '1' })).toBe(true);
    expect(detectColors({ write: () => true, isTTY: true }, { FORCE_COLOR: '0' })).toBe(false);
  });
});

describe('sinks', () => {
  it('StringSink only writes colour codes when colours are on', () => {
    const plain = new StringSink();
    plain.changeColor('green', true);
    plain.write('x');
    plain.resetColor();
    expect(plain.text).toBe('x');

    const colored = new StringSink({ colors: true });
    colored.changeColor('green', true);
    colored.write('x');
    colored.resetColor();
    expect(colored.text).toBe('\x1b[0;1;32mx\x1b[0m');
  });

  it('StreamSink forwards writes to the stream', () => {
    const chunks: string[] = [];
    const sink = new StreamSink({ write: (chunk: string) => chunks.push(chunk) }, { colors: false });
    sink.write('hello ');
    sink.changeColor('red');
    sink.write('world');
    expect(chunks).toEqual(['hello ', 'world']);
    expect(sink.hasColors()).toBe(false);
  });
});
