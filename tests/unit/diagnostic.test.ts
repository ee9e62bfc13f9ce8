import { describe, expect, it } from 'vitest';

import { SourceBuffer } from '../../src/core/buffer.js';
import { compareFixIts, Diagnostic } from '../../src/core/diagnostic.js';
import { SourceRegistry } from '../../src/core/registry.js';
import { StringSink } from '../../src/core/sink.js';
import { insertAt, replaceWith } from '../../src/core/types.js';

describe('Diagnostic', () => {
  it('sorts fix-its by range start, then end, then text', () => {
    const d = new Diagnostic({
      loc: 3,
      filename: 'f.c',
      line: 1,
      column: 2,
      kind: 'error',
      message: 'm',
      lineContents: 'abcdef',
      fixIts: [
        replaceWith({ start: 5, end: 6 }, 'b'),
        replaceWith({ start: 2, end: 3 }, 'a'),
        insertAt(2, 'z'),
        insertAt(2, 'y'),
      ],
    });
    expect(d.fixIts.map(f => f.text)).toEqual(['y', 'z', 'a', 'b']);
  });

  it('compareFixIts orders equal fix-its as equal', () => {
    expect(compareFixIts(insertAt(4, 'x'), insertAt(4, 'x'))).toBe(0);
  });

  it('is frozen after construction', () => {
    const d = new Diagnostic({ filename: 'f', kind: 'note', message: 'n', ranges: [[1, 2]] });
    expect(Object.isFrozen(d)).toBe(true);
    expect(Object.isFrozen(d.ranges)).toBe(true);
    expect(Object.isFrozen(d.fixIts)).toBe(true);
  });

  it('keeps its own copy of the fix-its', () => {
    const fix = insertAt(4, 'x');
    const d = new Diagnostic({ filename: 'f', kind: 'note', message: 'n', fixIts: [fix] });
    fix.text = 'changed';
    fix.range.start = 1;
    expect(d.fixIts).toEqual([{ range: { start: 4, end: 4 }, text: 'x' }]);
    expect(d.fixIts[0]).not.toBe(fix);
    expect(Object.isFrozen(d.fixIts[0].range)).toBe(true);
  });

  it('defaults to no location', () => {
    const d = Diagnostic.withoutLocation('input.c', 'error', 'cannot open file');
    expect(d.hasLocation).toBe(false);
    expect([d.line, d.column, d.loc]).toEqual([-1, -1, 0]);
    expect(d.lineContents).toBe('');
  });

  it('serializes to JSON with 1-based columns', () => {
    const registry = new SourceRegistry({ sink: new StringSink() });
    const id = registry.addBuffer(SourceBuffer.fromText('int x = 1\n', 'j.c'));
    const d = registry.buildDiagnostic(registry.locAt(id, 9), 'error', "expected ';'", [], [insertAt(registry.locAt(id, 9), ';')]);
    expect(d.toJSON()).toEqual({
      kind: 'error',
      file: 'j.c',
      line: 1,
      column: 10,
      message: "expected ';'",
      source: 'int x = 1',
      ranges: [],
      fixIts: [{ start: 9, end: 9, text: ';' }],
    });
    expect(Diagnostic.withoutLocation('k.c', 'note', 'n').toJSON()).toEqual({
      kind: 'note',
      file: 'k.c',
      line: -1,
      column: -1,
      message: 'n',
      ranges: [],
      fixIts: [],
    });
  });
});
