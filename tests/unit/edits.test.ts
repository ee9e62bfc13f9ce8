import { describe, expect, it } from 'vitest';

import { SourceBuffer } from '../../src/core/buffer.js';
import { applyFixIts, groupFixIts } from '../../src/core/edits.js';
import { SourceRegistry } from '../../src/core/registry.js';
import { StringSink } from '../../src/core/sink.js';
import { insertAt, rangeOf, removeRange, replaceWith } from '../../src/core/types.js';

function setup(text = 'hello world\n') {
  const registry = new SourceRegistry({ sink: new StringSink() });
  const id = registry.addBuffer(SourceBuffer.fromText(text, 'e.txt'));
  const at = (offset: number) => registry.locAt(id, offset);
  return { registry, id, at };
}

describe('applyFixIts', () => {
  it('applies replacements and insertions', () => {
    const { registry, id, at } = setup();
    const out = applyFixIts(registry, id, [
      replaceWith({ start: at(0), end: at(5) }, 'HELLO'),
      insertAt(at(11), '!'),
    ]);
    expect(out).toBe('HELLO world!\n');
  });

  it('skips a fix-it that overlaps a later one', () => {
    const { registry, id, at } = setup();
    const out = applyFixIts(registry, id, [
      replaceWith({ start: at(0), end: at(5) }, 'A'),
      replaceWith({ start: at(3), end: at(8) }, 'B'),
    ]);
    expect(out).toBe('helBrld\n');
  });

  it('keeps insertions at the same offset in the order given', () => {
    const { registry, id, at } = setup();
    expect(applyFixIts(registry, id, [insertAt(at(5), 'X'), insertAt(at(5), 'Y')])).toBe('helloXY world\n');
  });

  it('removes ranges built with rangeOf', () => {
    const { registry, id, at } = setup();
    expect(rangeOf(at(5))).toEqual({ start: 6, end: 6 });
    expect(applyFixIts(registry, id, [removeRange(rangeOf(at(5), at(11)))])).toBe('hello\n');
  });

  it('handles multi-byte text around edits', () => {
    const { registry, id, at } = setup('é=1\n');
    // 'é' is two bytes, so '=' sits at offset 2
    expect(applyFixIts(registry, id, [replaceWith({ start: at(2), end: at(3) }, ' := ')])).toBe('é := 1\n');
  });

  it('ignores fix-its outside the buffer', () => {
    const { registry, id } = setup();
    const other = registry.addBuffer(SourceBuffer.fromText('zz', 'o.txt'));
    expect(applyFixIts(registry, id, [insertAt(registry.locAt(other, 0), 'nope')])).toBe('hello world\n');
  });
});

describe('groupFixIts', () => {
  it('groups by owning buffer and drops unresolvable fix-its', () => {
    const { registry, id, at } = setup();
    const other = registry.addBuffer(SourceBuffer.fromText('zz', 'o.txt'));
    const first = insertAt(at(1), 'a');
    const second = insertAt(registry.locAt(other, 1), 'b');
    const third = insertAt(at(4), 'c');
    const groups = groupFixIts(registry, [first, second, third, insertAt(0, 'x'), insertAt(999, 'y')]);
    expect([...groups.keys()]).toEqual([id, other]);
    expect(groups.get(id)).toEqual([first, third]);
    expect(groups.get(other)).toEqual([second]);
  });
});
