import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { checkFile } from '../../src/core/checker.js';
import type { Diagnostic } from '../../src/core/diagnostic.js';
import { applyFixIts } from '../../src/core/edits.js';
import { SourceRegistry } from '../../src/core/registry.js';
import { StringSink } from '../../src/core/sink.js';
import { NO_BUFFER } from '../../src/core/types.js';

let dir: string;

function write(name: string, text: string): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text);
  return file;
}

function setup() {
  const sink = new StringSink();
  return { sink, registry: new SourceRegistry({ sink }) };
}

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'srcloc-checker-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('checkFile', () => {
  it('reports a missing include with its name underlined', () => {
    const main = write('missing/main.c', 'int x;\n#include <missing.h>\n');
    const { sink, registry } = setup();
    const result = checkFile(registry, main);
    expect(result).toMatchObject({ file: main, bufferId: 1, errorCount: 1, warningCount: 0 });
    expect(sink.text).toBe(`${main}:2:10: error: 'missing.h' file not found\n#include <missing.h>\n         ^~~~~~~~~~\n`);
  });

  it('prints the include stack for errors in nested files', () => {
    const main = write('nested/main.c', '#include "a.h"\n');
    write('nested/a.h', 'int a;\n#include "gone.h"\n');
    const { sink, registry } = setup();
    const result = checkFile(registry, main);
    expect(result.errorCount).toBe(1);
    expect(sink.text).toBe(
      `Included from ${main}:1:\n` +
      `${path.join(dir, 'nested', 'a.h')}:2:10: error: 'gone.h' file not found\n` +
      '#include "gone.h"\n' +
      '         ^~~~~~~\n',
    );
  });

  it('resolves quoted includes beside the includer and angled ones on the search path', () => {
    const main = write('paths/src/main.c', '#include "local.h"\n#include <lib.h>\n');
    write('paths/src/local.h', 'int local;\n');
    write('paths/include/lib.h', '#include "detail.h"\n');
    write('paths/include/detail.h', 'int detail;\n');
    const { sink, registry } = setup();
    const result = checkFile(registry, main, { includeDirs: [path.join(dir, 'paths', 'include')] });
    expect(result.errorCount).toBe(0);
    expect(sink.text).toBe('');
    expect(registry.bufferCount).toBe(4);
    expect(registry.getBuffer(4).identifier).toBe(path.join(dir, 'paths', 'include', 'detail.h'));
  });

  it('prefers the includer directory over the working directory for quoted includes', () => {
    const main = write('shadow/src/main.c', '#include "local.h"\n');
    write('shadow/src/local.h', 'int local;\n');
    write('shadow/cwd/local.h', 'int decoy;\n');
    const { registry } = setup();
    const cwd = process.cwd();
    process.chdir(path.join(dir, 'shadow', 'cwd'));
    try {
      expect(checkFile(registry, main).errorCount).toBe(0);
    } finally {
      process.chdir(cwd);
    }
    expect(registry.getBuffer(2).identifier).toBe(path.join(dir, 'shadow', 'src', 'local.h'));
  });

  it('walks a header shared by two includers once', () => {
    const main = write('diamond/main.c', '#include "a.h"\n#include "b.h"\n');
    write('diamond/a.h', '#include "c.h"\n');
    write('diamond/b.h', '#include "c.h"\n');
    write('diamond/c.h', '#include "gone.h"\n');
    const { sink, registry } = setup();
    const result = checkFile(registry, main);
    expect(result.errorCount).toBe(1);
    expect(registry.bufferCount).toBe(5);
    expect(sink.text.split("'gone.h' file not found")).toHaveLength(2);
  });

  it('does not search the includer directory for angled includes', () => {
    const main = write('angled/main.c', '#include <here.h>\n');
    write('angled/here.h', '');
    const { registry } = setup();
    expect(checkFile(registry, main).errorCount).toBe(1);
  });

  it('reports recursive inclusion once and still registers the file', () => {
    const main = write('recursive/main.c', '#include "self.h"\n');
    write('recursive/self.h', '#include "self.h"\n');
    const { sink, registry } = setup();
    const result = checkFile(registry, main);
    expect(result.errorCount).toBe(1);
    expect(registry.bufferCount).toBe(3);
    expect(sink.text).toContain("error: recursive inclusion of 'self.h'\n");
  });

  it('warns about backslashes and suggests the forward-slash spelling', () => {
    const main = write('slashes/main.c', '#include "sub\\x.h"\n');
    write('slashes/sub/x.h', 'int x;\n');
    const { registry } = setup();
    const result = checkFile(registry, main);
    expect(result).toMatchObject({ errorCount: 0, warningCount: 1 });
    const fixIts = result.fixIts.get(result.bufferId);
    expect(fixIts).toHaveLength(1);
    expect(applyFixIts(registry, result.bufferId, fixIts ?? [])).toBe('#include "sub/x.h"\n');
  });

  it('stops at the maximum include depth', () => {
    const main = write('deep/main.c', '#include "a.h"\n');
    write('deep/a.h', '#include "b.h"\n');
    const { sink, registry } = setup();
    const result = checkFile(registry, main, { maxDepth: 1 });
    expect(result.errorCount).toBe(1);
    expect(sink.text).toContain('a.h:1:1: error: #include nested too deeply\n');
    expect(registry.bufferCount).toBe(2);
  });

  it('sends reports to an installed handler instead of the sink', () => {
    const main = write('handler/main.c', '#include "nope.h"\n');
    const { sink, registry } = setup();
    const seen: Diagnostic[] = [];
    registry.setHandler((d, ctx: Diagnostic[]) => { ctx.push(d); }, seen);
    checkFile(registry, main);
    expect(sink.text).toBe('');
    expect(seen.map(d => [d.line, d.column, d.message])).toEqual([[1, 9, "'nope.h' file not found"]]);
  });

  it('reports an unreadable main file without a location', () => {
    const nope = path.join(dir, 'does-not-exist.c');
    const { sink, registry } = setup();
    const result = checkFile(registry, nope);
    expect(result).toMatchObject({ bufferId: NO_BUFFER, errorCount: 1 });
    expect(sink.text).toBe(`${nope}: error: cannot open file\n`);
  });
});
