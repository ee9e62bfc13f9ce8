/**
 * Example showing the programmatic API
 *
 * This file shows how to:
 * 1. Register in-memory buffers and report against them
 * 2. Collect diagnostics through a handler and render them later
 * 3. Implement a custom output sink (HTML-ish markup instead of ANSI)
 */

import {
  Diagnostic,
  SourceBuffer,
  SourceRegistry,
  StringSink,
  applyFixIts,
  insertAt,
  printDiagnostic,
  renderDiagnostic,
  type Color,
  type OutputSink,
} from '../src/index.js';

const source = `int main() {
\tint x = 1
\treturn x;
}
`;

// ============================================================================
// Example 1: Reporting straight to a sink
// ============================================================================
console.log('Example 1: Reporting to a string sink');
console.log('='.repeat(50));

const sink = new StringSink();
const registry = new SourceRegistry({ sink });
const id = registry.addBuffer(SourceBuffer.fromText(source, 'main.c'));

const semiLoc = registry.findLocForLineAndColumn(id, 2, 11);
registry.report(semiLoc, 'error', "expected ';' after declaration", { fixIts: [insertAt(semiLoc, ';')] });
console.log(sink.text);

// ============================================================================
// Example 2: Collecting with a handler
// ============================================================================
console.log('Example 2: Collecting with a handler');
console.log('='.repeat(50));

const collected: Diagnostic[] = [];
registry.setHandler((d, ctx: Diagnostic[]) => { ctx.push(d); }, collected);
const returnLoc = registry.findLocForLineAndColumn(id, 3, 2);
registry.report(returnLoc, 'warning', 'unreachable return', {
  ranges: [{ start: returnLoc, end: returnLoc + 'return'.length }],
});
registry.clearHandler();

for (const d of collected) {
  console.log(`${d.kind} at ${d.line}:${d.column + 1}`);
  console.log(renderDiagnostic(d));
}

const fixed = applyFixIts(registry, id, [insertAt(semiLoc, ';')]);
console.log(fixed);

// ============================================================================
// Example 3: A custom sink
// ============================================================================
console.log('Example 3: Custom sink');
console.log('='.repeat(50));

class MarkupSink implements OutputSink {
  private out = '';
  private open = false;

  write(text: string): void {
    this.out += text.replace(/&/g, '&amp;').replace(/</g, '&lt;');
  }

  hasColors(): boolean {
    return true;
  }

  changeColor(color: Color, bold = false): void {
    this.resetColor();
    this.out += `<span class="${color}${bold ? ' bold' : ''}">`;
    this.open = true;
  }

  resetColor(): void {
    if (this.open) this.out += '</span>';
    this.open = false;
  }

  get markup(): string {
    return this.out;
  }
}

const markup = new MarkupSink();
for (const d of collected) printDiagnostic(d, markup);
console.log(markup.markup);
