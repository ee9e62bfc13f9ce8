import { invariant } from './errors.js';
import { OffsetIndex } from './offsets.js';

// Offsets count bytes, so a leading BOM stays part of the first line.
const decoder = new TextDecoder('utf-8', { ignoreBOM: true });

/** Byte offsets of one line, `end` exclusive and past the newline when there is one. */
export interface LineSpan {
  start: number;
  end: number;
}

/**
 * Immutable bytes of one file or snippet plus the identifier it is reported
 * under. The newline index is built on first use and frozen afterwards.
 */
export class SourceBuffer {
  readonly identifier: string;
  readonly bytes: Uint8Array;
  private offsets: OffsetIndex | null = null;

  constructor(bytes: Uint8Array, identifier: string) {
    this.bytes = bytes;
    this.identifier = identifier;
  }

  static fromText(text: string, identifier: string): SourceBuffer {
    return new SourceBuffer(new TextEncoder().encode(text), identifier);
  }

  get size(): number {
    return this.bytes.length;
  }

  text(start = 0, end = this.bytes.length): string {
    return decoder.decode(this.bytes.subarray(start, end));
  }

  lineOffsets(): OffsetIndex {
    if (!this.offsets) this.offsets = OffsetIndex.build(this.bytes);
    return this.offsets;
  }

  // The first newline not before `offset` ends the line (a newline belongs to
  // the line it terminates).
  lineAt(offset: number): LineSpan & { line: number } {
    invariant(offset >= 0 && offset <= this.bytes.length, `offset ${offset} is outside '${this.identifier}'`);
    const index = this.lineOffsets();
    const eol = index.lowerBound(offset);
    const start = eol > 0 ? index.offsetAt(eol - 1) + 1 : 0;
    const end = eol < index.count() ? index.offsetAt(eol) + 1 : this.bytes.length;
    return { start, end, line: eol + 1 };
  }

  lineSpan(line: number): LineSpan {
    invariant(line >= 1, 'line number must be 1-based');
    const index = this.lineOffsets();
    const count = index.count();
    const n = line - 1;
    if (n < count) {
      const start = n > 0 ? index.offsetAt(n - 1) + 1 : 0;
      return { start, end: index.offsetAt(n) + 1 };
    }
    if (n === count) {
      const start = count > 0 ? index.offsetAt(count - 1) + 1 : 0;
      return { start, end: this.bytes.length };
    }
    return { start: this.bytes.length, end: this.bytes.length };
  }
}
