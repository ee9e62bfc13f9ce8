import * as fs from 'node:fs';
import * as path from 'node:path';
import { SourceBuffer } from './buffer.js';
import { Diagnostic } from './diagnostic.js';
import { invariant } from './errors.js';
import { printDiagnostic as printToSink } from './format.js';
import type { OutputSink } from './sink.js';
import { stderrSink } from './sink.js';
import type { ColumnRange, DiagKind, FixIt, FoundLine, IncludeResult, LineAndColumn, LineRef, Loc, SourceRange } from './types.js';
import { NO_BUFFER, NO_LOC, isValidLoc, isValidRange } from './types.js';

interface BufferEntry {
  buffer: SourceBuffer;
  start: Loc;
  includeLoc: Loc;
}

export type DiagHandler<C> = (diagnostic: Diagnostic, context: C) => void;

export interface RegistryOptions {
  includeDirs?: string[];
  sink?: OutputSink;
  showColors?: boolean;
  programName?: string;
}

export interface ReportOptions {
  ranges?: readonly SourceRange[];
  fixIts?: readonly FixIt[];
  sink?: OutputSink;
  showColors?: boolean;
}

const LF = 0x0a;
const CR = 0x0d;

function isEol(byte: number): boolean {
  return byte === LF || byte === CR;
}

function readFileOrNull(file: string): Uint8Array | null {
  try {
    return fs.readFileSync(file);
  } catch {
    return null;
  }
}

/**
 * Owns every source buffer of a compilation and turns positions into
 * file/line/column coordinates and rendered diagnostics.
 *
 * Buffers are append-only: ids are dense and 1-based, and every buffer gets a
 * fresh interval of positions after the previous one. Registration and lookup
 * mutate shared state and must not run concurrently.
 */
export class SourceRegistry {
  includeDirs: string[];

  private readonly buffers: BufferEntry[] = [];
  // Sorted by end, since intervals are handed out in increasing order.
  private readonly bufferEnds: Array<{ end: Loc; id: number }> = [];
  private nextStart: Loc = NO_LOC + 1;
  // Most lookups land in the buffer found last time.
  private lastFoundId = NO_BUFFER;
  private handler: ((diagnostic: Diagnostic) => void) | null = null;
  private readonly sink: OutputSink;
  private readonly showColors: boolean;
  private readonly programName: string | undefined;

  constructor(options: RegistryOptions = {}) {
    this.includeDirs = options.includeDirs ?? [];
    this.sink = options.sink ?? stderrSink();
    this.showColors = options.showColors ?? true;
    this.programName = options.programName;
  }

  get bufferCount(): number {
    return this.buffers.length;
  }

  get mainFileId(): number {
    return this.buffers.length > 0 ? 1 : NO_BUFFER;
  }

  addBuffer(buffer: SourceBuffer, includeLoc: Loc = NO_LOC): number {
    const start = this.nextStart;
    const end = start + buffer.size;
    this.nextStart = end + 1;
    this.buffers.push({ buffer, start, includeLoc });
    const id = this.buffers.length;
    this.bufferEnds.push({ end, id });
    return id;
  }

  /**
   * Opens `filename` as given, then under each search directory in order.
   * A file found nowhere yields `NO_BUFFER` and registers nothing.
   */
  addIncludeFile(filename: string, includeLoc: Loc, searchDirs: readonly string[] = this.includeDirs): IncludeResult {
    let includedFile = filename;
    let bytes = readFileOrNull(includedFile);
    for (const dir of searchDirs) {
      if (bytes) break;
      includedFile = path.join(dir, filename);
      bytes = readFileOrNull(includedFile);
    }
    if (!bytes) return { id: NO_BUFFER, includedFile: '' };
    return { id: this.addBuffer(new SourceBuffer(bytes, includedFile), includeLoc), includedFile };
  }

  private entry(id: number): BufferEntry {
    const entry = this.buffers[id - 1];
    invariant(id >= 1 && entry !== undefined, `unknown buffer id ${id}`);
    return entry;
  }

  getBuffer(id: number): SourceBuffer {
    return this.entry(id).buffer;
  }

  getBufferStart(id: number): Loc {
    return this.entry(id).start;
  }

  getBufferEnd(id: number): Loc {
    const entry = this.entry(id);
    return entry.start + entry.buffer.size;
  }

  getIncludeLoc(id: number): Loc {
    return this.entry(id).includeLoc;
  }

  locAt(id: number, offset: number): Loc {
    const entry = this.entry(id);
    invariant(offset >= 0 && offset <= entry.buffer.size, `offset ${offset} is outside buffer ${id}`);
    return entry.start + offset;
  }

  findBufferContaining(loc: Loc): number {
    const last = this.buffers[this.lastFoundId - 1];
    if (last && loc >= last.start && loc <= last.start + last.buffer.size) {
      return this.lastFoundId;
    }

    const ends = this.bufferEnds;
    let lo = 0;
    let hi = ends.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (ends[mid].end < loc) lo = mid + 1;
      else hi = mid;
    }
    const candidate = ends[lo];
    if (candidate && loc >= this.entry(candidate.id).start) {
      this.lastFoundId = candidate.id;
      return candidate.id;
    }
    return NO_BUFFER;
  }

  private resolve(loc: Loc, bufferId: number): BufferEntry & { id: number } {
    const id = bufferId !== NO_BUFFER ? bufferId : this.findBufferContaining(loc);
    invariant(id !== NO_BUFFER, `invalid location ${loc}: not inside any registered buffer`);
    return { ...this.entry(id), id };
  }

  findLine(loc: Loc, bufferId = NO_BUFFER): FoundLine {
    const { buffer, start } = this.resolve(loc, bufferId);
    const span = buffer.lineAt(loc - start);
    return {
      text: buffer.text(span.start, span.end),
      start: start + span.start,
      end: start + span.end,
      line: span.line,
    };
  }

  findLineNumber(loc: Loc, bufferId = NO_BUFFER): number {
    return this.findLine(loc, bufferId).line;
  }

  getLineRef(line: number, bufferId: number): LineRef {
    invariant(bufferId !== NO_BUFFER, 'buffer id must be specified');
    const { buffer, start } = this.entry(bufferId);
    const span = buffer.lineSpan(line);
    return { text: buffer.text(span.start, span.end), start: start + span.start, end: start + span.end };
  }

  getLineAndColumn(loc: Loc, bufferId = NO_BUFFER): LineAndColumn {
    const found = this.findLine(loc, bufferId);
    return { line: found.line, column: loc - found.start + 1 };
  }

  /** Inverse of `getLineAndColumn`; `NO_LOC` when the line or column does not exist. */
  findLocForLineAndColumn(bufferId: number, line: number, column: number): Loc {
    invariant(bufferId !== NO_BUFFER, 'buffer id must be specified');
    const { buffer, start } = this.entry(bufferId);
    if (line < 1 || column < 1 || line - 1 > buffer.lineOffsets().count()) return NO_LOC;
    const span = buffer.lineSpan(line);
    const offset = span.start + column - 1;
    if (offset < span.end) return start + offset;
    // The buffer end is addressable on the last line, which has no newline.
    const endsLine = span.end > span.start && buffer.bytes[span.end - 1] === LF;
    if (offset === buffer.size && span.end === buffer.size && !endsLine) return start + offset;
    return NO_LOC;
  }

  buildDiagnostic(
    loc: Loc,
    kind: DiagKind,
    message: string,
    ranges: readonly SourceRange[] = [],
    fixIts: readonly FixIt[] = [],
  ): Diagnostic {
    if (!isValidLoc(loc)) {
      return new Diagnostic({ filename: '<unknown>', kind, message, fixIts });
    }

    const { buffer, start, id } = this.resolve(loc, NO_BUFFER);
    const bytes = buffer.bytes;
    const offset = loc - start;

    // One line is all we need, so scan for it instead of building the index.
    let lineStart = offset;
    while (lineStart > 0 && !isEol(bytes[lineStart - 1])) lineStart--;
    let lineEnd = offset;
    while (lineEnd < bytes.length && !isEol(bytes[lineEnd])) lineEnd++;

    const lineStartLoc = start + lineStart;
    const lineEndLoc = start + lineEnd;
    const columns: ColumnRange[] = [];
    for (const range of ranges) {
      if (!isValidRange(range)) continue;
      if (range.start > lineEndLoc || range.end < lineStartLoc) continue;
      const from = Math.max(range.start, lineStartLoc);
      const to = Math.min(range.end, lineEndLoc);
      columns.push([from - lineStartLoc, to - lineStartLoc]);
    }

    const { line, column } = this.getLineAndColumn(loc, id);
    return new Diagnostic({
      loc,
      filename: buffer.identifier,
      line,
      column: column - 1,
      kind,
      message,
      lineContents: buffer.text(lineStart, lineEnd),
      ranges: columns,
      fixIts,
    });
  }

  /** Prints `Included from file:line:` frames, outermost file first. */
  printIncludeStack(includeLoc: Loc, sink: OutputSink = this.sink): void {
    if (!isValidLoc(includeLoc)) return;
    const { buffer, includeLoc: parentLoc, id } = this.resolve(includeLoc, NO_BUFFER);
    this.printIncludeStack(parentLoc, sink);
    sink.write(`Included from ${buffer.identifier}:${this.findLineNumber(includeLoc, id)}:\n`);
  }

  printDiagnostic(diagnostic: Diagnostic, sink: OutputSink = this.sink, showColors = this.showColors): void {
    if (this.handler) {
      this.handler(diagnostic);
      return;
    }
    if (isValidLoc(diagnostic.loc)) {
      this.printIncludeStack(this.resolve(diagnostic.loc, NO_BUFFER).includeLoc, sink);
    }
    printToSink(diagnostic, sink, { showColors, programName: this.programName });
  }

  report(loc: Loc, kind: DiagKind, message: string, options: ReportOptions = {}): Diagnostic {
    const diagnostic = this.buildDiagnostic(loc, kind, message, options.ranges, options.fixIts);
    this.printDiagnostic(diagnostic, options.sink ?? this.sink, options.showColors ?? this.showColors);
    return diagnostic;
  }

  /** Routes every diagnostic to `handler` instead of the renderer. */
  setHandler<C>(handler: DiagHandler<C>, context: C): void {
    this.handler = (diagnostic) => handler(diagnostic, context);
  }

  clearHandler(): void {
    this.handler = null;
  }

  get hasHandler(): boolean {
    return this.handler !== null;
  }
}
