import type { ColumnRange, DiagKind, FixIt, Loc } from './types.js';
import { NO_LOC } from './types.js';

export function compareFixIts(a: FixIt, b: FixIt): number {
  if (a.range.start !== b.range.start) return a.range.start - b.range.start;
  if (a.range.end !== b.range.end) return a.range.end - b.range.end;
  return a.text < b.text ? -1 : a.text > b.text ? 1 : 0;
}

export interface DiagnosticInit {
  loc?: Loc;
  filename: string;
  line?: number;
  column?: number;
  kind: DiagKind;
  message: string;
  lineContents?: string;
  ranges?: readonly ColumnRange[];
  fixIts?: readonly FixIt[];
}

export interface DiagnosticJson {
  kind: DiagKind;
  file: string;
  line: number;
  column: number; // 1-based, -1 when unknown
  message: string;
  source?: string;
  ranges: Array<[number, number]>;
  fixIts: Array<{ start: number; end: number; text: string }>;
}

/**
 * One reported event, resolved against the registry at construction time.
 * `line` is 1-based and `column` 0-based; either is -1 when the location is
 * unknown. Fix-its are kept sorted by range.
 */
export class Diagnostic {
  readonly loc: Loc;
  readonly filename: string;
  readonly line: number;
  readonly column: number;
  readonly kind: DiagKind;
  readonly message: string;
  readonly lineContents: string;
  readonly ranges: readonly ColumnRange[];
  readonly fixIts: readonly FixIt[];

  constructor(init: DiagnosticInit) {
    this.loc = init.loc ?? NO_LOC;
    this.filename = init.filename;
    this.line = init.line ?? -1;
    this.column = init.column ?? -1;
    this.kind = init.kind;
    this.message = init.message;
    this.lineContents = init.lineContents ?? '';
    this.ranges = Object.freeze((init.ranges ?? []).map(([s, e]) => [s, e] as const));
    this.fixIts = Object.freeze(
      (init.fixIts ?? [])
        .map(f => Object.freeze({ range: Object.freeze({ ...f.range }), text: f.text }))
        .sort(compareFixIts),
    );
    Object.freeze(this);
  }

  /** A message that is not tied to a position, such as an unreadable input file. */
  static withoutLocation(filename: string, kind: DiagKind, message: string): Diagnostic {
    return new Diagnostic({ filename, kind, message });
  }

  get hasLocation(): boolean {
    return this.line !== -1 && this.column !== -1;
  }

  toJSON(): DiagnosticJson {
    const lineStart = this.loc - this.column;
    return {
      kind: this.kind,
      file: this.filename,
      line: this.line,
      column: this.column === -1 ? -1 : this.column + 1,
      message: this.message,
      ...(this.hasLocation ? { source: this.lineContents } : {}),
      ranges: this.ranges.map(([s, e]): [number, number] => [s, e]),
      fixIts: this.hasLocation
        ? this.fixIts.map(f => ({ start: f.range.start - lineStart, end: f.range.end - lineStart, text: f.text }))
        : [],
    };
  }
}
