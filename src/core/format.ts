import type { Diagnostic, DiagnosticJson } from './diagnostic.js';
import type { Color, OutputSink } from './sink.js';
import { StringSink } from './sink.js';
import type { DiagKind, FixIt, Loc } from './types.js';

export const TAB_STOP = 8;

export interface PrintOptions {
  programName?: string;
  showColors?: boolean;
  showKindLabel?: boolean;
}

const KIND_COLORS: Record<DiagKind, Color> = {
  error: 'red',
  warning: 'magenta',
  note: 'black',
  remark: 'blue',
};

// Fix-its that span lines or carry tabs cannot be drawn on one annotation line.
const UNPRINTABLE_FIXIT = /[\n\r\t]/;

export function hasNonAscii(text: string): boolean {
  return /[^\x00-\x7f]/.test(text);
}

export function expandTabs(line: string): string {
  let out = '';
  let col = 0;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch !== '\t') {
      out += ch;
      col++;
      continue;
    }
    do {
      out += ' ';
      col++;
    } while (col % TAB_STOP !== 0);
  }
  return out;
}

// Repeats the annotation character under each source tab so columns line up
// with the expanded source line.
function expandCaretLine(caretLine: string, source: string): string {
  let out = '';
  let col = 0;
  for (let i = 0; i < caretLine.length; i++) {
    const ch = caretLine[i];
    if (i >= source.length || source[i] !== '\t') {
      out += ch;
      col++;
      continue;
    }
    do {
      out += ch;
      col++;
    } while (col % TAB_STOP !== 0);
  }
  return out;
}

// Like expandCaretLine, but a non-space character consumes its own slot so a
// replacement text is not stretched across a tab.
function expandFixItLine(fixItLine: string, source: string): string {
  let out = '';
  let col = 0;
  const e = fixItLine.length;
  for (let i = 0; i < e; i++) {
    if (i >= source.length || source[i] !== '\t') {
      out += fixItLine[i];
      col++;
      continue;
    }
    do {
      out += fixItLine[i];
      if (fixItLine[i] !== ' ') i++;
      col++;
    } while (col % TAB_STOP !== 0 && i !== e);
  }
  return out;
}

function buildFixItLine(caret: string[], fixIts: readonly FixIt[], lineStart: Loc, lineLength: number): string {
  const line: string[] = [];
  const lineEnd = lineStart + lineLength;
  let prevHintEnd = 0;

  for (const fix of fixIts) {
    if (UNPRINTABLE_FIXIT.test(fix.text)) continue;
    const { start, end } = fix.range;
    if (start > lineEnd || end < lineStart) continue;

    const firstCol = start < lineStart ? 0 : start - lineStart;
    // A hint that would start inside the previous one is pushed past it with a
    // one-column gap; a hint starting exactly at its end stays put.
    const hintCol = firstCol < prevHintEnd ? prevHintEnd + 1 : firstCol;
    const lastModified = hintCol + fix.text.length;
    while (line.length < lastModified) line.push(' ');
    for (let k = 0; k < fix.text.length; k++) line[hintCol + k] = fix.text.charAt(k);
    prevHintEnd = lastModified;

    const lastCol = end >= lineEnd ? lineLength : end - lineStart;
    caret.fill('~', firstCol, lastCol);
  }
  return line.join('');
}

export interface AnnotationLines {
  caretLine: string;
  fixItLine: string;
}

/** Caret and fix-it lines before tab expansion. Only meaningful for ASCII lines. */
export function buildAnnotationLines(diag: Diagnostic): AnnotationLines {
  const numColumns = diag.lineContents.length;
  const caret = new Array<string>(numColumns + 1).fill(' ');
  for (const [start, end] of diag.ranges) {
    caret.fill('~', start, Math.min(end, caret.length));
  }
  const fixItLine = buildFixItLine(caret, diag.fixIts, diag.loc - diag.column, numColumns);
  caret[Math.min(diag.column, numColumns)] = '^';
  return { caretLine: caret.join('').replace(/ +$/, ''), fixItLine };
}

export function printDiagnostic(diag: Diagnostic, sink: OutputSink, options: PrintOptions = {}): void {
  const { programName, showKindLabel = true } = options;
  const showColors = (options.showColors ?? true) && sink.hasColors();

  if (showColors) sink.changeColor('savedColor', true);
  if (programName) sink.write(`${programName}: `);

  if (diag.filename) {
    sink.write(diag.filename === '-' ? '<stdin>' : diag.filename);
    if (diag.line !== -1) {
      sink.write(`:${diag.line}`);
      if (diag.column !== -1) sink.write(`:${diag.column + 1}`);
    }
    sink.write(': ');
  }

  if (showKindLabel) {
    if (showColors) sink.changeColor(KIND_COLORS[diag.kind], true);
    sink.write(`${diag.kind}: `);
    if (showColors) {
      sink.resetColor();
      sink.changeColor('savedColor', true);
    }
  }

  sink.write(`${diag.message}\n`);
  if (showColors) sink.resetColor();

  if (!diag.hasLocation) return;

  const source = diag.lineContents;
  // Byte offsets are not display columns outside ASCII; show the line alone
  // rather than misplaced carets.
  if (hasNonAscii(source)) {
    sink.write(`${expandTabs(source)}\n`);
    return;
  }

  const { caretLine, fixItLine } = buildAnnotationLines(diag);
  sink.write(`${expandTabs(source)}\n`);

  if (showColors) sink.changeColor('green', true);
  sink.write(`${expandCaretLine(caretLine, source)}\n`);
  if (showColors) sink.resetColor();

  if (fixItLine.length === 0) return;
  sink.write(`${expandFixItLine(fixItLine, source)}\n`);
}

export function renderDiagnostic(diag: Diagnostic, options: PrintOptions = {}): string {
  const sink = new StringSink({ colors: options.showColors ?? false });
  printDiagnostic(diag, sink, options);
  return sink.text;
}

export function groupDiagnostics(diagnostics: readonly Diagnostic[]) {
  const errs = diagnostics.filter(d => d.kind === 'error');
  const warns = diagnostics.filter(d => d.kind === 'warning');
  return { errs, warns };
}

export interface JsonResult {
  file: string;
  valid: boolean;
  errorCount: number;
  warningCount: number;
  diagnostics: DiagnosticJson[];
}

export function toJsonResult(filename: string, diagnostics: readonly Diagnostic[]): JsonResult {
  const { errs, warns } = groupDiagnostics(diagnostics);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    diagnostics: diagnostics.map(d => d.toJSON()),
  };
}
