/**
 * A position in a registry's flat address space. Every registered buffer owns
 * a closed interval `[start, start + size]`; intervals never overlap.
 */
export type Loc = number;

/** "No location". */
export const NO_LOC: Loc = 0;

/** Buffer id returned when nothing was found or registered. */
export const NO_BUFFER = 0;

export type DiagKind = 'error' | 'warning' | 'note' | 'remark';

export interface SourceRange {
  start: Loc;
  end: Loc; // exclusive
}

// A suggested edit; an empty range is an insertion
export interface FixIt {
  range: SourceRange;
  text: string;
}

export interface LineAndColumn { line: number; column: number }

export interface LineRef {
  text: string;
  start: Loc;
  end: Loc;
}

export interface FoundLine extends LineRef {
  line: number;
}

export interface IncludeResult {
  id: number; // NO_BUFFER when the file was not found
  includedFile: string;
}

export type ColumnRange = readonly [start: number, end: number];

export function isValidLoc(loc: Loc): boolean {
  return loc !== NO_LOC;
}

export function isValidRange(range: SourceRange): boolean {
  return isValidLoc(range.start) && isValidLoc(range.end);
}

export function rangeOf(start: Loc, end: Loc = start): SourceRange {
  return { start, end };
}

export function replaceWith(range: SourceRange, text: string): FixIt {
  return { range, text };
}

export function insertAt(loc: Loc, text: string): FixIt {
  return { range: { start: loc, end: loc }, text };
}

export function removeRange(range: SourceRange): FixIt {
  return { range, text: '' };
}
