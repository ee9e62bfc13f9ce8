import * as fs from 'node:fs';
import { z } from 'zod';
import { Diagnostic } from './diagnostic.js';
import type { SourceRegistry } from './registry.js';
import type { FixIt, SourceRange } from './types.js';
import { NO_LOC, isValidLoc } from './types.js';

// Diagnostics produced elsewhere, described with 1-based line/column coordinates.
const Line = z.number().int().positive();
const Column = z.number().int().positive();

const RangeSchema = z.object({
  line: Line,
  column: Column,
  length: z.number().int().nonnegative().default(1),
});

const FixItSchema = z.object({
  line: Line,
  column: Column,
  length: z.number().int().nonnegative().default(0).describe('Bytes replaced; 0 inserts'),
  text: z.string(),
});

const EntrySchema = z.object({
  severity: z.enum(['error', 'warning', 'note', 'remark']),
  message: z.string().min(1),
  line: Line.optional(),
  column: Column.optional(),
  ranges: z.array(RangeSchema).default([]),
  fixIts: z.array(FixItSchema).default([]),
});

export const ManifestSchema = z.object({
  diagnostics: z.array(EntrySchema),
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestEntry = z.infer<typeof EntrySchema>;

function describeIssues(issues: z.ZodIssue[]): string {
  return `invalid diagnostics manifest:\n${issues.map(i => `  ${i.path.join('.') || '<root>'}: ${i.message}`).join('\n')}`;
}

export class ManifestError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'ManifestError';
    this.issues = issues;
  }
}

export function parseManifest(value: unknown): Manifest {
  const parsed = ManifestSchema.safeParse(value);
  if (!parsed.success) throw new ManifestError(describeIssues(parsed.error.issues), parsed.error.issues);
  return parsed.data;
}

/** Reads and validates a manifest file. A missing or malformed file throws `ManifestError`; other I/O errors propagate. */
export function readManifest(file: string): Manifest {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ManifestError(`File not found: ${file}`);
    }
    throw err;
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) throw new ManifestError(`${file}: ${err.message}`);
    throw err;
  }

  try {
    return parseManifest(value);
  } catch (err) {
    if (err instanceof ManifestError) throw new ManifestError(`${file}: ${err.message}`, err.issues);
    throw err;
  }
}

function spanAt(registry: SourceRegistry, bufferId: number, line: number, column: number, length: number): SourceRange | null {
  const start = registry.findLocForLineAndColumn(bufferId, line, column);
  if (!isValidLoc(start)) return null;
  const end = Math.min(start + length, registry.getBufferEnd(bufferId));
  return { start, end };
}

/**
 * Reports every manifest entry against buffer `bufferId`. Entries whose line
 * or column is missing or outside the buffer lose their location but are
 * still reported.
 */
export function reportManifest(registry: SourceRegistry, bufferId: number, manifest: Manifest): Diagnostic[] {
  const filename = registry.getBuffer(bufferId).identifier;
  const out: Diagnostic[] = [];
  for (const entry of manifest.diagnostics) {
    const loc = entry.line !== undefined
      ? registry.findLocForLineAndColumn(bufferId, entry.line, entry.column ?? 1)
      : NO_LOC;
    if (!isValidLoc(loc)) {
      const diagnostic = Diagnostic.withoutLocation(filename, entry.severity, entry.message);
      registry.printDiagnostic(diagnostic);
      out.push(diagnostic);
      continue;
    }

    const ranges: SourceRange[] = [];
    for (const r of entry.ranges) {
      const span = spanAt(registry, bufferId, r.line, r.column, r.length);
      if (span) ranges.push(span);
    }
    const fixIts: FixIt[] = [];
    for (const f of entry.fixIts) {
      const span = spanAt(registry, bufferId, f.line, f.column, f.length);
      if (span) fixIts.push({ range: span, text: f.text });
    }
    out.push(registry.report(loc, entry.severity, entry.message, { ranges, fixIts }));
  }
  return out;
}
