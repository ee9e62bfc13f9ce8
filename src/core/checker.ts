import * as path from 'node:path';
import { Diagnostic } from './diagnostic.js';
import { groupFixIts } from './edits.js';
import { scanIncludes } from './includes.js';
import type { ReportOptions, SourceRegistry } from './registry.js';
import type { DiagKind, FixIt, IncludeResult, Loc } from './types.js';
import { NO_BUFFER, NO_LOC, replaceWith } from './types.js';

export const DEFAULT_MAX_INCLUDE_DEPTH = 200;

export interface CheckOptions {
  includeDirs?: string[];
  maxDepth?: number;
}

export interface CheckResult {
  file: string;
  bufferId: number;
  errorCount: number;
  warningCount: number;
  fixIts: Map<number, FixIt[]>;
}

/**
 * Registers `file` and every file it reaches through `#include`, reporting
 * includes that are missing, recursive, nested too deeply or spelled with
 * backslashes. Reports go through the registry, so an installed handler sees
 * them instead of the renderer.
 */
export function checkFile(registry: SourceRegistry, file: string, options: CheckOptions = {}): CheckResult {
  const { includeDirs = registry.includeDirs, maxDepth = DEFAULT_MAX_INCLUDE_DEPTH } = options;
  let errorCount = 0;
  let warningCount = 0;
  const suggested: FixIt[] = [];

  const report = (loc: Loc, kind: DiagKind, message: string, extra: ReportOptions = {}) => {
    registry.report(loc, kind, message, extra);
    if (kind === 'error') errorCount++;
    else if (kind === 'warning') warningCount++;
    if (extra.fixIts) suggested.push(...extra.fixIts);
  };

  const main = registry.addIncludeFile(file, NO_LOC, []);
  if (main.id === NO_BUFFER) {
    registry.printDiagnostic(Diagnostic.withoutLocation(file, 'error', 'cannot open file'));
    return { file, bufferId: NO_BUFFER, errorCount: 1, warningCount: 0, fixIts: new Map() };
  }

  // Quoted names look beside the includer before the working directory and
  // the search path; angled names only use the latter two.
  const locate = (name: string, angled: boolean, includer: string, includeLoc: Loc): IncludeResult => {
    if (!angled && !path.isAbsolute(name)) {
      const beside = registry.addIncludeFile(path.join(path.dirname(includer), name), includeLoc, []);
      if (beside.id !== NO_BUFFER) return beside;
    }
    return registry.addIncludeFile(name, includeLoc, includeDirs);
  };

  // Files whose includes were already walked. A file reached again is still
  // registered, but its directives are not reported twice.
  const checked = new Set<string>();

  // `chain` holds the resolved paths from the main file down to `id`.
  const visit = (id: number, chain: string[]): void => {
    const buffer = registry.getBuffer(id);
    for (const directive of scanIncludes(buffer.bytes)) {
      const nameRange = { start: registry.locAt(id, directive.nameStart), end: registry.locAt(id, directive.nameEnd) };
      const includeLoc = registry.locAt(id, directive.offset);
      const name = directive.name.replace(/\\/g, '/');

      if (name !== directive.name) {
        const spelled = directive.angled ? `<${name}>` : `"${name}"`;
        report(nameRange.start, 'warning', 'backslash in include path; use forward slashes', {
          ranges: [nameRange],
          fixIts: [replaceWith(nameRange, spelled)],
        });
      }

      if (chain.length > maxDepth) {
        report(includeLoc, 'error', '#include nested too deeply');
        continue;
      }

      const found = locate(name, directive.angled, buffer.identifier, includeLoc);
      if (found.id === NO_BUFFER) {
        report(nameRange.start, 'error', `'${directive.name}' file not found`, { ranges: [nameRange] });
        continue;
      }

      const resolved = path.resolve(found.includedFile);
      if (chain.includes(resolved)) {
        report(nameRange.start, 'error', `recursive inclusion of '${directive.name}'`, { ranges: [nameRange] });
        continue;
      }
      if (checked.has(resolved)) continue;
      visit(found.id, [...chain, resolved]);
    }
    checked.add(chain[chain.length - 1]);
  };

  visit(main.id, [path.resolve(main.includedFile)]);

  return {
    file,
    bufferId: main.id,
    errorCount,
    warningCount,
    fixIts: groupFixIts(registry, suggested),
  };
}
