// Public SDK surface for programmatic use
export type {
  Loc,
  DiagKind,
  SourceRange,
  FixIt,
  LineAndColumn,
  LineRef,
  FoundLine,
  IncludeResult,
  ColumnRange,
} from './core/types.js';
export { NO_LOC, NO_BUFFER, isValidLoc, isValidRange, rangeOf, replaceWith, insertAt, removeRange } from './core/types.js';

// Buffers and the registry
export { SourceBuffer } from './core/buffer.js';
export type { LineSpan } from './core/buffer.js';
export { OffsetIndex, widthForLength } from './core/offsets.js';
export type { OffsetWidth } from './core/offsets.js';
export { SourceRegistry } from './core/registry.js';
export type { DiagHandler, RegistryOptions, ReportOptions } from './core/registry.js';
export { InvariantError, invariant } from './core/errors.js';

// Diagnostics and rendering
export { Diagnostic, compareFixIts } from './core/diagnostic.js';
export type { DiagnosticInit, DiagnosticJson } from './core/diagnostic.js';
export {
  TAB_STOP,
  printDiagnostic,
  renderDiagnostic,
  buildAnnotationLines,
  expandTabs,
  hasNonAscii,
  groupDiagnostics,
  toJsonResult,
} from './core/format.js';
export type { PrintOptions, AnnotationLines, JsonResult } from './core/format.js';
export { StringSink, StreamSink, stderrSink, detectColors, colorSequence, RESET } from './core/sink.js';
export type { Color, OutputSink, SinkOptions, WritableLike } from './core/sink.js';

// Fix-its
export { applyFixIts, groupFixIts } from './core/edits.js';

// Include checking and external diagnostics
export { scanIncludes } from './core/includes.js';
export type { IncludeDirective } from './core/includes.js';
export { checkFile, DEFAULT_MAX_INCLUDE_DEPTH } from './core/checker.js';
export type { CheckOptions, CheckResult } from './core/checker.js';
export { ManifestSchema, ManifestError, parseManifest, readManifest, reportManifest } from './core/manifest.js';
export type { Manifest, ManifestEntry } from './core/manifest.js';
