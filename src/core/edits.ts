import type { SourceRegistry } from './registry.js';
import type { FixIt } from './types.js';
import { NO_BUFFER, isValidRange } from './types.js';

/** Groups fix-its by the buffer their range starts in; unresolvable ones are dropped. */
export function groupFixIts(registry: SourceRegistry, fixIts: readonly FixIt[]): Map<number, FixIt[]> {
  const groups = new Map<number, FixIt[]>();
  for (const fix of fixIts) {
    if (!isValidRange(fix.range)) continue;
    const id = registry.findBufferContaining(fix.range.start);
    if (id === NO_BUFFER) continue;
    const group = groups.get(id);
    if (group) group.push(fix);
    else groups.set(id, [fix]);
  }
  return groups;
}

/**
 * Applies fix-its to a buffer's text, last edit first. A fix-it overlapping one
 * that was already applied is skipped; insertions at the same offset keep their
 * given order.
 */
export function applyFixIts(registry: SourceRegistry, bufferId: number, fixIts: readonly FixIt[]): string {
  const bytes = registry.getBuffer(bufferId).bytes;
  const base = registry.getBufferStart(bufferId);
  const end = registry.getBufferEnd(bufferId);

  type Edit = { startOff: number; endOff: number; text: string };
  const edits: Edit[] = [...fixIts]
    .reverse()
    .filter(f => isValidRange(f.range) && f.range.start >= base && f.range.end <= end && f.range.start <= f.range.end)
    .map(f => ({ startOff: f.range.start - base, endOff: f.range.end - base, text: f.text }))
    .sort((a, b) => b.startOff - a.startOff || b.endOff - a.endOff);

  const parts: Uint8Array[] = [];
  let cursor = bytes.length;
  for (const e of edits) {
    if (e.endOff > cursor) continue;
    parts.push(bytes.subarray(e.endOff, cursor), Buffer.from(e.text, 'utf8'));
    cursor = e.startOff;
  }
  parts.push(bytes.subarray(0, cursor));
  return Buffer.concat(parts.reverse()).toString('utf8');
}
