export interface IncludeDirective {
  name: string;
  angled: boolean;
  offset: number;    // byte offset of the '#'
  nameStart: number; // byte offset of the opening '<' or '"'
  nameEnd: number;   // byte offset just past the closing delimiter
}

const INCLUDE_RE = /^[ \t]*#[ \t]*include[ \t]*(<[^>\r\n]*>|"[^"\r\n]*")/gm;

/**
 * Line-level scan for `#include "name"` and `#include <name>`. Offsets are in
 * bytes: matching runs over a latin1 view, where one character is one byte.
 */
export function scanIncludes(source: Uint8Array | string): IncludeDirective[] {
  const bytes = typeof source === 'string' ? Buffer.from(source, 'utf8') : Buffer.from(source.buffer, source.byteOffset, source.byteLength);
  const view = bytes.toString('latin1');
  const directives: IncludeDirective[] = [];
  INCLUDE_RE.lastIndex = 0;
  for (let m = INCLUDE_RE.exec(view); m; m = INCLUDE_RE.exec(view)) {
    const delimited = m[1];
    const nameEnd = m.index + m[0].length;
    const nameStart = nameEnd - delimited.length;
    directives.push({
      name: bytes.subarray(nameStart + 1, nameEnd - 1).toString('utf8'),
      angled: delimited.startsWith('<'),
      offset: m.index + m[0].indexOf('#'),
      nameStart,
      nameEnd,
    });
  }
  return directives;
}
