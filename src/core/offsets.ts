export type OffsetWidth = 8 | 16 | 32 | 64;

// The element type is chosen once, from the buffer length, so that thousands of
// small buffers do not each pay for 64-bit offsets.
type OffsetStore =
  | { width: 8; data: Uint8Array }
  | { width: 16; data: Uint16Array }
  | { width: 32; data: Uint32Array }
  | { width: 64; data: BigUint64Array };

const NEWLINE = 0x0a;

/** Smallest unsigned width able to hold every offset of a buffer of `length` bytes. */
export function widthForLength(length: number): OffsetWidth {
  if (length <= 0xff) return 8;
  if (length <= 0xffff) return 16;
  if (length <= 0xffffffff) return 32;
  return 64;
}

function countNewlines(bytes: Uint8Array): number {
  let n = 0;
  for (let i = bytes.indexOf(NEWLINE); i !== -1; i = bytes.indexOf(NEWLINE, i + 1)) n++;
  return n;
}

function allocate(width: OffsetWidth, count: number): OffsetStore {
  switch (width) {
    case 8: return { width, data: new Uint8Array(count) };
    case 16: return { width, data: new Uint16Array(count) };
    case 32: return { width, data: new Uint32Array(count) };
    case 64: return { width, data: new BigUint64Array(count) };
  }
}

/**
 * Sorted byte offsets of every `\n` in a buffer. Callers only see the
 * width-erased accessors; the concrete typed array stays private.
 */
export class OffsetIndex {
  private constructor(private readonly store: OffsetStore) {}

  static build(bytes: Uint8Array): OffsetIndex {
    const store = allocate(widthForLength(bytes.length), countNewlines(bytes));
    let slot = 0;
    for (let i = bytes.indexOf(NEWLINE); i !== -1; i = bytes.indexOf(NEWLINE, i + 1)) {
      if (store.width === 64) store.data[slot++] = BigInt(i);
      else store.data[slot++] = i;
    }
    return new OffsetIndex(store);
  }

  get width(): OffsetWidth {
    return this.store.width;
  }

  count(): number {
    return this.store.data.length;
  }

  offsetAt(index: number): number {
    const store = this.store;
    if (store.width === 64) return Number(store.data[index]);
    return store.data[index];
  }

  /** Index of the first newline at or after `offset`; `count()` when there is none. */
  lowerBound(offset: number): number {
    let lo = 0;
    let hi = this.count();
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.offsetAt(mid) < offset) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
