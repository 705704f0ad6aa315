import type { IrSymbol } from '../ir/ast.js';
import { sizeInBytes } from '../ir/ast.js';
import type { LivenessInfo, LiveRange } from '../ir/liveness.js';
import { ATARI_DEFAULT_ABSOLUTE_BASE, ATARI_USER_ZERO_PAGE } from '../target/atari.js';

export type StorageSlot = { kind: 'zp'; offset: number } | { kind: 'abs'; address: number };

/**
 * Zero-page bytes available to the allocator: `[start, end)` minus `reserved`.
 */
export interface ZeroPageWindow {
  start: number;
  /** Exclusive, at most `0x100`. */
  end: number;
  reserved?: readonly number[];
}

export interface AllocatorOptions {
  window?: ZeroPageWindow;
  /** First address of absolute storage for spilled symbols. */
  absoluteBase?: number;
}

export interface Allocation {
  /** Slot per symbol, allocated and fixed. Unreferenced symbols have none. */
  slots: Map<string, StorageSlot>;
  /** Symbols placed in absolute storage because the window was full, in declaration order. */
  spilled: string[];
  /** Highest number of window bytes in use at once. */
  zeroPageBytesUsed: number;
  /** Absolute storage used by spilled symbols, `[start, end)`. */
  absoluteRange?: { start: number; end: number };
}

export const DEFAULT_WINDOW: ZeroPageWindow = {
  start: ATARI_USER_ZERO_PAGE.start,
  end: ATARI_USER_ZERO_PAGE.end,
};

export const FULL_PAGE_WINDOW: ZeroPageWindow = { start: 0, end: 0x100 };

export function slotAddress(slot: StorageSlot): number {
  return slot.kind === 'zp' ? slot.offset : slot.address;
}

function fixedSlot(address: number): StorageSlot {
  return address < 0x100 ? { kind: 'zp', offset: address } : { kind: 'abs', address };
}

interface Interval {
  symbol: IrSymbol;
  order: number;
  range: LiveRange;
  frequency: number;
  size: number;
}

interface Active {
  end: number;
  offset: number;
  size: number;
}

/**
 * Assign storage to every referenced symbol.
 *
 * Linear scan over live ranges (an interval graph): intervals are visited by start, ties broken by
 * higher access frequency, then declaration order. Intervals that ended before the current start
 * release their bytes; the symbol takes the lowest free run of its size. A 2-byte symbol never
 * starts at `$FF`. Bytes of fixed-address symbols are never handed out, in the window or in
 * absolute storage. Symbols that do not fit go to absolute storage in declaration order. The
 * allocator never fails.
 */
export function allocateStorage(
  symbols: readonly IrSymbol[],
  liveness: LivenessInfo,
  options: AllocatorOptions = {},
): Allocation {
  const window = options.window ?? DEFAULT_WINDOW;
  const absoluteBase = options.absoluteBase ?? ATARI_DEFAULT_ABSOLUTE_BASE;
  const windowStart = Math.max(0, window.start);
  const windowEnd = Math.min(0x100, window.end);

  const slots = new Map<string, StorageSlot>();
  const intervals: Interval[] = [];
  symbols.forEach((symbol, order) => {
    const info = liveness.symbols.get(symbol.name);
    if (!info || slots.has(symbol.name)) return;
    if (symbol.at !== undefined) {
      slots.set(symbol.name, fixedSlot(symbol.at));
      return;
    }
    intervals.push({
      symbol,
      order,
      range: info.range,
      frequency: info.frequency,
      size: sizeInBytes(symbol.size),
    });
  });

  intervals.sort(
    (a, b) => a.range.start - b.range.start || b.frequency - a.frequency || a.order - b.order,
  );

  const busy = new Array<boolean>(0x100).fill(false);
  for (let i = 0; i < 0x100; i++) {
    if (i < windowStart || i >= windowEnd) busy[i] = true;
  }
  for (const r of window.reserved ?? []) {
    if (r >= 0 && r < 0x100) busy[r] = true;
  }
  const fixed = fixedRanges(symbols);
  for (const { start, end } of fixed) {
    for (let b = start; b < end && b < 0x100; b++) busy[b] = true;
  }

  let active: Active[] = [];
  let inUse = 0;
  let peak = 0;
  const spilled = new Set<string>();

  const findRun = (size: number): number | undefined => {
    for (let offset = windowStart; offset + size <= windowEnd; offset++) {
      let free = true;
      for (let k = 0; k < size; k++) {
        if (busy[offset + k]) {
          free = false;
          break;
        }
      }
      if (free) return offset;
    }
    return undefined;
  };

  for (const interval of intervals) {
    const still: Active[] = [];
    for (const a of active) {
      if (a.end < interval.range.start) {
        for (let k = 0; k < a.size; k++) busy[a.offset + k] = false;
        inUse -= a.size;
      } else {
        still.push(a);
      }
    }
    active = still;

    const offset = findRun(interval.size);
    if (offset === undefined) {
      spilled.add(interval.symbol.name);
      continue;
    }
    for (let k = 0; k < interval.size; k++) busy[offset + k] = true;
    active.push({ end: interval.range.end, offset, size: interval.size });
    inUse += interval.size;
    peak = Math.max(peak, inUse);
    slots.set(interval.symbol.name, { kind: 'zp', offset });
  }

  const spilledInOrder: string[] = [];
  let first: number | undefined;
  let next = absoluteBase;
  for (const symbol of symbols) {
    if (!spilled.has(symbol.name) || slots.has(symbol.name)) continue;
    const size = sizeInBytes(symbol.size);
    next = clearOf(fixed, next, size);
    first ??= next;
    slots.set(symbol.name, { kind: 'abs', address: next });
    spilledInOrder.push(symbol.name);
    next += size;
  }

  return {
    slots,
    spilled: spilledInOrder,
    zeroPageBytesUsed: peak,
    ...(first !== undefined ? { absoluteRange: { start: first, end: next } } : {}),
  };
}

/** Byte ranges `[start, end)` claimed by every declared fixed-address symbol. */
function fixedRanges(symbols: readonly IrSymbol[]): Array<{ start: number; end: number }> {
  const ranges: Array<{ start: number; end: number }> = [];
  for (const symbol of symbols) {
    if (symbol.at === undefined) continue;
    ranges.push({ start: symbol.at, end: symbol.at + sizeInBytes(symbol.size) });
  }
  return ranges;
}

/** Lowest address at or after `address` where `size` bytes overlap no fixed range. */
function clearOf(
  fixed: ReadonlyArray<{ start: number; end: number }>,
  address: number,
  size: number,
): number {
  let at = address;
  for (;;) {
    const hit = fixed.find((r) => at < r.end && r.start < at + size);
    if (!hit) return at;
    at = hit.end;
  }
}
