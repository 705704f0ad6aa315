/**
 * Atari 8-bit memory map as seen by the allocator defaults and the crash-safety validator.
 */

export type RegionKind = 'os-zero-page' | 'stack' | 'io' | 'reserved' | 'rom';

export interface MemoryRegion {
  name: string;
  /** Inclusive. */
  start: number;
  /** Inclusive. */
  end: number;
  kind: RegionKind;
}

export const ATARI_REGIONS: readonly MemoryRegion[] = [
  { name: 'OS zero page', start: 0x0000, end: 0x007f, kind: 'os-zero-page' },
  { name: 'hardware stack', start: 0x0100, end: 0x01ff, kind: 'stack' },
  { name: 'OS ROM', start: 0xc000, end: 0xcfff, kind: 'rom' },
  { name: 'GTIA', start: 0xd000, end: 0xd0ff, kind: 'io' },
  { name: 'PBI', start: 0xd100, end: 0xd1ff, kind: 'reserved' },
  { name: 'POKEY', start: 0xd200, end: 0xd2ff, kind: 'io' },
  { name: 'PIA', start: 0xd300, end: 0xd3ff, kind: 'io' },
  { name: 'ANTIC', start: 0xd400, end: 0xd4ff, kind: 'io' },
  { name: 'cartridge control', start: 0xd500, end: 0xd5ff, kind: 'reserved' },
  { name: 'unused I/O', start: 0xd600, end: 0xd7ff, kind: 'reserved' },
  { name: 'floating point and OS ROM', start: 0xd800, end: 0xffff, kind: 'rom' },
];

/** Hardware and OS locations referenced by the runtime and the executable writer. */
export const ATARI_REGISTERS = {
  /** GTIA: video standard (read). */
  PAL: 0xd014,
  /** ANTIC: current scan line / 2 (read). */
  VCOUNT: 0xd40b,
  /** OS: run address vector used by the loader. */
  RUNAD: 0x02e0,
} as const;

/** Zero-page bytes left free by the OS. */
export const ATARI_USER_ZERO_PAGE = { start: 0x80, end: 0x100 } as const;

/** Page 6 is left free by the OS and BASIC. */
export const ATARI_DEFAULT_ABSOLUTE_BASE = 0x0600;

export const ATARI_DEFAULT_ORIGIN = 0x2000;

export function regionAt(address: number): MemoryRegion | undefined {
  const a = address & 0xffff;
  return ATARI_REGIONS.find((r) => a >= r.start && a <= r.end);
}

export function isIoAddress(address: number): boolean {
  return regionAt(address)?.kind === 'io';
}

/**
 * Regions overlapping `[start, end)`.
 */
export function regionsOverlapping(start: number, end: number): MemoryRegion[] {
  return ATARI_REGIONS.filter((r) => start <= r.end && end > r.start);
}
