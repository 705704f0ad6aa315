import { ATARI_REGISTERS } from '../target/atari.js';
import type { EmittedProgram, XexArtifact } from './types.js';

function word(value: number): number[] {
  return [value & 0xff, (value >> 8) & 0xff];
}

/**
 * Create an Atari DOS executable: the `$FFFF` marker, one segment holding the code image, and a
 * segment that stores the entry address into `RUNAD`.
 *
 * Segment end addresses are inclusive.
 */
export function writeXex(program: EmittedProgram): XexArtifact {
  const { origin, end, image, labels } = program.layout;
  const entry = program.entry !== undefined ? (labels.get(program.entry) ?? origin) : origin;
  const runad = ATARI_REGISTERS.RUNAD;

  const bytes: number[] = [0xff, 0xff];
  if (image.length > 0) {
    bytes.push(...word(origin), ...word(end - 1), ...image);
  }
  bytes.push(...word(runad), ...word(runad + 1), ...word(entry));
  return { kind: 'xex', bytes: Uint8Array.from(bytes) };
}
