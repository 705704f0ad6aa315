import type { FormatWriters } from './types.js';
import { writeAsm } from './writeAsm.js';
import { writeListing } from './writeListing.js';
import { writeXex } from './writeXex.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to
 * disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeAsm,
  writeXex,
  writeListing,
};
