import type { Register, StreamItem } from '../m6502/instruction.js';
import { streamBytes, streamCycles } from '../m6502/instruction.js';

/**
 * One legal encoding of one IR operation.
 *
 * `register` is the register that carries the data (`none` for read-modify-write templates that
 * operate on memory directly).
 */
export interface InstructionCandidate {
  template: string;
  register: Register | 'none';
  items: StreamItem[];
  bytes: number;
  cycles: number;
}

export function candidate(
  template: string,
  register: Register | 'none',
  items: StreamItem[],
): InstructionCandidate {
  return { template, register, items, bytes: streamBytes(items), cycles: streamCycles(items) };
}

function registerRank(register: Register | 'none'): number {
  return register === 'X' || register === 'Y' ? 1 : 0;
}

/**
 * Pick the lowest byte cost; ties prefer accumulator templates, then fewer cycles, then the
 * earlier candidate.
 */
export function chooseCandidate(
  candidates: readonly InstructionCandidate[],
): InstructionCandidate | undefined {
  let best: InstructionCandidate | undefined;
  for (const c of candidates) {
    if (
      !best ||
      c.bytes < best.bytes ||
      (c.bytes === best.bytes && registerRank(c.register) < registerRank(best.register)) ||
      (c.bytes === best.bytes &&
        registerRank(c.register) === registerRank(best.register) &&
        c.cycles < best.cycles)
    ) {
      best = c;
    }
  }
  return best;
}
