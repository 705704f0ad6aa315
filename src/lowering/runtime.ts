import type { StreamItem } from '../m6502/instruction.js';
import { absRef, ins, imm, label, labelRef, mem } from '../m6502/instruction.js';
import { ATARI_REGISTERS } from '../target/atari.js';

/**
 * A fixed routine appended to the stream when a program calls it by name.
 */
export interface RuntimeRoutine {
  name: string;
  description: string;
  /** Build the routine body; `fresh` returns a new generated label name. */
  build(fresh: () => string): StreamItem[];
}

const synchro: RuntimeRoutine = {
  name: 'SYNCHRO',
  description: 'wait for the last visible scan line (PAL or NTSC)',
  build(fresh) {
    const pal = fresh();
    const wait = fresh();
    const palReg = mem(absRef(ATARI_REGISTERS.PAL, true));
    const vcount = mem(absRef(ATARI_REGISTERS.VCOUNT, true));
    return [
      label('SYNCHRO', { proc: true }),
      ins('LDA', 'abs', palReg),
      // PAL machines read %0001, NTSC %1111.
      ins('AND', 'imm', imm(0x0e)),
      ins('BEQ', 'rel', labelRef(pal)),
      ins('LDA', 'imm', imm(120)),
      ins('BNE', 'rel', labelRef(wait)),
      label(pal, { generated: true }),
      ins('LDA', 'imm', imm(145)),
      label(wait, { generated: true }),
      ins('CMP', 'abs', vcount),
      ins('BNE', 'rel', labelRef(wait)),
      ins('RTS', 'imp'),
    ];
  },
};

export const LAST_CMP_EQUAL = 'LAST_CMP_EQUAL';

const lastCmpEqual: RuntimeRoutine = {
  name: LAST_CMP_EQUAL,
  description: 'A := 1 when the zero flag is set, 0 otherwise',
  build(fresh) {
    const equal = fresh();
    return [
      label(LAST_CMP_EQUAL, { proc: true }),
      ins('BEQ', 'rel', labelRef(equal)),
      ins('LDA', 'imm', imm(0)),
      ins('RTS', 'imp'),
      label(equal, { generated: true }),
      ins('LDA', 'imm', imm(1)),
      ins('RTS', 'imp'),
    ];
  },
};

const ROUTINES: ReadonlyMap<string, RuntimeRoutine> = new Map(
  [synchro, lastCmpEqual].map((r): [string, RuntimeRoutine] => [r.name, r]),
);

export function runtimeRoutine(name: string): RuntimeRoutine | undefined {
  return ROUTINES.get(name);
}

export function isRuntimeRoutine(name: string): boolean {
  return ROUTINES.has(name);
}
