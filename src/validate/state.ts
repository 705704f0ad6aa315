import type { Register, StreamItem } from '../m6502/instruction.js';

/** Register contents known at a point of the stream, `undefined` where unknown. */
export type KnownRegisters = Record<Register, number | undefined>;

function unknown(): KnownRegisters {
  return { A: undefined, X: undefined, Y: undefined };
}

function step(known: KnownRegisters, item: StreamItem): KnownRegisters {
  if (item.kind === 'label') return unknown();
  const next = { ...known };
  const value = item.operand.kind === 'imm' ? item.operand.value : undefined;
  const bump = (v: number | undefined, by: number) => (v === undefined ? v : (v + by) & 0xff);
  switch (item.mnemonic) {
    case 'LDA':
      next.A = item.mode === 'imm' ? value : undefined;
      break;
    case 'LDX':
      next.X = item.mode === 'imm' ? value : undefined;
      break;
    case 'LDY':
      next.Y = item.mode === 'imm' ? value : undefined;
      break;
    case 'TAX':
      next.X = known.A;
      break;
    case 'TAY':
      next.Y = known.A;
      break;
    case 'TXA':
      next.A = known.X;
      break;
    case 'TYA':
      next.A = known.Y;
      break;
    case 'INX':
      next.X = bump(known.X, 1);
      break;
    case 'DEX':
      next.X = bump(known.X, -1);
      break;
    case 'INY':
      next.Y = bump(known.Y, 1);
      break;
    case 'DEY':
      next.Y = bump(known.Y, -1);
      break;
    case 'STA':
    case 'STX':
    case 'STY':
    case 'SAX':
    case 'CMP':
    case 'CPX':
    case 'CPY':
    case 'BIT':
    case 'PHA':
    case 'PHP':
    case 'CLC':
    case 'SEC':
    case 'CLI':
    case 'SEI':
    case 'CLD':
    case 'SED':
    case 'CLV':
    case 'NOP':
    case 'INC':
    case 'DEC':
    case 'BCC':
    case 'BCS':
    case 'BEQ':
    case 'BNE':
    case 'BMI':
    case 'BPL':
    case 'BVC':
    case 'BVS':
      break;
    case 'ASL':
    case 'LSR':
    case 'ROL':
    case 'ROR':
      if (item.mode === 'acc') next.A = undefined;
      break;
    case 'TSX':
      next.X = undefined;
      break;
    default:
      return unknown();
  }
  return next;
}

/**
 * Register values known before each item, tracked forward inside straight-line code. Labels and
 * instructions with effects not modeled here forget everything.
 */
export function knownRegisters(items: readonly StreamItem[]): KnownRegisters[] {
  const out: KnownRegisters[] = [];
  let known = unknown();
  for (const item of items) {
    out.push(known);
    known = step(known, item);
  }
  return out;
}
