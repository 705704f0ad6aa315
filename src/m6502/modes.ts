/**
 * 6502 addressing modes.
 *
 * - `imp` implied, `acc` accumulator, `imm` immediate
 * - `zp`, `zpx`, `zpy`: zero page, optionally indexed (the sum wraps inside page 0)
 * - `abs`, `absx`, `absy`: absolute, optionally indexed
 * - `ind`: `JMP (addr)` only
 * - `indx`: `(zp,X)`, `indy`: `(zp),Y`
 * - `rel`: signed 8-bit branch displacement
 */
export type AddressingMode =
  | 'imp'
  | 'acc'
  | 'imm'
  | 'zp'
  | 'zpx'
  | 'zpy'
  | 'abs'
  | 'absx'
  | 'absy'
  | 'ind'
  | 'indx'
  | 'indy'
  | 'rel';

export const ADDRESSING_MODES: readonly AddressingMode[] = [
  'imp',
  'acc',
  'imm',
  'zp',
  'zpx',
  'zpy',
  'abs',
  'absx',
  'absy',
  'ind',
  'indx',
  'indy',
  'rel',
];

export function isAddressingMode(value: string): value is AddressingMode {
  return (ADDRESSING_MODES as readonly string[]).includes(value);
}

/**
 * Number of operand bytes following the opcode byte.
 */
export function operandSize(mode: AddressingMode): 0 | 1 | 2 {
  switch (mode) {
    case 'imp':
    case 'acc':
      return 0;
    case 'imm':
    case 'zp':
    case 'zpx':
    case 'zpy':
    case 'indx':
    case 'indy':
    case 'rel':
      return 1;
    case 'abs':
    case 'absx':
    case 'absy':
    case 'ind':
      return 2;
  }
}

export type IndexRegister = 'X' | 'Y';

export function indexRegisterOf(mode: AddressingMode): IndexRegister | undefined {
  switch (mode) {
    case 'zpx':
    case 'absx':
    case 'indx':
      return 'X';
    case 'zpy':
    case 'absy':
    case 'indy':
      return 'Y';
    default:
      return undefined;
  }
}

/** Modes whose operand is a memory address rather than a value, a register or a branch offset. */
export function isMemoryMode(mode: AddressingMode): boolean {
  return mode !== 'imp' && mode !== 'acc' && mode !== 'imm' && mode !== 'rel';
}

/**
 * Zero-page counterpart of an absolute mode, if the mode has one.
 */
export function zeroPageForm(mode: AddressingMode): AddressingMode | undefined {
  switch (mode) {
    case 'abs':
      return 'zp';
    case 'absx':
      return 'zpx';
    case 'absy':
      return 'zpy';
    default:
      return undefined;
  }
}

