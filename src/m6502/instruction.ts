import type { AddressingMode } from './modes.js';
import { byteCost, cycleCost } from './opcodes.js';

export type Register = 'A' | 'X' | 'Y';

/**
 * IR operation an instruction was selected for.
 */
export interface OpOrigin {
  /** 0-based index into `IrProgram.ops`. */
  opIndex: number;
  file: string;
  line?: number;
  column?: number;
  /** IR text of the operation (as written, or rendered for programmatic IR). */
  text: string;
}

/**
 * A resolved memory location.
 *
 * `address` is final (zero-page offset or absolute address). `symbol`/`offset` keep the symbolic
 * spelling for the native dialect (`V_name+offset`).
 */
export interface MemRef {
  address: number;
  symbol?: string;
  offset: number;
  /** Reads/writes have side effects (hardware registers); never merged or removed. */
  volatile: boolean;
}

export type Operand =
  | { kind: 'none' }
  | { kind: 'imm'; value: number }
  | { kind: 'mem'; ref: MemRef }
  | { kind: 'label'; label: string };

export interface Instruction {
  kind: 'ins';
  mnemonic: string;
  mode: AddressingMode;
  operand: Operand;
  origin?: OpOrigin;
}

export interface LabelItem {
  kind: 'label';
  name: string;
  /** Created by the back end (`__L1`), free to remove when unreferenced. */
  generated: boolean;
  /** Subroutine entry: starts a new stack-tracking scope, never removed. */
  proc: boolean;
  origin?: OpOrigin;
}

export type StreamItem = Instruction | LabelItem;

/**
 * Ordered instruction and label sequence; the unit optimized and validated.
 */
export interface InstructionStream {
  items: StreamItem[];
  /** Entry procedure label, when the program declares one. */
  entry?: string;
}

export const NO_OPERAND: Operand = { kind: 'none' };

export function ins(
  mnemonic: string,
  mode: AddressingMode,
  operand: Operand = NO_OPERAND,
  origin?: OpOrigin,
): Instruction {
  return { kind: 'ins', mnemonic, mode, operand, ...(origin ? { origin } : {}) };
}

export function label(
  name: string,
  opts?: { generated?: boolean; proc?: boolean; origin?: OpOrigin },
): LabelItem {
  return {
    kind: 'label',
    name,
    generated: opts?.generated ?? false,
    proc: opts?.proc ?? false,
    ...(opts?.origin ? { origin: opts.origin } : {}),
  };
}

export function imm(value: number): Operand {
  return { kind: 'imm', value: value & 0xff };
}

export function mem(ref: MemRef): Operand {
  return { kind: 'mem', ref };
}

export function labelRef(name: string): Operand {
  return { kind: 'label', label: name };
}

export function absRef(address: number, volatile = false): MemRef {
  return { address: address & 0xffff, offset: 0, volatile };
}

export function isInstruction(item: StreamItem): item is Instruction {
  return item.kind === 'ins';
}

export function instructionBytes(i: Instruction): number {
  return byteCost(i.mode);
}

export function instructionCycles(i: Instruction): number {
  return cycleCost(i.mnemonic, i.mode);
}

/**
 * Nominal byte cost of a stream (branches counted as 2 bytes, labels as 0).
 */
export function streamBytes(items: readonly StreamItem[]): number {
  let total = 0;
  for (const item of items) {
    if (item.kind === 'ins') total += instructionBytes(item);
  }
  return total;
}

export function streamCycles(items: readonly StreamItem[]): number {
  let total = 0;
  for (const item of items) {
    if (item.kind === 'ins') total += instructionCycles(item);
  }
  return total;
}

export const CONDITIONAL_BRANCHES: ReadonlySet<string> = new Set([
  'BCC',
  'BCS',
  'BEQ',
  'BNE',
  'BMI',
  'BPL',
  'BVC',
  'BVS',
]);

const INVERTED_BRANCH: Readonly<Record<string, string>> = {
  BCC: 'BCS',
  BCS: 'BCC',
  BEQ: 'BNE',
  BNE: 'BEQ',
  BMI: 'BPL',
  BPL: 'BMI',
  BVC: 'BVS',
  BVS: 'BVC',
};

export function invertBranch(mnemonic: string): string | undefined {
  return INVERTED_BRANCH[mnemonic];
}

export function isConditionalBranch(i: Instruction): boolean {
  return CONDITIONAL_BRANCHES.has(i.mnemonic);
}

const FLOW_ENDERS: ReadonlySet<string> = new Set(['JMP', 'RTS', 'RTI', 'JAM']);

/** Instructions after which control never falls through. */
export function endsFlow(i: Instruction): boolean {
  return FLOW_ENDERS.has(i.mnemonic);
}

/** Label an instruction transfers control to, if any. */
export function targetLabel(i: Instruction): string | undefined {
  return i.operand.kind === 'label' ? i.operand.label : undefined;
}

function hex(value: number, digits: number): string {
  return `$${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}

/**
 * Canonical native-syntax text for an instruction, with numeric operands.
 *
 * Used in diagnostics; the dialect writers in `formats/` render symbolic output.
 */
export function formatInstruction(i: Instruction): string {
  const op = i.operand;
  const addr = (digits: number): string => {
    if (op.kind === 'mem') return hex(op.ref.address, digits);
    if (op.kind === 'label') return op.label;
    return '?';
  };
  switch (i.mode) {
    case 'imp':
      return i.mnemonic;
    case 'acc':
      return `${i.mnemonic} A`;
    case 'imm':
      return `${i.mnemonic} #${op.kind === 'imm' ? hex(op.value, 2) : '?'}`;
    case 'zp':
      return `${i.mnemonic} ${addr(2)}`;
    case 'zpx':
      return `${i.mnemonic} ${addr(2)},X`;
    case 'zpy':
      return `${i.mnemonic} ${addr(2)},Y`;
    case 'abs':
    case 'rel':
      return `${i.mnemonic} ${addr(4)}`;
    case 'absx':
      return `${i.mnemonic} ${addr(4)},X`;
    case 'absy':
      return `${i.mnemonic} ${addr(4)},Y`;
    case 'ind':
      return `${i.mnemonic} (${addr(4)})`;
    case 'indx':
      return `${i.mnemonic} (${addr(2)},X)`;
    case 'indy':
      return `${i.mnemonic} (${addr(2)}),Y`;
  }
}
