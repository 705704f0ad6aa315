import { instructionEffects } from '../m6502/effects.js';
import type { Instruction, Register, StreamItem } from '../m6502/instruction.js';

/**
 * Values a register is known to hold: `#n` for a constant, `@addr` for the current content of a
 * non-volatile memory byte.
 */
export type RegisterValues = Record<Register, Set<string>>;

export function emptyValues(): RegisterValues {
  return { A: new Set(), X: new Set(), Y: new Set() };
}

const LOADS: Readonly<Record<string, Register>> = { LDA: 'A', LDX: 'X', LDY: 'Y' };
const STORES: Readonly<Record<string, Register>> = { STA: 'A', STX: 'X', STY: 'Y' };
const TRANSFERS: Readonly<Record<string, [Register, Register]>> = {
  TAX: ['A', 'X'],
  TAY: ['A', 'Y'],
  TXA: ['X', 'A'],
  TYA: ['Y', 'A'],
};

export function loadRegister(i: Instruction): Register | undefined {
  return LOADS[i.mnemonic];
}

export function storeRegister(i: Instruction): Register | undefined {
  return STORES[i.mnemonic];
}

/**
 * Trackable operand value of a load or store: immediates and direct non-volatile memory.
 */
export function valueKey(i: Instruction): string | undefined {
  if (i.mode === 'imm' && i.operand.kind === 'imm') return `#${i.operand.value}`;
  if (i.mode !== 'zp' && i.mode !== 'abs') return undefined;
  if (i.operand.kind === 'mem' && !i.operand.ref.volatile) return `@${i.operand.ref.address}`;
  return undefined;
}

function forgetMemory(values: RegisterValues, key?: string): void {
  for (const r of ['A', 'X', 'Y'] as const) {
    if (key !== undefined) {
      values[r].delete(key);
      continue;
    }
    for (const k of [...values[r]]) if (k.startsWith('@')) values[r].delete(k);
  }
}

function reset(values: RegisterValues): void {
  values.A.clear();
  values.X.clear();
  values.Y.clear();
}

/**
 * Advance register knowledge over one stream item. Labels are join points and forget everything.
 */
export function stepValues(values: RegisterValues, item: StreamItem): void {
  if (item.kind === 'label') {
    reset(values);
    return;
  }

  const load = loadRegister(item);
  if (load) {
    const key = valueKey(item);
    values[load] = new Set(key !== undefined ? [key] : []);
    return;
  }

  const store = storeRegister(item);
  if (store && item.operand.kind === 'mem' && (item.mode === 'zp' || item.mode === 'abs')) {
    const key = `@${item.operand.ref.address}`;
    forgetMemory(values, key);
    if (!item.operand.ref.volatile) values[store].add(key);
    return;
  }

  const transfer = TRANSFERS[item.mnemonic];
  if (transfer) {
    const [from, to] = transfer;
    values[to] = new Set(values[from]);
    return;
  }

  const effects = instructionEffects(item);
  for (const r of ['A', 'X', 'Y'] as const) {
    if (effects.writes.has(r)) values[r].clear();
  }
  if (effects.memory === 'write' || effects.memory === 'rmw') {
    const direct =
      item.operand.kind === 'mem' && (item.mode === 'zp' || item.mode === 'abs')
        ? `@${item.operand.ref.address}`
        : undefined;
    forgetMemory(values, direct);
  }
  if (effects.control !== 'none' && effects.control !== 'branch') reset(values);
}
