import type { Layout } from '../lowering/layout.js';
import { instructionEffects, writesMemory } from '../m6502/effects.js';
import type { Instruction } from '../m6502/instruction.js';
import { lookupOpcode } from '../m6502/opcodes.js';
import { indexRegisterOf } from '../m6502/modes.js';
import type { MemoryRegion } from '../target/atari.js';
import { isIoAddress, regionAt, regionsOverlapping } from '../target/atari.js';
import type { KnownRegisters } from './state.js';
import { knownRegisters } from './state.js';
import { checkStack } from './stack.js';

export type HazardRuleName =
  | 'illegal-opcode'
  | 'reserved-write'
  | 'io-read-modify-write'
  | 'io-indexed-dummy-read'
  | 'stack-underflow'
  | 'stack-imbalance'
  | 'stack-overflow'
  | 'zero-page-index-wrap'
  | 'page-cross-timing'
  | 'indirect-jump-page-bug'
  | 'zero-page-pointer-wrap'
  | 'absolute-storage-overlap';

/**
 * Placement of a symbol in memory, for the storage rules.
 */
export interface StorageExtent {
  name: string;
  address: number;
  size: number;
  /** Placed by the allocator outside zero page (spilled). */
  spilled: boolean;
  file?: string;
  line?: number;
  column?: number;
}

export interface ValidationContext {
  layout: Layout;
  storage: readonly StorageExtent[];
  /** Bytes of hardware stack a program may use. */
  stackBudget: number;
  /** Known register values before each placed item. */
  known: readonly KnownRegisters[];
}

/**
 * One hazard. `index` points into `layout.placed`; storage findings name a symbol instead.
 */
export interface Finding {
  rule: HazardRuleName;
  message: string;
  index?: number;
  symbol?: StorageExtent;
}

export interface HazardRule {
  name: HazardRuleName | 'stack';
  check(ctx: ValidationContext): Finding[];
}

function hex(value: number, digits = 4): string {
  return `$${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}

function baseAddress(i: Instruction): number | undefined {
  return i.operand.kind === 'mem' ? i.operand.ref.address : undefined;
}

/** Visit every placed instruction with its index and known registers. */
function eachInstruction(
  ctx: ValidationContext,
  visit: (i: Instruction, index: number, known: KnownRegisters) => Finding | undefined,
): Finding[] {
  const out: Finding[] = [];
  ctx.layout.placed.forEach((placed, index) => {
    if (placed.item.kind !== 'ins') return;
    const known = ctx.known[index] ?? { A: undefined, X: undefined, Y: undefined };
    const finding = visit(placed.item, index, known);
    if (finding) out.push(finding);
  });
  return out;
}

const illegalOpcode: HazardRule = {
  name: 'illegal-opcode',
  check: (ctx) =>
    eachInstruction(ctx, (i, index) => {
      const info = lookupOpcode(i.mnemonic, i.mode);
      const code = info ? ` (opcode ${hex(info.code, 2)})` : '';
      if (i.mnemonic === 'JAM') {
        return { rule: 'illegal-opcode', index, message: `JAM${code} locks up the CPU` };
      }
      if (i.mnemonic === 'BRK') {
        const message = 'BRK enters the OS interrupt handler and does not return here';
        return { rule: 'illegal-opcode', index, message };
      }
      if (info?.illegal) {
        const message = `undocumented opcode ${i.mnemonic}${code}`;
        return { rule: 'illegal-opcode', index, message };
      }
      return undefined;
    }),
};

function describe(region: MemoryRegion): string {
  return `${region.name} ${hex(region.start)}-${hex(region.end)}`;
}

const DIRECT_OR_INDEXED = new Set(['zp', 'zpx', 'zpy', 'abs', 'absx', 'absy']);

const reservedWrite: HazardRule = {
  name: 'reserved-write',
  check: (ctx) =>
    eachInstruction(ctx, (i, index) => {
      const base = baseAddress(i);
      if (base === undefined || !DIRECT_OR_INDEXED.has(i.mode)) return undefined;
      if (!writesMemory(i)) return undefined;
      const region = regionAt(base);
      if (!region || region.kind === 'io') return undefined;
      const message = `write to ${hex(base)} in ${describe(region)}`;
      return { rule: 'reserved-write', index, message };
    }),
};

const ioReadModifyWrite: HazardRule = {
  name: 'io-read-modify-write',
  check: (ctx) =>
    eachInstruction(ctx, (i, index) => {
      const base = baseAddress(i);
      if (base === undefined || instructionEffects(i).memory !== 'rmw') return undefined;
      if (!isIoAddress(base)) return undefined;
      const message = `${i.mnemonic} on I/O register ${hex(base)} writes it twice`;
      return { rule: 'io-read-modify-write', index, message };
    }),
};

const ioIndexedDummyRead: HazardRule = {
  name: 'io-indexed-dummy-read',
  check: (ctx) =>
    eachInstruction(ctx, (i, index) => {
      const base = baseAddress(i);
      if (base === undefined || (i.mode !== 'absx' && i.mode !== 'absy')) return undefined;
      if (!writesMemory(i) || !isIoAddress(base)) return undefined;
      const message = `indexed ${i.mnemonic} at I/O base ${hex(base)} performs a dummy read`;
      return { rule: 'io-indexed-dummy-read', index, message };
    }),
};

const zeroPageIndexWrap: HazardRule = {
  name: 'zero-page-index-wrap',
  check: (ctx) =>
    eachInstruction(ctx, (i, index, known) => {
      const base = baseAddress(i);
      if (base === undefined || (i.mode !== 'zpx' && i.mode !== 'zpy' && i.mode !== 'indx')) {
        return undefined;
      }
      const reg = indexRegisterOf(i.mode);
      const value = reg ? known[reg] : undefined;
      if (value === undefined || base + value <= 0xff) return undefined;
      const wrapped = hex((base + value) & 0xff, 2);
      const message = `${hex(base, 2)}+${reg ?? ''}=${value} wraps to ${wrapped}`;
      return { rule: 'zero-page-index-wrap', index, message };
    }),
};

const pageCrossTiming: HazardRule = {
  name: 'page-cross-timing',
  check: (ctx) =>
    eachInstruction(ctx, (i, index, known) => {
      const base = baseAddress(i);
      if (base === undefined || (i.mode !== 'absx' && i.mode !== 'absy')) return undefined;
      if (!lookupOpcode(i.mnemonic, i.mode)?.pageCross) return undefined;
      const reg = indexRegisterOf(i.mode);
      const value = reg ? known[reg] : undefined;
      if (value === undefined || (base & 0xff) + value <= 0xff) return undefined;
      const message = `${hex(base)}+${reg ?? ''}=${value} crosses a page (one extra cycle)`;
      return { rule: 'page-cross-timing', index, message };
    }),
};

const indirectJumpPageBug: HazardRule = {
  name: 'indirect-jump-page-bug',
  check: (ctx) =>
    eachInstruction(ctx, (i, index) => {
      const base = baseAddress(i);
      if (base === undefined || i.mode !== 'ind' || (base & 0xff) !== 0xff) return undefined;
      const hi = hex(base & 0xff00);
      const message = `JMP (${hex(base)}) reads its high byte from ${hi}, not ${hex(base + 1)}`;
      return { rule: 'indirect-jump-page-bug', index, message };
    }),
};

const zeroPagePointerWrap: HazardRule = {
  name: 'zero-page-pointer-wrap',
  check: (ctx) =>
    eachInstruction(ctx, (i, index, known) => {
      const base = baseAddress(i);
      if (base === undefined) return undefined;
      let pointer: number | undefined;
      if (i.mode === 'indy') pointer = base;
      else if (i.mode === 'indx' && known.X !== undefined) pointer = (base + known.X) & 0xff;
      if (pointer !== 0xff) return undefined;
      const message = 'pointer at $FF takes its high byte from $00';
      return { rule: 'zero-page-pointer-wrap', index, message };
    }),
};

const absoluteStorageOverlap: HazardRule = {
  name: 'absolute-storage-overlap',
  check: (ctx) => {
    const out: Finding[] = [];
    const { origin, end } = ctx.layout;
    for (const symbol of ctx.storage) {
      if (!symbol.spilled) continue;
      const last = symbol.address + symbol.size;
      for (const region of regionsOverlapping(symbol.address, last)) {
        const at = `storage of "${symbol.name}" at ${hex(symbol.address)}`;
        const message = `${at} overlaps ${describe(region)}`;
        out.push({ rule: 'absolute-storage-overlap', message, symbol });
      }
      if (symbol.address < end && last > origin) {
        const message =
          `storage of "${symbol.name}" at ${hex(symbol.address)} overlaps the code ` +
          `${hex(origin)}-${hex(end - 1)}`;
        out.push({ rule: 'absolute-storage-overlap', message, symbol });
      }
    }
    return out;
  },
};

const stack: HazardRule = {
  name: 'stack',
  check: (ctx) => checkStack(ctx.layout.stream, ctx.stackBudget),
};

/**
 * Hazard rules in reporting order.
 */
export const HAZARD_RULES: readonly HazardRule[] = [
  illegalOpcode,
  reservedWrite,
  ioReadModifyWrite,
  ioIndexedDummyRead,
  stack,
  zeroPageIndexWrap,
  pageCrossTiming,
  indirectJumpPageBug,
  zeroPagePointerWrap,
  absoluteStorageOverlap,
];

export function validationContext(
  layout: Layout,
  storage: readonly StorageExtent[],
  stackBudget: number,
): ValidationContext {
  return { layout, storage, stackBudget, known: knownRegisters(layout.stream.items) };
}
