import type { Instruction, StreamItem } from '../m6502/instruction.js';
import {
  endsFlow,
  invertBranch,
  isConditionalBranch,
  labelRef,
  targetLabel,
} from '../m6502/instruction.js';
import { isLegalMode } from '../m6502/opcodes.js';
import { zeroPageForm } from '../m6502/modes.js';
import {
  flagsObserved,
  instructionAt,
  labelIndex,
  nominalOffsets,
  referencedLabels,
} from './analysis.js';
import { emptyValues, loadRegister, stepValues, storeRegister, valueKey } from './registers.js';

export type RuleName =
  | 'redundant-load'
  | 'redundant-store'
  | 'branch-to-branch'
  | 'jump-to-next'
  | 'branch-over-jump'
  | 'zero-page-substitution'
  | 'unreachable-code'
  | 'unreferenced-label';

export interface RuleResult {
  items: StreamItem[];
  count: number;
}

export interface RuleContext {
  entry?: string;
}

/**
 * A rewrite that never increases the byte cost and never changes flags read later.
 *
 * `apply` returns the rewritten items and how many rewrites it made, or `undefined` when nothing
 * matched.
 */
export interface RewriteRule {
  name: RuleName;
  /** Runs at the default optimization level as well. */
  cheap: boolean;
  apply(items: readonly StreamItem[], ctx: RuleContext): RuleResult | undefined;
}

/**
 * Nominal distance a retargeted conditional branch may span. Kept below the 8-bit displacement
 * range so layout never has to relax a branch the optimizer created.
 */
export const SAFE_BRANCH_DISTANCE = 100;

function without(items: readonly StreamItem[], drop: ReadonlySet<number>): StreamItem[] {
  return items.filter((_, i) => !drop.has(i));
}

const redundantLoad: RewriteRule = {
  name: 'redundant-load',
  cheap: false,
  apply(items) {
    const values = emptyValues();
    const drop = new Set<number>();
    items.forEach((item, i) => {
      if (item.kind === 'ins') {
        const reg = loadRegister(item);
        const key = valueKey(item);
        const known = reg !== undefined && key !== undefined && values[reg].has(key);
        if (known && !flagsObserved(items, i, ['N', 'Z'])) {
          drop.add(i);
          return;
        }
      }
      stepValues(values, item);
    });
    return drop.size > 0 ? { items: without(items, drop), count: drop.size } : undefined;
  },
};

const redundantStore: RewriteRule = {
  name: 'redundant-store',
  cheap: false,
  apply(items) {
    const values = emptyValues();
    const drop = new Set<number>();
    items.forEach((item, i) => {
      if (item.kind === 'ins') {
        const reg = storeRegister(item);
        const key = valueKey(item);
        if (reg && key !== undefined && values[reg].has(key)) {
          drop.add(i);
          return;
        }
      }
      stepValues(values, item);
    });
    return drop.size > 0 ? { items: without(items, drop), count: drop.size } : undefined;
  },
};

function isLabelJump(i: Instruction | undefined): i is Instruction {
  return i !== undefined && i.mnemonic === 'JMP' && i.mode === 'abs' && i.operand.kind === 'label';
}

const branchToBranch: RewriteRule = {
  name: 'branch-to-branch',
  cheap: false,
  apply(items) {
    const { offsets, labels } = nominalOffsets(items);
    let count = 0;
    const out = items.map((item, i) => {
      if (item.kind !== 'ins') return item;
      const target = targetLabel(item);
      if (target === undefined) return item;
      if (item.mnemonic !== 'JMP' && !isConditionalBranch(item)) return item;
      const at = labelIndex(items, target);
      if (at === undefined) return item;
      const next = instructionAt(items, at)?.instruction;
      if (!isLabelJump(next)) return item;
      const final = targetLabel(next);
      if (final === undefined || final === target) return item;
      if (isConditionalBranch(item)) {
        const to = labels.get(final);
        const from = offsets[i] ?? 0;
        if (to === undefined || Math.abs(to - from) > SAFE_BRANCH_DISTANCE) return item;
      }
      count++;
      return { ...item, operand: labelRef(final) };
    });
    return count > 0 ? { items: out, count } : undefined;
  },
};

/** Only labels separate `index` from the definition of `name`. */
function fallsThroughTo(items: readonly StreamItem[], index: number, name: string): boolean {
  for (let i = index + 1; i < items.length; i++) {
    const item = items[i];
    if (!item || item.kind !== 'label') return false;
    if (item.name === name) return true;
  }
  return false;
}

const jumpToNext: RewriteRule = {
  name: 'jump-to-next',
  cheap: true,
  apply(items) {
    const drop = new Set<number>();
    items.forEach((item, i) => {
      if (item.kind !== 'ins') return;
      if (!isLabelJump(item) && !isConditionalBranch(item)) return;
      const target = targetLabel(item);
      if (target !== undefined && fallsThroughTo(items, i, target)) drop.add(i);
    });
    return drop.size > 0 ? { items: without(items, drop), count: drop.size } : undefined;
  },
};

const branchOverJump: RewriteRule = {
  name: 'branch-over-jump',
  cheap: false,
  apply(items) {
    const { offsets, labels } = nominalOffsets(items);
    const out: StreamItem[] = [];
    let count = 0;
    for (let i = 0; i < items.length; i++) {
      const item = items[i];
      if (!item) continue;
      const after = items[i + 1];
      const jump = after?.kind === 'ins' ? after : undefined;
      if (item.kind === 'ins' && isConditionalBranch(item) && isLabelJump(jump)) {
        const over = targetLabel(item);
        const final = targetLabel(jump);
        const inverted = invertBranch(item.mnemonic);
        const to = final !== undefined ? labels.get(final) : undefined;
        if (
          over !== undefined &&
          final !== undefined &&
          inverted !== undefined &&
          to !== undefined &&
          fallsThroughTo(items, i + 1, over) &&
          Math.abs(to - (offsets[i] ?? 0)) <= SAFE_BRANCH_DISTANCE
        ) {
          out.push({ ...item, mnemonic: inverted, operand: labelRef(final) });
          i++;
          count++;
          continue;
        }
      }
      out.push(item);
    }
    return count > 0 ? { items: out, count } : undefined;
  },
};

const zeroPageSubstitution: RewriteRule = {
  name: 'zero-page-substitution',
  cheap: true,
  apply(items) {
    let count = 0;
    const out = items.map((item) => {
      if (item.kind !== 'ins' || item.mode !== 'abs' || item.operand.kind !== 'mem') return item;
      if (item.operand.ref.address > 0xff) return item;
      const zp = zeroPageForm(item.mode);
      if (!zp || !isLegalMode(item.mnemonic, zp)) return item;
      count++;
      return { ...item, mode: zp };
    });
    return count > 0 ? { items: out, count } : undefined;
  },
};

const unreachableCode: RewriteRule = {
  name: 'unreachable-code',
  cheap: false,
  apply(items, ctx) {
    const referenced = referencedLabels(items, ctx.entry);
    const drop = new Set<number>();
    let dead = false;
    items.forEach((item, i) => {
      if (item.kind === 'label') {
        if (item.proc || referenced.has(item.name)) dead = false;
        else if (dead) drop.add(i);
        return;
      }
      if (dead) {
        drop.add(i);
        return;
      }
      if (endsFlow(item)) dead = true;
    });
    return drop.size > 0 ? { items: without(items, drop), count: drop.size } : undefined;
  },
};

const unreferencedLabel: RewriteRule = {
  name: 'unreferenced-label',
  cheap: true,
  apply(items, ctx) {
    const referenced = referencedLabels(items, ctx.entry);
    const drop = new Set<number>();
    items.forEach((item, i) => {
      if (item.kind === 'label' && item.generated && !item.proc && !referenced.has(item.name)) {
        drop.add(i);
      }
    });
    return drop.size > 0 ? { items: without(items, drop), count: drop.size } : undefined;
  },
};

/**
 * Rules in application order.
 */
export const REWRITE_RULES: readonly RewriteRule[] = [
  zeroPageSubstitution,
  redundantLoad,
  redundantStore,
  branchToBranch,
  branchOverJump,
  jumpToNext,
  unreachableCode,
  unreferencedLabel,
];
