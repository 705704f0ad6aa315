import type { Flag } from '../m6502/effects.js';
import { instructionEffects } from '../m6502/effects.js';
import type { Instruction, StreamItem } from '../m6502/instruction.js';
import { instructionBytes, targetLabel } from '../m6502/instruction.js';

/**
 * Labels referenced by an instruction operand, plus the entry label.
 */
export function referencedLabels(items: readonly StreamItem[], entry?: string): Set<string> {
  const out = new Set<string>();
  if (entry !== undefined) out.add(entry);
  for (const item of items) {
    if (item.kind !== 'ins') continue;
    const target = targetLabel(item);
    if (target !== undefined) out.add(target);
  }
  return out;
}

/**
 * Nominal byte offset of every item and of every label, with branches at 2 bytes.
 */
export function nominalOffsets(items: readonly StreamItem[]): {
  offsets: number[];
  labels: Map<string, number>;
} {
  const offsets: number[] = [];
  const labels = new Map<string, number>();
  let at = 0;
  for (const item of items) {
    offsets.push(at);
    if (item.kind === 'label') {
      if (!labels.has(item.name)) labels.set(item.name, at);
    } else {
      at += instructionBytes(item);
    }
  }
  return { offsets, labels };
}

/**
 * Index of the label named `name`.
 */
export function labelIndex(items: readonly StreamItem[], name: string): number | undefined {
  const i = items.findIndex((item) => item.kind === 'label' && item.name === name);
  return i >= 0 ? i : undefined;
}

/**
 * First instruction at or after `index`, skipping labels only.
 */
export function instructionAt(
  items: readonly StreamItem[],
  index: number,
): { instruction: Instruction; index: number } | undefined {
  for (let i = index; i < items.length; i++) {
    const item = items[i];
    if (!item) break;
    if (item.kind === 'ins') return { instruction: item, index: i };
  }
  return undefined;
}

/**
 * Whether any of `flags`, as left by the instruction at `index`, may be read later.
 *
 * Scans forward until every flag is overwritten. Labels and control transfers end the scan
 * conservatively: the flags count as observed.
 */
export function flagsObserved(
  items: readonly StreamItem[],
  index: number,
  flags: readonly Flag[],
): boolean {
  const pending = new Set(flags);
  for (let i = index + 1; i < items.length; i++) {
    const item = items[i];
    if (!item || item.kind === 'label') return true;
    const effects = instructionEffects(item);
    for (const f of effects.flagsIn) if (pending.has(f)) return true;
    if (effects.control !== 'none') return true;
    for (const f of effects.flagsOut) pending.delete(f);
    if (pending.size === 0) return false;
  }
  return true;
}
