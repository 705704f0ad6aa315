import type { InstructionStream, StreamItem } from '../m6502/instruction.js';
import { isConditionalBranch, targetLabel } from '../m6502/instruction.js';
import type { Finding } from './rules.js';

interface Scope {
  name: string;
  start: number;
  /** Exclusive. */
  end: number;
}

interface CallSite {
  callee: string;
  depth: number;
  index: number;
}

interface ScopeSummary {
  maxDepth: number;
  calls: CallSite[];
}

/** Procedure scopes: each proc label up to the next; code before the first forms its own scope. */
function scopes(items: readonly StreamItem[]): Scope[] {
  const out: Scope[] = [];
  let current: Scope = { name: '', start: 0, end: items.length };
  items.forEach((item, index) => {
    if (item.kind !== 'label' || !item.proc) return;
    if (index > current.start) out.push({ ...current, end: index });
    current = { name: item.name, start: index, end: items.length };
  });
  if (current.start < items.length) out.push(current);
  return out;
}

const PUSHES: Readonly<Record<string, number>> = { PHA: 1, PHP: 1, PLA: -1, PLP: -1 };

function summarize(
  items: readonly StreamItem[],
  scope: Scope,
  labels: ReadonlyMap<string, number>,
  findings: Finding[],
): ScopeSummary {
  const depthAt = new Map<number, number>();
  const reportedMerge = new Set<number>();
  const calls: CallSite[] = [];
  let maxDepth = 0;
  const work: Array<[number, number]> = [[scope.start, 0]];

  const inScope = (index: number | undefined): index is number =>
    index !== undefined && index >= scope.start && index < scope.end;

  const flow = (index: number | undefined, depth: number): void => {
    if (inScope(index)) work.push([index, depth]);
  };

  for (let next = work.pop(); next; next = work.pop()) {
    const [index, depth] = next;
    const seen = depthAt.get(index);
    if (seen !== undefined) {
      if (seen !== depth && !reportedMerge.has(index)) {
        reportedMerge.add(index);
        const message = `stack depth ${depth} meets depth ${seen} at a join point`;
        findings.push({ rule: 'stack-imbalance', index, message });
      }
      continue;
    }
    depthAt.set(index, depth);
    maxDepth = Math.max(maxDepth, depth);
    const item = items[index];
    if (!item) continue;
    if (item.kind === 'label') {
      flow(index + 1, depth);
      continue;
    }

    const target = targetLabel(item);
    switch (item.mnemonic) {
      case 'RTS':
      case 'RTI':
        if (depth > 0) {
          const message = `${item.mnemonic} with ${depth} byte(s) still pushed`;
          findings.push({ rule: 'stack-imbalance', index, message });
        }
        continue;
      case 'JAM':
      case 'BRK':
        continue;
      case 'JMP': {
        const to = target !== undefined ? labels.get(target) : undefined;
        if (inScope(to)) flow(to, depth);
        else if (depth > 0 && item.mode !== 'ind') {
          const message = `jump out of "${scope.name || 'top level'}" with ${depth} byte(s) pushed`;
          findings.push({ rule: 'stack-imbalance', index, message });
        }
        continue;
      }
      case 'JSR':
        if (target !== undefined) calls.push({ callee: target, depth, index });
        flow(index + 1, depth);
        continue;
      case 'TXS':
        // The stack pointer is reloaded; depth is no longer known on this path.
        continue;
      default:
        break;
    }

    if (isConditionalBranch(item) && target !== undefined) flow(labels.get(target), depth);
    const delta = PUSHES[item.mnemonic] ?? 0;
    let after = depth + delta;
    if (after < 0) {
      const message = `${item.mnemonic} on an empty stack`;
      findings.push({ rule: 'stack-underflow', index, message });
      after = 0;
    }
    flow(index + 1, after);
  }
  return { maxDepth, calls };
}

/**
 * Stack depth checks over procedures and the call graph.
 *
 * Depth is tracked per procedure from its entry (0 bytes pushed). A call adds the two return
 * address bytes plus the callee's own need; recursion has no bound and is reported at the call.
 */
export function checkStack(stream: InstructionStream, budget: number): Finding[] {
  const findings: Finding[] = [];
  const items = stream.items;
  const labels = new Map<string, number>();
  items.forEach((item, index) => {
    if (item.kind === 'label' && !labels.has(item.name)) labels.set(item.name, index);
  });

  const all = scopes(items);
  const summaries = new Map<string, ScopeSummary>();
  for (const scope of all) summaries.set(scope.name, summarize(items, scope, labels, findings));

  const need = new Map<string, number>();
  const visiting = new Set<string>();
  const recursive = new Set<number>();
  const depthOf = (name: string): number => {
    const known = need.get(name);
    if (known !== undefined) return known;
    const summary = summaries.get(name);
    if (!summary) return 0;
    visiting.add(name);
    let total = summary.maxDepth;
    for (const call of summary.calls) {
      if (visiting.has(call.callee)) {
        if (!recursive.has(call.index)) {
          recursive.add(call.index);
          const message = `recursive call to "${call.callee}" has no stack bound`;
          findings.push({ rule: 'stack-overflow', index: call.index, message });
        }
        continue;
      }
      total = Math.max(total, call.depth + 2 + depthOf(call.callee));
    }
    visiting.delete(name);
    need.set(name, total);
    return total;
  };

  const called = new Set<string>();
  for (const summary of summaries.values()) {
    for (const call of summary.calls) called.add(call.callee);
  }
  for (const scope of all) {
    if (called.has(scope.name) && scope.name !== stream.entry) continue;
    const total = depthOf(scope.name);
    if (total > budget) {
      const who = scope.name || 'top level';
      const message = `"${who}" needs ${total} stack bytes; budget is ${budget}`;
      findings.push({ rule: 'stack-overflow', index: scope.start, message });
    }
  }
  // Procedures reachable only through a cycle.
  for (const scope of all) depthOf(scope.name);
  return findings;
}
