import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { IrOp, IrOperand, IrProgram } from './ast.js';

/** Inclusive range of IR operation indices. */
export interface LiveRange {
  start: number;
  end: number;
}

export interface SymbolLiveness {
  name: string;
  range: LiveRange;
  /** Sum of `8^loopDepth` over the operations that reference the symbol. */
  frequency: number;
  /** First reference reads the symbol: the value is live on entry, so it stays live everywhere. */
  global: boolean;
}

export interface LivenessInfo {
  /** Referenced symbols only. */
  symbols: Map<string, SymbolLiveness>;
  /** Backward transfers, as `[target label, branch]`. */
  loops: LiveRange[];
  /** Procedure bodies, `proc` through `endproc`. */
  procs: Map<string, LiveRange>;
  pointCount: number;
}

const MAX_LOOP_DEPTH = 3;
const LOOP_WEIGHT = 8;
const FLOW_MNEMONICS: ReadonlySet<string> = new Set([
  'JMP',
  'BCC',
  'BCS',
  'BEQ',
  'BNE',
  'BMI',
  'BPL',
  'BVC',
  'BVS',
]);

export interface OpReferences {
  reads: string[];
  writes: string[];
}

function syms(...operands: Array<IrOperand | undefined>): string[] {
  const out: string[] = [];
  for (const o of operands) if (o?.kind === 'Sym') out.push(o.name);
  return out;
}

/**
 * Symbols an operation reads and writes.
 *
 * Indexed stores write part of the base and leave the rest intact, so the base counts as read.
 * Inline instructions are opaque and count as a read of their symbol.
 */
export function opReferences(op: IrOp): OpReferences {
  switch (op.kind) {
    case 'Mov':
      return { reads: syms(op.src), writes: [op.dst] };
    case 'Binary':
      return { reads: syms(op.left, op.right), writes: [op.dst] };
    case 'Unary':
      return { reads: [op.dst], writes: [op.dst] };
    case 'Load':
      return { reads: [op.pointer, ...syms(op.index)], writes: [op.dst] };
    case 'Store':
      return { reads: [op.pointer, ...syms(op.index, op.src)], writes: [] };
    case 'LoadIndexed':
      return { reads: [op.base, ...syms(op.index)], writes: [op.dst] };
    case 'StoreIndexed':
      return { reads: [op.base, ...syms(op.index, op.src)], writes: [op.base] };
    case 'Branch':
      return { reads: syms(op.left, op.right), writes: [] };
    case 'Set':
      return { reads: syms(op.left, op.right), writes: [op.dst] };
    case 'Select':
      return { reads: syms(op.cond, op.ifTrue, op.ifFalse), writes: [op.dst] };
    case 'JumpIndirect':
      return { reads: [op.pointer], writes: [] };
    case 'Push':
      return { reads: syms(op.src), writes: [] };
    case 'Pop':
      return { reads: [], writes: [op.dst] };
    case 'Inline':
      return op.operand.kind === 'Memory' && op.operand.target.kind === 'Symbol'
        ? { reads: [op.operand.target.name], writes: [] }
        : { reads: [], writes: [] };
    default:
      return { reads: [], writes: [] };
  }
}

function transferTarget(op: IrOp): string | undefined {
  switch (op.kind) {
    case 'Branch':
    case 'Jump':
      return op.target;
    case 'Inline':
      return op.operand.kind === 'Label' && FLOW_MNEMONICS.has(op.mnemonic)
        ? op.operand.name
        : undefined;
    default:
      return undefined;
  }
}

function callTarget(op: IrOp): string | undefined {
  if (op.kind === 'Call') return op.target.kind === 'Label' ? op.target.name : undefined;
  if (op.kind === 'Inline' && op.mnemonic === 'JSR' && op.operand.kind === 'Label') {
    return op.operand.name;
  }
  return undefined;
}

function overlaps(a: LiveRange, b: LiveRange): boolean {
  return a.start <= b.end && a.end >= b.start;
}

function contains(range: LiveRange, point: number): boolean {
  return point >= range.start && point <= range.end;
}

/**
 * Compute a live range and an access frequency for every referenced symbol.
 *
 * A range starts as the hull of the symbol's references, then grows until stable:
 * - over every loop it overlaps, since the value may be read again on the next iteration;
 * - over the body of every procedure called inside it, so the callee's symbols never share its
 *   storage.
 */
export function analyzeLiveness(program: IrProgram, diagnostics: Diagnostic[]): LivenessInfo {
  const ops = program.ops;
  const pointCount = ops.length;
  const lastPoint = Math.max(0, pointCount - 1);

  const labelIndex = new Map<string, number>();
  const procs = new Map<string, LiveRange>();
  let openProc: { name: string; start: number } | undefined;
  ops.forEach((op, index) => {
    if (op.kind === 'Label' || op.kind === 'Proc') labelIndex.set(op.name, index);
    if (op.kind === 'Proc') openProc = { name: op.name, start: index };
    if (op.kind === 'EndProc' && openProc) {
      procs.set(openProc.name, { start: openProc.start, end: index });
      openProc = undefined;
    }
  });
  if (openProc) procs.set(openProc.name, { start: openProc.start, end: lastPoint });

  const loops: LiveRange[] = [];
  ops.forEach((op, index) => {
    const target = transferTarget(op);
    if (target === undefined) return;
    const at = labelIndex.get(target);
    if (at !== undefined && at <= index) loops.push({ start: at, end: index });
  });

  const depthAt = (point: number): number =>
    Math.min(MAX_LOOP_DEPTH, loops.filter((l) => contains(l, point)).length);

  const ranges = new Map<string, LiveRange>();
  const frequency = new Map<string, number>();
  const global = new Set<string>();
  ops.forEach((op, index) => {
    const { reads, writes } = opReferences(op);
    const seen = new Set<string>();
    for (const name of reads) {
      if (!ranges.has(name)) global.add(name);
    }
    for (const name of [...reads, ...writes]) {
      if (seen.has(name)) continue;
      seen.add(name);
      const r = ranges.get(name);
      if (r) r.end = index;
      else ranges.set(name, { start: index, end: index });
      frequency.set(name, (frequency.get(name) ?? 0) + LOOP_WEIGHT ** depthAt(index));
    }
  });

  for (const name of global) {
    ranges.set(name, { start: 0, end: lastPoint });
  }

  const calls: Array<{ point: number; body: LiveRange }> = [];
  ops.forEach((op, index) => {
    const target = callTarget(op);
    const body = target !== undefined ? procs.get(target) : undefined;
    if (body) calls.push({ point: index, body });
  });

  for (const range of ranges.values()) {
    let changed = true;
    while (changed) {
      changed = false;
      const grow = (other: LiveRange): void => {
        if (other.start < range.start) {
          range.start = other.start;
          changed = true;
        }
        if (other.end > range.end) {
          range.end = other.end;
          changed = true;
        }
      };
      for (const loop of loops) if (overlaps(range, loop)) grow(loop);
      for (const call of calls) if (contains(range, call.point)) grow(call.body);
    }
  }

  const symbols = new Map<string, SymbolLiveness>();
  for (const s of program.symbols) {
    const range = ranges.get(s.name);
    if (!range) {
      if (s.at === undefined) {
        diagnostics.push({
          id: DiagnosticIds.UnusedSymbol,
          severity: 'warning',
          message: `Symbol "${s.name}" is never referenced; no storage assigned.`,
          file: program.file,
          ...(s.span ? { line: s.span.start.line, column: s.span.start.column } : {}),
        });
      }
      continue;
    }
    symbols.set(s.name, {
      name: s.name,
      range,
      frequency: frequency.get(s.name) ?? 0,
      global: global.has(s.name),
    });
  }

  return { symbols, loops, procs, pointCount };
}
