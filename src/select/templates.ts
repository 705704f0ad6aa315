import type {
  BinaryOpKind,
  BranchCond,
  IrOperand,
  UnaryOpKind,
} from '../ir/ast.js';
import { LAST_CMP_EQUAL } from '../lowering/runtime.js';
import type { AddressingMode, IndexRegister } from '../m6502/modes.js';
import type { MemRef, OpOrigin, StreamItem } from '../m6502/instruction.js';
import { imm, ins, label, labelRef, mem } from '../m6502/instruction.js';
import { isLegalMode } from '../m6502/opcodes.js';
import type { InstructionCandidate } from './candidate.js';
import { candidate, chooseCandidate } from './candidate.js';

/**
 * What templates need to know about the operation being selected.
 */
export interface TemplateContext {
  origin: OpOrigin;
  /** Storage of byte `offset` of a symbol. */
  location(name: string, offset?: number): MemRef;
  sizeOf(name: string): 1 | 2;
  isVolatile(name: string): boolean;
  /** Whether a call to the named runtime routine links the routine in. */
  hasRuntime(name: string): boolean;
  /** A new generated label name. */
  fresh(): string;
}

export type ByteSource = { kind: 'imm'; value: number } | { kind: 'mem'; ref: MemRef };

/**
 * Width of a value operand: symbols by size class, immediates by magnitude.
 */
export function operandWidth(ctx: TemplateContext, operand: IrOperand): 1 | 2 {
  if (operand.kind === 'Sym') return ctx.sizeOf(operand.name);
  return operand.value >= -0x80 && operand.value <= 0xff ? 1 : 2;
}

/**
 * Byte `k` of a value operand; bytes past a symbol's size read as zero.
 */
export function sourceByte(ctx: TemplateContext, operand: IrOperand, k: number): ByteSource {
  if (operand.kind === 'Imm') return { kind: 'imm', value: (operand.value >> (8 * k)) & 0xff };
  if (k >= ctx.sizeOf(operand.name)) return { kind: 'imm', value: 0 };
  return { kind: 'mem', ref: ctx.location(operand.name, k) };
}

function sameByteSource(a: ByteSource, b: ByteSource): boolean {
  if (a.kind === 'imm' || b.kind === 'imm') {
    return a.kind === 'imm' && b.kind === 'imm' && a.value === b.value;
  }
  return a.ref.address === b.ref.address;
}

function isVolatileSource(source: ByteSource): boolean {
  return source.kind === 'mem' && source.ref.volatile;
}

function memoryModes(address: number, index?: IndexRegister): AddressingMode[] {
  const zp = address < 0x100;
  if (index === 'X') return zp ? ['zpx', 'absx'] : ['absx'];
  if (index === 'Y') return zp ? ['zpy', 'absy'] : ['absy'];
  return zp ? ['zp', 'abs'] : ['abs'];
}

/**
 * Instruction sequence under construction; any unencodable step marks the whole sequence invalid.
 */
class Seq {
  readonly items: StreamItem[] = [];
  ok = true;

  constructor(private readonly origin: OpOrigin) {}

  op(mnemonic: string): this {
    this.items.push(ins(mnemonic, 'imp', undefined, this.origin));
    return this;
  }

  acc(mnemonic: string): this {
    this.items.push(ins(mnemonic, 'acc', undefined, this.origin));
    return this;
  }

  immediate(mnemonic: string, value: number): this {
    if (!isLegalMode(mnemonic, 'imm')) this.ok = false;
    else this.items.push(ins(mnemonic, 'imm', imm(value), this.origin));
    return this;
  }

  mem(mnemonic: string, ref: MemRef, index?: IndexRegister): this {
    const mode = memoryModes(ref.address, index).find((m) => isLegalMode(mnemonic, m));
    if (!mode) this.ok = false;
    else this.items.push(ins(mnemonic, mode, mem(ref), this.origin));
    return this;
  }

  indirect(mnemonic: string, ref: MemRef, mode: 'indx' | 'indy'): this {
    if (ref.address > 0xff || !isLegalMode(mnemonic, mode)) this.ok = false;
    else this.items.push(ins(mnemonic, mode, mem(ref), this.origin));
    return this;
  }

  src(mnemonic: string, source: ByteSource, index?: IndexRegister): this {
    return source.kind === 'imm'
      ? this.immediate(mnemonic, source.value)
      : this.mem(mnemonic, source.ref, index);
  }

  branch(mnemonic: string, target: string): this {
    this.items.push(ins(mnemonic, 'rel', labelRef(target), this.origin));
    return this;
  }

  jump(mnemonic: 'JMP' | 'JSR', target: string): this {
    this.items.push(ins(mnemonic, 'abs', labelRef(target), this.origin));
    return this;
  }

  label(name: string): this {
    this.items.push(label(name, { generated: true, origin: this.origin }));
    return this;
  }
}

function build(
  out: InstructionCandidate[],
  template: string,
  register: InstructionCandidate['register'],
  seq: Seq,
): void {
  if (seq.ok) out.push(candidate(template, register, seq.items));
}

type LoadStore = { load: string; store: string; register: 'A' | 'X' | 'Y' };

const MOVERS: readonly LoadStore[] = [
  { load: 'LDA', store: 'STA', register: 'A' },
  { load: 'LDX', store: 'STX', register: 'X' },
  { load: 'LDY', store: 'STY', register: 'Y' },
];

export function movCandidates(
  ctx: TemplateContext,
  dst: string,
  src: IrOperand,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);
  const volatileDst = ctx.isVolatile(dst);
  const bytes = Array.from({ length: n }, (_, k) => sourceByte(ctx, src, k));

  if (src.kind === 'Sym' && src.name === dst && !volatileDst) {
    out.push(candidate('self-move', 'none', []));
  }

  for (const m of MOVERS) {
    const seq = new Seq(ctx.origin);
    bytes.forEach((b, k) => seq.src(m.load, b).mem(m.store, ctx.location(dst, k)));
    build(out, `copy-${m.register.toLowerCase()}`, m.register, seq);
  }

  const [lo, hi] = bytes;
  if (n === 2 && lo && hi && lo.kind === 'imm' && sameByteSource(lo, hi)) {
    const seq = new Seq(ctx.origin)
      .src('LDA', lo)
      .mem('STA', ctx.location(dst, 0))
      .mem('STA', ctx.location(dst, 1));
    build(out, 'shared-immediate', 'A', seq);
  }
  return out;
}

const LOGIC: Readonly<Record<'and' | 'or' | 'xor', string>> = {
  and: 'AND',
  or: 'ORA',
  xor: 'EOR',
};

function isImm(operand: IrOperand, value: number): boolean {
  return operand.kind === 'Imm' && operand.value === value;
}

function isSym(operand: IrOperand, name: string): boolean {
  return operand.kind === 'Sym' && operand.name === name;
}

/**
 * `dst := src + 1` or `dst := src - 1`: register increment and, for `src === dst`, in-memory
 * read-modify-write templates.
 */
function stepCandidates(
  ctx: TemplateContext,
  dst: string,
  src: IrOperand,
  direction: 'inc' | 'dec',
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);
  const inPlace = isSym(src, dst) && !ctx.isVolatile(dst);
  const lo = ctx.location(dst, 0);

  if (n === 1) {
    if (inPlace) {
      const seq = new Seq(ctx.origin).mem(direction === 'inc' ? 'INC' : 'DEC', lo);
      build(out, `${direction}-memory`, 'none', seq);
    }
    const step: Record<'X' | 'Y', string> =
      direction === 'inc' ? { X: 'INX', Y: 'INY' } : { X: 'DEX', Y: 'DEY' };
    for (const r of ['X', 'Y'] as const) {
      const seq = new Seq(ctx.origin)
        .src(`LD${r}`, sourceByte(ctx, src, 0))
        .op(step[r])
        .mem(`ST${r}`, lo);
      build(out, `${direction}-${r.toLowerCase()}`, r, seq);
    }
    return out;
  }

  if (inPlace) {
    const hi = ctx.location(dst, 1);
    const skip = ctx.fresh();
    if (direction === 'inc') {
      const seq = new Seq(ctx.origin).mem('INC', lo).branch('BNE', skip).mem('INC', hi).label(skip);
      build(out, 'word-increment', 'none', seq);
    } else {
      const seq = new Seq(ctx.origin)
        .mem('LDA', lo)
        .branch('BNE', skip)
        .mem('DEC', hi)
        .label(skip)
        .mem('DEC', lo);
      build(out, 'word-decrement', 'none', seq);
    }
  }
  return out;
}

function arithmeticChain(
  ctx: TemplateContext,
  op: 'add' | 'sub',
  dst: string,
  left: IrOperand,
  right: IrOperand,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);
  const seq = new Seq(ctx.origin).op(op === 'add' ? 'CLC' : 'SEC');
  for (let k = 0; k < n; k++) {
    seq
      .src('LDA', sourceByte(ctx, left, k))
      .src(op === 'add' ? 'ADC' : 'SBC', sourceByte(ctx, right, k))
      .mem('STA', ctx.location(dst, k));
  }
  build(out, op === 'add' ? 'add-carry-chain' : 'sub-borrow-chain', 'A', seq);
  return out;
}

export function binaryCandidates(
  ctx: TemplateContext,
  op: BinaryOpKind,
  dst: string,
  left: IrOperand,
  right: IrOperand,
): InstructionCandidate[] {
  if (op === 'add' || op === 'sub') {
    const out = arithmeticChain(ctx, op, dst, left, right);
    if (isImm(right, 1)) {
      out.push(...stepCandidates(ctx, dst, left, op === 'add' ? 'inc' : 'dec'));
    } else if (op === 'add' && isImm(left, 1)) out.push(...stepCandidates(ctx, dst, right, 'inc'));
    return out;
  }

  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);
  const seq = new Seq(ctx.origin);
  for (let k = 0; k < n; k++) {
    seq
      .src('LDA', sourceByte(ctx, left, k))
      .src(LOGIC[op], sourceByte(ctx, right, k))
      .mem('STA', ctx.location(dst, k));
  }
  build(out, 'logic-a', 'A', seq);
  return out;
}

export function unaryCandidates(
  ctx: TemplateContext,
  op: UnaryOpKind,
  dst: string,
): InstructionCandidate[] {
  const self: IrOperand = { kind: 'Sym', name: dst };
  if (op === 'inc' || op === 'dec') {
    const one: IrOperand = { kind: 'Imm', value: 1 };
    return binaryCandidates(ctx, op === 'inc' ? 'add' : 'sub', dst, self, one);
  }

  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);
  // Shift left starts at the low byte, shift right at the high byte; carry links the bytes.
  const order = op === 'shl' ? [0, 1].slice(0, n) : [1, 0].slice(2 - n);
  const first = op === 'shl' ? 'ASL' : 'LSR';
  const rest = op === 'shl' ? 'ROL' : 'ROR';

  if (!ctx.isVolatile(dst)) {
    const seq = new Seq(ctx.origin);
    order.forEach((k, i) => seq.mem(i === 0 ? first : rest, ctx.location(dst, k)));
    build(out, 'shift-memory', 'none', seq);
  }
  const seq = new Seq(ctx.origin);
  order.forEach((k, i) => {
    const at = ctx.location(dst, k);
    seq.mem('LDA', at).acc(i === 0 ? first : rest).mem('STA', at);
  });
  build(out, 'shift-a', 'A', seq);
  return out;
}

/**
 * Index operand of a pointer or array access, already validated as a byte.
 */
export type IndexSource = { kind: 'imm'; value: number } | { kind: 'mem'; ref: MemRef };

export function indirectLoadCandidates(
  ctx: TemplateContext,
  dst: string,
  pointer: MemRef,
  index: IndexSource,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);

  const y = new Seq(ctx.origin).src('LDY', index);
  for (let k = 0; k < n; k++) {
    if (k > 0) y.op('INY');
    y.indirect('LDA', pointer, 'indy').mem('STA', ctx.location(dst, k));
  }
  build(out, 'indirect-y', 'A', y);

  if (n === 1 && index.kind === 'imm' && index.value === 0) {
    const x = new Seq(ctx.origin)
      .immediate('LDX', 0)
      .indirect('LDA', pointer, 'indx')
      .mem('STA', ctx.location(dst, 0));
    build(out, 'indirect-x', 'A', x);
  }
  return out;
}

export function indirectStoreCandidates(
  ctx: TemplateContext,
  pointer: MemRef,
  index: IndexSource,
  src: IrOperand,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = operandWidth(ctx, src);

  const y = new Seq(ctx.origin).src('LDY', index);
  for (let k = 0; k < n; k++) {
    if (k > 0) y.op('INY');
    y.src('LDA', sourceByte(ctx, src, k)).indirect('STA', pointer, 'indy');
  }
  build(out, 'indirect-y', 'A', y);

  if (n === 1 && index.kind === 'imm' && index.value === 0) {
    const x = new Seq(ctx.origin)
      .immediate('LDX', 0)
      .src('LDA', sourceByte(ctx, src, 0))
      .indirect('STA', pointer, 'indx');
    build(out, 'indirect-x', 'A', x);
  }
  return out;
}

function offsetRef(ref: MemRef, delta: number): MemRef {
  return { ...ref, address: (ref.address + delta) & 0xffff, offset: ref.offset + delta };
}

export function indexedLoadCandidates(
  ctx: TemplateContext,
  dst: string,
  base: MemRef,
  index: IndexSource,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = ctx.sizeOf(dst);

  if (index.kind === 'imm') {
    for (const m of MOVERS) {
      const seq = new Seq(ctx.origin);
      for (let k = 0; k < n; k++) {
        seq.mem(m.load, offsetRef(base, index.value + k)).mem(m.store, ctx.location(dst, k));
      }
      build(out, `indexed-constant-${m.register.toLowerCase()}`, m.register, seq);
    }
    return out;
  }

  for (const r of ['X', 'Y'] as const) {
    const seq = new Seq(ctx.origin).mem(`LD${r}`, index.ref);
    for (let k = 0; k < n; k++) {
      seq.mem('LDA', offsetRef(base, k), r).mem('STA', ctx.location(dst, k));
    }
    build(out, `indexed-${r.toLowerCase()}`, 'A', seq);
  }
  return out;
}

export function indexedStoreCandidates(
  ctx: TemplateContext,
  base: MemRef,
  index: IndexSource,
  src: IrOperand,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const n = operandWidth(ctx, src);

  if (index.kind === 'imm') {
    for (const m of MOVERS) {
      const seq = new Seq(ctx.origin);
      for (let k = 0; k < n; k++) {
        seq.src(m.load, sourceByte(ctx, src, k)).mem(m.store, offsetRef(base, index.value + k));
      }
      build(out, `indexed-constant-${m.register.toLowerCase()}`, m.register, seq);
    }
    return out;
  }

  for (const r of ['X', 'Y'] as const) {
    const seq = new Seq(ctx.origin).mem(`LD${r}`, index.ref);
    for (let k = 0; k < n; k++) {
      seq.src('LDA', sourceByte(ctx, src, k)).mem('STA', offsetRef(base, k), r);
    }
    build(out, `indexed-${r.toLowerCase()}`, 'A', seq);
  }
  return out;
}

const BRANCH_ON: Readonly<Record<BranchCond, string>> = {
  eq: 'BEQ',
  ne: 'BNE',
  lt: 'BCC',
  ge: 'BCS',
};

const COMPARERS: readonly LoadStore[] = [
  { load: 'LDA', store: 'CMP', register: 'A' },
  { load: 'LDX', store: 'CPX', register: 'X' },
  { load: 'LDY', store: 'CPY', register: 'Y' },
];

/**
 * Unsigned compare and branch. Word compares use `CMP` on the low byte and `SBC` on the high byte
 * so the carry ends up as `left >= right`.
 */
export function branchCandidates(
  ctx: TemplateContext,
  cond: BranchCond,
  left: IrOperand,
  right: IrOperand,
  target: string,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const width = Math.max(operandWidth(ctx, left), operandWidth(ctx, right));
  const l0 = sourceByte(ctx, left, 0);
  const r0 = sourceByte(ctx, right, 0);
  const zeroRight = isImm(right, 0);
  const volatileLeft =
    isVolatileSource(l0) || (width === 2 && isVolatileSource(sourceByte(ctx, left, 1)));

  if (zeroRight && !volatileLeft) {
    if (cond === 'lt') out.push(candidate('never', 'none', []));
    if (cond === 'ge') build(out, 'always', 'none', new Seq(ctx.origin).jump('JMP', target));
  }

  if (width === 1) {
    for (const m of COMPARERS) {
      const seq = new Seq(ctx.origin)
        .src(m.load, l0)
        .src(m.store, r0)
        .branch(BRANCH_ON[cond], target);
      build(out, `compare-${m.register.toLowerCase()}`, m.register, seq);
    }
    if (zeroRight && (cond === 'eq' || cond === 'ne')) {
      const seq = new Seq(ctx.origin).src('LDA', l0).branch(BRANCH_ON[cond], target);
      build(out, 'test-zero', 'A', seq);
    }
    return out;
  }

  const l1 = sourceByte(ctx, left, 1);
  const r1 = sourceByte(ctx, right, 1);
  if (cond === 'eq') {
    const skip = ctx.fresh();
    const seq = new Seq(ctx.origin)
      .src('LDA', l0)
      .src('CMP', r0)
      .branch('BNE', skip)
      .src('LDA', l1)
      .src('CMP', r1)
      .branch('BEQ', target)
      .label(skip);
    build(out, 'compare-word', 'A', seq);
  } else if (cond === 'ne') {
    const seq = new Seq(ctx.origin)
      .src('LDA', l0)
      .src('CMP', r0)
      .branch('BNE', target)
      .src('LDA', l1)
      .src('CMP', r1)
      .branch('BNE', target);
    build(out, 'compare-word', 'A', seq);
  } else {
    const seq = new Seq(ctx.origin)
      .src('LDA', l0)
      .src('CMP', r0)
      .src('LDA', l1)
      .src('SBC', r1)
      .branch(BRANCH_ON[cond], target);
    build(out, 'compare-word', 'A', seq);
  }
  if (zeroRight && (cond === 'eq' || cond === 'ne')) {
    const seq = new Seq(ctx.origin).src('LDA', l0).src('ORA', l1).branch(BRANCH_ON[cond], target);
    build(out, 'test-zero-word', 'A', seq);
  }
  return out;
}

const PENDING_TRUE = '__true';

/** Store the 0/1 in `A` to `dst`, zero-extending into a word. */
function storeFlag(ctx: TemplateContext, seq: Seq, dst: string): Seq {
  seq.mem('STA', ctx.location(dst, 0));
  if (ctx.sizeOf(dst) === 2) seq.immediate('LDA', 0).mem('STA', ctx.location(dst, 1));
  return seq;
}

/**
 * Materialize an unsigned comparison as `0` or `1`.
 *
 * `lt`/`ge` rotate the carry of the compare into `A`; `eq`/`ne` call {@link LAST_CMP_EQUAL}, which
 * turns the zero flag into a value. Every condition also has a branching form.
 */
export function setCandidates(
  ctx: TemplateContext,
  cond: BranchCond,
  dst: string,
  left: IrOperand,
  right: IrOperand,
): InstructionCandidate[] {
  const out: InstructionCandidate[] = [];
  const width = Math.max(operandWidth(ctx, left), operandWidth(ctx, right));
  const l0 = sourceByte(ctx, left, 0);
  const r0 = sourceByte(ctx, right, 0);
  const l1 = sourceByte(ctx, left, 1);
  const r1 = sourceByte(ctx, right, 1);

  if (cond === 'lt' || cond === 'ge') {
    const seq = new Seq(ctx.origin).src('LDA', l0).src('CMP', r0);
    if (width === 2) seq.src('LDA', l1).src('SBC', r1);
    seq.immediate('LDA', 0).acc('ROL');
    if (cond === 'lt') seq.immediate('EOR', 1);
    build(out, 'set-carry', 'A', storeFlag(ctx, seq, dst));
  }

  if ((cond === 'eq' || cond === 'ne') && ctx.hasRuntime(LAST_CMP_EQUAL)) {
    const seq = new Seq(ctx.origin).src('LDA', l0).src('CMP', r0);
    if (width === 2) {
      const skip = ctx.fresh();
      seq.branch('BNE', skip).src('LDA', l1).src('CMP', r1).label(skip);
    }
    seq.jump('JSR', LAST_CMP_EQUAL);
    if (cond === 'ne') seq.immediate('EOR', 1);
    build(out, 'set-runtime', 'A', storeFlag(ctx, seq, dst));
  }

  const branch = chooseCandidate(branchCandidates(ctx, cond, left, right, PENDING_TRUE));
  if (branch) {
    const yes = ctx.fresh();
    const done = ctx.fresh();
    const seq = new Seq(ctx.origin);
    seq.items.push(...retarget(branch.items, PENDING_TRUE, yes));
    seq.immediate('LDA', 0).branch('BEQ', done).label(yes).immediate('LDA', 1).label(done);
    build(out, 'set-branch', 'A', storeFlag(ctx, seq, dst));
  }
  return out;
}

function retarget(items: readonly StreamItem[], from: string, to: string): StreamItem[] {
  return items.map((item) =>
    item.kind === 'ins' && item.operand.kind === 'label' && item.operand.label === from
      ? { ...item, operand: labelRef(to) }
      : item,
  );
}

/**
 * `dst := cond != 0 ? ifTrue : ifFalse`: test the condition, then run the cheapest move for the
 * chosen arm.
 */
export function selectCandidates(
  ctx: TemplateContext,
  dst: string,
  cond: IrOperand,
  ifTrue: IrOperand,
  ifFalse: IrOperand,
): InstructionCandidate[] {
  const whenTrue = chooseCandidate(movCandidates(ctx, dst, ifTrue));
  const whenFalse = chooseCandidate(movCandidates(ctx, dst, ifFalse));
  if (!whenTrue || !whenFalse) return [];

  const no = ctx.fresh();
  const done = ctx.fresh();
  const seq = new Seq(ctx.origin).src('LDA', sourceByte(ctx, cond, 0));
  if (operandWidth(ctx, cond) === 2) seq.src('ORA', sourceByte(ctx, cond, 1));
  seq.branch('BEQ', no);
  seq.items.push(...whenTrue.items);
  seq.jump('JMP', done).label(no);
  seq.items.push(...whenFalse.items);
  seq.label(done);

  const out: InstructionCandidate[] = [];
  build(out, 'select', 'A', seq);
  return out;
}

export function pushCandidates(ctx: TemplateContext, src: IrOperand): InstructionCandidate[] {
  const n = operandWidth(ctx, src);
  const seq = new Seq(ctx.origin);
  // High byte first so the low byte is on top.
  for (let k = n - 1; k >= 0; k--) seq.src('LDA', sourceByte(ctx, src, k)).op('PHA');
  const out: InstructionCandidate[] = [];
  build(out, 'push-a', 'A', seq);
  return out;
}

export function popCandidates(ctx: TemplateContext, dst: string): InstructionCandidate[] {
  const n = ctx.sizeOf(dst);
  const seq = new Seq(ctx.origin);
  for (let k = 0; k < n; k++) seq.op('PLA').mem('STA', ctx.location(dst, k));
  const out: InstructionCandidate[] = [];
  build(out, 'pop-a', 'A', seq);
  return out;
}

export function flowCandidates(
  ctx: TemplateContext,
  mnemonic: 'JMP' | 'JSR',
  target: string,
): InstructionCandidate[] {
  const seq = new Seq(ctx.origin).jump(mnemonic, target);
  return [candidate(mnemonic === 'JMP' ? 'jump' : 'call', 'none', seq.items)];
}

export function fixedCandidates(template: string, items: StreamItem[]): InstructionCandidate[] {
  return [candidate(template, 'none', items)];
}
