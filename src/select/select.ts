import type { Allocation } from '../alloc/zeropage.js';
import { slotAddress } from '../alloc/zeropage.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { InlineOp, IrOp, IrOperand, IrProgram, IrSymbol } from '../ir/ast.js';
import { sizeInBytes } from '../ir/ast.js';
import { opText } from '../ir/render.js';
import { runtimeRoutine } from '../lowering/runtime.js';
import type {
  Instruction,
  InstructionStream,
  MemRef,
  OpOrigin,
  Operand,
  StreamItem,
} from '../m6502/instruction.js';
import {
  absRef,
  endsFlow,
  imm,
  ins,
  isInstruction,
  label,
  labelRef,
  mem,
  CONDITIONAL_BRANCHES,
} from '../m6502/instruction.js';
import type { AddressingMode } from '../m6502/modes.js';
import { isKnownMnemonic, isLegalMode } from '../m6502/opcodes.js';
import { isIoAddress } from '../target/atari.js';
import type { InstructionCandidate } from './candidate.js';
import { chooseCandidate } from './candidate.js';
import type { IndexSource, TemplateContext } from './templates.js';
import {
  binaryCandidates,
  branchCandidates,
  fixedCandidates,
  flowCandidates,
  indexedLoadCandidates,
  indexedStoreCandidates,
  indirectLoadCandidates,
  indirectStoreCandidates,
  movCandidates,
  operandWidth,
  popCandidates,
  pushCandidates,
  selectCandidates,
  setCandidates,
  unaryCandidates,
} from './templates.js';

export const GENERATED_LABEL_PREFIX = '__L';
const PENDING_PREFIX = '__pending';

export interface SelectionResult {
  stream: InstructionStream;
  /** Chosen template per IR operation index, for `--verbose` and tests. */
  templates: Map<number, string>;
}

class IllegalOperand extends Error {}

interface SymbolStorage {
  symbol: IrSymbol;
  base: number;
  /** Declared `volatile`, or fixed on a hardware register. */
  volatile: boolean;
}

function isHardwareSymbol(symbol: IrSymbol): boolean {
  const at = symbol.at;
  if (at === undefined) return false;
  for (let k = 0; k < sizeInBytes(symbol.size); k++) {
    if (isIoAddress((at + k) & 0xffff)) return true;
  }
  return false;
}

/**
 * Entry procedure: `main` when present, otherwise the first procedure.
 */
export function entryProcedure(program: IrProgram): string | undefined {
  let first: string | undefined;
  for (const op of program.ops) {
    if (op.kind !== 'Proc') continue;
    if (op.name === 'main') return op.name;
    first ??= op.name;
  }
  return first;
}

/**
 * Lower every IR operation to the cheapest candidate instruction sequence.
 *
 * Storage locations come from `allocation`; operations whose operands cannot be addressed are
 * reported as `IllegalAddressingMode` and produce no instructions.
 */
export function selectInstructions(
  program: IrProgram,
  allocation: Allocation,
  diagnostics: Diagnostic[],
): SelectionResult {
  const storage = new Map<string, SymbolStorage>();
  for (const s of program.symbols) {
    const slot = allocation.slots.get(s.name);
    if (!slot || storage.has(s.name)) continue;
    const volatile = s.volatile || isHardwareSymbol(s);
    storage.set(s.name, { symbol: s, base: slotAddress(slot), volatile });
  }
  const userLabels = new Set<string>();
  for (const op of program.ops) {
    if (op.kind === 'Label' || op.kind === 'Proc') userLabels.add(op.name);
  }

  const items: StreamItem[] = [];
  const templates = new Map<number, string>();
  const runtimeCalls: string[] = [];
  let labelCounter = 0;
  const nextLabel = (): string => `${GENERATED_LABEL_PREFIX}${++labelCounter}`;

  const noteCall = (name: string): void => {
    if (!userLabels.has(name) && runtimeRoutine(name) && !runtimeCalls.includes(name)) {
      runtimeCalls.push(name);
    }
  };

  program.ops.forEach((op, opIndex) => {
    const origin: OpOrigin = {
      opIndex,
      file: program.file,
      ...(op.span ? { line: op.span.start.line, column: op.span.start.column } : {}),
      text: opText(op),
    };
    const fail = (reason: string): void => {
      const where = origin.line !== undefined ? `, line ${origin.line}` : '';
      const what = `${op.kind} operation "${origin.text}" (op ${opIndex}${where})`;
      diagnostics.push({
        id: DiagnosticIds.IllegalAddressingMode,
        severity: 'error',
        message: `Cannot encode ${what}: ${reason}`,
        file: program.file,
        ...(origin.line !== undefined ? { line: origin.line } : {}),
        ...(origin.column !== undefined ? { column: origin.column } : {}),
        opIndex,
      });
    };

    let pending = 0;
    const ctx: TemplateContext = {
      origin,
      location(name, offset = 0) {
        const s = storage.get(name);
        if (!s) throw new IllegalOperand(`symbol "${name}" has no storage`);
        return {
          address: (s.base + offset) & 0xffff,
          symbol: name,
          offset,
          volatile: s.volatile,
        };
      },
      sizeOf(name) {
        const s = storage.get(name);
        if (!s) throw new IllegalOperand(`symbol "${name}" has no storage`);
        return sizeInBytes(s.symbol.size);
      },
      isVolatile(name) {
        return storage.get(name)?.volatile ?? false;
      },
      hasRuntime(name) {
        return !userLabels.has(name) && runtimeRoutine(name) !== undefined;
      },
      fresh() {
        return `${PENDING_PREFIX}${++pending}`;
      },
    };

    if (op.kind === 'Label' || op.kind === 'Proc') {
      items.push(label(op.name, { proc: op.kind === 'Proc', origin }));
      return;
    }
    if (op.kind === 'EndProc') {
      const last = items[items.length - 1];
      if (!(last && isInstruction(last) && endsFlow(last))) {
        items.push(ins('RTS', 'imp', undefined, origin));
        templates.set(opIndex, 'implicit-return');
      }
      return;
    }
    if (op.kind === 'Inline' && op.operand.kind === 'Label') noteCall(op.operand.name);

    let candidates: InstructionCandidate[];
    try {
      candidates = operationCandidates(op, ctx, origin);
    } catch (err) {
      if (err instanceof IllegalOperand) {
        fail(err.message);
        return;
      }
      throw err;
    }
    const chosen = chooseCandidate(candidates);
    if (!chosen) {
      fail('no addressing mode can reach the operands at their storage locations');
      return;
    }
    templates.set(opIndex, chosen.template);
    for (const item of chosen.items) {
      if (item.kind === 'ins' && item.mnemonic === 'JSR' && item.operand.kind === 'label') {
        noteCall(item.operand.label);
      }
    }

    const renamed = new Map<string, string>();
    const rename = (name: string): string => {
      if (!name.startsWith(PENDING_PREFIX)) return name;
      const known = renamed.get(name);
      if (known) return known;
      const fresh = nextLabel();
      renamed.set(name, fresh);
      return fresh;
    };
    for (const item of chosen.items) {
      if (item.kind === 'label') {
        items.push({ ...item, name: rename(item.name) });
      } else if (item.operand.kind === 'label') {
        items.push({ ...item, operand: labelRef(rename(item.operand.label)) });
      } else {
        items.push(item);
      }
    }
  });

  for (const name of runtimeCalls) {
    const routine = runtimeRoutine(name);
    if (routine) items.push(...routine.build(nextLabel));
  }

  const entry = entryProcedure(program);
  return { stream: { items, ...(entry !== undefined ? { entry } : {}) }, templates };
}

function indexSource(
  ctx: TemplateContext,
  operand: IrOperand | undefined,
  span: number,
): IndexSource {
  if (!operand) return { kind: 'imm', value: 0 };
  if (operand.kind === 'Imm') {
    if (operand.value < 0 || operand.value + span - 1 > 0xff) {
      throw new IllegalOperand(`index ${operand.value} does not fit the 8-bit index register`);
    }
    return { kind: 'imm', value: operand.value };
  }
  if (ctx.sizeOf(operand.name) !== 1) {
    throw new IllegalOperand(`index "${operand.name}" is not a byte`);
  }
  return { kind: 'mem', ref: ctx.location(operand.name) };
}

function pointerRef(ctx: TemplateContext, name: string, indirectIndexed: boolean): MemRef {
  if (ctx.sizeOf(name) !== 2) {
    throw new IllegalOperand(`pointer "${name}" is a byte; indirect access needs a ptr or word`);
  }
  const ref = ctx.location(name);
  if (indirectIndexed && ref.address > 0xff) {
    const hex = ref.address.toString(16).toUpperCase().padStart(4, '0');
    throw new IllegalOperand(
      `indirect addressing needs a zero-page pointer; "${name}" is in absolute storage at $${hex}`,
    );
  }
  return ref;
}

function operationCandidates(
  op: Exclude<IrOp, { kind: 'Label' | 'Proc' | 'EndProc' }>,
  ctx: TemplateContext,
  origin: OpOrigin,
): InstructionCandidate[] {
  switch (op.kind) {
    case 'Mov':
      return movCandidates(ctx, op.dst, op.src);
    case 'Binary':
      return binaryCandidates(ctx, op.op, op.dst, op.left, op.right);
    case 'Unary':
      return unaryCandidates(ctx, op.op, op.dst);
    case 'Load': {
      const pointer = pointerRef(ctx, op.pointer, true);
      const index = indexSource(ctx, op.index, ctx.sizeOf(op.dst));
      return indirectLoadCandidates(ctx, op.dst, pointer, index);
    }
    case 'Store': {
      const pointer = pointerRef(ctx, op.pointer, true);
      const index = indexSource(ctx, op.index, operandWidth(ctx, op.src));
      return indirectStoreCandidates(ctx, pointer, index, op.src);
    }
    case 'LoadIndexed':
      return indexedLoadCandidates(
        ctx,
        op.dst,
        ctx.location(op.base),
        indexSource(ctx, op.index, ctx.sizeOf(op.dst)),
      );
    case 'StoreIndexed':
      return indexedStoreCandidates(
        ctx,
        ctx.location(op.base),
        indexSource(ctx, op.index, operandWidth(ctx, op.src)),
        op.src,
      );
    case 'Branch':
      return branchCandidates(ctx, op.cond, op.left, op.right, op.target);
    case 'Set':
      return setCandidates(ctx, op.cond, op.dst, op.left, op.right);
    case 'Select':
      return selectCandidates(ctx, op.dst, op.cond, op.ifTrue, op.ifFalse);
    case 'Jump':
      return flowCandidates(ctx, 'JMP', op.target);
    case 'JumpIndirect': {
      const pointer = pointerRef(ctx, op.pointer, false);
      return fixedCandidates('jump-indirect', [ins('JMP', 'ind', mem(pointer), origin)]);
    }
    case 'Call':
      if (op.target.kind === 'Label') return flowCandidates(ctx, 'JSR', op.target.name);
      return fixedCandidates('call', [ins('JSR', 'abs', mem(absRef(op.target.address)), origin)]);
    case 'Return':
      return fixedCandidates('return', [ins('RTS', 'imp', undefined, origin)]);
    case 'Push':
      return pushCandidates(ctx, op.src);
    case 'Pop':
      return popCandidates(ctx, op.dst);
    case 'Inline':
      return fixedCandidates('inline', [inlineInstruction(op, ctx, origin)]);
  }
}

function modeFor(mnemonic: string, modes: AddressingMode[], what: string): AddressingMode {
  const mode = modes.find((m) => isLegalMode(mnemonic, m));
  if (!mode) throw new IllegalOperand(`${mnemonic} has no ${what} addressing form`);
  return mode;
}

/**
 * Resolve an `asm` line to a single instruction, choosing zero-page forms where they exist.
 */
function inlineInstruction(op: InlineOp, ctx: TemplateContext, origin: OpOrigin): Instruction {
  const mnemonic = op.mnemonic.toUpperCase();
  if (!isKnownMnemonic(mnemonic)) {
    throw new IllegalOperand(`unknown 6502 mnemonic "${mnemonic}"`);
  }
  const operand = op.operand;
  const build = (mode: AddressingMode, value: Operand = { kind: 'none' }): Instruction =>
    ins(mnemonic, mode, value, origin);
  const isBranch = CONDITIONAL_BRANCHES.has(mnemonic);

  switch (operand.kind) {
    case 'None':
      return build(modeFor(mnemonic, ['imp', 'acc'], 'implied'));
    case 'Accumulator':
      return build(modeFor(mnemonic, ['acc'], 'accumulator'));
    case 'Immediate':
      return build(modeFor(mnemonic, ['imm'], 'immediate'), imm(operand.value));
    case 'Label':
      return build(
        modeFor(mnemonic, isBranch ? ['rel'] : ['abs'], 'label'),
        labelRef(operand.name),
      );
    case 'Memory': {
      const t = operand.target;
      const ref: MemRef =
        t.kind === 'Address'
          ? absRef(t.address, isIoAddress(t.address))
          : ctx.location(t.name, t.offset);
      const zp = ref.address < 0x100;
      let modes: AddressingMode[];
      switch (operand.form) {
        case 'direct':
          modes = isBranch ? ['rel'] : zp ? ['zp', 'abs'] : ['abs'];
          break;
        case 'x':
          modes = zp ? ['zpx', 'absx'] : ['absx'];
          break;
        case 'y':
          modes = zp ? ['zpy', 'absy'] : ['absy'];
          break;
        case 'indirect':
          modes = ['ind'];
          break;
        case 'indirect-x':
          modes = zp ? ['indx'] : [];
          break;
        case 'indirect-y':
          modes = zp ? ['indy'] : [];
          break;
      }
      return build(modeFor(mnemonic, modes, operand.form), mem(ref));
    }
  }
}
