/**
 * Intermediate program contracts.
 *
 * The front end produces an {@link IrProgram}; the back end treats it as immutable input. This
 * module defines types only.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Declared size class: `byte` is 1 byte, `word` and `ptr` are 2 bytes (little endian).
 */
export type SizeClass = 'byte' | 'word' | 'ptr';

export function sizeInBytes(size: SizeClass): 1 | 2 {
  return size === 'byte' ? 1 : 2;
}

export interface IrSymbol {
  name: string;
  size: SizeClass;
  /** Fixed address (hardware register, OS variable). Fixed symbols are never allocated. */
  at?: number;
  /** Reads and writes have side effects. */
  volatile: boolean;
  span?: SourceSpan;
}

export type IrOperand = { kind: 'Sym'; name: string } | { kind: 'Imm'; value: number };

export type BinaryOpKind = 'add' | 'sub' | 'and' | 'or' | 'xor';
export type UnaryOpKind = 'inc' | 'dec' | 'shl' | 'shr';
/** Unsigned comparisons. */
export type BranchCond = 'eq' | 'ne' | 'lt' | 'ge';

interface OpBase {
  span?: SourceSpan;
  /** IR text as written; used for annotations and diagnostics. */
  text?: string;
}

export interface LabelOp extends OpBase {
  kind: 'Label';
  name: string;
}

export interface ProcOp extends OpBase {
  kind: 'Proc';
  name: string;
}

export interface EndProcOp extends OpBase {
  kind: 'EndProc';
}

export interface MovOp extends OpBase {
  kind: 'Mov';
  dst: string;
  src: IrOperand;
}

export interface BinaryOp extends OpBase {
  kind: 'Binary';
  op: BinaryOpKind;
  dst: string;
  left: IrOperand;
  right: IrOperand;
}

export interface UnaryOp extends OpBase {
  kind: 'Unary';
  op: UnaryOpKind;
  dst: string;
}

/** `load dst, [pointer + index]`: indirect read through a zero-page pointer. */
export interface LoadOp extends OpBase {
  kind: 'Load';
  dst: string;
  pointer: string;
  index?: IrOperand;
}

/** `store [pointer + index], src`: indirect write through a zero-page pointer. */
export interface StoreOp extends OpBase {
  kind: 'Store';
  pointer: string;
  index?: IrOperand;
  src: IrOperand;
}

/** `load dst, base[index]`: byte `index` past the storage of `base`. */
export interface LoadIndexedOp extends OpBase {
  kind: 'LoadIndexed';
  dst: string;
  base: string;
  index: IrOperand;
}

/** `store base[index], src`. */
export interface StoreIndexedOp extends OpBase {
  kind: 'StoreIndexed';
  base: string;
  index: IrOperand;
  src: IrOperand;
}

export interface BranchOp extends OpBase {
  kind: 'Branch';
  cond: BranchCond;
  left: IrOperand;
  right: IrOperand;
  target: string;
}

/** `set.<cond> dst, left, right`: `dst := 1` when the comparison holds, `0` otherwise. */
export interface SetOp extends OpBase {
  kind: 'Set';
  cond: BranchCond;
  dst: string;
  left: IrOperand;
  right: IrOperand;
}

/** `sel dst, cond, ifTrue, ifFalse`: `dst := cond != 0 ? ifTrue : ifFalse`. */
export interface SelectOp extends OpBase {
  kind: 'Select';
  dst: string;
  cond: IrOperand;
  ifTrue: IrOperand;
  ifFalse: IrOperand;
}

export interface JumpOp extends OpBase {
  kind: 'Jump';
  target: string;
}

export interface JumpIndirectOp extends OpBase {
  kind: 'JumpIndirect';
  pointer: string;
}

export type CallTarget = { kind: 'Label'; name: string } | { kind: 'Address'; address: number };

export interface CallOp extends OpBase {
  kind: 'Call';
  target: CallTarget;
}

export interface ReturnOp extends OpBase {
  kind: 'Return';
}

export interface PushOp extends OpBase {
  kind: 'Push';
  src: IrOperand;
}

export interface PopOp extends OpBase {
  kind: 'Pop';
  dst: string;
}

/**
 * Operand of an inline instruction, in native 6502 syntax after parsing.
 *
 * `target` is either a number or a symbol name (resolved to its storage by the selector).
 */
export type InlineOperand =
  | { kind: 'None' }
  | { kind: 'Accumulator' }
  | { kind: 'Immediate'; value: number }
  | {
      kind: 'Memory';
      target:
        | { kind: 'Address'; address: number }
        | { kind: 'Symbol'; name: string; offset: number };
      form: 'direct' | 'x' | 'y' | 'indirect' | 'indirect-x' | 'indirect-y';
    }
  | { kind: 'Label'; name: string };

/**
 * `asm MNEMONIC operand`: a fixed low-level primitive emitted as written.
 */
export interface InlineOp extends OpBase {
  kind: 'Inline';
  mnemonic: string;
  operand: InlineOperand;
}

export type IrOp =
  | LabelOp
  | ProcOp
  | EndProcOp
  | MovOp
  | BinaryOp
  | UnaryOp
  | LoadOp
  | StoreOp
  | LoadIndexedOp
  | StoreIndexedOp
  | BranchOp
  | SetOp
  | SelectOp
  | JumpOp
  | JumpIndirectOp
  | CallOp
  | ReturnOp
  | PushOp
  | PopOp
  | InlineOp;

/**
 * The intermediate program: typed symbols plus an ordered operation list.
 */
export interface IrProgram {
  /** Path or name used in diagnostics. */
  file: string;
  name?: string;
  symbols: IrSymbol[];
  ops: IrOp[];
}
