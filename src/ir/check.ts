import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isRuntimeRoutine } from '../lowering/runtime.js';
import type { IrOp, IrOperand, IrProgram, IrSymbol } from './ast.js';

/** Immediates accepted by value operands: 16-bit unsigned, or signed down to -32768. */
const IMM_MIN = -0x8000;
const IMM_MAX = 0xffff;

export const RESERVED_PREFIX = '__';

/**
 * Validate an intermediate program before it reaches the back end.
 *
 * Checks declarations, procedure structure, name references and immediate ranges. Every problem
 * is reported; the caller stops on errors.
 */
export function checkIrProgram(program: IrProgram, diagnostics: Diagnostic[]): void {
  const file = program.file;
  const at = (op: IrOp, index: number, id: DiagnosticId, message: string): void => {
    diagnostics.push({
      id,
      severity: 'error',
      message,
      file,
      ...(op.span ? { line: op.span.start.line, column: op.span.start.column } : {}),
      opIndex: index,
    });
  };

  const symbols = new Map<string, IrSymbol>();
  for (const s of program.symbols) {
    const loc = s.span ? { line: s.span.start.line, column: s.span.start.column } : {};
    if (s.name.startsWith(RESERVED_PREFIX)) {
      diagnostics.push({
        id: DiagnosticIds.DuplicateSymbol,
        severity: 'error',
        message: `Symbol name "${s.name}" uses the reserved "${RESERVED_PREFIX}" prefix.`,
        file,
        ...loc,
      });
      continue;
    }
    if (symbols.has(s.name)) {
      diagnostics.push({
        id: DiagnosticIds.DuplicateSymbol,
        severity: 'error',
        message: `Duplicate symbol "${s.name}".`,
        file,
        ...loc,
      });
      continue;
    }
    if (s.at !== undefined && s.size !== 'byte' && s.at === 0xffff) {
      diagnostics.push({
        id: DiagnosticIds.ImmediateRange,
        severity: 'error',
        message: `Symbol "${s.name}" at $FFFF does not fit 2 bytes.`,
        file,
        ...loc,
      });
      continue;
    }
    symbols.set(s.name, s);
  }

  const labels = new Set<string>();
  let openProc: { name: string; op: IrOp; index: number } | undefined;
  program.ops.forEach((op, index) => {
    if (op.kind === 'Label' || op.kind === 'Proc') {
      if (op.name.startsWith(RESERVED_PREFIX)) {
        const message = `Label "${op.name}" uses the reserved "${RESERVED_PREFIX}" prefix.`;
        at(op, index, DiagnosticIds.DuplicateSymbol, message);
      } else if (labels.has(op.name)) {
        at(op, index, DiagnosticIds.DuplicateLabel, `Duplicate label "${op.name}".`);
      }
      labels.add(op.name);
    }
    if (op.kind === 'Proc') {
      if (openProc) {
        const message = `"proc ${op.name}" nested inside "proc ${openProc.name}".`;
        at(op, index, DiagnosticIds.ProcStructure, message);
      }
      openProc = { name: op.name, op, index };
    }
    if (op.kind === 'EndProc') {
      if (!openProc) {
        at(op, index, DiagnosticIds.ProcStructure, `"endproc" without a matching "proc".`);
      }
      openProc = undefined;
    }
  });
  if (openProc) {
    const message = `"proc ${openProc.name}" has no "endproc".`;
    at(openProc.op, openProc.index, DiagnosticIds.ProcStructure, message);
  }

  program.ops.forEach((op, index) => {
    const sym = (name: string): void => {
      if (!symbols.has(name)) {
        at(op, index, DiagnosticIds.UnknownSymbol, `Unknown symbol "${name}".`);
      }
    };
    const value = (operand: IrOperand): void => {
      if (operand.kind === 'Sym') {
        sym(operand.name);
        return;
      }
      if (!Number.isInteger(operand.value) || operand.value < IMM_MIN || operand.value > IMM_MAX) {
        const message = `Immediate ${operand.value} does not fit 16 bits.`;
        at(op, index, DiagnosticIds.ImmediateRange, message);
      }
    };
    const target = (name: string): void => {
      if (!labels.has(name)) {
        at(op, index, DiagnosticIds.UnresolvedLabel, `Undefined label "${name}".`);
      }
    };

    switch (op.kind) {
      case 'Label':
      case 'Proc':
      case 'EndProc':
      case 'Return':
        return;
      case 'Mov':
        sym(op.dst);
        value(op.src);
        return;
      case 'Binary':
        sym(op.dst);
        value(op.left);
        value(op.right);
        return;
      case 'Unary':
      case 'Pop':
        sym(op.dst);
        return;
      case 'Load':
        sym(op.dst);
        sym(op.pointer);
        if (op.index) value(op.index);
        return;
      case 'Store':
        sym(op.pointer);
        if (op.index) value(op.index);
        value(op.src);
        return;
      case 'LoadIndexed':
        sym(op.dst);
        sym(op.base);
        value(op.index);
        return;
      case 'StoreIndexed':
        sym(op.base);
        value(op.index);
        value(op.src);
        return;
      case 'Branch':
        value(op.left);
        value(op.right);
        target(op.target);
        return;
      case 'Set':
        sym(op.dst);
        value(op.left);
        value(op.right);
        return;
      case 'Select':
        sym(op.dst);
        value(op.cond);
        value(op.ifTrue);
        value(op.ifFalse);
        return;
      case 'Jump':
        target(op.target);
        return;
      case 'JumpIndirect':
        sym(op.pointer);
        return;
      case 'Call':
        if (op.target.kind === 'Label' && !isRuntimeRoutine(op.target.name)) target(op.target.name);
        return;
      case 'Push':
        value(op.src);
        return;
      case 'Inline': {
        const operand = op.operand;
        if (operand.kind === 'Immediate' && (operand.value < -0x80 || operand.value > 0xff)) {
          const message = `Immediate ${operand.value} does not fit 8 bits.`;
          at(op, index, DiagnosticIds.ImmediateRange, message);
        }
        if (operand.kind === 'Memory' && operand.target.kind === 'Symbol') sym(operand.target.name);
        if (operand.kind === 'Label' && !isRuntimeRoutine(operand.name)) target(operand.name);
        return;
      }
    }
  });
}
