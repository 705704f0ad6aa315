import type { InlineOperand, IrOp, IrOperand } from './ast.js';

function hex(value: number, digits: number): string {
  return `$${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}

export function renderOperand(operand: IrOperand): string {
  return operand.kind === 'Sym' ? operand.name : String(operand.value);
}

function renderIndex(index: IrOperand | undefined): string {
  return index ? ` + ${renderOperand(index)}` : '';
}

function renderInlineOperand(operand: InlineOperand): string {
  switch (operand.kind) {
    case 'None':
      return '';
    case 'Accumulator':
      return ' a';
    case 'Immediate':
      return ` #${operand.value < 0 ? String(operand.value) : hex(operand.value, 2)}`;
    case 'Label':
      return ` ${operand.name}`;
    case 'Memory': {
      const t = operand.target;
      const base =
        t.kind === 'Address'
          ? hex(t.address, t.address < 0x100 ? 2 : 4)
          : t.offset > 0
            ? `${t.name}+${t.offset}`
            : t.name;
      switch (operand.form) {
        case 'direct':
          return ` ${base}`;
        case 'x':
          return ` ${base},x`;
        case 'y':
          return ` ${base},y`;
        case 'indirect':
          return ` (${base})`;
        case 'indirect-x':
          return ` (${base},x)`;
        case 'indirect-y':
          return ` (${base}),y`;
      }
    }
  }
}

/**
 * Render an operation in `.a8ir` syntax.
 *
 * Used for diagnostics and annotations when the operation was built programmatically and carries
 * no source text.
 */
export function renderIrOp(op: IrOp): string {
  switch (op.kind) {
    case 'Label':
      return `${op.name}:`;
    case 'Proc':
      return `proc ${op.name}`;
    case 'EndProc':
      return 'endproc';
    case 'Mov':
      return `mov ${op.dst}, ${renderOperand(op.src)}`;
    case 'Binary':
      return `${op.op} ${op.dst}, ${renderOperand(op.left)}, ${renderOperand(op.right)}`;
    case 'Unary':
      return `${op.op} ${op.dst}`;
    case 'Load':
      return `load ${op.dst}, [${op.pointer}${renderIndex(op.index)}]`;
    case 'Store':
      return `store [${op.pointer}${renderIndex(op.index)}], ${renderOperand(op.src)}`;
    case 'LoadIndexed':
      return `load ${op.dst}, ${op.base}[${renderOperand(op.index)}]`;
    case 'StoreIndexed':
      return `store ${op.base}[${renderOperand(op.index)}], ${renderOperand(op.src)}`;
    case 'Branch':
      return `br.${op.cond} ${renderOperand(op.left)}, ${renderOperand(op.right)}, ${op.target}`;
    case 'Set':
      return `set.${op.cond} ${op.dst}, ${renderOperand(op.left)}, ${renderOperand(op.right)}`;
    case 'Select':
      return (
        `sel ${op.dst}, ${renderOperand(op.cond)}, ` +
        `${renderOperand(op.ifTrue)}, ${renderOperand(op.ifFalse)}`
      );
    case 'Jump':
      return `jmp ${op.target}`;
    case 'JumpIndirect':
      return `jmpi ${op.pointer}`;
    case 'Call':
      return op.target.kind === 'Label'
        ? `call ${op.target.name}`
        : `call ${hex(op.target.address, 4)}`;
    case 'Return':
      return 'ret';
    case 'Push':
      return `push ${renderOperand(op.src)}`;
    case 'Pop':
      return `pop ${op.dst}`;
    case 'Inline':
      return `asm ${op.mnemonic.toLowerCase()}${renderInlineOperand(op.operand)}`;
  }
}

/**
 * Text of an operation: as written when read from a file, rendered otherwise.
 */
export function opText(op: IrOp): string {
  return op.text ?? renderIrOp(op);
}
