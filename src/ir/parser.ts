import type {
  BinaryOpKind,
  BranchCond,
  InlineOperand,
  IrOp,
  IrOperand,
  IrProgram,
  IrSymbol,
  SizeClass,
  SourceSpan,
  UnaryOpKind,
} from './ast.js';
import type { IrSourceFile } from './source.js';
import { lineSpan, makeIrSourceFile } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

function diag(
  diagnostics: Diagnostic[],
  file: string,
  message: string,
  where?: { line: number; column: number },
): void {
  diagnostics.push({
    id: DiagnosticIds.ParseError,
    severity: 'error',
    message,
    file,
    ...(where ? { line: where.line, column: where.column } : {}),
  });
}

function stripComment(line: string): string {
  const semi = line.indexOf(';');
  return semi >= 0 ? line.slice(0, semi) : line;
}

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(text: string): boolean {
  return IDENT_RE.test(text);
}

/**
 * Parse a numeric literal: decimal, `$hex`, `0xhex` or `%binary`, with an optional leading `-`.
 */
export function parseNumberLiteral(text: string): number | undefined {
  let t = text.trim();
  let sign = 1;
  if (t.startsWith('-')) {
    sign = -1;
    t = t.slice(1).trimStart();
  }
  if (/^\$[0-9A-Fa-f]+$/.test(t)) return sign * Number.parseInt(t.slice(1), 16);
  if (/^0x[0-9A-Fa-f]+$/i.test(t)) return sign * Number.parseInt(t.slice(2), 16);
  if (/^%[01]+$/.test(t)) return sign * Number.parseInt(t.slice(1), 2);
  if (/^[0-9]+$/.test(t)) return sign * Number.parseInt(t, 10);
  return undefined;
}

/**
 * Split an operand list on top-level commas (commas inside `[]` or `()` do not split).
 */
function splitOperands(text: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '[' || ch === '(') depth++;
    if (ch === ']' || ch === ')') depth = Math.max(0, depth - 1);
    if (ch === ',' && depth === 0) {
      out.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.trim().length > 0 || out.length > 0) out.push(current.trim());
  return out;
}

const BINARY_HEADS: ReadonlySet<string> = new Set(['add', 'sub', 'and', 'or', 'xor']);
const UNARY_HEADS: ReadonlySet<string> = new Set(['inc', 'dec', 'shl', 'shr']);
const BRANCH_CONDS: ReadonlySet<string> = new Set(['eq', 'ne', 'lt', 'ge']);
const SIZE_CLASSES: ReadonlySet<string> = new Set(['byte', 'word', 'ptr']);
const SYMBOL_DECL = /^([A-Za-z_]\w*)\s*:\s*([A-Za-z]+)\s*(?:@\s*(\S+))?\s*(volatile)?\s*$/i;
const FLOW_MNEMONICS: ReadonlySet<string> = new Set([
  'JMP',
  'JSR',
  'BCC',
  'BCS',
  'BEQ',
  'BNE',
  'BMI',
  'BPL',
  'BVC',
  'BVS',
]);

function isBinaryHead(head: string): head is BinaryOpKind {
  return BINARY_HEADS.has(head);
}

function isUnaryHead(head: string): head is UnaryOpKind {
  return UNARY_HEADS.has(head);
}

function isBranchCond(cond: string): cond is BranchCond {
  return BRANCH_CONDS.has(cond);
}

function isSizeClass(size: string): size is SizeClass {
  return SIZE_CLASSES.has(size);
}

type IndirectRef = { pointer: string; index?: IrOperand };
type IndexedRef = { base: string; index: IrOperand };

/**
 * Parse the operand of an `asm` line in native 6502 syntax.
 */
export function parseInlineOperand(mnemonic: string, text: string): InlineOperand | undefined {
  const t = text.trim();
  if (t.length === 0) return { kind: 'None' };
  if (/^(a|@)$/i.test(t)) return { kind: 'Accumulator' };

  if (t.startsWith('#')) {
    const value = parseNumberLiteral(t.slice(1));
    return value === undefined ? undefined : { kind: 'Immediate', value };
  }

  const target = (
    s: string,
  ):
    | { kind: 'Address'; address: number }
    | { kind: 'Symbol'; name: string; offset: number }
    | undefined => {
    const n = parseNumberLiteral(s);
    if (n !== undefined) return n >= 0 && n <= 0xffff ? { kind: 'Address', address: n } : undefined;
    const m = /^([A-Za-z_][A-Za-z0-9_]*)\s*(?:\+\s*([0-9]+))?$/.exec(s.trim());
    if (!m || m[1] === undefined) return undefined;
    const offset = m[2] !== undefined ? Number.parseInt(m[2], 10) : 0;
    return { kind: 'Symbol', name: m[1], offset };
  };

  let m = /^\(\s*(.+?)\s*,\s*x\s*\)$/i.exec(t);
  if (m?.[1] !== undefined) {
    const tg = target(m[1]);
    return tg ? { kind: 'Memory', target: tg, form: 'indirect-x' } : undefined;
  }
  m = /^\(\s*(.+?)\s*\)\s*,\s*y$/i.exec(t);
  if (m?.[1] !== undefined) {
    const tg = target(m[1]);
    return tg ? { kind: 'Memory', target: tg, form: 'indirect-y' } : undefined;
  }
  m = /^\(\s*(.+?)\s*\)$/.exec(t);
  if (m?.[1] !== undefined) {
    const tg = target(m[1]);
    return tg ? { kind: 'Memory', target: tg, form: 'indirect' } : undefined;
  }
  m = /^(.+?)\s*,\s*([xy])$/i.exec(t);
  if (m?.[1] !== undefined && m[2] !== undefined) {
    const tg = target(m[1]);
    const form = m[2].toLowerCase() === 'x' ? 'x' : 'y';
    return tg ? { kind: 'Memory', target: tg, form } : undefined;
  }

  if (FLOW_MNEMONICS.has(mnemonic.toUpperCase()) && isIdentifier(t)) {
    return { kind: 'Label', name: t };
  }
  const tg = target(t);
  return tg ? { kind: 'Memory', target: tg, form: 'direct' } : undefined;
}

/**
 * Read an `.a8ir` intermediate program.
 *
 * The format is line based: `sym` declarations, `proc`/`endproc` brackets, `name:` labels and one
 * operation per line, with `;` starting a comment. Syntax errors are reported with line/column and
 * the offending line is skipped, so a single run reports every malformed line.
 */
export function parseIrProgram(path: string, text: string, diagnostics: Diagnostic[]): IrProgram {
  const file: IrSourceFile = makeIrSourceFile(path, text);
  const symbols: IrSymbol[] = [];
  const ops: IrOp[] = [];
  let name: string | undefined;

  file.lines.forEach((rawLine, lineIndex) => {
    const content = stripComment(rawLine);
    const trimmed = content.trim();
    if (trimmed.length === 0) return;

    const column = content.length - content.trimStart().length + 1;
    const where = { line: lineIndex + 1, column };
    const stmtSpan: SourceSpan = lineSpan(file, lineIndex, column, column + trimmed.length);
    const fail = (message: string): void => diag(diagnostics, path, message, where);

    const operandColumn = (operandText: string): number => {
      const at = content.indexOf(operandText, column - 1);
      return at >= 0 ? at + 1 : column;
    };
    const failAt = (operandText: string, message: string): void =>
      diag(diagnostics, path, message, { line: lineIndex + 1, column: operandColumn(operandText) });

    const labelMatch = /^([A-Za-z_][A-Za-z0-9_]*)\s*:$/.exec(trimmed);
    if (labelMatch?.[1] !== undefined) {
      ops.push({ kind: 'Label', name: labelMatch[1], span: stmtSpan, text: trimmed });
      return;
    }

    const headMatch = /^([A-Za-z_][A-Za-z0-9_.]*)\s*(.*)$/.exec(trimmed);
    if (!headMatch || headMatch[1] === undefined) {
      fail(`Unrecognized line: "${trimmed}"`);
      return;
    }
    const head = headMatch[1].toLowerCase();
    const rest = (headMatch[2] ?? '').trim();

    const value = (t: string): IrOperand | undefined => {
      const n = parseNumberLiteral(t);
      if (n !== undefined) return { kind: 'Imm', value: n };
      if (isIdentifier(t)) return { kind: 'Sym', name: t };
      failAt(t, `Expected a symbol or number, found "${t}"`);
      return undefined;
    };
    const symbolName = (t: string): string | undefined => {
      if (isIdentifier(t)) return t;
      failAt(t, `Expected a symbol name, found "${t}"`);
      return undefined;
    };
    const indirect = (t: string): IndirectRef | undefined => {
      const m = /^\[\s*([A-Za-z_][A-Za-z0-9_]*)\s*(?:\+\s*([^\]]+?))?\s*\]$/.exec(t);
      if (!m || m[1] === undefined) return undefined;
      if (m[2] === undefined) return { pointer: m[1] };
      const index = value(m[2].trim());
      return index ? { pointer: m[1], index } : undefined;
    };
    const indexed = (t: string): IndexedRef | undefined => {
      const m = /^([A-Za-z_][A-Za-z0-9_]*)\s*\[\s*([^\]]+?)\s*\]$/.exec(t);
      if (!m || m[1] === undefined || m[2] === undefined) return undefined;
      const index = value(m[2]);
      return index ? { base: m[1], index } : undefined;
    };
    const operands = (count: number): string[] | undefined => {
      const parts = rest.length === 0 ? [] : splitOperands(rest);
      if (parts.length !== count || parts.some((p) => p.length === 0)) {
        fail(`"${head}" expects ${count} operand${count === 1 ? '' : 's'}, found ${parts.length}`);
        return undefined;
      }
      return parts;
    };
    const push = (op: IrOp): void => {
      ops.push({ ...op, span: stmtSpan, text: trimmed });
    };

    if (head === 'program') {
      if (!isIdentifier(rest)) {
        fail(`"program" expects a name`);
        return;
      }
      name = rest;
      return;
    }

    if (head === 'sym') {
      const m = SYMBOL_DECL.exec(rest);
      if (!m || m[1] === undefined || m[2] === undefined) {
        fail(
          'Malformed symbol declaration: expected "sym name: byte|word|ptr [@ addr] [volatile]"',
        );
        return;
      }
      const size = m[2].toLowerCase();
      if (!isSizeClass(size)) {
        failAt(m[2], `Unknown size class "${m[2]}" (expected byte|word|ptr)`);
        return;
      }
      let at: number | undefined;
      if (m[3] !== undefined) {
        at = parseNumberLiteral(m[3]);
        if (at === undefined || at < 0 || at > 0xffff) {
          failAt(m[3], `Invalid fixed address "${m[3]}"`);
          return;
        }
      }
      symbols.push({
        name: m[1],
        size,
        ...(at !== undefined ? { at } : {}),
        volatile: m[4] !== undefined,
        span: stmtSpan,
      });
      return;
    }

    if (head === 'proc') {
      const n = symbolName(rest);
      if (n) push({ kind: 'Proc', name: n });
      return;
    }
    if (head === 'endproc') {
      if (rest.length > 0) {
        fail(`"endproc" takes no operands`);
        return;
      }
      push({ kind: 'EndProc' });
      return;
    }

    if (head === 'mov') {
      const parts = operands(2);
      if (!parts) return;
      const [d, s] = parts;
      const dst = symbolName(d ?? '');
      const src = value(s ?? '');
      if (dst && src) push({ kind: 'Mov', dst, src });
      return;
    }

    if (isBinaryHead(head)) {
      const parts = operands(3);
      if (!parts) return;
      const [d, l, r] = parts;
      const dst = symbolName(d ?? '');
      const left = value(l ?? '');
      const right = value(r ?? '');
      if (dst && left && right) push({ kind: 'Binary', op: head, dst, left, right });
      return;
    }

    if (isUnaryHead(head)) {
      const parts = operands(1);
      if (!parts) return;
      const dst = symbolName(parts[0] ?? '');
      if (dst) push({ kind: 'Unary', op: head, dst });
      return;
    }

    if (head === 'load') {
      const parts = operands(2);
      if (!parts) return;
      const [d, s] = parts;
      const dst = symbolName(d ?? '');
      if (!dst || s === undefined) return;
      if (s.startsWith('[')) {
        const ref = indirect(s);
        if (!ref) {
          failAt(s, `Malformed indirect operand "${s}" (expected [ptr] or [ptr + index])`);
          return;
        }
        const index = ref.index ? { index: ref.index } : {};
        push({ kind: 'Load', dst, pointer: ref.pointer, ...index });
        return;
      }
      const ref = indexed(s);
      if (!ref) {
        failAt(s, `Malformed load source "${s}" (expected [ptr], [ptr + index] or base[index])`);
        return;
      }
      push({ kind: 'LoadIndexed', dst, base: ref.base, index: ref.index });
      return;
    }

    if (head === 'store') {
      const parts = operands(2);
      if (!parts) return;
      const [d, s] = parts;
      const src = value(s ?? '');
      if (!src || d === undefined) return;
      if (d.startsWith('[')) {
        const ref = indirect(d);
        if (!ref) {
          failAt(d, `Malformed indirect operand "${d}" (expected [ptr] or [ptr + index])`);
          return;
        }
        const index = ref.index ? { index: ref.index } : {};
        push({ kind: 'Store', pointer: ref.pointer, ...index, src });
        return;
      }
      const ref = indexed(d);
      if (!ref) {
        failAt(d, `Malformed store target "${d}" (expected [ptr], [ptr + index] or base[index])`);
        return;
      }
      push({ kind: 'StoreIndexed', base: ref.base, index: ref.index, src });
      return;
    }

    if (head.startsWith('br.')) {
      const cond = head.slice(3);
      if (!isBranchCond(cond)) {
        fail(`Unknown branch condition "${cond}" (expected eq|ne|lt|ge)`);
        return;
      }
      const parts = operands(3);
      if (!parts) return;
      const [l, r, t] = parts;
      const left = value(l ?? '');
      const right = value(r ?? '');
      const target = symbolName(t ?? '');
      if (left && right && target) push({ kind: 'Branch', cond, left, right, target });
      return;
    }

    if (head.startsWith('set.')) {
      const cond = head.slice(4);
      if (!isBranchCond(cond)) {
        fail(`Unknown comparison "${cond}" (expected eq|ne|lt|ge)`);
        return;
      }
      const parts = operands(3);
      if (!parts) return;
      const [d, l, r] = parts;
      const dst = symbolName(d ?? '');
      const left = value(l ?? '');
      const right = value(r ?? '');
      if (dst && left && right) push({ kind: 'Set', cond, dst, left, right });
      return;
    }

    if (head === 'sel') {
      const parts = operands(4);
      if (!parts) return;
      const [d, c, t, f] = parts;
      const dst = symbolName(d ?? '');
      const cond = value(c ?? '');
      const ifTrue = value(t ?? '');
      const ifFalse = value(f ?? '');
      if (dst && cond && ifTrue && ifFalse) push({ kind: 'Select', dst, cond, ifTrue, ifFalse });
      return;
    }

    if (head === 'jmp') {
      const target = symbolName(rest);
      if (target) push({ kind: 'Jump', target });
      return;
    }
    if (head === 'jmpi') {
      const pointer = symbolName(rest);
      if (pointer) push({ kind: 'JumpIndirect', pointer });
      return;
    }
    if (head === 'call') {
      const address = parseNumberLiteral(rest);
      if (address !== undefined) {
        if (address < 0 || address > 0xffff) {
          failAt(rest, `Call address out of range: ${rest}`);
          return;
        }
        push({ kind: 'Call', target: { kind: 'Address', address } });
        return;
      }
      const target = symbolName(rest);
      if (target) push({ kind: 'Call', target: { kind: 'Label', name: target } });
      return;
    }
    if (head === 'ret') {
      if (rest.length > 0) {
        fail(`"ret" takes no operands`);
        return;
      }
      push({ kind: 'Return' });
      return;
    }
    if (head === 'push') {
      const src = value(rest);
      if (src) push({ kind: 'Push', src });
      return;
    }
    if (head === 'pop') {
      const dst = symbolName(rest);
      if (dst) push({ kind: 'Pop', dst });
      return;
    }

    if (head === 'asm') {
      const m = /^([A-Za-z]{3})\b\s*(.*)$/.exec(rest);
      if (!m || m[1] === undefined) {
        fail(`"asm" expects a 6502 mnemonic`);
        return;
      }
      const mnemonic = m[1].toUpperCase();
      const operandText = m[2] ?? '';
      const operand = parseInlineOperand(mnemonic, operandText);
      if (!operand) {
        failAt(operandText, `Malformed 6502 operand "${operandText.trim()}"`);
        return;
      }
      push({ kind: 'Inline', mnemonic, operand });
      return;
    }

    fail(`Unknown operation "${headMatch[1]}"`);
  });

  return { file: path, ...(name !== undefined ? { name } : {}), symbols, ops };
}
