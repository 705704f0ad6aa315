import type { PlacedItem } from '../lowering/layout.js';
import type { Instruction, Operand } from '../m6502/instruction.js';
import { instructionCycles } from '../m6502/instruction.js';
import type { AsmStyle, EmittedProgram, LabelMode, SymbolEntry } from './types.js';

/**
 * Host triple shown by the debug dialect when none is configured.
 */
export const DEFAULT_TARGET_TRIPLE = 'x86_64-unknown-linux-gnu';

export interface DialectContext {
  labels: LabelMode;
  /** Label name -> address. */
  addresses: ReadonlyMap<string, number>;
  target: string;
}

/**
 * Text syntax of one assembly dialect. The writer owns line order; the dialect owns spelling.
 */
export interface AsmDialect {
  style: AsmStyle;
  comment(text: string): string;
  header(program: EmittedProgram, ctx: DialectContext): string[];
  /** Origin directive placed after the equates, if the dialect has one. */
  origin(address: number): string | undefined;
  equate(symbol: SymbolEntry): string | undefined;
  label(name: string, address: number, ctx: DialectContext): string;
  instruction(placed: PlacedItem, i: Instruction, ctx: DialectContext): string;
  footer(program: EmittedProgram, ctx: DialectContext): string[];
}

function hexUpper(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}

/** MADS equate prefix keeps data names apart from labels and mnemonics. */
export function equateName(symbol: string): string {
  return `V_${symbol}`;
}

const ZERO_PAGE_MODES: ReadonlySet<string> = new Set(['zp', 'zpx', 'zpy', 'indx', 'indy']);

function isZeroPageMode(i: Instruction): boolean {
  return ZERO_PAGE_MODES.has(i.mode);
}

function nativeTarget(op: Operand, i: Instruction, ctx: DialectContext): string {
  switch (op.kind) {
    case 'none':
      return '';
    case 'imm':
      return `$${hexUpper(op.value, 2)}`;
    case 'label': {
      if (ctx.labels === 'symbolic') return op.label;
      return `$${hexUpper(ctx.addresses.get(op.label) ?? 0, 4)}`;
    }
    case 'mem': {
      const { ref } = op;
      let text: string;
      if (ref.symbol !== undefined) {
        text = equateName(ref.symbol) + (ref.offset !== 0 ? `+${ref.offset}` : '');
      } else {
        text = `$${hexUpper(ref.address, isZeroPageMode(i) ? 2 : 4)}`;
      }
      // `a:` keeps the absolute form of a zero-page address.
      if (!isZeroPageMode(i) && ref.address < 0x100 && i.mode !== 'ind') text = `a:${text}`;
      return text;
    }
  }
}

const native: AsmDialect = {
  style: 'native',
  comment: (text) => `; ${text}`,
  header: (program) => [`; ${program.name ?? program.file}`],
  origin: (address) => `\tORG $${hexUpper(address, 4)}`,
  equate(symbol) {
    if (symbol.kind === 'label') return undefined;
    const digits = symbol.address < 0x100 ? 2 : 4;
    return `${equateName(symbol.name)} equ $${hexUpper(symbol.address, digits)}`;
  },
  label(name, address, ctx) {
    return ctx.labels === 'symbolic' ? name : `; ${name} = $${hexUpper(address, 4)}`;
  },
  instruction(_placed, i, ctx) {
    const t = nativeTarget(i.operand, i, ctx);
    switch (i.mode) {
      case 'imp':
        return `\t${i.mnemonic}`;
      case 'acc':
        return `\t${i.mnemonic} A`;
      case 'imm':
        return `\t${i.mnemonic} #${t}`;
      case 'zpx':
      case 'absx':
        return `\t${i.mnemonic} ${t},X`;
      case 'zpy':
      case 'absy':
        return `\t${i.mnemonic} ${t},Y`;
      case 'ind':
        return `\t${i.mnemonic} (${t})`;
      case 'indx':
        return `\t${i.mnemonic} (${t},X)`;
      case 'indy':
        return `\t${i.mnemonic} (${t}),Y`;
      default:
        return `\t${i.mnemonic} ${t}`;
    }
  },
  footer(program, ctx) {
    if (program.entry === undefined) return [];
    const address = program.layout.labels.get(program.entry) ?? program.layout.origin;
    const run = ctx.labels === 'symbolic' ? program.entry : `$${hexUpper(address, 4)}`;
    return [`\tRUN ${run}`];
  },
};

function hexLower(value: number): string {
  return `0x${value.toString(16)}`;
}

function debugOperand(i: Instruction, ctx: DialectContext): string {
  const op = i.operand;
  let base = '';
  if (op.kind === 'imm') return `$${hexLower(op.value)}`;
  if (op.kind === 'mem') base = hexLower(op.ref.address);
  if (op.kind === 'label') {
    base = ctx.labels === 'symbolic' ? op.label : hexLower(ctx.addresses.get(op.label) ?? 0);
  }
  switch (i.mode) {
    case 'imp':
      return '';
    case 'acc':
      return '%a';
    case 'zpx':
    case 'absx':
      return `${base}(%x)`;
    case 'zpy':
    case 'absy':
      return `${base}(%y)`;
    case 'ind':
      return `(${base})`;
    case 'indx':
      return `(${base},%x)`;
    case 'indy':
      return `(${base})(%y)`;
    default:
      return base;
  }
}

const attLikeDebug: AsmDialect = {
  style: 'att-like-debug',
  comment: (text) => `# ${text}`,
  header(program, ctx) {
    return [
      `# ${program.name ?? program.file}`,
      `# host-target: ${ctx.target}`,
      `# origin: ${hexLower(program.layout.origin)}`,
    ];
  },
  origin: () => undefined,
  equate(symbol) {
    if (symbol.kind === 'label') return undefined;
    return `# ${symbol.kind} ${symbol.name} = ${hexLower(symbol.address)} (${symbol.size ?? 1})`;
  },
  label(name, address, ctx) {
    return ctx.labels === 'symbolic' ? `${name}:` : `# ${name} = ${hexLower(address)}`;
  },
  instruction(placed, i, ctx) {
    const bytes = [...placed.bytes].map((b) => hexUpper(b, 2).toLowerCase()).join(' ');
    const operand = debugOperand(i, ctx);
    const text = `${i.mnemonic.toLowerCase()}${operand ? ` ${operand}` : ''}`;
    const head = `  ${hexUpper(placed.address, 4).toLowerCase()}: ${bytes.padEnd(8, ' ')}  ${text}`;
    return `${head.padEnd(39, ' ')} # ${i.mode}, ${instructionCycles(i)} cycles`;
  },
  footer(program) {
    const lines: string[] = [];
    if (program.entry !== undefined) lines.push(`# entry: ${program.entry}`);
    lines.push(`# end: ${hexLower(program.layout.end)}`);
    return lines;
  },
};

const DIALECTS: Readonly<Record<AsmStyle, AsmDialect>> = {
  native,
  'att-like-debug': attLikeDebug,
};

export function asmDialect(style: AsmStyle): AsmDialect {
  return DIALECTS[style];
}

const TRIPLE_PART = '[A-Za-z0-9_.]+';
const TRIPLE = new RegExp(`^${TRIPLE_PART}-${TRIPLE_PART}-${TRIPLE_PART}(?:-${TRIPLE_PART})?$`);

/**
 * `arch-vendor-os` with an optional `-env` suffix, e.g. `x86_64-unknown-linux-gnu`.
 */
export function isTargetTriple(value: string): boolean {
  return TRIPLE.test(value);
}

export function isAsmStyle(value: string): value is AsmStyle {
  return value === 'native' || value === 'att-like-debug';
}
