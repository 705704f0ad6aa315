import { readFileSync } from 'node:fs';

import type { AddressingMode } from './modes.js';
import { isAddressingMode, operandSize } from './modes.js';

/**
 * One row of the opcode table.
 */
export interface OpcodeInfo {
  code: number;
  mnemonic: string;
  mode: AddressingMode;
  /** Base cycle count (branches: not taken). */
  cycles: number;
  /** Adds a cycle when the effective address crosses a page; branches, when taken across one. */
  pageCross: boolean;
  /** Undocumented opcode (NMOS side effect, not part of the published instruction set). */
  illegal: boolean;
}

export interface OpcodeTable {
  byCode: ReadonlyMap<number, OpcodeInfo>;
  /** `MNEMONIC/mode` -> first matching row. */
  byForm: ReadonlyMap<string, OpcodeInfo>;
  mnemonics: ReadonlySet<string>;
}

function formKey(mnemonic: string, mode: AddressingMode): string {
  return `${mnemonic.toUpperCase()}/${mode}`;
}

function parseRow(raw: unknown, index: number): OpcodeInfo {
  const bad = (what: string): never => {
    throw new Error(`opcodes.json row ${index}: ${what}`);
  };
  if (raw === null || typeof raw !== 'object') return bad('expected an object');
  const row: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const { code, mnemonic, mode, cycles, pageCross, illegal } = row;
  if (typeof code !== 'string' || !/^[0-9A-F]{2}$/.test(code)) return bad('bad "code"');
  if (typeof mnemonic !== 'string' || !/^[A-Z]{3}$/.test(mnemonic)) return bad('bad "mnemonic"');
  if (typeof mode !== 'string' || !isAddressingMode(mode)) return bad('bad "mode"');
  if (typeof cycles !== 'number' || !Number.isInteger(cycles)) return bad('bad "cycles"');
  if (typeof pageCross !== 'boolean') return bad('bad "pageCross"');
  if (typeof illegal !== 'boolean') return bad('bad "illegal"');
  return { code: Number.parseInt(code, 16), mnemonic, mode, cycles, pageCross, illegal };
}

function loadOpcodeTable(): OpcodeTable {
  const text = readFileSync(new URL('./opcodes.json', import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) throw new Error('opcodes.json: expected an array');

  const byCode = new Map<number, OpcodeInfo>();
  const byForm = new Map<string, OpcodeInfo>();
  const mnemonics = new Set<string>();
  parsed.forEach((raw: unknown, index) => {
    const info = parseRow(raw, index);
    if (byCode.has(info.code)) throw new Error(`opcodes.json: duplicate code ${info.code}`);
    byCode.set(info.code, info);
    const key = formKey(info.mnemonic, info.mode);
    if (!byForm.has(key)) byForm.set(key, info);
    mnemonics.add(info.mnemonic);
  });
  return { byCode, byForm, mnemonics };
}

let table: OpcodeTable | undefined;

/**
 * The 6502 opcode table: every official opcode plus the stable undocumented ones.
 *
 * Loaded once from `opcodes.json`; read-only afterwards.
 */
export function opcodeTable(): OpcodeTable {
  table ??= loadOpcodeTable();
  return table;
}

export function lookupOpcode(mnemonic: string, mode: AddressingMode): OpcodeInfo | undefined {
  return opcodeTable().byForm.get(formKey(mnemonic, mode));
}

export function decodeOpcode(code: number): OpcodeInfo | undefined {
  return opcodeTable().byCode.get(code & 0xff);
}

export function isKnownMnemonic(mnemonic: string): boolean {
  return opcodeTable().mnemonics.has(mnemonic.toUpperCase());
}

export function isLegalMode(mnemonic: string, mode: AddressingMode): boolean {
  return lookupOpcode(mnemonic, mode) !== undefined;
}

/**
 * Addressing modes accepted by a mnemonic, in table order.
 */
export function legalModes(mnemonic: string): AddressingMode[] {
  const upper = mnemonic.toUpperCase();
  const out: AddressingMode[] = [];
  for (const info of opcodeTable().byForm.values()) {
    if (info.mnemonic === upper) out.push(info.mode);
  }
  return out;
}

/** Encoded size in bytes of `mnemonic` in `mode`. */
export function byteCost(mode: AddressingMode): number {
  return 1 + operandSize(mode);
}

/** Base cycle count of `mnemonic` in `mode`, or 0 for unknown forms. */
export function cycleCost(mnemonic: string, mode: AddressingMode): number {
  return lookupOpcode(mnemonic, mode)?.cycles ?? 0;
}
