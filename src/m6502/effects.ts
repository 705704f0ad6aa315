import { readFileSync } from 'node:fs';

import type { Instruction } from './instruction.js';
import { indexRegisterOf, isMemoryMode } from './modes.js';

/** `A`, `X`, `Y` and the stack pointer `S`. */
export type EffectRegister = 'A' | 'X' | 'Y' | 'S';
export type Flag = 'N' | 'V' | 'D' | 'I' | 'Z' | 'C' | 'B';
export type MemoryAccess = 'none' | 'read' | 'write' | 'rmw';
export type ControlKind = 'none' | 'branch' | 'jump' | 'call' | 'return' | 'halt';

/**
 * What an instruction reads and writes, as far as the optimizer and the validator care.
 */
export interface InstructionEffects {
  reads: ReadonlySet<EffectRegister>;
  writes: ReadonlySet<EffectRegister>;
  flagsIn: ReadonlySet<Flag>;
  flagsOut: ReadonlySet<Flag>;
  memory: MemoryAccess;
  /** Net bytes pushed (negative: pulled). */
  stack: number;
  control: ControlKind;
}

const REGISTERS: readonly EffectRegister[] = ['A', 'X', 'Y', 'S'];
const FLAGS: readonly Flag[] = ['N', 'V', 'D', 'I', 'Z', 'C', 'B'];
const ACCESS: readonly MemoryAccess[] = ['none', 'read', 'write', 'rmw'];
const CONTROL: readonly ControlKind[] = ['none', 'branch', 'jump', 'call', 'return', 'halt'];

function letters<T extends string>(text: unknown, allowed: readonly T[], what: string): Set<T> {
  if (typeof text !== 'string') throw new Error(`effects.json: bad "${what}"`);
  const out = new Set<T>();
  for (const ch of text) {
    const hit = allowed.find((a) => a === ch);
    if (!hit) throw new Error(`effects.json: unknown ${what} "${ch}"`);
    out.add(hit);
  }
  return out;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], what: string): T {
  const hit = allowed.find((a) => a === value);
  if (!hit) throw new Error(`effects.json: bad "${what}" ${String(value)}`);
  return hit;
}

function loadEffects(): Map<string, InstructionEffects> {
  const text = readFileSync(new URL('./effects.json', import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(text);
  if (parsed === null || typeof parsed !== 'object') {
    throw new Error('effects.json: expected an object');
  }
  const entries: Array<[string, unknown]> = Object.entries(parsed);
  const out = new Map<string, InstructionEffects>();
  for (const [mnemonic, raw] of entries) {
    if (raw === null || typeof raw !== 'object') {
      throw new Error(`effects.json: bad entry ${mnemonic}`);
    }
    const row: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
    if (typeof row.stack !== 'number') {
      throw new Error(`effects.json: bad "stack" for ${mnemonic}`);
    }
    out.set(mnemonic, {
      reads: letters(row.reads, REGISTERS, 'register'),
      writes: letters(row.writes, REGISTERS, 'register'),
      flagsIn: letters(row.flagsIn, FLAGS, 'flag'),
      flagsOut: letters(row.flagsOut, FLAGS, 'flag'),
      memory: oneOf(row.memory, ACCESS, 'memory'),
      stack: row.stack,
      control: oneOf(row.control, CONTROL, 'control'),
    });
  }
  return out;
}

let table: Map<string, InstructionEffects> | undefined;

const UNKNOWN: InstructionEffects = {
  reads: new Set(REGISTERS),
  writes: new Set(REGISTERS),
  flagsIn: new Set(FLAGS),
  flagsOut: new Set(FLAGS),
  memory: 'rmw',
  stack: 0,
  control: 'halt',
};

/**
 * Effects of `mnemonic` independent of its addressing mode.
 */
export function mnemonicEffects(mnemonic: string): InstructionEffects {
  table ??= loadEffects();
  return table.get(mnemonic.toUpperCase()) ?? UNKNOWN;
}

/**
 * Effects of an instruction in its addressing mode: accumulator forms act on `A` instead of memory,
 * immediates touch no memory, and indexed forms read their index register.
 */
export function instructionEffects(i: Instruction): InstructionEffects {
  const base = mnemonicEffects(i.mnemonic);
  const reads = new Set(base.reads);
  const writes = new Set(base.writes);
  let memory = base.memory;

  if (i.mode === 'acc') {
    reads.add('A');
    writes.add('A');
    memory = 'none';
  } else if (!isMemoryMode(i.mode) || i.mnemonic === 'JMP' || i.mnemonic === 'JSR') {
    memory = 'none';
  }
  const index = indexRegisterOf(i.mode);
  if (index) reads.add(index);

  return { ...base, reads, writes, memory };
}

export function writesMemory(i: Instruction): boolean {
  const m = instructionEffects(i).memory;
  return m === 'write' || m === 'rmw';
}

