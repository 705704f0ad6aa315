import { describe, expect, it } from 'vitest';

import {
  allocateStorage,
  DEFAULT_WINDOW,
  FULL_PAGE_WINDOW,
  slotAddress,
} from '../src/alloc/zeropage.js';
import type { Allocation } from '../src/alloc/zeropage.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { IrSymbol, SizeClass } from '../src/ir/ast.js';
import type { LivenessInfo, SymbolLiveness } from '../src/ir/liveness.js';
import { ir, lower } from './helpers/lower.js';

function sym(name: string, size: SizeClass = 'byte', at?: number): IrSymbol {
  return { name, size, volatile: false, ...(at !== undefined ? { at } : {}) };
}

function live(entries: Array<[string, number, number, number?]>): LivenessInfo {
  const symbols = new Map<string, SymbolLiveness>();
  let last = 0;
  for (const [name, start, end, frequency] of entries) {
    symbols.set(name, { name, range: { start, end }, frequency: frequency ?? 1, global: false });
    last = Math.max(last, end);
  }
  return { symbols, loops: [], procs: new Map(), pointCount: last + 1 };
}

function addressOf(allocation: Allocation, name: string): number | undefined {
  const slot = allocation.slots.get(name);
  return slot ? slotAddress(slot) : undefined;
}

describe('analyzeLiveness', () => {
  it('spans the first to the last reference and warns about unused symbols', () => {
    const { liveness, diagnostics } = lower(
      ir(
        'sym a: byte',
        'sym b: byte',
        'sym u: byte',
        'proc main',
        '  mov a, 1',
        '  mov b, a',
        '  mov b, 2',
        '  ret',
        'endproc',
      ),
    );
    expect(liveness.symbols.get('a')).toEqual({
      name: 'a',
      range: { start: 1, end: 2 },
      frequency: 2,
      global: false,
    });
    expect(liveness.symbols.get('b')?.range).toEqual({ start: 2, end: 3 });
    expect(liveness.symbols.has('u')).toBe(false);
    expect(diagnostics.map((d) => [d.id, d.severity, d.message])).toEqual([
      [
        DiagnosticIds.UnusedSymbol,
        'warning',
        'Symbol "u" is never referenced; no storage assigned.',
      ],
    ]);
  });

  it('keeps a symbol read before any write live everywhere', () => {
    const { liveness } = lower(
      ir('sym a: byte', 'sym b: byte', 'proc main', '  mov a, b', '  ret', 'endproc'),
    );
    expect(liveness.symbols.get('b')?.global).toBe(true);
    expect(liveness.symbols.get('b')?.range).toEqual({ start: 0, end: 3 });
    expect(liveness.symbols.get('a')?.range).toEqual({ start: 1, end: 1 });
  });

  it('extends ranges over loops and weights accesses by loop depth', () => {
    const { liveness } = lower(
      ir(
        'sym i: byte',
        'sym x: byte',
        'proc main',
        '  mov i, 0',
        'top:',
        '  mov x, i',
        '  inc i',
        '  br.ne i, 10, top',
        '  ret',
        'endproc',
      ),
    );
    expect(liveness.loops).toEqual([{ start: 2, end: 5 }]);
    expect(liveness.symbols.get('i')?.range).toEqual({ start: 1, end: 5 });
    expect(liveness.symbols.get('i')?.frequency).toBe(25);
    expect(liveness.symbols.get('x')?.range).toEqual({ start: 2, end: 5 });
    expect(liveness.symbols.get('x')?.frequency).toBe(8);
  });

  it('extends a range over the body of a procedure called inside it', () => {
    const { liveness, allocation } = lower(
      ir(
        'sym a: byte',
        'sym b: byte',
        'sym s: byte',
        'sym r: byte',
        'proc main',
        '  mov a, 1',
        '  call helper',
        '  mov b, a',
        '  ret',
        'endproc',
        'proc helper',
        '  mov s, 2',
        '  mov r, s',
        '  ret',
        'endproc',
      ),
    );
    expect(liveness.procs.get('helper')).toEqual({ start: 6, end: 10 });
    expect(liveness.symbols.get('a')?.range).toEqual({ start: 1, end: 10 });
    expect(liveness.symbols.get('b')?.range).toEqual({ start: 3, end: 3 });
    expect(addressOf(allocation, 'a')).toBe(0x80);
    expect(addressOf(allocation, 'b')).toBe(0x81);
    expect(addressOf(allocation, 's')).toBe(0x81);
    expect(addressOf(allocation, 'r')).toBe(0x82);
  });
});

describe('allocateStorage', () => {
  it('lets symbols with disjoint lifetimes share a byte', () => {
    const { allocation, diagnostics } = lower(
      ir(
        'sym a: byte',
        'sym b: byte',
        'sym c: word',
        'proc main',
        '  mov c, 0',
        '  mov a, 1',
        '  add c, c, a',
        '  mov b, 2',
        '  add c, c, b',
        '  ret',
        'endproc',
      ),
    );
    expect(diagnostics).toEqual([]);
    expect(allocation.slots.get('c')).toEqual({ kind: 'zp', offset: 0x80 });
    expect(allocation.slots.get('a')).toEqual({ kind: 'zp', offset: 0x82 });
    expect(allocation.slots.get('b')).toEqual({ kind: 'zp', offset: 0x82 });
    expect(allocation.zeroPageBytesUsed).toBe(3);
    expect(allocation.spilled).toEqual([]);
    expect(allocation.absoluteRange).toBeUndefined();
  });

  it('gives the lowest byte to the more frequently accessed symbol', () => {
    const allocation = allocateStorage(
      [sym('x'), sym('y')],
      live([
        ['x', 0, 5, 1],
        ['y', 0, 5, 64],
      ]),
    );
    expect(addressOf(allocation, 'y')).toBe(0x80);
    expect(addressOf(allocation, 'x')).toBe(0x81);
  });

  it('falls back to declaration order on equal frequency', () => {
    const allocation = allocateStorage(
      [sym('x'), sym('y')],
      live([
        ['y', 0, 5],
        ['x', 0, 5],
      ]),
    );
    expect(addressOf(allocation, 'x')).toBe(0x80);
    expect(addressOf(allocation, 'y')).toBe(0x81);
  });

  it('skips reserved bytes', () => {
    const allocation = allocateStorage([sym('x')], live([['x', 0, 1]]), {
      window: { ...DEFAULT_WINDOW, reserved: [0x80, 0x81] },
    });
    expect(addressOf(allocation, 'x')).toBe(0x82);
  });

  it('never starts a two-byte symbol at $FF', () => {
    const allocation = allocateStorage(
      [sym('b1'), sym('w', 'word')],
      live([
        ['b1', 0, 9],
        ['w', 0, 9],
      ]),
      { window: { start: 0xfe, end: 0x100 } },
    );
    expect(allocation.slots.get('b1')).toEqual({ kind: 'zp', offset: 0xfe });
    expect(allocation.slots.get('w')).toEqual({ kind: 'abs', address: 0x0600 });
    expect(allocation.spilled).toEqual(['w']);
    expect(allocation.absoluteRange).toEqual({ start: 0x0600, end: 0x0602 });
  });

  it('places fixed symbols at their declared addresses', () => {
    const allocation = allocateStorage(
      [sym('colbk', 'byte', 0xd01a), sym('rtclok', 'byte', 0x14), sym('x')],
      live([
        ['colbk', 0, 3],
        ['rtclok', 0, 3],
        ['x', 0, 3],
      ]),
    );
    expect(allocation.slots.get('colbk')).toEqual({ kind: 'abs', address: 0xd01a });
    expect(allocation.slots.get('rtclok')).toEqual({ kind: 'zp', offset: 0x14 });
    expect(allocation.slots.get('x')).toEqual({ kind: 'zp', offset: 0x80 });
    expect(allocation.spilled).toEqual([]);
    expect(allocation.zeroPageBytesUsed).toBe(1);
  });

  it('keeps allocated symbols off the bytes of fixed symbols in the window', () => {
    const { allocation } = lower(
      ir(
        'sym hw: byte @ $80',
        'sym x: byte',
        'proc main',
        '  mov x, 1',
        '  mov hw, 2',
        '  mov hw, x',
        '  ret',
        'endproc',
      ),
    );
    expect(allocation.slots.get('hw')).toEqual({ kind: 'zp', offset: 0x80 });
    expect(allocation.slots.get('x')).toEqual({ kind: 'zp', offset: 0x81 });

    const word = allocateStorage(
      [sym('ptr', 'word', 0x81), sym('a'), sym('b')],
      live([
        ['a', 0, 4],
        ['b', 0, 4],
      ]),
    );
    expect(addressOf(word, 'a')).toBe(0x80);
    expect(addressOf(word, 'b')).toBe(0x83);
    expect(word.slots.has('ptr')).toBe(false);
  });

  it('spills around fixed symbols in absolute storage', () => {
    const allocation = allocateStorage(
      [sym('buf', 'byte', 0x0600), sym('x'), sym('y', 'word')],
      live([
        ['buf', 0, 3],
        ['x', 0, 3],
        ['y', 0, 3],
      ]),
      { window: { start: 0x80, end: 0x80 } },
    );
    expect(allocation.slots.get('buf')).toEqual({ kind: 'abs', address: 0x0600 });
    expect(allocation.slots.get('x')).toEqual({ kind: 'abs', address: 0x0601 });
    expect(allocation.slots.get('y')).toEqual({ kind: 'abs', address: 0x0602 });
    expect(allocation.spilled).toEqual(['x', 'y']);
    expect(allocation.absoluteRange).toEqual({ start: 0x0601, end: 0x0604 });
  });

  it('assigns nothing to symbols without a live range', () => {
    const allocation = allocateStorage([sym('x'), sym('unused')], live([['x', 0, 1]]));
    expect(allocation.slots.has('unused')).toBe(false);
  });

  it('spills to absolute storage once the window is full', () => {
    const symbols: IrSymbol[] = [];
    const entries: Array<[string, number, number]> = [];
    for (let i = 0; i < 129; i++) {
      symbols.push(sym(`s${i}`));
      entries.push([`s${i}`, 0, 10]);
    }
    const allocation = allocateStorage(symbols, live(entries));
    expect(addressOf(allocation, 's0')).toBe(0x80);
    expect(addressOf(allocation, 's127')).toBe(0xff);
    expect(allocation.slots.get('s128')).toEqual({ kind: 'abs', address: 0x0600 });
    expect(allocation.spilled).toEqual(['s128']);
    expect(allocation.zeroPageBytesUsed).toBe(128);
    expect(allocation.absoluteRange).toEqual({ start: 0x0600, end: 0x0601 });

    const based = allocateStorage(symbols, live(entries), { absoluteBase: 0x3000 });
    expect(based.slots.get('s128')).toEqual({ kind: 'abs', address: 0x3000 });
  });

  it('never gives overlapping lifetimes overlapping bytes', () => {
    let seed = 20240611;
    const random = (n: number): number => {
      seed = (Math.imul(seed, 1664525) + 1013904223) >>> 0;
      return seed % n;
    };

    for (let round = 0; round < 25; round++) {
      const symbols: IrSymbol[] = [];
      const entries: Array<[string, number, number, number]> = [];
      for (let i = 0; i < 40; i++) {
        const start = random(60);
        symbols.push(sym(`v${i}`, random(2) === 0 ? 'byte' : 'word'));
        entries.push([`v${i}`, start, start + random(20), 1 + random(10)]);
      }
      const allocation = allocateStorage(symbols, live(entries), { window: FULL_PAGE_WINDOW });
      expect(allocation.spilled).toEqual([]);

      const bytes = (i: number): number[] => {
        const base = addressOf(allocation, `v${i}`) ?? -1;
        return symbols[i]?.size === 'byte' ? [base] : [base, base + 1];
      };
      for (let i = 0; i < entries.length; i++) {
        const a = entries[i];
        expect(bytes(i).every((b) => b >= 0 && b < 0x100)).toBe(true);
        for (let j = i + 1; j < entries.length; j++) {
          const b = entries[j];
          if (!a || !b || a[1] > b[2] || b[1] > a[2]) continue;
          const mine = new Set(bytes(i));
          expect(bytes(j).some((x) => mine.has(x))).toBe(false);
        }
      }
    }
  });
});
