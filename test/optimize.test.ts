import { describe, expect, it } from 'vitest';

import type { StreamItem } from '../src/m6502/instruction.js';
import { absRef, imm, ins, label, labelRef, mem } from '../src/m6502/instruction.js';
import { simulateStream } from '../src/m6502/simulate.js';
import { optimizeStream } from '../src/optimize/optimize.js';
import { ir, lower, shape } from './helpers/lower.js';

const zp = (address: number) => mem(absRef(address));
const gen = (name: string) => label(name, { generated: true });

describe('optimizeStream', () => {
  it('drops a load of a value the register already holds', () => {
    const items: StreamItem[] = [
      ins('LDA', 'imm', imm(5)),
      ins('STA', 'zp', zp(0x80)),
      ins('LDA', 'imm', imm(5)),
      ins('STA', 'zp', zp(0x81)),
      ins('LDX', 'imm', imm(1)),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size' });
    expect(shape(result.stream.items)).toEqual([
      'LDA imm',
      'STA zp',
      'STA zp',
      'LDX imm',
      'RTS imp',
    ]);
    expect(result.rewrites.get('redundant-load')).toBe(1);
    expect(result.passes).toBe(2);
    expect(result.converged).toBe(true);
    expect([result.bytesBefore, result.bytesAfter]).toEqual([11, 9]);
  });

  it('keeps a repeated load whose flags are tested', () => {
    const items: StreamItem[] = [
      ins('LDA', 'zp', zp(0x80)),
      ins('STA', 'zp', zp(0x81)),
      ins('LDA', 'zp', zp(0x80)),
      ins('BEQ', 'rel', labelRef('out')),
      ins('RTS', 'imp'),
      label('out'),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size' });
    expect(result.rewrites.has('redundant-load')).toBe(false);
    expect(result.stream.items).toHaveLength(7);
  });

  it('drops a store of the value memory already holds', () => {
    const items: StreamItem[] = [
      ins('LDA', 'zp', zp(0x80)),
      ins('STA', 'zp', zp(0x80)),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size' });
    expect(shape(result.stream.items)).toEqual(['LDA zp', 'RTS imp']);
    expect(result.rewrites.get('redundant-store')).toBe(1);
  });

  it('never merges accesses to volatile locations', () => {
    const colbk = mem(absRef(0xd01a, true));
    const items: StreamItem[] = [
      ins('LDA', 'abs', colbk),
      ins('STA', 'abs', colbk),
      ins('LDA', 'abs', colbk),
      ins('STA', 'zp', zp(0x80)),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size' });
    expect(result.stream.items).toEqual(items);
    expect(result.rewrites.size).toBe(0);
  });

  it('keeps every store to a fixed symbol in hardware register space', () => {
    const { stream, diagnostics } = lower(
      ir(
        'sym wsync: byte @ $D40A',
        'sym x: byte',
        'sym y: byte',
        'proc main',
        '  mov x, 1',
        '  mov wsync, x',
        '  mov wsync, x',
        '  mov y, 7',
        '  ret',
        'endproc',
      ),
    );
    expect(diagnostics).toEqual([]);
    const result = optimizeStream(stream, { level: 'size' });
    const stores = result.stream.items.flatMap((item) =>
      item.kind === 'ins' && /^ST[AXY]$/.test(item.mnemonic) && item.operand.kind === 'mem'
        ? [item.operand.ref]
        : [],
    );
    expect(stores.map((ref) => [ref.symbol, ref.volatile])).toEqual([
      ['x', false],
      ['wsync', true],
      ['wsync', true],
      ['y', false],
    ]);
  });

  it('threads branches through jumps and cleans up behind them', () => {
    const items: StreamItem[] = [
      ins('BEQ', 'rel', labelRef('__L1')),
      ins('LDX', 'imm', imm(1)),
      gen('__L1'),
      ins('JMP', 'abs', labelRef('__L2')),
      ins('LDX', 'imm', imm(2)),
      gen('__L2'),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size' });
    expect(shape(result.stream.items)).toEqual(['BEQ rel', 'LDX imm', '__L2:', 'RTS imp']);
    expect(result.stream.items[0]).toMatchObject({ operand: { kind: 'label', label: '__L2' } });
    expect(Object.fromEntries(result.rewrites)).toEqual({
      'branch-to-branch': 1,
      'unreachable-code': 1,
      'unreferenced-label': 1,
      'jump-to-next': 1,
    });
    expect(result.passes).toBe(3);
  });

  it('inverts a branch over a jump', () => {
    const items: StreamItem[] = [
      ins('BNE', 'rel', labelRef('__L1')),
      ins('JMP', 'abs', labelRef('__L2')),
      gen('__L1'),
      ins('LDA', 'imm', imm(1)),
      gen('__L2'),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size' });
    expect(shape(result.stream.items)).toEqual(['BEQ rel', 'LDA imm', '__L2:', 'RTS imp']);
    expect(result.stream.items[0]).toMatchObject({
      mnemonic: 'BEQ',
      operand: { kind: 'label', label: '__L2' },
    });
    expect([result.bytesBefore, result.bytesAfter]).toEqual([8, 5]);
  });

  it('keeps user labels even when nothing refers to them', () => {
    const items: StreamItem[] = [label('main', { proc: true }), label('spare'), ins('RTS', 'imp')];
    const result = optimizeStream({ items, entry: 'main' }, { level: 'size' });
    expect(result.stream.items).toEqual(items);
  });

  it('runs one pass of the cheap rules at the default level', () => {
    const items: StreamItem[] = [
      ins('LDA', 'abs', zp(0x80)),
      ins('JMP', 'abs', labelRef('__L1')),
      gen('__L1'),
      ins('LDA', 'zp', zp(0x80)),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'default' });
    expect(shape(result.stream.items)).toEqual(['LDA zp', 'LDA zp', 'RTS imp']);
    expect(result.passes).toBe(1);
    expect(result.converged).toBe(true);
    expect(result.rewrites.has('redundant-load')).toBe(false);
    expect([result.bytesBefore, result.bytesAfter]).toEqual([9, 5]);
  });

  it('stops at the pass bound without converging', () => {
    const items: StreamItem[] = [
      ins('BEQ', 'rel', labelRef('__L1')),
      ins('LDX', 'imm', imm(1)),
      gen('__L1'),
      ins('JMP', 'abs', labelRef('__L2')),
      ins('LDX', 'imm', imm(2)),
      gen('__L2'),
      ins('RTS', 'imp'),
    ];
    const result = optimizeStream({ items }, { level: 'size', maxPasses: 1 });
    expect(result.passes).toBe(1);
    expect(result.converged).toBe(false);
    expect(shape(result.stream.items)).toEqual([
      'BEQ rel',
      'LDX imm',
      'JMP abs',
      '__L2:',
      'RTS imp',
    ]);
  });
});

const SUM = ir(
  'sym i: byte',
  'sym total: word',
  'proc main',
  '  mov total, 0',
  '  mov i, 0',
  'loop:',
  '  add total, total, i',
  '  inc i',
  '  br.lt i, 40, loop',
  '  ret',
  'endproc',
);

const FILL = ir(
  'sym p: ptr',
  'sym n: byte',
  'proc main',
  '  mov p, $3000',
  '  mov n, 0',
  'fill:',
  '  store [p + n], n',
  '  inc n',
  '  br.ne n, 16, fill',
  '  call clear',
  '  ret',
  'endproc',
  'proc clear',
  '  mov n, 0',
  '  ret',
  'endproc',
);

describe('optimized programs', () => {
  function run(items: readonly StreamItem[]) {
    return simulateStream(items, { entry: 'main' });
  }

  it('compute the same results as before optimization', () => {
    for (const text of [SUM, FILL]) {
      const { stream, diagnostics } = lower(text);
      expect(diagnostics).toEqual([]);
      const optimized = optimizeStream(stream, { level: 'size' });
      expect(optimized.bytesAfter).toBeLessThanOrEqual(optimized.bytesBefore);

      const before = run(stream.items);
      const after = run(optimized.stream.items);
      expect(before.halt).toBe('return');
      expect(after.halt).toBe('return');
      // Page 1 holds return addresses, which are stream positions here.
      expect(after.state.memory.slice(0, 0x100)).toEqual(before.state.memory.slice(0, 0x100));
      expect(after.state.memory.slice(0x200)).toEqual(before.state.memory.slice(0x200));
    }
  });

  it('compute the same results on generated programs', () => {
    let seed = 19790521;
    const random = (n: number): number => {
      seed = (Math.imul(seed, 1664525) + 1013904223) >>> 0;
      return seed % n;
    };
    const pick = (values: readonly string[]): string => values[random(values.length)] ?? '0';
    const vars = ['v0', 'v1', 'v2', 'v3', 'w0'];
    const operand = (): string => (random(3) === 0 ? String(random(256)) : pick(vars));
    const step = (): string => {
      const dst = pick(vars);
      switch (random(5)) {
        case 0:
          return `mov ${dst}, ${operand()}`;
        case 1:
          return `${pick(['add', 'sub', 'and', 'or', 'xor'])} ${dst}, ${operand()}, ${operand()}`;
        case 2:
          return `${pick(['inc', 'dec', 'shl', 'shr'])} ${dst}`;
        case 3:
          return `set.${pick(['eq', 'ne', 'lt', 'ge'])} ${dst}, ${operand()}, ${operand()}`;
        default:
          return `sel ${dst}, ${operand()}, ${operand()}, ${operand()}`;
      }
    };
    const steps = (count: number): string[] => Array.from({ length: count }, () => `  ${step()}`);

    for (let round = 0; round < 40; round++) {
      const lines = [
        'sym v0: byte',
        'sym v1: byte',
        'sym v2: byte',
        'sym v3: byte',
        'sym w0: word',
        'sym i: byte',
        'proc main',
        ...vars.map((v) => `  mov ${v}, ${random(256)}`),
        ...steps(2 + random(6)),
      ];
      if (random(2) === 0) {
        lines.push('  mov i, 0', 'top:', ...steps(1 + random(5)));
        lines.push('  inc i', `  br.ne i, ${2 + random(6)}, top`);
      }
      lines.push(...steps(random(5)), '  ret', 'endproc');

      const { stream, diagnostics } = lower(ir(...lines));
      expect(diagnostics.filter((d) => d.severity === 'error')).toEqual([]);
      const optimized = optimizeStream(stream, { level: 'size' });
      expect(optimized.bytesAfter).toBeLessThanOrEqual(optimized.bytesBefore);

      const before = run(stream.items);
      const after = run(optimized.stream.items);
      expect(before.halt).toBe('return');
      expect(after.halt).toBe('return');
      expect(after.state.memory.slice(0, 0x100)).toEqual(before.state.memory.slice(0, 0x100));
      expect(after.state.memory.slice(0x200)).toEqual(before.state.memory.slice(0x200));
    }
  });

  it('sum a counted loop', () => {
    const { stream, allocation } = lower(SUM);
    const result = run(optimizeStream(stream, { level: 'size' }).stream.items);
    expect(allocation.slots.get('total')).toEqual({ kind: 'zp', offset: 0x80 });
    expect(allocation.slots.get('i')).toEqual({ kind: 'zp', offset: 0x82 });
    const memory = result.state.memory;
    expect((memory[0x81] ?? 0) * 256 + (memory[0x80] ?? 0)).toBe(780);
    expect(memory[0x82]).toBe(40);
  });

  it('fill memory through a pointer', () => {
    const result = run(optimizeStream(lower(FILL).stream, { level: 'size' }).stream.items);
    expect(Array.from(result.state.memory.slice(0x3000, 0x3010))).toEqual(
      Array.from({ length: 16 }, (_, i) => i),
    );
    expect(result.state.memory[0x82]).toBe(0);
  });

  it('reach a fixpoint: optimizing again changes nothing', () => {
    for (const text of [SUM, FILL]) {
      const once = optimizeStream(lower(text).stream, { level: 'size' });
      expect(once.converged).toBe(true);
      const twice = optimizeStream(once.stream, { level: 'size' });
      expect(twice.stream.items).toEqual(once.stream.items);
      expect(twice.rewrites.size).toBe(0);
      expect(twice.passes).toBe(1);
    }
  });
});
