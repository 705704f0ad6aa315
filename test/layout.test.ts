import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { OpOrigin, StreamItem } from '../src/m6502/instruction.js';
import { absRef, imm, ins, label, labelRef, mem } from '../src/m6502/instruction.js';
import { layoutStream } from '../src/lowering/layout.js';
import { shape } from './helpers/lower.js';

describe('layoutStream', () => {
  it('places and encodes a stream at the origin', () => {
    const diagnostics: Diagnostic[] = [];
    const layout = layoutStream(
      {
        items: [
          label('main', { proc: true }),
          ins('LDA', 'imm', imm(0x2a)),
          ins('STA', 'abs', mem(absRef(0xd01a, true))),
          ins('RTS', 'imp'),
        ],
        entry: 'main',
      },
      {},
      diagnostics,
    );
    expect(diagnostics).toEqual([]);
    expect(layout?.origin).toBe(0x2000);
    expect(layout?.end).toBe(0x2006);
    expect(Array.from(layout?.image ?? [])).toEqual([0xa9, 0x2a, 0x8d, 0x1a, 0xd0, 0x60]);
    expect(layout?.labels.get('main')).toBe(0x2000);
    expect(layout?.placed.map((p) => p.address)).toEqual([0x2000, 0x2000, 0x2002, 0x2005]);
    expect(layout?.relaxed).toBe(0);
  });

  it('relaxes a branch that cannot reach its target', () => {
    const nops: StreamItem[] = Array.from({ length: 200 }, () => ins('NOP', 'imp'));
    const diagnostics: Diagnostic[] = [];
    const layout = layoutStream(
      {
        items: [ins('BEQ', 'rel', labelRef('far')), ...nops, label('far'), ins('RTS', 'imp')],
      },
      { origin: 0x2000 },
      diagnostics,
    );
    expect(diagnostics).toEqual([]);
    expect(layout?.relaxed).toBe(1);
    expect(shape(layout?.stream.items.slice(0, 4) ?? [])).toEqual([
      'BNE rel',
      'JMP abs',
      '__R1:',
      'NOP imp',
    ]);
    expect(layout?.labels.get('far')).toBe(0x20cd);
    expect(Array.from(layout?.image.slice(0, 5) ?? [])).toEqual([0xd0, 0x03, 0x4c, 0xcd, 0x20]);
    expect(layout?.end).toBe(0x20ce);
  });

  it('leaves branches that reach alone', () => {
    const nops: StreamItem[] = Array.from({ length: 127 }, () => ins('NOP', 'imp'));
    const layout = layoutStream(
      { items: [ins('BNE', 'rel', labelRef('far')), ...nops, label('far'), ins('RTS', 'imp')] },
      {},
      [],
    );
    expect(layout?.relaxed).toBe(0);
    expect(Array.from(layout?.image.slice(0, 2) ?? [])).toEqual([0xd0, 0x7f]);
  });

  it('reports duplicate labels', () => {
    const diagnostics: Diagnostic[] = [];
    const layout = layoutStream(
      { items: [label('a'), label('a'), ins('RTS', 'imp')] },
      { file: 'dup.a8ir' },
      diagnostics,
    );
    expect(layout).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.DuplicateLabel,
        severity: 'error',
        message: 'Duplicate label "a".',
        file: 'dup.a8ir',
      },
    ]);
  });

  it('reports unresolved labels with the operation they came from', () => {
    const origin: OpOrigin = {
      opIndex: 3,
      file: 'jump.a8ir',
      line: 4,
      column: 3,
      text: 'jmp nowhere',
    };
    const diagnostics: Diagnostic[] = [];
    const layout = layoutStream(
      { items: [ins('JMP', 'abs', labelRef('nowhere'), origin)], entry: 'main' },
      {},
      diagnostics,
    );
    expect(layout).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnresolvedLabel,
        severity: 'error',
        message: 'Unresolved label "nowhere".',
        file: 'jump.a8ir',
        line: 4,
        column: 3,
        opIndex: 3,
        instruction: 'JMP nowhere',
      },
      {
        id: DiagnosticIds.UnresolvedLabel,
        severity: 'error',
        message: 'Unresolved entry "main".',
        file: '<stream>',
      },
    ]);
  });

  it('rejects an image that runs past $FFFF', () => {
    const diagnostics: Diagnostic[] = [];
    const layout = layoutStream(
      { items: [ins('LDA', 'abs', mem(absRef(0x1234))), ins('RTS', 'imp')] },
      { origin: 0xfffe },
      diagnostics,
    );
    expect(layout).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.EncodeError, 'Code image $FFFE..$10002 runs past $FFFF.'],
    ]);
  });

  it('passes encoding errors through', () => {
    const diagnostics: Diagnostic[] = [];
    const layout = layoutStream(
      { items: [ins('LDA', 'zp', mem(absRef(0x1234)))] },
      {},
      diagnostics,
    );
    expect(layout).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message, d.instruction])).toEqual([
      [DiagnosticIds.EncodeError, 'LDA zp expects a zero-page operand', 'LDA $1234'],
    ]);
  });
});
