import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { disassemble } from '../src/m6502/disasm.js';
import { instructionEffects, mnemonicEffects } from '../src/m6502/effects.js';
import { encodeInstruction } from '../src/m6502/encode.js';
import {
  absRef,
  formatInstruction,
  imm,
  ins,
  labelRef,
  mem,
} from '../src/m6502/instruction.js';
import {
  byteCost,
  cycleCost,
  decodeOpcode,
  isLegalMode,
  legalModes,
  lookupOpcode,
  opcodeTable,
} from '../src/m6502/opcodes.js';

describe('opcode table', () => {
  it('maps official forms to their opcodes', () => {
    expect(lookupOpcode('LDA', 'imm')?.code).toBe(0xa9);
    expect(lookupOpcode('lda', 'zp')?.code).toBe(0xa5);
    expect(lookupOpcode('STA', 'abs')?.code).toBe(0x8d);
    expect(lookupOpcode('JMP', 'ind')?.code).toBe(0x6c);
    expect(lookupOpcode('JSR', 'abs')?.code).toBe(0x20);
    expect(lookupOpcode('RTS', 'imp')?.code).toBe(0x60);
  });

  it('knows which modes each mnemonic accepts', () => {
    expect(isLegalMode('STA', 'imm')).toBe(false);
    expect(isLegalMode('LDX', 'zpy')).toBe(true);
    expect(isLegalMode('LDX', 'zpx')).toBe(false);
    expect(legalModes('LDX')).toEqual(['imm', 'zp', 'zpy', 'abs', 'absy']);
  });

  it('marks undocumented opcodes', () => {
    const lax = decodeOpcode(0xa7);
    expect(lax?.mnemonic).toBe('LAX');
    expect(lax?.mode).toBe('zp');
    expect(lax?.illegal).toBe(true);
    expect(decodeOpcode(0xa5)?.illegal).toBe(false);
    expect(decodeOpcode(0x80)).toBeUndefined();
  });

  it('has one row per opcode byte and a form for every row', () => {
    const table = opcodeTable();
    expect(table.byCode.size).toBe(219);
    for (const info of table.byCode.values()) {
      expect(lookupOpcode(info.mnemonic, info.mode)?.mnemonic).toBe(info.mnemonic);
    }
  });

  it('reports sizes and cycles', () => {
    expect(byteCost('imp')).toBe(1);
    expect(byteCost('zp')).toBe(2);
    expect(byteCost('absx')).toBe(3);
    expect(cycleCost('INC', 'absx')).toBe(7);
    expect(lookupOpcode('LDA', 'absx')?.pageCross).toBe(true);
    expect(cycleCost('XYZ', 'imp')).toBe(0);
  });
});

describe('instruction effects', () => {
  it('treats accumulator forms as register operations', () => {
    const acc = instructionEffects(ins('ASL', 'acc'));
    expect(acc.memory).toBe('none');
    expect(acc.writes.has('A')).toBe(true);

    const zp = instructionEffects(ins('ASL', 'zp', mem(absRef(0x80))));
    expect(zp.memory).toBe('rmw');
    expect([...zp.flagsOut].sort()).toEqual(['C', 'N', 'Z']);
  });

  it('adds the index register to the reads of indexed forms', () => {
    const e = instructionEffects(ins('LDA', 'absx', mem(absRef(0x0600))));
    expect(e.reads.has('X')).toBe(true);
    expect(e.writes.has('A')).toBe(true);
    expect(e.memory).toBe('read');
  });

  it('describes stack and control effects', () => {
    expect(mnemonicEffects('PHA').stack).toBe(1);
    expect(mnemonicEffects('JSR').control).toBe('call');
    expect(instructionEffects(ins('JMP', 'abs', labelRef('x'))).memory).toBe('none');
  });
});

describe('encodeInstruction', () => {
  const labels = new Map([
    ['loop', 0x2000],
    ['far', 0x2100],
  ]);

  it('encodes immediate, absolute and relative forms', () => {
    const diagnostics: Diagnostic[] = [];
    expect(encodeInstruction(ins('LDA', 'imm', imm(0x2a)), 0x2000, labels, diagnostics)).toEqual(
      Uint8Array.of(0xa9, 0x2a),
    );
    expect(
      encodeInstruction(ins('STA', 'abs', mem(absRef(0xd01a))), 0x2002, labels, diagnostics),
    ).toEqual(Uint8Array.of(0x8d, 0x1a, 0xd0));
    const bne = ins('BNE', 'rel', labelRef('loop'));
    expect(encodeInstruction(bne, 0x2010, labels, diagnostics)).toEqual(Uint8Array.of(0xd0, 0xee));
    const jmp = ins('JMP', 'abs', labelRef('far'));
    expect(encodeInstruction(jmp, 0x2000, labels, diagnostics)).toEqual(
      Uint8Array.of(0x4c, 0x00, 0x21),
    );
    expect(diagnostics).toEqual([]);
  });

  it('rejects branches beyond the 8-bit displacement', () => {
    const diagnostics: Diagnostic[] = [];
    const far = ins('BNE', 'rel', labelRef('far'));
    const bytes = encodeInstruction(far, 0x2000, labels, diagnostics);
    expect(bytes).toBeUndefined();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.id).toBe(DiagnosticIds.EncodeError);
    expect(diagnostics[0]?.message).toBe('BNE target out of range (254 bytes)');
    expect(diagnostics[0]?.instruction).toBe('BNE far');
  });

  it('rejects illegal forms and wide zero-page operands', () => {
    const diagnostics: Diagnostic[] = [];
    expect(encodeInstruction(ins('STA', 'imm', imm(1)), 0, labels, diagnostics)).toBeUndefined();
    expect(
      encodeInstruction(ins('LDA', 'zp', mem(absRef(0x1234))), 0, labels, diagnostics),
    ).toBeUndefined();
    expect(diagnostics.map((d) => d.message)).toEqual([
      'STA has no imm addressing form',
      'LDA zp expects a zero-page operand',
    ]);
  });
});

describe('disassemble', () => {
  it('decodes operands and resolves branch targets', () => {
    const bytes = Uint8Array.of(0xa9, 0x2a, 0x8d, 0x1a, 0xd0, 0xd0, 0xfb, 0x80);
    const out = disassemble(bytes, 0x2000);
    expect(out.map((d) => [d.address, d.mnemonic, d.mode, d.operand])).toEqual([
      [0x2000, 'LDA', 'imm', 0x2a],
      [0x2002, 'STA', 'abs', 0xd01a],
      [0x2005, 'BNE', 'rel', 0x2002],
      [0x2007, '???', 'imp', undefined],
    ]);
  });
});

describe('formatInstruction', () => {
  it('renders canonical native syntax', () => {
    const p = mem({ address: 0x80, offset: 0, volatile: false });
    expect(formatInstruction(ins('LDA', 'indy', p))).toBe('LDA ($80),Y');
    expect(formatInstruction(ins('LDA', 'indx', p))).toBe('LDA ($80,X)');
    expect(formatInstruction(ins('STA', 'abs', mem(absRef(0xd01a))))).toBe('STA $D01A');
    expect(formatInstruction(ins('ROL', 'acc'))).toBe('ROL A');
    expect(formatInstruction(ins('LDX', 'imm', imm(-1)))).toBe('LDX #$FF');
  });
});
