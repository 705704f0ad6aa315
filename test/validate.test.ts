import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { OpOrigin, StreamItem } from '../src/m6502/instruction.js';
import { absRef, imm, ins, label, labelRef, mem } from '../src/m6502/instruction.js';
import { layoutStream } from '../src/lowering/layout.js';
import type { ValidateOptions } from '../src/validate/crash.js';
import { validateLayout } from '../src/validate/crash.js';
import type { StorageExtent } from '../src/validate/rules.js';

function check(
  body: StreamItem[],
  options: ValidateOptions = {},
  storage: StorageExtent[] = [],
): { count: number; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const layout = layoutStream(
    { items: [label('main', { proc: true }), ...body], entry: 'main' },
    { origin: 0x2000 },
    diagnostics,
  );
  if (!layout) throw new Error(diagnostics.map((d) => d.message).join('; '));
  const count = validateLayout(layout, storage, { file: 'v.a8ir', ...options }, diagnostics);
  return { count, diagnostics };
}

function messages(body: StreamItem[], options: ValidateOptions = {}): string[] {
  return check(body, options).diagnostics.map((d) => d.message);
}

const at = (address: number) => mem(absRef(address, address >= 0xd000 && address < 0xd800));

describe('validateLayout', () => {
  it('accepts ordinary code', () => {
    const result = check([
      ins('LDA', 'imm', imm(1)),
      ins('STA', 'zp', at(0x80)),
      ins('PHA', 'imp'),
      ins('PLA', 'imp'),
      ins('RTS', 'imp'),
    ]);
    expect(result).toEqual({ count: 0, diagnostics: [] });
  });

  it('warns about undocumented opcodes, or fails in strict mode', () => {
    const body = [ins('LAX', 'zp', at(0x80)), ins('RTS', 'imp')];
    const permissive = check(body);
    expect(permissive.count).toBe(1);
    expect(permissive.diagnostics).toEqual([
      {
        id: DiagnosticIds.HardwareFaultRisk,
        severity: 'warning',
        message: 'illegal-opcode: undocumented opcode LAX (opcode $A7)',
        file: 'v.a8ir',
        instruction: 'LAX $80',
      },
    ]);
    expect(check(body, { strict: true }).diagnostics[0]?.severity).toBe('error');
  });

  it('names the operation a finding came from', () => {
    const origin: OpOrigin = {
      opIndex: 2,
      file: 'src.a8ir',
      line: 4,
      column: 3,
      text: 'asm lax $80',
    };
    const { diagnostics } = check([ins('LAX', 'zp', at(0x80), origin), ins('RTS', 'imp')]);
    expect(diagnostics[0]).toMatchObject({
      message: 'illegal-opcode: undocumented opcode LAX (opcode $A7) (op 2, line 4: asm lax $80)',
      file: 'src.a8ir',
      line: 4,
      column: 3,
      opIndex: 2,
    });
  });

  it('flags writes to operating system memory', () => {
    expect(
      messages([
        ins('STA', 'abs', at(0xc000)),
        ins('STA', 'zp', at(0x10)),
        ins('LDA', 'zp', at(0x10)),
        ins('RTS', 'imp'),
      ]),
    ).toEqual([
      'reserved-write: write to $C000 in OS ROM $C000-$CFFF',
      'reserved-write: write to $0010 in OS zero page $0000-$007F',
    ]);
  });

  it('flags read-modify-write and indexed writes on I/O registers', () => {
    expect(
      messages([
        ins('INC', 'abs', at(0xd01a)),
        ins('STA', 'absx', at(0xd000)),
        ins('STA', 'abs', at(0xd01a)),
        ins('RTS', 'imp'),
      ]),
    ).toEqual([
      'io-read-modify-write: INC on I/O register $D01A writes it twice',
      'io-indexed-dummy-read: indexed STA at I/O base $D000 performs a dummy read',
    ]);
  });

  it('tracks the stack through each procedure', () => {
    expect(messages([ins('PLA', 'imp'), ins('RTS', 'imp')])).toEqual([
      'stack-underflow: PLA on an empty stack',
    ]);
    expect(messages([ins('PHA', 'imp'), ins('RTS', 'imp')])).toEqual([
      'stack-imbalance: RTS with 1 byte(s) still pushed',
    ]);
    expect(messages([ins('JSR', 'abs', labelRef('main')), ins('RTS', 'imp')])).toEqual([
      'stack-overflow: recursive call to "main" has no stack bound',
    ]);
  });

  it('reports a join point reached at two depths', () => {
    expect(
      messages([
        ins('BEQ', 'rel', labelRef('join')),
        ins('PHA', 'imp'),
        label('join'),
        ins('RTS', 'imp'),
      ]),
    ).toContain('stack-imbalance: stack depth 0 meets depth 1 at a join point');
  });

  it('holds the call graph to the stack budget', () => {
    const body = [
      ins('PHA', 'imp'),
      ins('JSR', 'abs', labelRef('sub')),
      ins('PLA', 'imp'),
      ins('RTS', 'imp'),
      label('sub', { proc: true }),
      ins('PHA', 'imp'),
      ins('PLA', 'imp'),
      ins('RTS', 'imp'),
    ];
    expect(messages(body)).toEqual([]);
    expect(messages(body, { stackBudget: 3 })).toEqual([
      'stack-overflow: "main" needs 4 stack bytes; budget is 3',
    ]);
  });

  it('flags zero-page index wrap and page-crossing indexed reads', () => {
    expect(
      messages([
        ins('LDX', 'imm', imm(0x10)),
        ins('LDA', 'zpx', at(0xf8)),
        ins('LDA', 'absx', at(0x30f8)),
        ins('RTS', 'imp'),
      ]),
    ).toEqual([
      'zero-page-index-wrap: $F8+X=16 wraps to $08',
      'page-cross-timing: $30F8+X=16 crosses a page (one extra cycle)',
    ]);
  });

  it('flags pointers that straddle a page boundary', () => {
    expect(messages([ins('JMP', 'ind', at(0x02ff))])).toEqual([
      'indirect-jump-page-bug: JMP ($02FF) reads its high byte from $0200, not $0300',
    ]);
    expect(messages([ins('LDA', 'indy', at(0xff)), ins('RTS', 'imp')])).toEqual([
      'zero-page-pointer-wrap: pointer at $FF takes its high byte from $00',
    ]);
  });

  it('flags spilled storage over hardware or code', () => {
    const body = [ins('LDA', 'imm', imm(1)), ins('RTS', 'imp')];
    const storage: StorageExtent[] = [
      { name: 'buf', address: 0xd000, size: 2, spilled: true, file: 'v.a8ir', line: 3, column: 1 },
      { name: 'big', address: 0x2002, size: 2, spilled: true },
      { name: 'zp', address: 0x80, size: 1, spilled: false },
    ];
    const { diagnostics } = check(body, {}, storage);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.HardwareFaultRisk,
        severity: 'warning',
        message: 'absolute-storage-overlap: storage of "buf" at $D000 overlaps GTIA $D000-$D0FF',
        file: 'v.a8ir',
        line: 3,
        column: 1,
      },
      {
        id: DiagnosticIds.HardwareFaultRisk,
        severity: 'warning',
        message:
          'absolute-storage-overlap: storage of "big" at $2002 overlaps the code $2000-$2002',
        file: 'v.a8ir',
      },
    ]);
  });
});
