import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { compile, compileProgram } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { writeAsm } from '../src/formats/writeAsm.js';
import type { PipelineDeps } from '../src/pipeline.js';
import { ir, parseClean } from './helpers/lower.js';

const deps: PipelineDeps = { formats: defaultFormatWriters };

const DEMO = ir(
  'program demo',
  'sym x: byte',
  'sym colbk: byte @ $D01A volatile',
  'proc main',
  '  mov x, 42',
  '  mov colbk, x',
  '  ret',
  'endproc',
);

const LAX = ir('proc main', '  asm lax $80', '  ret', 'endproc');

function asmText(result: ReturnType<typeof compileProgram>): string {
  const asm = result.artifacts.find((a) => a.kind === 'asm');
  return asm?.kind === 'asm' ? asm.text : '';
}

describe('compileProgram', () => {
  it('lowers a program to native assembly', () => {
    const result = compileProgram(parseClean(DEMO), {}, deps);
    expect(result.diagnostics).toEqual([]);
    expect(result.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(result.stats).toBeUndefined();
    expect(asmText(result).split('\n')).toEqual([
      '; demo',
      'V_x equ $80',
      'V_colbk equ $D01A',
      '',
      '\tORG $2000',
      'main',
      '\tLDA #$2A',
      '\tSTA V_x',
      '\tLDA V_x',
      '\tSTA V_colbk',
      '\tRTS',
      '\tRUN main',
      '',
    ]);
  });

  it('reports per-stage statistics when verbose', () => {
    const result = compileProgram(parseClean(DEMO), { verbose: true }, deps);
    expect(result.stats).toEqual({
      symbols: 2,
      zeroPageBytes: 1,
      spilled: [],
      selectedInstructions: 5,
      optimizerPasses: 1,
      optimizerConverged: true,
      bytesBeforeOptimize: 10,
      bytesAfterOptimize: 10,
      rewrites: {},
      relaxedBranches: 0,
      codeStart: 0x2000,
      codeEnd: 0x200a,
      hazards: 0,
    });
  });

  it('never grows the code when optimizing for size', () => {
    const result = compileProgram(parseClean(DEMO), { optimize: 'size', verbose: true }, deps);
    expect(result.stats?.optimizerConverged).toBe(true);
    const before = result.stats?.bytesBeforeOptimize ?? 0;
    expect(result.stats?.bytesAfterOptimize).toBeLessThanOrEqual(before);
  });

  it('writes every requested artifact in a fixed order', () => {
    const result = compileProgram(
      parseClean(DEMO),
      { emitXex: true, emitListing: true, origin: 0x3000 },
      deps,
    );
    expect(result.artifacts.map((a) => a.kind)).toEqual(['asm', 'xex', 'lst']);
    const xex = result.artifacts[1];
    expect(xex?.kind === 'xex' && Array.from(xex.bytes.slice(0, 6))).toEqual([
      0xff, 0xff, 0x00, 0x30, 0x09, 0x30,
    ]);
  });

  it('warns when a requested writer is missing', () => {
    const result = compileProgram(
      parseClean(DEMO),
      { emitXex: true, emitListing: true },
      { formats: { writeAsm } },
    );
    expect(result.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(result.diagnostics.map((d) => [d.id, d.severity, d.message])).toEqual([
      [
        DiagnosticIds.Unknown,
        'warning',
        'No .xex writer is configured; skipping .xex artifact.',
      ],
      [
        DiagnosticIds.Unknown,
        'warning',
        'No .lst writer is configured; skipping .lst artifact.',
      ],
    ]);
  });

  it('warns that a target triple does not affect the native dialect', () => {
    const result = compileProgram(parseClean(DEMO), { target: 'aarch64-apple-darwin' }, deps);
    expect(result.diagnostics).toEqual([
      {
        id: DiagnosticIds.OptionIgnored,
        severity: 'warning',
        message: '--target "aarch64-apple-darwin" only affects the att-like-debug dialect.',
        file: 'test.a8ir',
      },
    ]);
    expect(result.artifacts).toHaveLength(1);
  });

  it('names the target triple in the debug dialect', () => {
    const result = compileProgram(
      parseClean(DEMO),
      { asmStyle: 'att-like-debug', target: 'aarch64-apple-darwin' },
      deps,
    );
    expect(result.diagnostics).toEqual([]);
    expect(asmText(result).split('\n').slice(0, 3)).toEqual([
      '# demo',
      '# host-target: aarch64-apple-darwin',
      '# origin: 0x2000',
    ]);
  });

  it('stops at the first stage with errors', () => {
    const result = compileProgram(
      parseClean(ir('sym x: byte', 'proc main', '  mov y, 1', '  ret', 'endproc')),
      {},
      deps,
    );
    expect(result.artifacts).toEqual([]);
    expect(result.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.UnknownSymbol, 'Unknown symbol "y".'],
    ]);
  });

  it('reports crash hazards as warnings by default', () => {
    const result = compileProgram(parseClean(LAX), {}, deps);
    expect(result.artifacts).toHaveLength(1);
    expect(result.diagnostics).toEqual([
      {
        id: DiagnosticIds.HardwareFaultRisk,
        severity: 'warning',
        message:
          'illegal-opcode: undocumented opcode LAX (opcode $A7) (op 1, line 2: asm lax $80)',
        file: 'test.a8ir',
        line: 2,
        column: 3,
        opIndex: 1,
        instruction: 'LAX $80',
      },
    ]);
  });

  it('refuses to emit code with hazards in strict mode', () => {
    const result = compileProgram(parseClean(LAX), { nocrash: true }, deps);
    expect(result.artifacts).toEqual([]);
    expect(result.diagnostics.map((d) => [d.id, d.severity])).toEqual([
      [DiagnosticIds.HardwareFaultRisk, 'error'],
    ]);
  });
});

describe('compile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function source(text: string): Promise<string> {
    dir = await mkdtemp(join(tmpdir(), 'a8lower-'));
    const path = join(dir, 'demo.a8ir');
    await writeFile(path, text, 'utf8');
    return path;
  }

  it('reads, parses and lowers a file', async () => {
    const path = await source(DEMO);
    const result = await compile(path, {}, deps);
    expect(result.diagnostics).toEqual([]);
    expect(asmText(result)).toBe(asmText(compileProgram(parseClean(DEMO), {}, deps)));
  });

  it('reports a file that cannot be read', async () => {
    const missing = join(tmpdir(), 'a8lower-missing', 'nothing.a8ir');
    const result = await compile(missing, {}, deps);
    expect(result.artifacts).toEqual([]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.id).toBe(DiagnosticIds.IoReadFailed);
    expect(result.diagnostics[0]?.file).toBe(missing);
    expect(result.diagnostics[0]?.message.startsWith('Failed to read IR file: ')).toBe(true);
  });

  it('stops after parse errors', async () => {
    const path = await source(ir('sym x: quad', 'proc main', '  ret', 'endproc'));
    const result = await compile(path, {}, deps);
    expect(result.artifacts).toEqual([]);
    expect(result.diagnostics.map((d) => [d.id, d.file, d.line])).toEqual([
      [DiagnosticIds.ParseError, path, 1],
    ]);
  });
});
