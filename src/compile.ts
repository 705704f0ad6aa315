import { readFile } from 'node:fs/promises';

import type { Allocation } from './alloc/zeropage.js';
import { allocateStorage, slotAddress } from './alloc/zeropage.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { Artifact, EmittedProgram, SymbolEntry } from './formats/types.js';
import type { IrProgram } from './ir/ast.js';
import { sizeInBytes } from './ir/ast.js';
import { checkIrProgram } from './ir/check.js';
import { analyzeLiveness } from './ir/liveness.js';
import { parseIrProgram } from './ir/parser.js';
import { layoutStream } from './lowering/layout.js';
import { optimizeStream } from './optimize/optimize.js';
import type { CompileFn, CompileProgramFn, CompileResult, CompileStats } from './pipeline.js';
import { selectInstructions } from './select/select.js';
import type { StorageExtent } from './validate/rules.js';
import { validateLayout } from './validate/crash.js';

function storageExtents(program: IrProgram, allocation: Allocation): StorageExtent[] {
  const spilled = new Set(allocation.spilled);
  const out: StorageExtent[] = [];
  for (const s of program.symbols) {
    const slot = allocation.slots.get(s.name);
    if (!slot) continue;
    out.push({
      name: s.name,
      address: slotAddress(slot),
      size: sizeInBytes(s.size),
      spilled: spilled.has(s.name),
      file: s.span?.file ?? program.file,
      ...(s.span ? { line: s.span.start.line, column: s.span.start.column } : {}),
    });
  }
  return out;
}

function symbolEntries(program: IrProgram, allocation: Allocation): SymbolEntry[] {
  const out: SymbolEntry[] = [];
  const seen = new Set<string>();
  for (const s of program.symbols) {
    const slot = allocation.slots.get(s.name);
    if (!slot || seen.has(s.name)) continue;
    seen.add(s.name);
    out.push({
      kind: s.at !== undefined ? 'fixed' : 'var',
      name: s.name,
      address: slotAddress(slot),
      size: sizeInBytes(s.size),
      file: program.file,
      ...(s.span ? { line: s.span.start.line } : {}),
    });
  }
  return out;
}

/**
 * Lower an in-memory IR program to 6502 code and artifacts.
 *
 * Stages run in order (check, liveness, allocation, selection, optimization, layout,
 * validation, emission); the first stage that reports an error ends the run with no artifacts.
 */
export const compileProgram: CompileProgramFn = (program, options, deps) => {
  const diagnostics: Diagnostic[] = [];
  const fail = (): CompileResult => ({ diagnostics, artifacts: [] });

  checkIrProgram(program, diagnostics);
  if (hasErrors(diagnostics)) return fail();

  const liveness = analyzeLiveness(program, diagnostics);
  const allocation = allocateStorage(program.symbols, liveness, {
    ...(options.zeroPage ? { window: options.zeroPage } : {}),
    ...(options.absoluteBase !== undefined ? { absoluteBase: options.absoluteBase } : {}),
  });

  const selection = selectInstructions(program, allocation, diagnostics);
  if (hasErrors(diagnostics)) return fail();

  const optimized = optimizeStream(selection.stream, {
    level: options.optimize ?? 'default',
    ...(options.maxOptimizerPasses !== undefined ? { maxPasses: options.maxOptimizerPasses } : {}),
  });

  const layout = layoutStream(
    optimized.stream,
    { file: program.file, ...(options.origin !== undefined ? { origin: options.origin } : {}) },
    diagnostics,
  );
  if (!layout || hasErrors(diagnostics)) return fail();

  const hazards = validateLayout(
    layout,
    storageExtents(program, allocation),
    {
      strict: options.nocrash ?? false,
      file: program.file,
      ...(options.stackBudget !== undefined ? { stackBudget: options.stackBudget } : {}),
    },
    diagnostics,
  );
  if (hasErrors(diagnostics)) return fail();

  const style = options.asmStyle ?? 'native';
  if (options.target !== undefined && style === 'native') {
    diagnostics.push({
      id: DiagnosticIds.OptionIgnored,
      severity: 'warning',
      message: `--target "${options.target}" only affects the att-like-debug dialect.`,
      file: program.file,
    });
  }

  const emitted: EmittedProgram = {
    file: program.file,
    ...(program.name !== undefined ? { name: program.name } : {}),
    layout,
    symbols: symbolEntries(program, allocation),
    ...(layout.stream.entry !== undefined ? { entry: layout.stream.entry } : {}),
  };
  const artifacts: Artifact[] = [
    deps.formats.writeAsm(emitted, {
      style,
      labels: options.labels ?? 'symbolic',
      annotate: options.annotate ?? false,
      ...(options.target !== undefined ? { target: options.target } : {}),
    }),
  ];
  const missingWriter = (kind: string): void => {
    diagnostics.push({
      id: DiagnosticIds.Unknown,
      severity: 'warning',
      message: `No ${kind} writer is configured; skipping ${kind} artifact.`,
      file: program.file,
    });
  };
  if (options.emitXex) {
    if (deps.formats.writeXex) artifacts.push(deps.formats.writeXex(emitted));
    else missingWriter('.xex');
  }
  if (options.emitListing) {
    if (deps.formats.writeListing) artifacts.push(deps.formats.writeListing(emitted));
    else missingWriter('.lst');
  }

  if (!options.verbose) return { diagnostics, artifacts };

  const stats: CompileStats = {
    symbols: program.symbols.length,
    zeroPageBytes: allocation.zeroPageBytesUsed,
    spilled: [...allocation.spilled],
    selectedInstructions: selection.stream.items.filter((i) => i.kind === 'ins').length,
    optimizerPasses: optimized.passes,
    optimizerConverged: optimized.converged,
    bytesBeforeOptimize: optimized.bytesBefore,
    bytesAfterOptimize: optimized.bytesAfter,
    rewrites: Object.fromEntries(optimized.rewrites),
    relaxedBranches: layout.relaxed,
    codeStart: layout.origin,
    codeEnd: layout.end,
    hazards,
  };
  return { diagnostics, artifacts, stats };
};

/**
 * Compile an `.a8ir` file.
 *
 * Reads and parses the file, then runs {@link compileProgram}. Artifacts are produced in memory
 * via `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (entryFile, options, deps) => {
  const diagnostics: Diagnostic[] = [];

  let text: string;
  try {
    text = await readFile(entryFile, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read IR file: ${String(err)}`,
      file: entryFile,
    });
    return { diagnostics, artifacts: [] };
  }

  let program: IrProgram;
  try {
    program = parseIrProgram(entryFile, text, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file: entryFile,
    });
    return { diagnostics, artifacts: [] };
  }
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const result = compileProgram(program, options, deps);
  return { ...result, diagnostics: [...diagnostics, ...result.diagnostics] };
};
