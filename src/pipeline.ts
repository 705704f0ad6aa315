import type { ZeroPageWindow } from './alloc/zeropage.js';
import type { Diagnostic } from './diagnostics/types.js';
import type { IrProgram } from './ir/ast.js';
import type { Artifact, AsmStyle, FormatWriters, LabelMode } from './formats/types.js';
import type { OptimizeLevel } from './optimize/optimize.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 *
 * Every stage reads its settings from this value; nothing is taken from the environment.
 */
export interface CompilerOptions {
  /** Assembly dialect of the `.asm` artifact (default `native`). */
  asmStyle?: AsmStyle;
  /**
   * Host target triple (`arch-vendor-os[-env]`), named in the debug dialect header.
   *
   * It has no effect on the native dialect.
   */
  target?: string;
  /** Strict crash-safety mode: hazards are errors and abort emission. */
  nocrash?: boolean;
  /** `size` runs the full peephole optimizer; `default` only the cheap rewrites. */
  optimize?: OptimizeLevel;
  /** Pass bound for the optimizer (default 16). */
  maxOptimizerPasses?: number;
  /** Load address of the code (default `$2000`). */
  origin?: number;
  /** Label spelling in the `.asm` artifact (default `symbolic`). */
  labels?: LabelMode;
  /** Annotate instructions with the IR operation they came from. */
  annotate?: boolean;
  /** Emit an Atari executable (`.xex`). */
  emitXex?: boolean;
  /** Emit listing (`.lst`). */
  emitListing?: boolean;
  /** Collect per-stage statistics into {@link CompileResult.stats}. */
  verbose?: boolean;
  /** Zero-page window for the allocator (default `$80..$FF`). */
  zeroPage?: ZeroPageWindow;
  /** First address of absolute storage for spilled symbols (default `$0600`). */
  absoluteBase?: number;
  /** Hardware stack budget in bytes for the validator (default 256). */
  stackBudget?: number;
}

/**
 * Per-stage numbers reported by `--verbose`.
 */
export interface CompileStats {
  symbols: number;
  zeroPageBytes: number;
  spilled: string[];
  selectedInstructions: number;
  optimizerPasses: number;
  optimizerConverged: boolean;
  bytesBeforeOptimize: number;
  bytesAfterOptimize: number;
  rewrites: Record<string, number>;
  relaxedBranches: number;
  codeStart: number;
  codeEnd: number;
  hazards: number;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  stats?: CompileStats;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;

/**
 * Compile an IR program already in memory.
 */
export type CompileProgramFn = (
  program: IrProgram,
  options: CompilerOptions,
  deps: PipelineDeps,
) => CompileResult;
