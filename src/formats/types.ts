import type { Layout } from '../lowering/layout.js';

/**
 * Assembly text dialects.
 *
 * - `native`: source for the Atari cross assemblers (MADS/atasm syntax).
 * - `att-like-debug`: annotated dump for inspecting the back end itself.
 */
export type AsmStyle = 'native' | 'att-like-debug';

/** How label definitions and references are written. */
export type LabelMode = 'symbolic' | 'absolute';

/**
 * A named address for equates and listings.
 */
export interface SymbolEntry {
  kind: 'var' | 'fixed' | 'label';
  name: string;
  address: number;
  /** Bytes, for `var` and `fixed`. */
  size?: number;
  file?: string;
  line?: number;
}

/**
 * Everything the writers need: the laid-out stream plus its symbols.
 */
export interface EmittedProgram {
  /** Input file, for headers. */
  file: string;
  name?: string;
  layout: Layout;
  /** Data symbols in declaration order. */
  symbols: SymbolEntry[];
  /** Entry label; the loader starts here. */
  entry?: string;
}

/**
 * Options for `.asm` text emission.
 */
export interface WriteAsmOptions {
  style?: AsmStyle;
  labels?: LabelMode;
  /** Precede each operation's instructions with its IR line and text. */
  annotate?: boolean;
  /** Host target triple named in the debug dialect header. */
  target?: string;
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for listing writing.
 *
 * Note: the listing format is a deterministic byte dump plus a symbol table.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Number of bytes shown per listing line.
   */
  bytesPerLine?: number;
}

/**
 * In-memory `.asm` artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory Atari executable (`.xex`) artifact.
 */
export interface XexArtifact {
  kind: 'xex';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact | XexArtifact | ListingArtifact;

/**
 * Destination for streamed text (stdout, a file, a test buffer).
 */
export interface TextSink {
  write(text: string): void;
}

/**
 * Format writers used by the pipeline to turn a laid-out program into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeXex?(program: EmittedProgram): XexArtifact;
  writeListing?(program: EmittedProgram, opts?: WriteListingOptions): ListingArtifact;
}
