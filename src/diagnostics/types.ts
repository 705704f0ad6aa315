/**
 * Severity level for a diagnostic.
 *
 * `error` is fatal: the pipeline stops after the stage that produced it and no artifact is emitted.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A back-end diagnostic with an optional IR location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `A8L200`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** 0-based index of the IR operation the diagnostic belongs to. */
  opIndex?: number;
  /** Rendered 6502 instruction involved, for validator findings. */
  instruction?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'A8L000',

  /** Failed to read an IR file from disk. */
  IoReadFailed: 'A8L001',

  /** Internal error during IR reading (unexpected exception). */
  InternalParseError: 'A8L002',

  /** Malformed IR text. */
  ParseError: 'A8L100',

  /** Reference to a symbol that was never declared. */
  UnknownSymbol: 'A8L101',

  /** Symbol declared twice, or a reserved name used. */
  DuplicateSymbol: 'A8L102',

  /** Immediate value does not fit the destination size class. */
  ImmediateRange: 'A8L103',

  /** Symbol declared but never referenced; it receives no storage. */
  UnusedSymbol: 'A8L104',

  /** Procedure structure error (nested `proc`, stray `endproc`, missing `endproc`). */
  ProcStructure: 'A8L105',

  /**
   * Zero-page exhaustion.
   *
   * Reserved: exhaustion degrades to absolute storage and is never reported.
   */
  AllocationExhaustion: 'A8L200',

  /** The selector cannot encode an operation with the operands' storage locations. */
  IllegalAddressingMode: 'A8L300',

  /** Instruction encoding failed (internal invariant). */
  EncodeError: 'A8L301',

  /** A label reference has no definition. */
  UnresolvedLabel: 'A8L400',

  /** A label is defined more than once. */
  DuplicateLabel: 'A8L401',

  /** Crash-safety finding (error in strict mode, warning otherwise). */
  HardwareFaultRisk: 'A8L500',

  /** Option accepted but without effect for the chosen configuration. */
  OptionIgnored: 'A8L600',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
