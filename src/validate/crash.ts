import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { Layout } from '../lowering/layout.js';
import { formatInstruction } from '../m6502/instruction.js';
import type { Finding, StorageExtent } from './rules.js';
import { HAZARD_RULES, validationContext } from './rules.js';

export const DEFAULT_STACK_BUDGET = 256;

export interface ValidateOptions {
  /** Report hazards as errors (`--nocrash`). */
  strict?: boolean;
  stackBudget?: number;
  /** File named by findings without an IR origin. */
  file?: string;
}

function toDiagnostic(
  finding: Finding,
  layout: Layout,
  severity: Diagnostic['severity'],
  file: string,
): Diagnostic {
  const base = { id: DiagnosticIds.HardwareFaultRisk, severity };
  const message = `${finding.rule}: ${finding.message}`;
  if (finding.symbol) {
    const s = finding.symbol;
    return {
      ...base,
      message,
      file: s.file ?? file,
      ...(s.line !== undefined ? { line: s.line } : {}),
      ...(s.column !== undefined ? { column: s.column } : {}),
    };
  }
  const item = finding.index !== undefined ? layout.placed[finding.index]?.item : undefined;
  const origin = item?.origin;
  const line = origin?.line !== undefined ? `, line ${origin.line}` : '';
  const at = origin ? ` (op ${origin.opIndex}${line}: ${origin.text})` : '';
  return {
    ...base,
    message: `${message}${at}`,
    file: origin?.file ?? file,
    ...(origin?.line !== undefined ? { line: origin.line } : {}),
    ...(origin?.column !== undefined ? { column: origin.column } : {}),
    ...(origin ? { opIndex: origin.opIndex } : {}),
    ...(item?.kind === 'ins' ? { instruction: formatInstruction(item) } : {}),
  };
}

/**
 * Run every hazard rule over a laid-out program.
 *
 * Findings become `HardwareFaultRisk` diagnostics: errors in strict mode, warnings otherwise.
 * Returns the number of findings.
 */
export function validateLayout(
  layout: Layout,
  storage: readonly StorageExtent[],
  options: ValidateOptions,
  diagnostics: Diagnostic[],
): number {
  const ctx = validationContext(layout, storage, options.stackBudget ?? DEFAULT_STACK_BUDGET);
  const severity = options.strict ? 'error' : 'warning';
  const file = options.file ?? '<stream>';
  let count = 0;
  for (const rule of HAZARD_RULES) {
    for (const finding of rule.check(ctx)) {
      diagnostics.push(toDiagnostic(finding, layout, severity, file));
      count++;
    }
  }
  return count;
}
