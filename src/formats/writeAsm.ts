import type { OpOrigin } from '../m6502/instruction.js';
import { asmDialect, DEFAULT_TARGET_TRIPLE } from './dialects.js';
import type { DialectContext } from './dialects.js';
import type { AsmArtifact, EmittedProgram, TextSink, WriteAsmOptions } from './types.js';

function annotation(origin: OpOrigin): string {
  return origin.line !== undefined
    ? `line ${origin.line}: ${origin.text}`
    : `op ${origin.opIndex}: ${origin.text}`;
}

/**
 * Render a laid-out program as assembly text lines, one per label or instruction.
 */
export function asmLines(program: EmittedProgram, opts?: WriteAsmOptions): string[] {
  const dialect = asmDialect(opts?.style ?? 'native');
  const ctx: DialectContext = {
    labels: opts?.labels ?? 'symbolic',
    addresses: program.layout.labels,
    target: opts?.target ?? DEFAULT_TARGET_TRIPLE,
  };

  const lines = [...dialect.header(program, ctx)];
  const equates = program.symbols
    .map((s) => dialect.equate(s))
    .filter((line): line is string => line !== undefined);
  lines.push(...equates);
  lines.push('');
  const origin = dialect.origin(program.layout.origin);
  if (origin !== undefined) lines.push(origin);

  let annotated: number | undefined;
  for (const placed of program.layout.placed) {
    const item = placed.item;
    if (item.kind === 'label') {
      lines.push(dialect.label(item.name, placed.address, ctx));
      continue;
    }
    if (opts?.annotate && item.origin && item.origin.opIndex !== annotated) {
      annotated = item.origin.opIndex;
      lines.push(dialect.comment(annotation(item.origin)));
    }
    lines.push(dialect.instruction(placed, item, ctx));
  }

  lines.push(...dialect.footer(program, ctx));
  return lines;
}

/**
 * Create a deterministic `.asm` artifact.
 */
export function writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  return { kind: 'asm', text: asmLines(program, opts).join(lineEnding) + lineEnding };
}

/**
 * Write assembly text to `sink`, one line per call.
 */
export function emitAsm(program: EmittedProgram, sink: TextSink, opts?: WriteAsmOptions): void {
  const lineEnding = opts?.lineEnding ?? '\n';
  for (const line of asmLines(program, opts)) sink.write(line + lineEnding);
}
