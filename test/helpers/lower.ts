import { allocateStorage } from '../../src/alloc/zeropage.js';
import type { Allocation, AllocatorOptions } from '../../src/alloc/zeropage.js';
import type { Diagnostic } from '../../src/diagnostics/types.js';
import type { IrProgram } from '../../src/ir/ast.js';
import { checkIrProgram } from '../../src/ir/check.js';
import { analyzeLiveness } from '../../src/ir/liveness.js';
import type { LivenessInfo } from '../../src/ir/liveness.js';
import { parseIrProgram } from '../../src/ir/parser.js';
import type { InstructionStream, StreamItem } from '../../src/m6502/instruction.js';
import { selectInstructions } from '../../src/select/select.js';

/** Join lines into `.a8ir` text. */
export function ir(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

export function parseClean(text: string, file = 'test.a8ir'): IrProgram {
  const diagnostics: Diagnostic[] = [];
  const program = parseIrProgram(file, text, diagnostics);
  if (diagnostics.length > 0) {
    throw new Error(`unexpected diagnostics: ${diagnostics.map((d) => d.message).join('; ')}`);
  }
  return program;
}

export interface Lowered {
  program: IrProgram;
  liveness: LivenessInfo;
  allocation: Allocation;
  stream: InstructionStream;
  templates: Map<number, string>;
  diagnostics: Diagnostic[];
}

/** Parse, check, analyze, allocate and select, collecting every diagnostic. */
export function lower(text: string, options: AllocatorOptions = {}): Lowered {
  const program = parseClean(text);
  const diagnostics: Diagnostic[] = [];
  checkIrProgram(program, diagnostics);
  const liveness = analyzeLiveness(program, diagnostics);
  const allocation = allocateStorage(program.symbols, liveness, options);
  const { stream, templates } = selectInstructions(program, allocation, diagnostics);
  return { program, liveness, allocation, stream, templates, diagnostics };
}

/** Instructions as compact `MNEMONIC mode` strings; labels as `name:`. */
export function shape(items: readonly StreamItem[]): string[] {
  return items.map((item) =>
    item.kind === 'label' ? `${item.name}:` : `${item.mnemonic} ${item.mode}`,
  );
}
