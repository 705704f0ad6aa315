import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { Instruction } from './instruction.js';
import { formatInstruction } from './instruction.js';
import { lookupOpcode } from './opcodes.js';

function diag(diagnostics: Diagnostic[], node: Instruction, message: string): void {
  diagnostics.push({
    id: DiagnosticIds.EncodeError,
    severity: 'error',
    message,
    file: node.origin?.file ?? '<stream>',
    ...(node.origin?.line !== undefined ? { line: node.origin.line } : {}),
    ...(node.origin?.column !== undefined ? { column: node.origin.column } : {}),
    ...(node.origin ? { opIndex: node.origin.opIndex } : {}),
    instruction: formatInstruction(node),
  });
}

/**
 * Resolve the 16-bit value an instruction's operand refers to.
 */
function operandValue(
  node: Instruction,
  labels: ReadonlyMap<string, number>,
): number | undefined {
  const op = node.operand;
  switch (op.kind) {
    case 'imm':
      return op.value & 0xff;
    case 'mem':
      return op.ref.address;
    case 'label':
      return labels.get(op.label);
    case 'none':
      return undefined;
  }
}

/**
 * Encode a single instruction placed at `address` into 6502 machine-code bytes.
 *
 * Implementation notes:
 * - Branch displacements are relative to the address after the 2-byte branch.
 * - Labels must already be laid out; unknown labels and out-of-range operands append an error
 *   diagnostic and return `undefined`.
 */
export function encodeInstruction(
  node: Instruction,
  address: number,
  labels: ReadonlyMap<string, number>,
  diagnostics: Diagnostic[],
): Uint8Array | undefined {
  const info = lookupOpcode(node.mnemonic, node.mode);
  if (!info) {
    diag(diagnostics, node, `${node.mnemonic} has no ${node.mode} addressing form`);
    return undefined;
  }

  switch (node.mode) {
    case 'imp':
    case 'acc':
      return Uint8Array.of(info.code);
    default:
      break;
  }

  const value = operandValue(node, labels);
  if (value === undefined) {
    const what = node.operand.kind === 'label' ? `label "${node.operand.label}"` : 'operand';
    diag(diagnostics, node, `${node.mnemonic} ${node.mode}: unresolved ${what}`);
    return undefined;
  }

  switch (node.mode) {
    case 'rel': {
      const disp = value - (address + 2);
      if (disp < -128 || disp > 127) {
        diag(diagnostics, node, `${node.mnemonic} target out of range (${disp} bytes)`);
        return undefined;
      }
      return Uint8Array.of(info.code, disp & 0xff);
    }
    case 'imm':
    case 'zp':
    case 'zpx':
    case 'zpy':
    case 'indx':
    case 'indy':
      if (value > 0xff) {
        diag(diagnostics, node, `${node.mnemonic} ${node.mode} expects a zero-page operand`);
        return undefined;
      }
      return Uint8Array.of(info.code, value);
    default:
      return Uint8Array.of(info.code, value & 0xff, (value >> 8) & 0xff);
  }
}
