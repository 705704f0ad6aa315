import type { AddressingMode } from './modes.js';
import { operandSize } from './modes.js';
import { decodeOpcode } from './opcodes.js';

/**
 * A decoded instruction. `operand` is the raw operand value; for branches it is the resolved
 * target address.
 */
export interface DecodedInstruction {
  address: number;
  code: number;
  mnemonic: string;
  mode: AddressingMode;
  operand?: number;
  bytes: number[];
}

/**
 * Disassemble `bytes` loaded at `origin`.
 *
 * Unknown opcode bytes decode as a one-byte `???` entry so the walk never desynchronizes silently.
 */
export function disassemble(bytes: Uint8Array, origin: number): DecodedInstruction[] {
  const out: DecodedInstruction[] = [];
  let i = 0;
  while (i < bytes.length) {
    const address = (origin + i) & 0xffff;
    const code = bytes[i] ?? 0;
    const info = decodeOpcode(code);
    if (!info) {
      out.push({ address, code, mnemonic: '???', mode: 'imp', bytes: [code] });
      i += 1;
      continue;
    }
    const size = operandSize(info.mode);
    const raw = Array.from(bytes.subarray(i, i + 1 + size));
    let operand: number | undefined;
    if (size === 1) {
      const b = raw[1] ?? 0;
      operand = info.mode === 'rel' ? (address + 2 + (b < 0x80 ? b : b - 0x100)) & 0xffff : b;
    } else if (size === 2) {
      operand = (raw[1] ?? 0) | ((raw[2] ?? 0) << 8);
    }
    out.push({
      address,
      code,
      mnemonic: info.mnemonic,
      mode: info.mode,
      ...(operand !== undefined ? { operand } : {}),
      bytes: raw,
    });
    i += 1 + size;
  }
  return out;
}
