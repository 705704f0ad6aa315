import type { EmittedProgram, ListingArtifact, SymbolEntry, WriteListingOptions } from './types.js';

function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

function toHexWord(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

function toAsciiByte(n: number): string {
  const v = n & 0xff;
  return v >= 0x20 && v <= 0x7e ? String.fromCharCode(v) : '.';
}

function formatSymbol(s: SymbolEntry): string {
  const size = s.size !== undefined ? ` (${s.size})` : '';
  return `${s.kind} ${s.name} = $${toHexWord(s.address)}${size}`;
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  if (a.address !== b.address) return a.address - b.address;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * A byte dump of the code image aligned to `bytesPerLine`, then data symbols and labels sorted by
 * address.
 */
export function writeListing(
  program: EmittedProgram,
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const bytesPerLine = opts?.bytesPerLine ?? 16;
  const { origin: start, end, image } = program.layout;

  const lines: string[] = [];
  lines.push(`; ${program.name ?? program.file} listing`);
  lines.push(`; range: $${toHexWord(start)}..$${toHexWord(end)} (end exclusive)`);
  lines.push('');

  const first = start - (start % bytesPerLine);
  for (let addr = first; addr < end; addr += bytesPerLine) {
    const hexBytes: string[] = [];
    const asciiBytes: string[] = [];
    for (let i = 0; i < bytesPerLine && addr + i < end; i++) {
      const byte = addr + i >= start ? image[addr + i - start] : undefined;
      if (byte === undefined) {
        hexBytes.push('..');
        asciiBytes.push(' ');
        continue;
      }
      hexBytes.push(toHexByte(byte));
      asciiBytes.push(toAsciiByte(byte));
    }
    const paddedHex = hexBytes.join(' ').padEnd(bytesPerLine * 3 - 1, ' ');
    lines.push(`${toHexWord(addr)}: ${paddedHex}  |${asciiBytes.join('')}|`);
  }

  const labels: SymbolEntry[] = [...program.layout.labels].map(([name, address]) => ({
    kind: 'label',
    name,
    address,
  }));
  lines.push('');
  lines.push('; symbols:');
  for (const s of [...program.symbols, ...labels].sort(sortSymbols)) {
    lines.push(`; ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
