import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds, hasErrors } from '../diagnostics/types.js';
import { encodeInstruction } from '../m6502/encode.js';
import type { Instruction, InstructionStream, StreamItem } from '../m6502/instruction.js';
import {
  formatInstruction,
  ins,
  instructionBytes,
  invertBranch,
  isConditionalBranch,
  label,
  labelRef,
  targetLabel,
} from '../m6502/instruction.js';
import { ATARI_DEFAULT_ORIGIN } from '../target/atari.js';

export const RELAY_LABEL_PREFIX = '__R';

export interface LayoutOptions {
  /** Load address of the first item. */
  origin?: number;
  /** File named by diagnostics for items without an IR origin. */
  file?: string;
}

export interface PlacedItem {
  item: StreamItem;
  address: number;
  /** Encoded bytes; empty for labels. */
  bytes: Uint8Array;
}

/**
 * A stream with final addresses and machine code.
 */
export interface Layout {
  origin: number;
  /** Exclusive end address. */
  end: number;
  /** The stream after branch relaxation. */
  stream: InstructionStream;
  placed: PlacedItem[];
  labels: Map<string, number>;
  image: Uint8Array;
  /** Conditional branches rewritten into a branch over a jump. */
  relaxed: number;
}

function diag(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  file: string,
  message: string,
  node?: StreamItem,
): void {
  const origin = node?.origin;
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: origin?.file ?? file,
    ...(origin?.line !== undefined ? { line: origin.line } : {}),
    ...(origin?.column !== undefined ? { column: origin.column } : {}),
    ...(origin ? { opIndex: origin.opIndex } : {}),
    ...(node?.kind === 'ins' ? { instruction: formatInstruction(node) } : {}),
  });
}

function addresses(items: readonly StreamItem[], origin: number): {
  at: number[];
  labels: Map<string, number>;
  end: number;
} {
  const at: number[] = [];
  const labels = new Map<string, number>();
  let pc = origin;
  for (const item of items) {
    at.push(pc);
    if (item.kind === 'label') {
      if (!labels.has(item.name)) labels.set(item.name, pc);
    } else {
      pc += instructionBytes(item);
    }
  }
  return { at, labels, end: pc };
}

function outOfRange(i: Instruction, address: number, labels: ReadonlyMap<string, number>): boolean {
  if (i.mode !== 'rel') return false;
  const target = targetLabel(i);
  const to = target !== undefined ? labels.get(target) : undefined;
  if (to === undefined) return false;
  const disp = to - (address + 2);
  return disp < -128 || disp > 127;
}

/**
 * Rewrite conditional branches whose target is beyond the 8-bit displacement into
 * `B!cc skip; JMP target; skip:` until every remaining branch reaches.
 */
function relax(items: StreamItem[], origin: number): { items: StreamItem[]; relaxed: number } {
  let relaxed = 0;
  let current = items;
  for (;;) {
    const { at, labels } = addresses(current, origin);
    const out: StreamItem[] = [];
    let changed = false;
    current.forEach((item, index) => {
      const inverted = item.kind === 'ins' ? invertBranch(item.mnemonic) : undefined;
      const target = item.kind === 'ins' ? targetLabel(item) : undefined;
      if (
        item.kind === 'ins' &&
        isConditionalBranch(item) &&
        inverted !== undefined &&
        target !== undefined &&
        outOfRange(item, at[index] ?? origin, labels)
      ) {
        relaxed++;
        changed = true;
        const skip = `${RELAY_LABEL_PREFIX}${relaxed}`;
        out.push(ins(inverted, 'rel', labelRef(skip), item.origin));
        out.push(ins('JMP', 'abs', labelRef(target), item.origin));
        out.push(label(skip, { generated: true }));
        return;
      }
      out.push(item);
    });
    current = out;
    if (!changed) return { items: current, relaxed };
  }
}

/**
 * Assign addresses to a stream, resolve labels and encode every instruction.
 *
 * Returns `undefined` after pushing an error diagnostic for a duplicate or unresolved label, an
 * encoding failure, or an image that runs past `$FFFF`.
 */
export function layoutStream(
  stream: InstructionStream,
  options: LayoutOptions,
  diagnostics: Diagnostic[],
): Layout | undefined {
  const origin = options.origin ?? ATARI_DEFAULT_ORIGIN;
  const file = options.file ?? '<stream>';
  const before = diagnostics.length;

  const seen = new Set<string>();
  for (const item of stream.items) {
    if (item.kind !== 'label') continue;
    if (seen.has(item.name)) {
      const message = `Duplicate label "${item.name}".`;
      diag(diagnostics, DiagnosticIds.DuplicateLabel, file, message, item);
    }
    seen.add(item.name);
  }
  for (const item of stream.items) {
    if (item.kind !== 'ins') continue;
    const target = targetLabel(item);
    if (target !== undefined && !seen.has(target)) {
      const message = `Unresolved label "${target}".`;
      diag(diagnostics, DiagnosticIds.UnresolvedLabel, file, message, item);
    }
  }
  if (stream.entry !== undefined && !seen.has(stream.entry)) {
    diag(diagnostics, DiagnosticIds.UnresolvedLabel, file, `Unresolved entry "${stream.entry}".`);
  }
  if (hasErrors(diagnostics.slice(before))) return undefined;

  const { items, relaxed } = relax(stream.items, origin);
  const { at, labels, end } = addresses(items, origin);
  if (end > 0x10000) {
    const message = `Code image $${origin.toString(16).toUpperCase()}..$${end
      .toString(16)
      .toUpperCase()} runs past $FFFF.`;
    diag(diagnostics, DiagnosticIds.EncodeError, file, message);
    return undefined;
  }

  const image = new Uint8Array(end - origin);
  const placed: PlacedItem[] = [];
  items.forEach((item, index) => {
    const address = at[index] ?? origin;
    if (item.kind === 'label') {
      placed.push({ item, address, bytes: new Uint8Array(0) });
      return;
    }
    const bytes = encodeInstruction(item, address, labels, diagnostics) ?? new Uint8Array(0);
    image.set(bytes, address - origin);
    placed.push({ item, address, bytes });
  });
  if (hasErrors(diagnostics.slice(before))) return undefined;

  return { origin, end, stream: { ...stream, items }, placed, labels, image, relaxed };
}
