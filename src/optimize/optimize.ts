import type { InstructionStream, StreamItem } from '../m6502/instruction.js';
import { streamBytes } from '../m6502/instruction.js';
import type { RewriteRule, RuleName } from './rules.js';
import { REWRITE_RULES } from './rules.js';

export type OptimizeLevel = 'size' | 'default';

export interface OptimizeOptions {
  level?: OptimizeLevel;
  /** Upper bound on full passes over the rule library. */
  maxPasses?: number;
}

export interface OptimizeResult {
  stream: InstructionStream;
  passes: number;
  /** `false` when the pass bound stopped rewriting before a fixpoint. */
  converged: boolean;
  bytesBefore: number;
  bytesAfter: number;
  /** Applied rewrites per rule, for `--verbose`. */
  rewrites: Map<RuleName, number>;
}

export const DEFAULT_MAX_PASSES = 16;

function runPass(
  items: StreamItem[],
  rules: readonly RewriteRule[],
  entry: string | undefined,
  rewrites: Map<RuleName, number>,
): { items: StreamItem[]; changed: boolean } {
  let changed = false;
  let current = items;
  for (const rule of rules) {
    const result = rule.apply(current, entry !== undefined ? { entry } : {});
    if (!result) continue;
    // Rewrites that grow the stream are discarded.
    if (streamBytes(result.items) > streamBytes(current)) continue;
    current = result.items;
    changed = true;
    rewrites.set(rule.name, (rewrites.get(rule.name) ?? 0) + result.count);
  }
  return { items: current, changed };
}

/**
 * Peephole-optimize an instruction stream.
 *
 * At `size` every rule runs until no rule changes the stream or `maxPasses` passes have run. At
 * `default` only the cheap rules run, once.
 */
export function optimizeStream(
  stream: InstructionStream,
  options: OptimizeOptions = {},
): OptimizeResult {
  const level = options.level ?? 'size';
  const maxPasses = Math.max(0, options.maxPasses ?? DEFAULT_MAX_PASSES);
  const rules = level === 'size' ? REWRITE_RULES : REWRITE_RULES.filter((r) => r.cheap);
  const bound = level === 'size' ? maxPasses : Math.min(1, maxPasses);

  const bytesBefore = streamBytes(stream.items);
  const rewrites = new Map<RuleName, number>();
  let items = stream.items;
  let passes = 0;
  let converged = false;

  while (passes < bound) {
    passes++;
    const pass = runPass(items, rules, stream.entry, rewrites);
    items = pass.items;
    if (!pass.changed) {
      converged = true;
      break;
    }
  }
  if (level === 'default' && passes === bound) converged = true;

  return {
    stream: { ...stream, items },
    passes,
    converged,
    bytesBefore,
    bytesAfter: streamBytes(items),
    rewrites,
  };
}
