#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { isAsmStyle, isTargetTriple } from './formats/dialects.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, AsmStyle, LabelMode, TextSink } from './formats/types.js';
import { parseNumberLiteral } from './ir/parser.js';
import type { OptimizeLevel } from './optimize/optimize.js';
import type { CompilerOptions, CompileStats } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  asmStyle: AsmStyle;
  target?: string;
  nocrash: boolean;
  optimize: OptimizeLevel;
  maxPasses?: number;
  origin?: number;
  labels: LabelMode;
  annotate: boolean;
  emitXex: boolean;
  emitListing: boolean;
  verbose: boolean;
};

/**
 * Where the CLI writes text. Defaults to the process streams.
 */
export interface CliIo {
  stdout: TextSink;
  stderr: TextSink;
}

const PROCESS_IO: CliIo = {
  stdout: { write: (text) => void process.stdout.write(text) },
  stderr: { write: (text) => void process.stderr.write(text) },
};

function usage(): string {
  return [
    'a8lower [options] <program.a8ir>',
    '',
    'Options:',
    '  -o, --output <file>       Write assembly to <file> (default: stdout)',
    '      --asm-style <style>   Assembly dialect: native|att-like-debug (default: native)',
    '      --target <triple>     Host triple shown by att-like-debug (arch-vendor-os[-env])',
    '      --nocrash             Strict crash-safety mode: hazards are errors',
    '  -O, --opt-level <level>   Optimization level: size|default (default: default)',
    '      -Os                   Same as --opt-level size',
    '      --max-passes <n>      Optimizer pass bound (default: 16)',
    '      --origin <addr>       Code load address (default: $2000)',
    '      --labels <mode>       Label spelling: symbolic|absolute (default: symbolic)',
    '      --annotate            Comment each operation with its IR line',
    '      --xex                 Also write an Atari executable (.xex)',
    '      --list                Also write a listing (.lst)',
    '      --verbose             Print per-stage statistics to stderr',
    '  -V, --version             Print version',
    '  -h, --help                Show help',
    '',
    'Notes:',
    '  - <program.a8ir> must be the last argument.',
    '  - .xex and .lst are written next to --output, or next to the input without it.',
    '',
  ].join('\n');
}

class CliError extends Error {
  override name = 'CliError';
}

function fail(message: string): never {
  throw new CliError(message);
}

/** Find the nearest package.json above this module. */
function packageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (parsed !== null && typeof parsed === 'object' && 'version' in parsed) {
        return String(parsed.version);
      }
      return '0.0.0';
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

function parseArgs(argv: string[], io: CliIo): CliOptions | CliExit {
  let outputPath: string | undefined;
  let asmStyle: AsmStyle = 'native';
  let target: string | undefined;
  let nocrash = false;
  let optimize: OptimizeLevel = 'default';
  let maxPasses: number | undefined;
  let origin: number | undefined;
  let labels: LabelMode = 'symbolic';
  let annotate = false;
  let emitXex = false;
  let emitListing = false;
  let verbose = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    const value = (name: string): string => {
      if (a.startsWith(`${name}=`)) {
        const v = a.slice(name.length + 1);
        if (!v) fail(`${name} expects a value`);
        return v;
      }
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      return v;
    };
    const is = (...names: string[]): boolean =>
      names.some((n) => a === n || (n.startsWith('--') && a.startsWith(`${n}=`)));

    if (a === '-h' || a === '--help') {
      io.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      io.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (is('-o', '--output')) {
      outputPath = value(a.startsWith('--output=') ? '--output' : a);
      continue;
    }
    if (is('--asm-style')) {
      const v = value('--asm-style');
      if (!isAsmStyle(v)) fail(`Unsupported --asm-style "${v}" (expected native|att-like-debug)`);
      asmStyle = v;
      continue;
    }
    if (is('--target')) {
      const v = value('--target');
      if (!isTargetTriple(v)) fail(`Invalid --target "${v}" (expected arch-vendor-os[-env])`);
      target = v;
      continue;
    }
    if (a === '--nocrash') {
      nocrash = true;
      continue;
    }
    if (a === '-Os') {
      optimize = 'size';
      continue;
    }
    if (is('-O', '--opt-level')) {
      const v = value(a.startsWith('--opt-level=') ? '--opt-level' : a);
      if (v !== 'size' && v !== 'default') {
        fail(`Unsupported --opt-level "${v}" (expected size|default)`);
      }
      optimize = v;
      continue;
    }
    if (is('--max-passes')) {
      const v = value('--max-passes');
      const n = parseNumberLiteral(v);
      if (n === undefined || n < 1) fail(`--max-passes expects a positive number, got "${v}"`);
      maxPasses = n;
      continue;
    }
    if (is('--origin')) {
      const v = value('--origin');
      const n = parseNumberLiteral(v);
      if (n === undefined || n < 0 || n > 0xffff) {
        fail(`--origin expects an address $0000..$FFFF, got "${v}"`);
      }
      origin = n;
      continue;
    }
    if (is('--labels')) {
      const v = value('--labels');
      if (v !== 'symbolic' && v !== 'absolute') {
        fail(`Unsupported --labels "${v}" (expected symbolic|absolute)`);
      }
      labels = v;
      continue;
    }
    if (a === '--annotate') {
      annotate = true;
      continue;
    }
    if (a === '--xex') {
      emitXex = true;
      continue;
    }
    if (a === '--list') {
      emitListing = true;
      continue;
    }
    if (a === '--verbose') {
      verbose = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <program.a8ir> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <program.a8ir> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    asmStyle,
    ...(target !== undefined ? { target } : {}),
    nocrash,
    optimize,
    ...(maxPasses !== undefined ? { maxPasses } : {}),
    ...(origin !== undefined ? { origin } : {}),
    labels,
    annotate,
    emitXex,
    emitListing,
    verbose,
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const path = resolve(outputPath ?? entryFile);
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

async function writeArtifacts(
  parsed: CliOptions,
  artifacts: Artifact[],
  io: CliIo,
): Promise<void> {
  const base = artifactBase(parsed.entryFile, parsed.outputPath);
  const ensureDir = async (p: string) => mkdir(dirname(p), { recursive: true });
  const writes: Array<Promise<void>> = [];

  for (const artifact of artifacts) {
    switch (artifact.kind) {
      case 'asm':
        if (parsed.outputPath === undefined) {
          io.stdout.write(artifact.text);
        } else {
          const path = resolve(parsed.outputPath);
          await ensureDir(path);
          writes.push(writeFile(path, artifact.text, 'utf8'));
        }
        break;
      case 'xex':
        await ensureDir(`${base}.xex`);
        writes.push(writeFile(`${base}.xex`, artifact.bytes));
        break;
      case 'lst':
        await ensureDir(`${base}.lst`);
        writes.push(writeFile(`${base}.lst`, artifact.text, 'utf8'));
        break;
    }
  }

  await Promise.all(writes);
  if (parsed.outputPath !== undefined) io.stdout.write(`${resolve(parsed.outputPath)}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

export function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined ? `${d.file}:${d.line}:${d.column ?? 1}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

function hex(value: number): string {
  return `$${value.toString(16).toUpperCase().padStart(4, '0')}`;
}

function statsLines(stats: CompileStats): string[] {
  const spilled = stats.spilled.length > 0 ? ` (${stats.spilled.join(', ')})` : '';
  const rewrites = Object.entries(stats.rewrites)
    .map(([rule, n]) => `${rule} ${n}`)
    .join(', ');
  return [
    `symbols: ${stats.symbols}, zero page bytes: ${stats.zeroPageBytes}, ` +
      `spilled: ${stats.spilled.length}${spilled}`,
    `selected instructions: ${stats.selectedInstructions}`,
    `optimizer: ${stats.optimizerPasses} pass(es), ` +
      `${stats.optimizerConverged ? 'converged' : 'pass bound reached'}, ` +
      `${stats.bytesBeforeOptimize} -> ${stats.bytesAfterOptimize} bytes` +
      (rewrites ? ` [${rewrites}]` : ''),
    `layout: ${hex(stats.codeStart)}..${hex(stats.codeEnd)}, ` +
      `relaxed branches: ${stats.relaxedBranches}, hazards: ${stats.hazards}`,
  ];
}

export async function runCli(argv: string[], io: CliIo = PROCESS_IO): Promise<number> {
  try {
    const parsed = parseArgs(argv, io);
    if ('code' in parsed) return parsed.code;

    const options: CompilerOptions = {
      asmStyle: parsed.asmStyle,
      ...(parsed.target !== undefined ? { target: parsed.target } : {}),
      nocrash: parsed.nocrash,
      optimize: parsed.optimize,
      ...(parsed.maxPasses !== undefined ? { maxOptimizerPasses: parsed.maxPasses } : {}),
      ...(parsed.origin !== undefined ? { origin: parsed.origin } : {}),
      labels: parsed.labels,
      annotate: parsed.annotate,
      emitXex: parsed.emitXex,
      emitListing: parsed.emitListing,
      verbose: parsed.verbose,
    };
    const res = await compile(parsed.entryFile, options, { formats: defaultFormatWriters });

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) io.stderr.write(`${formatDiagnostic(d)}\n`);

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    if (res.stats) {
      for (const line of statsLines(res.stats)) io.stderr.write(`a8lower: ${line}\n`);
    }
    await writeArtifacts(parsed, res.artifacts, io);
    return 0;
  } catch (err) {
    if (!(err instanceof CliError)) throw err;
    io.stderr.write(`a8lower: ${err.message}\n`);
    io.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = existsSync(resolved) ? realpathSync.native(resolved) : resolved;
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;

  const invoked = normalizePathForCompare(invokedAs);
  // npm bin shims and Windows path spellings: match the built entry by suffix.
  return (
    invoked.endsWith('/dist/src/cli.js') &&
    normalizePathForCompare(self).endsWith('/dist/src/cli.js')
  );
}

if (isDirectCliInvocation(process.argv[1])) {
  runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`a8lower: internal error: ${String(err)}\n`);
      process.exit(3);
    },
  );
}
