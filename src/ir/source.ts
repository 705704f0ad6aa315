import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * IR text file split into lines, used to build line/column spans while reading line by line.
 */
export interface IrSourceFile {
  path: string;
  text: string;
  /** Raw line texts without terminators (`\r\n` and `\n` both accepted). */
  lines: string[];
  /** 0-based offset of the start of each line. */
  lineStarts: number[];
}

export function makeIrSourceFile(path: string, text: string): IrSourceFile {
  const lines: string[] = [];
  const lineStarts: number[] = [];
  let start = 0;
  for (let i = 0; i <= text.length; i++) {
    if (i === text.length || text[i] === '\n') {
      const raw = text.slice(start, i);
      lines.push(raw.endsWith('\r') ? raw.slice(0, -1) : raw);
      lineStarts.push(start);
      start = i + 1;
    }
  }
  return { path, text, lines, lineStarts };
}

/**
 * Position of 1-based `column` on 0-based line `lineIndex`.
 */
export function posAt(file: IrSourceFile, lineIndex: number, column: number): SourcePosition {
  const lineStart = file.lineStarts[lineIndex] ?? 0;
  const lineLength = file.lines[lineIndex]?.length ?? 0;
  const col = Math.max(1, Math.min(column, lineLength + 1));
  return { line: lineIndex + 1, column: col, offset: lineStart + col - 1 };
}

/**
 * Span covering columns `[startColumn, endColumn)` of one line; defaults to the whole line.
 */
export function lineSpan(
  file: IrSourceFile,
  lineIndex: number,
  startColumn = 1,
  endColumn?: number,
): SourceSpan {
  const end = endColumn ?? (file.lines[lineIndex]?.length ?? 0) + 1;
  return {
    file: file.path,
    start: posAt(file, lineIndex, startColumn),
    end: posAt(file, lineIndex, end),
  };
}
