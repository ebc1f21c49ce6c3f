import type { SourcePosition, SourceSpan } from './ast.js';

/** A C translation unit held in memory, with the offset of every line start. */
export interface SourceFile {
  path: string;
  text: string;
  /** `lineStarts[n]` is the offset of line `n + 1`; line 1 starts at 0. */
  lineStarts: number[];
}

export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  let nl = text.indexOf('\n');
  while (nl >= 0) {
    lineStarts.push(nl + 1);
    nl = text.indexOf('\n', nl + 1);
  }
  return { path, text, lineStarts };
}

/**
 * Line and column (both from 1) of a character offset. Offsets outside the text are pinned to
 * its ends, so the end-of-file position is always representable.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const at = Math.min(Math.max(offset, 0), file.text.length);
  // Last line whose start is <= at.
  let line = 0;
  let upper = file.lineStarts.length - 1;
  while (line < upper) {
    const mid = (line + upper + 1) >> 1;
    if ((file.lineStarts[mid] ?? 0) <= at) line = mid;
    else upper = mid - 1;
  }
  return { line: line + 1, column: at - (file.lineStarts[line] ?? 0) + 1, offset: at };
}

/** Span covering `[from, to)`; tokens and nodes carry these. */
export function span(file: SourceFile, from: number, to: number): SourceSpan {
  return { file: file.path, start: posAtOffset(file, from), end: posAtOffset(file, to) };
}

/**
 * Text of a 1-based line, without its line terminator. Empty for lines past the end.
 */
export function lineText(file: SourceFile, line: number): string {
  const start = file.lineStarts[line - 1];
  if (start === undefined) return '';
  const next = file.lineStarts[line];
  const raw = next === undefined ? file.text.slice(start) : file.text.slice(start, next - 1);
  return raw.endsWith('\r') ? raw.slice(0, -1) : raw;
}

/**
 * Two-line excerpt pointing at `line:column`: the source line, then a caret under the column.
 *
 * Tabs before the column are kept in the caret line so the caret lines up in a terminal.
 */
export function caretExcerpt(file: SourceFile, line: number, column: number): string[] {
  const text = lineText(file, line);
  const lead = text.slice(0, Math.max(0, column - 1)).replace(/[^\t]/g, ' ');
  const pad = ' '.repeat(Math.max(0, column - 1 - text.length));
  return [`  ${text}`, `  ${lead}${pad}^`];
}
