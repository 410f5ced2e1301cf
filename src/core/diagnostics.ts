import type { ILexingError, IRecognitionException } from 'chevrotain';
import type { ValidationError } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function codeFrame(
  text: string,
  line: number,
  column: number,
  length = 1,
  contextLines = 1
): string {
  const lines = text.split(/\r?\n/);
  const idx = Math.max(0, Math.min(lines.length - 1, line - 1));
  const start = Math.max(0, idx - contextLines);
  const end = Math.min(lines.length - 1, idx + contextLines);
  const numWidth = String(end + 1).length;

  const parts: string[] = [];
  for (let i = start; i <= end; i++) {
    const lno = String(i + 1).padStart(numWidth, ' ');
    parts.push(`${lno} | ${lines[i] ?? ''}`);
    if (i === idx) {
      const caretPad = ' '.repeat(Math.max(0, column - 1));
      const marker = '^'.repeat(Math.max(1, Math.min(length, (lines[i] ?? '').length - column + 1)));
      parts.push(`${' '.repeat(numWidth)} | ${caretPad}${marker}`);
    }
  }
  return parts.join('\n');
}

function describeChar(ch: string): string {
  if (ch === '\t') return 'a tab';
  const cp = ch.codePointAt(0) ?? 0;
  if (cp < 0x20 || cp === 0x7f) return `control character U+${cp.toString(16).toUpperCase().padStart(4, '0')}`;
  return `'${ch}'`;
}

export function fromLexerError(e: ILexingError, text: string): ValidationError {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    message: `Unexpected character ${describeChar(String.fromCodePoint(text.codePointAt(e.offset) ?? 0))} in keyboard diagram.`,
    code: 'KB-UNEXPECTED-CHAR',
    hint: 'Keys are printable ASCII characters separated by spaces; indent rows with spaces, not tabs.',
    length: Math.max(1, e.length),
  };
}

export function mapParserError(e: IRecognitionException): ValidationError {
  const { line, column } = coercePos(e.token.startLine, e.token.startColumn);
  return { line, column, severity: 'error', message: e.message, code: 'KB-PARSE' };
}
