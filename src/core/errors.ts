import type { ValidationError } from './types.js';
import { codeFrame } from './diagnostics.js';

export type LayoutErrorKind =
  | 'TokenWidthMismatch'
  | 'ColumnAlignmentError'
  | 'EmptyLayout'
  | 'UnexpectedCharacter'
  | 'Syntax';

const KIND_BY_CODE: Record<string, LayoutErrorKind> = {
  'KB-TOKEN-WIDTH': 'TokenWidthMismatch',
  'KB-COLUMN-ALIGN': 'ColumnAlignmentError',
  'KB-EMPTY-LAYOUT': 'EmptyLayout',
  'KB-UNEXPECTED-CHAR': 'UnexpectedCharacter',
};

export function errorKindOf(e: ValidationError): LayoutErrorKind {
  return (e.code && KIND_BY_CODE[e.code]) || 'Syntax';
}

/**
 * Thrown when a keyboard diagram cannot be turned into a coordinate table.
 * The message names the layout and shows the first offending line.
 */
export class LayoutFormatError extends Error {
  readonly kind: LayoutErrorKind;

  constructor(
    readonly layout: string,
    readonly diagram: string,
    readonly diagnostics: ValidationError[],
  ) {
    const first = diagnostics.find((e) => e.severity === 'error') ?? diagnostics[0];
    const detail = first
      ? `${first.message} (line ${first.line}, column ${first.column})\n${codeFrame(diagram, first.line, first.column, first.length ?? 1)}`
      : 'no diagnostics';
    super(`Malformed keyboard layout "${layout}": ${detail}`);
    this.name = 'LayoutFormatError';
    this.kind = first ? errorKindOf(first) : 'Syntax';
  }
}

export class LayoutDefinitionError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'LayoutDefinitionError';
  }
}
