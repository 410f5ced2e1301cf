import type { GeometryKind, ParseOptions, ValidationError } from '../core/types.js';
import { lintWithChevrotain, type LintResult } from '../core/pipeline.js';
import { LayoutFormatError } from '../core/errors.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';
import { analyzeLayout } from './semantics.js';
import type { CoordinateTable } from './coordinates.js';

/** Diagnostics plus the coordinate table, which is absent when lexing or parsing failed. */
export function lintLayout(text: string, geometry: GeometryKind): LintResult<CoordinateTable> {
  return lintWithChevrotain(text, {
    tokenize,
    parse,
    analyze: (cst) => analyzeLayout(cst, geometry),
  });
}

/** Diagnostics for a keyboard diagram. Never throws. */
export function validateLayout(text: string, geometry: GeometryKind): ValidationError[] {
  return lintLayout(text, geometry).errors;
}

/**
 * Parse a keyboard diagram into its coordinate table.
 * Throws LayoutFormatError if the diagram has any error; warnings are ignored.
 */
export function parseLayout(text: string, options: ParseOptions): CoordinateTable {
  const { value, errors } = lintLayout(text, options.geometry);
  if (!value || errors.some((e) => e.severity === 'error')) {
    throw new LayoutFormatError(options.name ?? '<anonymous>', text, errors);
  }
  return value;
}
