import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';
import { fromLexerError, mapParserError } from './diagnostics.js';

export interface Analysis<T> {
  value: T;
  errors: ValidationError[];
}

export interface LintAdapters<T> {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode; errors: IRecognitionException[] };
  analyze: (cst: CstNode, tokens: IToken[]) => Analysis<T>;
}

export interface LintResult<T> {
  // Absent when lexing or parsing failed
  value?: T;
  errors: ValidationError[];
}

export function lintWithChevrotain<T>(text: string, adapters: LintAdapters<T>): LintResult<T> {
  const errors: ValidationError[] = [];

  // Lexing
  const lex = adapters.tokenize(text);
  if (lex.errors.length > 0) {
    errors.push(...lex.errors.map((e) => fromLexerError(e, text)));
    return { errors };
  }

  // Parsing
  const parseRes = adapters.parse(lex.tokens);
  if (parseRes.errors.length > 0) {
    errors.push(...parseRes.errors.map(mapParserError));
    return { errors };
  }

  // Semantics
  const analysis = adapters.analyze(parseRes.cst, lex.tokens);
  errors.push(...analysis.errors);
  return { value: analysis.value, errors };
}
