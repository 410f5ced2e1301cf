import { createToken, Lexer } from 'chevrotain';

// One key: its unshifted symbol, optionally followed by the shifted one
export const Key = createToken({ name: 'Key', pattern: /[!-~]+/ });

// Only spaces count as padding; column offsets would be meaningless with tabs
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: / +/, group: Lexer.SKIPPED });
export const Newline = createToken({ name: 'Newline', pattern: /\r\n|\r|\n/, line_breaks: true });

export const allTokens = [
  WhiteSpace,
  Key,
  Newline,
];

export const LayoutLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return LayoutLexer.tokenize(text);
}
