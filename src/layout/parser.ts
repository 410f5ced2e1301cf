import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class LayoutParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public layout = this.RULE('layout', () => {
    this.MANY(() => this.OR([
      { ALT: () => this.SUBRULE(this.row) },
      { ALT: () => this.CONSUME(t.Newline) },
    ]));
  });

  private row = this.RULE('row', () => {
    this.AT_LEAST_ONE(() => this.CONSUME(t.Key));
    this.OPTION(() => this.CONSUME2(t.Newline));
  });
}

export const parserInstance = new LayoutParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.layout();
  return { cst, errors: parserInstance.errors };
}
