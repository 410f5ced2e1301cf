import type { CstElement, CstNode, IToken } from 'chevrotain';
import type { GeometryKind, ValidationError } from '../core/types.js';
import type { Analysis } from '../core/pipeline.js';
import { errorAt, errorAtToken, warningAtToken } from '../core/errorBuilder.js';
import { CoordinateTable, type PlacedKey } from './coordinates.js';

function isCstNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

function childNodes(node: CstNode, name: string): CstNode[] {
  return (node.children[name] ?? []).filter(isCstNode);
}

function childTokens(node: CstNode, name: string): IToken[] {
  const out: IToken[] = [];
  for (const el of node.children[name] ?? []) {
    if (!isCstNode(el)) out.push(el);
  }
  return out;
}

function keyTokens(cst: CstNode): IToken[] {
  return childNodes(cst, 'row').flatMap((row) => childTokens(row, 'Key'));
}

// Floor division; the remainder is never negative
function divmod(n: number, d: number): [number, number] {
  const q = Math.floor(n / d);
  return [q, n - q * d];
}

function checkTokenWidth(keys: IToken[], width: number): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const tok of keys) {
    if (tok.image.length === width) continue;
    errors.push(errorAtToken(tok, `Key '${tok.image}' is ${tok.image.length} characters wide; every key in this diagram must be ${width} wide.`, {
      code: 'KB-TOKEN-WIDTH',
      hint: `The first key '${keys[0]?.image ?? ''}' sets the width. Print each key as its unshifted and shifted symbol, e.g. 'aA'.`,
    }));
  }
  return errors;
}

function checkDuplicates(keys: IToken[]): ValidationError[] {
  const firstSeen = new Map<string, IToken>();
  const warnings: ValidationError[] = [];
  for (const tok of keys) {
    for (const ch of tok.image) {
      const prior = firstSeen.get(ch);
      if (!prior) {
        firstSeen.set(ch, tok);
        continue;
      }
      if (prior === tok) continue;
      warnings.push(warningAtToken(tok, `Character '${ch}' is already printed on key '${prior.image}' at line ${prior.startLine}; this key's neighbours replace it.`, {
        code: 'KB-DUPLICATE-CHAR',
      }));
    }
  }
  return warnings;
}

export function analyzeLayout(cst: CstNode, geometry: GeometryKind): Analysis<CoordinateTable> {
  const keys = keyTokens(cst);
  const first = keys[0];
  if (!first) {
    return {
      value: new CoordinateTable(0),
      errors: [errorAt(1, 1, 'Keyboard diagram contains no keys.', { code: 'KB-EMPTY-LAYOUT' })],
    };
  }

  const width = first.image.length;
  const widthErrors = checkTokenWidth(keys, width);
  if (widthErrors.length > 0) {
    return { value: new CoordinateTable(width), errors: widthErrors };
  }

  // Each key is followed by one separator column
  const xUnit = width + 1;
  const errors: ValidationError[] = [];
  const placed: PlacedKey[] = [];
  for (const tok of keys) {
    const y = (tok.startLine ?? 1) - 1;
    const col = (tok.startColumn ?? 1) - 1;
    // Staggered rows are drawn one column further right than the row above
    const slant = geometry === 'slanted' ? y - 1 : 0;
    const [x, remainder] = divmod(col - slant, xUnit);
    if (remainder !== 0) {
      errors.push(errorAtToken(tok, `Key '${tok.image}' at column ${col + 1} is off the ${xUnit}-column grid of this ${geometry} diagram.`, {
        code: 'KB-COLUMN-ALIGN',
        hint: geometry === 'slanted'
          ? 'Indent each row one space further than the row above it, and separate keys with a single space.'
          : 'Keep keypad columns vertically aligned and separate keys with a single space.',
      }));
      continue;
    }
    placed.push({ position: { x, y }, token: tok.image });
  }

  return { value: new CoordinateTable(width, placed), errors: [...errors, ...checkDuplicates(keys)] };
}
