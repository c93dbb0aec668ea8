// engine/scanner/syntax.ts — Grammar-neutral helpers over tree-sitter string and call nodes
import type { SyntaxNode } from './tree-sitter.js';
import { PARAM_TOKEN } from '../contract/paths.js';

/** Interpolated fragments of a URL become this token. */
export const DYNAMIC_SEGMENT = PARAM_TOKEN;

const STRING_OPENER = /^([a-zA-Z]*)("""|'''|"|'|`)/;

interface StringValue {
  text: string;
  dynamic: boolean;
}

/**
 * Read a string literal (TS/JS string or template, Python string or
 * f-string). Interpolated parts are replaced by DYNAMIC_SEGMENT.
 * Returns null for anything that is not a text literal.
 */
export function readString(node: SyntaxNode): StringValue | null {
  switch (node.type) {
    case 'string': {
      const match = STRING_OPENER.exec(node.text);
      if (!match) return null;
      const [, prefix, quote] = match;
      if (/b/i.test(prefix)) return null; // Python bytes
      return splice(node, prefix.length + quote.length, quote.length, 'interpolation');
    }
    case 'template_string':
      return splice(node, 1, 1, 'template_substitution');
    case 'concatenated_string': {
      let text = '';
      let dynamic = false;
      for (const part of node.namedChildren) {
        const value = readString(part);
        if (!value) return null;
        text += value.text;
        dynamic = dynamic || value.dynamic;
      }
      return { text, dynamic };
    }
    case 'parenthesized_expression': {
      const inner = significantChildren(node)[0];
      return inner ? readString(inner) : null;
    }
    default:
      return null;
  }
}

/**
 * Static text of a literal without interpolation, or null.
 */
export function readLiteral(node: SyntaxNode): string | null {
  const value = readString(node);
  return value && !value.dynamic ? value.text : null;
}

/**
 * Resolve a URL expression: a literal, an interpolated string, or a `+`
 * concatenation of two resolvable expressions. Anything else yields null.
 */
export function readUrlExpression(node: SyntaxNode): string | null {
  const value = readString(node);
  if (value) return value.text;

  if ((node.type === 'binary_expression' || node.type === 'binary_operator') && isAddition(node)) {
    const left = node.childForFieldName('left');
    const right = node.childForFieldName('right');
    if (!left || !right) return null;
    const l = readUrlExpression(left);
    const r = readUrlExpression(right);
    return l !== null && r !== null ? l + r : null;
  }

  if (node.type === 'parenthesized_expression') {
    const inner = significantChildren(node)[0];
    return inner ? readUrlExpression(inner) : null;
  }

  return null;
}

/** Named children, minus comments. */
export function significantChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type !== 'comment');
}

/** First positional argument of an argument list. */
export function firstPositionalArgument(args: SyntaxNode | null): SyntaxNode | null {
  if (!args) return null;
  const first = significantChildren(args)[0];
  if (!first || first.type === 'keyword_argument') return null;
  return first;
}

export function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function isAddition(node: SyntaxNode): boolean {
  const operator = node.childForFieldName('operator');
  if (operator) return operator.type === '+';
  return node.children.some((c) => c.type === '+');
}

function splice(node: SyntaxNode, open: number, close: number, holeType: string): StringValue | null {
  const text = node.text;
  if (text.length < open + close) return null;

  let out = '';
  let cursor = open;
  let dynamic = false;
  for (const hole of node.descendantsOfType(holeType)) {
    const start = hole.startIndex - node.startIndex;
    const end = hole.endIndex - node.startIndex;
    if (start < cursor) continue; // nested inside a previous hole
    out += text.slice(cursor, start) + DYNAMIC_SEGMENT;
    cursor = end;
    dynamic = true;
  }
  out += text.slice(cursor, text.length - close);
  return { text: out, dynamic };
}
