import type { SourceSpan } from './ast.js';

export type Keyword = 'int' | 'return';

export type Punct = '{' | '}' | '(' | ')' | ';';

/**
 * One lexical unit. Every token carries the span it was read from.
 */
export type Token =
  | { kind: 'Identifier'; span: SourceSpan; text: string }
  | { kind: 'IntegerLiteral'; span: SourceSpan; text: string; value: bigint }
  | { kind: 'Keyword'; span: SourceSpan; keyword: Keyword }
  | { kind: 'Punct'; span: SourceSpan; punct: Punct }
  | { kind: 'EndOfFile'; span: SourceSpan };

export const KEYWORDS: ReadonlySet<string> = new Set<Keyword>(['int', 'return']);

export function isKeyword(text: string): text is Keyword {
  return KEYWORDS.has(text);
}

const PUNCT_NAMES: Record<Punct, string> = {
  '{': 'l_brace',
  '}': 'r_brace',
  '(': 'l_paren',
  ')': 'r_paren',
  ';': 'semi',
};

export function isPunct(ch: string): ch is Punct {
  return Object.prototype.hasOwnProperty.call(PUNCT_NAMES, ch);
}

/**
 * Render a token as `<name> '<spelling>'` (e.g. `semi ';'`, `identifier 'main'`).
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'Identifier':
      return `identifier '${token.text}'`;
    case 'IntegerLiteral':
      return `numeric_constant '${token.text}'`;
    case 'Keyword':
      return `${token.keyword} '${token.keyword}'`;
    case 'Punct':
      return `${PUNCT_NAMES[token.punct]} '${token.punct}'`;
    case 'EndOfFile':
      return `eof ''`;
    default: {
      const unreachable: never = token;
      return String(unreachable);
    }
  }
}
