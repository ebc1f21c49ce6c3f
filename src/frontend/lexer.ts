import { LexError } from '../diagnostics/errors.js';
import type { SourceFile } from './source.js';
import { span } from './source.js';
import type { Token } from './tokens.js';
import { isKeyword, isPunct } from './tokens.js';

/** Largest value of a signed 64-bit integer. */
export const INT64_MAX = (1n << 63n) - 1n;

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

function describeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  if (code < 0x20 || code === 0x7f) {
    return `'\\x${code.toString(16).padStart(2, '0')}'`;
  }
  return `'${ch}'`;
}

/**
 * Lazily split `file.text` into tokens, ending with exactly one `EndOfFile` token.
 *
 * Each call starts a fresh scan from offset 0. Whitespace, `//` line comments and
 * block comments produce no tokens. Throws {@link LexError} at the first character
 * that cannot start a token.
 */
export function* tokenize(file: SourceFile): Generator<Token, void, undefined> {
  const s = file.text;
  let i = 0;

  while (i < s.length) {
    const ch = s[i] ?? '';
    const start = i;

    if (WHITESPACE.test(ch)) {
      i++;
      continue;
    }

    if (ch === '/' && s[i + 1] === '/') {
      const nl = s.indexOf('\n', i + 2);
      i = nl < 0 ? s.length : nl + 1;
      continue;
    }
    if (ch === '/' && s[i + 1] === '*') {
      const close = s.indexOf('*/', i + 2);
      if (close < 0) {
        throw new LexError(span(file, start, start + 2), 'unterminated /* comment');
      }
      i = close + 2;
      continue;
    }

    if (isPunct(ch)) {
      i++;
      yield { kind: 'Punct', span: span(file, start, i), punct: ch };
      continue;
    }

    if (IDENT_START.test(ch)) {
      i++;
      while (i < s.length && IDENT_PART.test(s[i] ?? '')) i++;
      const text = s.slice(start, i);
      const where = span(file, start, i);
      yield isKeyword(text)
        ? { kind: 'Keyword', span: where, keyword: text }
        : { kind: 'Identifier', span: where, text };
      continue;
    }

    if (DIGIT.test(ch)) {
      i++;
      while (i < s.length && DIGIT.test(s[i] ?? '')) i++;
      if (i < s.length && IDENT_PART.test(s[i] ?? '')) {
        throw new LexError(
          span(file, i, i + 1),
          `invalid digit ${describeChar(s[i] ?? '')} in decimal constant`,
        );
      }
      const text = s.slice(start, i);
      const where = span(file, start, i);
      const value = BigInt(text);
      if (value > INT64_MAX) {
        throw new LexError(where, `integer literal '${text}' is too large for a 64-bit integer`);
      }
      yield { kind: 'IntegerLiteral', span: where, text, value };
      continue;
    }

    const unexpected = String.fromCodePoint(s.codePointAt(i) ?? 0);
    throw new LexError(
      span(file, start, start + unexpected.length),
      `unexpected character ${describeChar(unexpected)}`,
    );
  }

  yield { kind: 'EndOfFile', span: span(file, s.length, s.length) };
}
