import type {
  CompoundStatementNode,
  ExpressionNode,
  FunctionNode,
  ProgramNode,
  ReturnStatementNode,
  SourceSpan,
  StatementNode,
} from './ast.js';
import { ParseError } from '../diagnostics/errors.js';
import type { Keyword, Punct, Token } from './tokens.js';
import { describeToken } from './tokens.js';

type TokenOf<K extends Token['kind']> = Extract<Token, { kind: K }>;

const START_OF_INPUT: SourceSpan = {
  file: '<input>',
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
};

/**
 * Pull-based view over a token sequence with one token of lookahead.
 *
 * The underlying iterator is advanced only when the current token is consumed, so the lexer
 * never runs ahead of the parser by more than one token.
 */
class TokenStream {
  private readonly iter: Iterator<Token, unknown, undefined>;
  private current: Token | undefined;
  private last: Token | undefined;

  constructor(tokens: Iterable<Token>) {
    this.iter = tokens[Symbol.iterator]();
  }

  peek(): Token {
    if (!this.current) {
      const r = this.iter.next();
      if (r.done) {
        // Token sources should end with EndOfFile; synthesize one at the last known position.
        const at = this.last?.span ?? START_OF_INPUT;
        this.current = { kind: 'EndOfFile', span: { ...at, start: at.end } };
      } else {
        this.current = r.value;
      }
    }
    return this.current;
  }

  next(): Token {
    const t = this.peek();
    if (t.kind !== 'EndOfFile') this.current = undefined;
    this.last = t;
    return t;
  }

  fail(expected: string): never {
    const t = this.peek();
    throw new ParseError(t.span, expected, describeToken(t));
  }

  isPunct(p: Punct): boolean {
    const t = this.peek();
    return t.kind === 'Punct' && t.punct === p;
  }

  isKeyword(k: Keyword): boolean {
    const t = this.peek();
    return t.kind === 'Keyword' && t.keyword === k;
  }

  expectPunct(p: Punct): TokenOf<'Punct'> {
    const t = this.peek();
    if (t.kind !== 'Punct' || t.punct !== p) this.fail(`'${p}'`);
    this.next();
    return t;
  }

  expectKeyword(k: Keyword): TokenOf<'Keyword'> {
    const t = this.peek();
    if (t.kind !== 'Keyword' || t.keyword !== k) this.fail(`'${k}'`);
    this.next();
    return t;
  }

  expectIdentifier(): TokenOf<'Identifier'> {
    const t = this.peek();
    if (t.kind !== 'Identifier') this.fail('identifier');
    this.next();
    return t;
  }

  expectEnd(): TokenOf<'EndOfFile'> {
    const t = this.peek();
    if (t.kind !== 'EndOfFile') this.fail('end of file');
    return t;
  }
}

function join(from: SourceSpan, to: SourceSpan): SourceSpan {
  return { file: from.file, start: from.start, end: to.end };
}

function parseExpression(ts: TokenStream): ExpressionNode {
  const t = ts.peek();
  if (t.kind !== 'IntegerLiteral') ts.fail('expression');
  ts.next();
  return { kind: 'IntegerLiteral', span: t.span, value: t.value };
}

function parseReturn(ts: TokenStream): ReturnStatementNode {
  const kw = ts.expectKeyword('return');
  if (ts.isPunct(';')) {
    const semi = ts.expectPunct(';');
    return { kind: 'Return', span: join(kw.span, semi.span) };
  }
  if (ts.peek().kind !== 'IntegerLiteral') ts.fail(`expression or ';'`);
  const value = parseExpression(ts);
  const semi = ts.expectPunct(';');
  return { kind: 'Return', span: join(kw.span, semi.span), value };
}

function parseStatement(ts: TokenStream): StatementNode {
  if (ts.isKeyword('return')) return parseReturn(ts);
  return ts.fail(`statement or '}'`);
}

function parseCompound(ts: TokenStream): CompoundStatementNode {
  const open = ts.expectPunct('{');
  const statements: StatementNode[] = [];
  while (!ts.isPunct('}')) {
    statements.push(parseStatement(ts));
  }
  const close = ts.expectPunct('}');
  return { kind: 'CompoundStatement', span: join(open.span, close.span), statements };
}

function parseFunction(ts: TokenStream): FunctionNode {
  const type = ts.expectKeyword('int');
  const name = ts.expectIdentifier();
  ts.expectPunct('(');
  ts.expectPunct(')');
  const body = parseCompound(ts);
  return {
    kind: 'Function',
    span: join(type.span, body.span),
    name: name.text,
    returnType: 'int',
    body,
  };
}

/**
 * Parse a token sequence into a {@link ProgramNode}.
 *
 * Grammar:
 * ```
 * Program      := Function EOF
 * Function     := "int" Identifier "(" ")" CompoundStmt
 * CompoundStmt := "{" Statement* "}"
 * Statement    := "return" Expression? ";"
 * Expression   := IntegerLiteral
 * ```
 *
 * Stops at the first mismatch with a {@link ParseError} located at the offending token.
 */
export function parse(tokens: Iterable<Token>): ProgramNode {
  const ts = new TokenStream(tokens);
  const fn = parseFunction(ts);
  const eof = ts.expectEnd();
  return { kind: 'Program', span: join(fn.span, eof.span), functions: [fn] };
}
