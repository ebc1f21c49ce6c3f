/**
 * Frontend AST contracts for mincc.
 *
 * Node unions are closed: adding a construct means adding a variant here and a matching arm in
 * every stage that switches on `kind` (each switch ends in an exhaustiveness check).
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and exclusive end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Parsed translation unit. The supported subset holds exactly one function.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  functions: FunctionNode[];
}

/**
 * Scalar types a function may be declared to return.
 */
export type ReturnType = 'int';

export interface FunctionNode extends BaseNode {
  kind: 'Function';
  name: string;
  returnType: ReturnType;
  body: CompoundStatementNode;
}

/**
 * Brace-delimited statement list. May be empty.
 */
export interface CompoundStatementNode extends BaseNode {
  kind: 'CompoundStatement';
  statements: StatementNode[];
}

export type StatementNode = ReturnStatementNode;

/**
 * `return;` or `return <expr>;`. `value` is absent for the bare form.
 */
export interface ReturnStatementNode extends BaseNode {
  kind: 'Return';
  value?: ExpressionNode;
}

export type ExpressionNode = IntegerLiteralNode;

/**
 * Decimal integer literal. Always within the signed 64-bit range.
 */
export interface IntegerLiteralNode extends BaseNode {
  kind: 'IntegerLiteral';
  value: bigint;
}

/**
 * Union of every node kind, used where a stage reports the node it stopped at.
 */
export type AstNode =
  | ProgramNode
  | FunctionNode
  | CompoundStatementNode
  | StatementNode
  | ExpressionNode;
