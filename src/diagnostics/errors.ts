import type { AstNode, SourceSpan } from '../frontend/ast.js';
import type { Diagnostic, DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * Base class for errors that end a compilation. Each stage throws the first one it meets.
 */
export abstract class CompileError extends Error {
  abstract readonly id: DiagnosticId;

  protected constructor(
    message: string,
    readonly span: SourceSpan,
  ) {
    super(message);
  }

  toDiagnostic(): Diagnostic {
    return {
      id: this.id,
      severity: 'error',
      message: this.message,
      file: this.span.file,
      line: this.span.start.line,
      column: this.span.start.column,
    };
  }
}

export class LexError extends CompileError {
  override readonly name = 'LexError';
  readonly id = DiagnosticIds.LexError;

  constructor(
    span: SourceSpan,
    readonly reason: string,
  ) {
    super(reason, span);
  }

  get position(): SourceSpan['start'] {
    return this.span.start;
  }
}

export class ParseError extends CompileError {
  override readonly name = 'ParseError';
  readonly id = DiagnosticIds.ParseError;

  /**
   * @param expected - what the grammar allowed here, e.g. `';'` or `expression or ';'`
   * @param found - display form of the offending token
   */
  constructor(
    span: SourceSpan,
    readonly expected: string,
    readonly found: string,
  ) {
    super(`expected ${expected}, found ${found}`, span);
  }

  get position(): SourceSpan['start'] {
    return this.span.start;
  }
}

export class UnsupportedConstructError extends CompileError {
  override readonly name = 'UnsupportedConstructError';
  readonly id = DiagnosticIds.UnsupportedConstruct;

  constructor(
    readonly node: AstNode,
    detail?: string,
  ) {
    super(
      detail
        ? `unsupported construct '${node.kind}': ${detail}`
        : `unsupported construct '${node.kind}'`,
      node.span,
    );
  }
}
