/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `MCC001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'MCC000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'MCC001',

  /** Unexpected exception inside a compiler stage. */
  InternalError: 'MCC002',

  /** Unrecognized character, malformed or out-of-range literal, unterminated comment. */
  LexError: 'MCC100',

  /** Token sequence does not match the grammar. */
  ParseError: 'MCC200',

  /** AST node the code generator has no lowering for. */
  UnsupportedConstruct: 'MCC300',

  /** `return;` inside a function declared to return a value. */
  ReturnWithoutValue: 'MCC400',

  /** Statement after a `return` in the same block. */
  UnreachableCode: 'MCC401',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
