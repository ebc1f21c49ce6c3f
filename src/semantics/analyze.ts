import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  CompoundStatementNode,
  FunctionNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
} from '../frontend/ast.js';

function warnAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'warning',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
}

function checkStatement(fn: FunctionNode, stmt: StatementNode, diagnostics: Diagnostic[]): void {
  switch (stmt.kind) {
    case 'Return':
      if (!stmt.value && fn.returnType === 'int') {
        warnAt(
          diagnostics,
          DiagnosticIds.ReturnWithoutValue,
          stmt.span,
          `non-void function '${fn.name}' should return a value`,
        );
      }
      return;
    default: {
      const unreachable: never = stmt.kind;
      return unreachable;
    }
  }
}

function checkBlock(fn: FunctionNode, block: CompoundStatementNode, diagnostics: Diagnostic[]): void {
  let returned = false;
  let reported = false;
  for (const stmt of block.statements) {
    if (returned && !reported) {
      // One warning per block, at the first dead statement.
      warnAt(diagnostics, DiagnosticIds.UnreachableCode, stmt.span, 'code will never be executed');
      reported = true;
    }
    checkStatement(fn, stmt, diagnostics);
    if (stmt.kind === 'Return') returned = true;
  }
}

/**
 * Non-fatal checks over a parsed program. Only warnings are produced; code generation still runs.
 */
export function analyzeProgram(program: ProgramNode, diagnostics: Diagnostic[]): void {
  for (const fn of program.functions) {
    checkBlock(fn, fn.body, diagnostics);
  }
}
