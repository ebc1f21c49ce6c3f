import { UnsupportedConstructError } from '../diagnostics/errors.js';
import type { AsmLine, AsmProgram } from '../formats/types.js';
import type {
  ExpressionNode,
  FunctionNode,
  ProgramNode,
  StatementNode,
} from '../frontend/ast.js';
import { INT64_MAX } from '../frontend/lexer.js';
import type { Target } from '../targets/types.js';

/**
 * Value produced by `return;` and by falling off the end of a function body.
 *
 * The language leaves it unspecified; zero keeps `main` exiting cleanly.
 */
export const IMPLICIT_RETURN_VALUE = 0n;

function lowerExpression(expr: ExpressionNode): bigint {
  switch (expr.kind) {
    case 'IntegerLiteral':
      if (expr.value < 0n || expr.value > INT64_MAX) {
        throw new UnsupportedConstructError(expr, `value ${expr.value} is outside the 64-bit range`);
      }
      return expr.value;
    default: {
      const unreachable: never = expr.kind;
      throw new UnsupportedConstructError(expr, `no lowering for expression kind ${String(unreachable)}`);
    }
  }
}

/**
 * Lower one statement. `isLast` marks the final statement of the body, whose return falls
 * through into the epilogue; any other return jumps there.
 */
function lowerStatement(
  stmt: StatementNode,
  target: Target,
  epilogueLabel: string,
  isLast: boolean,
): { lines: AsmLine[]; jumpsToEpilogue: boolean } {
  switch (stmt.kind) {
    case 'Return': {
      const value = stmt.value ? lowerExpression(stmt.value) : IMPLICIT_RETURN_VALUE;
      const lines = target.loadReturnValue(value);
      if (isLast) return { lines, jumpsToEpilogue: false };
      return { lines: [...lines, target.jump(epilogueLabel)], jumpsToEpilogue: true };
    }
    default: {
      const unreachable: never = stmt.kind;
      throw new UnsupportedConstructError(stmt, `no lowering for statement kind ${String(unreachable)}`);
    }
  }
}

function lowerFunction(fn: FunctionNode, target: Target): AsmLine[] {
  if (fn.returnType !== 'int') {
    throw new UnsupportedConstructError(fn, `return type '${String(fn.returnType)}'`);
  }
  const symbol = target.symbolName(fn.name);
  const epilogueLabel = target.localLabel(`${fn.name}_epilogue`);
  const statements = fn.body.statements;

  const lines: AsmLine[] = [...target.functionHeader(symbol), ...target.prologue()];
  let epilogueUsed = false;

  for (const [i, stmt] of statements.entries()) {
    const lowered = lowerStatement(stmt, target, epilogueLabel, i === statements.length - 1);
    lines.push(...lowered.lines);
    if (lowered.jumpsToEpilogue) epilogueUsed = true;
  }

  const last = statements[statements.length - 1];
  if (!last || last.kind !== 'Return') {
    lines.push(...target.loadReturnValue(IMPLICIT_RETURN_VALUE));
  }

  if (epilogueUsed) lines.push({ kind: 'label', name: epilogueLabel });
  lines.push(...target.epilogue());
  lines.push(...target.functionTrailer(symbol));
  return lines;
}

/**
 * Lower a parsed program to target assembly lines.
 *
 * Every function gets a frame-pointer prologue and a single epilogue. Statements after a
 * `return` are still emitted; control never reaches them because the return jumps away.
 *
 * @param sourceName - shown in the leading comment only; pass a base name to keep output
 *   independent of the working directory
 */
export function emitProgram(program: ProgramNode, target: Target, sourceName?: string): AsmProgram {
  const lines: AsmLine[] = [];
  lines.push({
    kind: 'comment',
    text: sourceName ? `mincc ${target.id}: ${sourceName}` : `mincc ${target.id}`,
  });
  lines.push(...target.fileHeader());

  for (const fn of program.functions) {
    lines.push({ kind: 'blank' });
    lines.push(...lowerFunction(fn, target));
  }

  lines.push({ kind: 'blank' });
  lines.push(...target.fileTrailer());
  return { target: target.id, lines };
}
