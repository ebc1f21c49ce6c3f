import type { ProgramNode } from '../frontend/ast.js';
import type { AstArtifact } from './types.js';

/**
 * Plain-JSON copy of a node tree. `bigint` values become decimal strings and `span` fields are
 * reduced to `line:column` so the dump stays stable when a file moves.
 */
function toPlain(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toPlain);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      if (key === 'span' && isSpanLike(v)) {
        out['at'] = `${v.start.line}:${v.start.column}`;
        continue;
      }
      out[key] = toPlain(v);
    }
    return out;
  }
  return value;
}

function isSpanLike(v: unknown): v is { start: { line: number; column: number } } {
  if (v === null || typeof v !== 'object' || !('start' in v)) return false;
  const start = v.start;
  return (
    start !== null &&
    typeof start === 'object' &&
    'line' in start &&
    'column' in start &&
    typeof start.line === 'number' &&
    typeof start.column === 'number'
  );
}

export function writeAst(program: ProgramNode): AstArtifact {
  return { kind: 'ast', json: { format: 'mincc-ast', version: 1, program: toPlain(program) } };
}
