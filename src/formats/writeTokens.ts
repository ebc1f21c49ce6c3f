import type { Token } from '../frontend/tokens.js';
import { describeToken } from '../frontend/tokens.js';
import type { TokensArtifact } from './types.js';

/**
 * One token per line as `line:column<TAB>description`, e.g. `1:5\tidentifier 'main'`.
 */
export function writeTokens(tokens: Iterable<Token>): TokensArtifact {
  const lines: string[] = [];
  for (const t of tokens) {
    lines.push(`${t.span.start.line}:${t.span.start.column}\t${describeToken(t)}`);
  }
  return { kind: 'tokens', text: lines.map((l) => `${l}\n`).join('') };
}
