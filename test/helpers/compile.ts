import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compileSource } from '../../src/compile.js';
import { defaultFormatWriters } from '../../src/formats/index.js';
import type { AsmArtifact } from '../../src/formats/types.js';
import type { CompileResult, CompilerOptions } from '../../src/pipeline.js';
import type { TargetId } from '../../src/targets/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function fixturePath(name: string): string {
  return join(__dirname, '..', 'fixtures', name);
}

export function compileText(
  text: string,
  options: CompilerOptions = {},
  path = 'main.c',
): CompileResult {
  return compileSource(path, text, options, { formats: defaultFormatWriters });
}

/**
 * Compile `text` for `target` and return the `.s` text, failing the test on any error diagnostic.
 */
export function asmFor(text: string, target: TargetId = 'x86_64-linux'): string {
  const res = compileText(text, { target });
  const errors = res.diagnostics.filter((d) => d.severity === 'error');
  if (errors.length > 0) {
    throw new Error(`unexpected errors: ${errors.map((d) => d.message).join('; ')}`);
  }
  const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
  if (!asm) throw new Error('no asm artifact');
  return asm.text;
}

/**
 * Instruction lines only (tab-indented, not directives), with the leading tab removed.
 */
export function instructions(asm: string): string[] {
  return asm
    .split('\n')
    .filter((l) => l.startsWith('\t') && !l.startsWith('\t.'))
    .map((l) => l.slice(1));
}
