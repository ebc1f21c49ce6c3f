import { getTarget } from '../targets/index.js';
import type { AsmArtifact, AsmLine, AsmProgram, WriteAsmOptions } from './types.js';

function renderLine(line: AsmLine, commentPrefix: string): string {
  switch (line.kind) {
    case 'comment':
      return `${commentPrefix} ${line.text}`;
    case 'directive':
      return line.args && line.args.length > 0
        ? `\t${line.name}\t${line.args.join(', ')}`
        : `\t${line.name}`;
    case 'label':
      return `${line.name}:`;
    case 'instruction':
      return line.operands.length > 0
        ? `\t${line.mnemonic}\t${line.operands.join(', ')}`
        : `\t${line.mnemonic}`;
    case 'blank':
      return '';
    default: {
      const unreachable: never = line;
      return String(unreachable);
    }
  }
}

/**
 * Render a lowered program as assembler source text (`.s`), one line per entry.
 */
export function writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const { commentPrefix } = getTarget(program.target);
  const lines = program.lines.map((line) => renderLine(line, commentPrefix));
  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
