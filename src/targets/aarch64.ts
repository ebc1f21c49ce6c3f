import type { AsmLine } from '../formats/types.js';
import { cLocalLabel, cSymbol, directive, halves16, insn } from './shared.js';
import type { Target, TargetOs } from './types.js';

function hex16(n: number): string {
  return `#0x${n.toString(16)}`;
}

/**
 * Materialize `value` in `x0`: a single `mov` when it fits a 16-bit immediate, otherwise
 * `movz` for the lowest non-zero half followed by `movk` for each higher non-zero half.
 */
function loadX0(value: bigint): AsmLine[] {
  if (value <= 0xffffn) return [insn('mov', 'x0', `#${value}`)];
  const parts = halves16(value);
  const lines: AsmLine[] = [];
  parts.forEach((half, i) => {
    if (half === 0) return;
    const shift = i * 16;
    const ops = shift === 0 ? ['x0', hex16(half)] : ['x0', hex16(half), `lsl #${shift}`];
    lines.push(insn(lines.length === 0 ? 'movz' : 'movk', ...ops));
  });
  return lines;
}

/**
 * AArch64 AAPCS64 (ELF) and Apple arm64, as accepted by GNU as and clang.
 *
 * The integer return value lives in `x0`; the prologue saves the frame pointer and link register.
 */
export function aarch64Target(os: TargetOs): Target {
  return {
    id: `aarch64-${os}`,
    arch: 'aarch64',
    os,
    commentPrefix: '//',
    symbolName: (name) => cSymbol(os, name),
    localLabel: (name) => cLocalLabel(os, name),
    fileHeader: () => [directive('.text')],
    fileTrailer: () =>
      os === 'linux'
        ? [directive('.section', '.note.GNU-stack', '""', '%progbits')]
        : [directive('.subsections_via_symbols')],
    functionHeader(symbol) {
      const lines: AsmLine[] = [directive('.globl', symbol)];
      if (os === 'linux') lines.push(directive('.type', symbol, '%function'));
      lines.push(directive('.p2align', '2'));
      lines.push({ kind: 'label', name: symbol });
      return lines;
    },
    functionTrailer: (symbol) => (os === 'linux' ? [directive('.size', symbol, `.-${symbol}`)] : []),
    prologue: () => [insn('stp', 'x29', 'x30', '[sp, #-16]!'), insn('mov', 'x29', 'sp')],
    loadReturnValue: loadX0,
    jump: (label) => insn('b', label),
    epilogue: () => [insn('ldp', 'x29', 'x30', '[sp]', '#16'), insn('ret')],
  };
}
