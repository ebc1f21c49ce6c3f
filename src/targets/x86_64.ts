import type { AsmLine } from '../formats/types.js';
import { cLocalLabel, cSymbol, directive, insn } from './shared.js';
import type { Target, TargetOs } from './types.js';

const UINT32_MAX = 0xffff_ffffn;

/**
 * x86-64 System V (ELF) and Darwin, AT&T syntax as accepted by GNU as and clang.
 *
 * The integer return value lives in `%rax`. Writing `%eax` zero-extends into the full register,
 * so any value that fits 32 unsigned bits uses the shorter `movl` encoding.
 */
export function x86_64Target(os: TargetOs): Target {
  return {
    id: `x86_64-${os}`,
    arch: 'x86_64',
    os,
    commentPrefix: '#',
    symbolName: (name) => cSymbol(os, name),
    localLabel: (name) => cLocalLabel(os, name),
    fileHeader: () => [directive('.text')],
    fileTrailer: () =>
      os === 'linux'
        ? [directive('.section', '.note.GNU-stack', '""', '@progbits')]
        : [directive('.subsections_via_symbols')],
    functionHeader(symbol) {
      const lines: AsmLine[] = [directive('.globl', symbol)];
      if (os === 'linux') lines.push(directive('.type', symbol, '@function'));
      lines.push(directive('.p2align', '4', '0x90'));
      lines.push({ kind: 'label', name: symbol });
      return lines;
    },
    functionTrailer: (symbol) => (os === 'linux' ? [directive('.size', symbol, `.-${symbol}`)] : []),
    prologue: () => [insn('pushq', '%rbp'), insn('movq', '%rsp', '%rbp')],
    loadReturnValue(value) {
      if (value === 0n) return [insn('xorl', '%eax', '%eax')];
      if (value <= UINT32_MAX) return [insn('movl', `$${value}`, '%eax')];
      return [insn('movabsq', `$${value}`, '%rax')];
    },
    jump: (label) => insn('jmp', label),
    epilogue: () => [insn('popq', '%rbp'), insn('retq')],
  };
}
