import type { AsmLine } from '../formats/types.js';
import type { TargetOs } from './types.js';

export function insn(mnemonic: string, ...operands: string[]): AsmLine {
  return { kind: 'instruction', mnemonic, operands };
}

export function directive(name: string, ...args: string[]): AsmLine {
  return args.length > 0 ? { kind: 'directive', name, args } : { kind: 'directive', name };
}

/** Mach-O prefixes C symbols with `_`; ELF uses the name as written. */
export function cSymbol(os: TargetOs, name: string): string {
  return os === 'macos' ? `_${name}` : name;
}

/** Assembler-local labels: `.L` on ELF, `L` on Mach-O. */
export function cLocalLabel(os: TargetOs, name: string): string {
  return os === 'macos' ? `L${name}` : `.L${name}`;
}

/** Split a non-negative 64-bit value into four 16-bit halves, least significant first. */
export function halves16(value: bigint): number[] {
  const out: number[] = [];
  for (let shift = 0n; shift < 64n; shift += 16n) {
    out.push(Number((value >> shift) & 0xffffn));
  }
  return out;
}
