import type { AsmLine } from '../formats/types.js';

export type Arch = 'x86_64' | 'aarch64';
export type TargetOs = 'linux' | 'macos';
export type TargetId = `${Arch}-${TargetOs}`;

/**
 * Calling-convention and assembler-syntax knowledge for one architecture/OS pair.
 *
 * Lowering decides *what* happens (which value is returned, where control goes);
 * the target decides how that is spelled for its assembler.
 */
export interface Target {
  id: TargetId;
  arch: Arch;
  os: TargetOs;
  /** Line-comment introducer understood by the target assembler. */
  commentPrefix: string;
  /** Linker-visible name for a source-level function name. */
  symbolName(name: string): string;
  /** Assembler-local label name (not placed in the symbol table). */
  localLabel(name: string): string;
  fileHeader(): AsmLine[];
  fileTrailer(): AsmLine[];
  functionHeader(symbol: string): AsmLine[];
  functionTrailer(symbol: string): AsmLine[];
  /** Save the caller's frame and establish a new one. */
  prologue(): AsmLine[];
  /** Place a non-negative 64-bit value in the integer return register. */
  loadReturnValue(value: bigint): AsmLine[];
  jump(label: string): AsmLine;
  /** Restore the caller's frame and return. */
  epilogue(): AsmLine[];
}
