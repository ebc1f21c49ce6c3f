import type { ProgramNode } from '../frontend/ast.js';
import type { Token } from '../frontend/tokens.js';
import type { TargetId } from '../targets/types.js';

/**
 * One line of generated assembly, kept structured until a writer renders it for a target.
 */
export type AsmLine =
  | { kind: 'comment'; text: string }
  | { kind: 'directive'; name: string; args?: string[] }
  | { kind: 'label'; name: string }
  | { kind: 'instruction'; mnemonic: string; operands: string[] }
  | { kind: 'blank' };

/**
 * Lowered program for one target, in emission order.
 */
export interface AsmProgram {
  target: TargetId;
  lines: AsmLine[];
}

/**
 * Options for `.s` rendering.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory assembly source artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory token dump (one token per line).
 */
export interface TokensArtifact {
  kind: 'tokens';
  path?: string;
  text: string;
}

/**
 * In-memory AST dump. Integer values are stored as decimal strings.
 */
export interface AstArtifact {
  kind: 'ast';
  path?: string;
  json: AstJson;
}

export type AstJson = {
  format: 'mincc-ast';
  version: 1;
  program: unknown;
};

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact | TokensArtifact | AstArtifact;

/**
 * Format writers used by the pipeline to turn compiler stage outputs into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeTokens?(tokens: Iterable<Token>): TokensArtifact;
  writeAst?(program: ProgramNode): AstArtifact;
}

